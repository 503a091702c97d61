/** Upper bound of a Pymon's energy; captured Pymons start here. */
export const ENERGY_MAX = 3;

/** Successful moves that cost one point of energy. */
export const MOVES_PER_ENERGY = 2;

/** Round wins needed to capture an opponent. */
export const WINS_TO_CAPTURE = 2;

/** Round losses that end a battle in defeat. */
export const LOSSES_TO_DEFEAT = 2;

/** Chance that a consumable item gets a second copy during world setup. */
export const DUPLICATE_CONSUMABLE_CHANCE = 0.5;

export const DEFAULT_PYMON_NICKNAME = 'Kimimon';
export const DEFAULT_PYMON_DESCRIPTION = 'White and yellow with a long tail. Your loyal companion.';
