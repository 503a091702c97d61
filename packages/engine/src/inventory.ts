import { Pymon } from './actor';
import { Item, findItem, removeItem } from './item';
import { Location } from './location';
import { ENERGY_MAX } from './constants';
import { CommandResult, Direction, ItemView, LocationView, failure, isDirection, success } from './types';
import { logger } from './logger';

export type LookTarget = 'current' | Direction;

export interface UseItemOptions {
    /** Where a binocular looks. Defaults to the current location. */
    look?: string;
}

export interface ItemUseReport {
    item: string;
    consumed: boolean;
    energy: number;
    immune: boolean;
    /** Filled by items that reveal a location. */
    inspection: { target: LookTarget; location: LocationView | null } | null;
}

interface ItemEffectOutcome {
    consumed: boolean;
    narrative: string;
    inspection?: ItemUseReport['inspection'];
}

export type ItemEffect = (pymon: Pymon, options: UseItemOptions) => ItemEffectOutcome;

const eatApple: ItemEffect = (pymon) => {
    if (pymon.player.energy >= ENERGY_MAX) {
        return { consumed: false, narrative: 'Energy is already at maximum.' };
    }
    pymon.player.gainEnergy(1);
    return { consumed: true, narrative: 'Your Pymon ate the apple. Energy increased by 1.' };
};

const drinkMagicPotion: ItemEffect = (pymon) => {
    pymon.player.immune = true;
    return { consumed: true, narrative: 'Drank a magic potion. Temporary immunity activated for the next battle.' };
};

const lookThroughBinocular: ItemEffect = (pymon, options) => {
    const current = pymon.location;
    const look = (options.look ?? 'current').trim().toLowerCase();

    if (look === 'current') {
        return {
            consumed: true,
            narrative: 'You look around the current location. The binocular has been used up.',
            inspection: { target: 'current', location: current ? current.toView(pymon) : null }
        };
    }

    const neighbour = current && isDirection(look) ? current.getDoor(look) : null;
    if (!neighbour || !isDirection(look)) {
        return {
            consumed: true,
            narrative: `This direction (${look}) leads nowhere. The binocular has been used up.`,
            inspection: null
        };
    }
    return {
        consumed: true,
        narrative: `You look ${look} and see ${neighbour.name}. The binocular has been used up.`,
        inspection: { target: look, location: neighbour.toView() }
    };
};

/**
 * Item name (lower case) → effect. Items without an entry can be carried but do nothing.
 */
export const ITEM_EFFECTS: ReadonlyMap<string, ItemEffect> = new Map([
    ['apple', eatApple],
    ['magic potion', drinkMagicPotion],
    ['binocular', lookThroughBinocular]
]);

/**
 * Move an item from a location into a Pymon's inventory.
 */
export function pickItem(location: Location, pymon: Pymon, itemName: string): CommandResult<ItemView> {
    const item = location.findItem(itemName);
    if (!item) {
        return failure('InvalidSelection', `${itemName} is not available here.`);
    }
    if (!item.pickable) {
        return failure('InvalidSelection', `${item.name} cannot be picked up.`);
    }
    location.removeItem(item);
    pymon.player.inventory.push(item);
    logger.log(`[Inventory] ${pymon.nickname} picked up ${item.name} at ${location.name}`);
    return success(`${item.name} has been added to your inventory.`, item.toView());
}

export function useItem(
    pymon: Pymon,
    itemName: string,
    options: UseItemOptions = {},
    effects: ReadonlyMap<string, ItemEffect> = ITEM_EFFECTS
): CommandResult<ItemUseReport> {
    const item: Item | undefined = findItem(pymon.player.inventory, itemName);
    if (!item) {
        return failure('InvalidSelection', `This ${itemName} is not in your inventory.`);
    }

    const effect = effects.get(item.name.toLowerCase());
    const outcome: ItemEffectOutcome = effect
        ? effect(pymon, options)
        : { consumed: false, narrative: `Nothing happens when you use the ${item.name}.` };

    if (outcome.consumed) {
        removeItem(pymon.player.inventory, item);
    }
    logger.log(`[Inventory] ${pymon.nickname} used ${item.name}, consumed: ${outcome.consumed}`);

    return success(outcome.narrative, {
        item: item.name,
        consumed: outcome.consumed,
        energy: pymon.player.energy,
        immune: pymon.player.immune,
        inspection: outcome.inspection ?? null
    });
}

/**
 * Hand a whole inventory over to another Pymon, leaving the source empty.
 */
export function transferInventory(from: Pymon, to: Pymon): void {
    to.player.inventory.push(...from.player.inventory);
    from.player.inventory.length = 0;
}
