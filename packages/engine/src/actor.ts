import type { Location } from './location';
import { Item } from './item';
import { ENERGY_MAX } from './constants';
import { CreatureRecord, CreatureView, PymonView } from './types';

/**
 * State only player-controlled creatures carry.
 */
export class PlayerState {
    energy: number;
    inventory: Item[];
    moveCount: number; // Successful moves since energy was last drained
    immune: boolean; // Set by a magic potion, consumed by the next battle

    constructor(data: { energy?: number; inventory?: Item[]; moveCount?: number; immune?: boolean } = {}) {
        this.energy = clampEnergy(data.energy ?? ENERGY_MAX);
        this.inventory = [...(data.inventory ?? [])];
        this.moveCount = data.moveCount ?? 0;
        this.immune = data.immune ?? false;
    }

    gainEnergy(amount: number = 1): void {
        this.energy = clampEnergy(this.energy + amount);
    }

    drainEnergy(amount: number = 1): void {
        this.energy = clampEnergy(this.energy - amount);
    }
}

function clampEnergy(value: number): number {
    return Math.max(0, Math.min(ENERGY_MAX, Math.trunc(value)));
}

/**
 * Anything that can stand in a location. The location's creature list owns
 * presence; `location` is only a back reference.
 */
export class Actor {
    readonly nickname: string;
    readonly description: string;
    readonly adoptable: boolean;
    location: Location | null;
    player: PlayerState | null;

    constructor(data: {
        nickname: string;
        description: string;
        adoptable?: boolean;
        location?: Location | null;
        player?: PlayerState | null;
    }) {
        this.nickname = data.nickname;
        this.description = data.description;
        this.adoptable = data.adoptable ?? false;
        this.location = data.location ?? null;
        this.player = data.player ?? null;
    }

    static fromRecord(record: CreatureRecord): Actor {
        return new Actor({
            nickname: record.nickname,
            description: record.description,
            adoptable: record.adoptable
        });
    }

    toView(): CreatureView {
        return {
            nickname: this.nickname,
            description: this.description,
            adoptable: this.adoptable
        };
    }
}

export type Pymon = Actor & { player: PlayerState };

export function isPymon(actor: Actor): actor is Pymon {
    return actor.player !== null;
}

export function createPymon(data: {
    nickname: string;
    description: string;
    location?: Location | null;
    energy?: number;
}): Pymon {
    const player = new PlayerState({ energy: data.energy });
    const actor = new Actor({
        nickname: data.nickname,
        description: data.description,
        location: data.location ?? null,
        player
    });
    if (!isPymon(actor)) {
        throw new Error(`Failed to create Pymon ${data.nickname}`);
    }
    return actor;
}

/**
 * A defeated wild creature joins the player as a fresh Pymon at full energy.
 */
export function adoptCreature(creature: Actor): Pymon {
    return createPymon({
        nickname: creature.nickname,
        description: creature.description,
        location: creature.location,
        energy: ENERGY_MAX
    });
}

export function toPymonView(pymon: Pymon): PymonView {
    return {
        nickname: pymon.nickname,
        description: pymon.description,
        energy: pymon.player.energy,
        immune: pymon.player.immune,
        location: pymon.location?.name ?? null,
        inventory: pymon.player.inventory.map(item => item.toView())
    };
}
