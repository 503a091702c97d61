import { Pymon } from './actor';
import { InvalidSelectionError } from './errors';
import { logger } from './logger';

/**
 * The player's Pymons: one active, the rest on an ordered bench.
 * Captures join the back of the bench; defeat promotes from the front.
 */
export class CreatureRoster {
    private activePymon: Pymon;
    private readonly pets: Pymon[] = [];

    constructor(active: Pymon, pets: Pymon[] = []) {
        this.activePymon = active;
        this.pets.push(...pets);
    }

    get active(): Pymon {
        return this.activePymon;
    }

    bench(): readonly Pymon[] {
        return this.pets;
    }

    capture(pymon: Pymon): void {
        this.pets.push(pymon);
        logger.log(`[Roster] Captured ${pymon.nickname}, bench size ${this.pets.length}`);
    }

    /**
     * Replace the active Pymon with the first benched one. The outgoing Pymon is
     * not kept. Returns null when the bench is empty.
     */
    promoteNext(): Pymon | null {
        const next = this.pets.shift();
        if (!next) return null;
        logger.log(`[Roster] ${next.nickname} replaces ${this.activePymon.nickname}`);
        this.activePymon = next;
        return next;
    }

    /**
     * Make the benched Pymon at `index` (zero-based) active; the previous active
     * one goes to the back of the bench. Throws InvalidSelectionError and changes
     * nothing when the index does not name a benched Pymon.
     */
    switchTo(index: number): { previous: Pymon; current: Pymon } {
        if (this.pets.length === 0) {
            throw new InvalidSelectionError("You don't have any other Pymon.");
        }
        if (!Number.isInteger(index) || index < 0 || index >= this.pets.length) {
            throw new InvalidSelectionError(`Invalid selection: ${index + 1}. Choose a Pymon between 1 and ${this.pets.length}.`);
        }
        const [selected] = this.pets.splice(index, 1);
        const previous = this.activePymon;
        this.pets.push(previous);
        this.activePymon = selected;
        logger.log(`[Roster] Switched from ${previous.nickname} to ${selected.nickname}`);
        return { previous, current: selected };
    }
}
