import { Actor, Pymon } from './actor';
import { Location } from './location';
import { MOVES_PER_ENERGY } from './constants';
import { CommandResult, failure, isDirection, success } from './types';
import { Random, pick } from './rng';
import { logger } from './logger';

export interface MoveReport {
    from: string;
    to: string;
    /** Energy was drained by this move. */
    drained: boolean;
    energy: number;
    /** Where the Pymon escaped to after running out of energy. */
    relocatedTo: string | null;
    /** Energy ran out but no door led anywhere, so the Pymon stayed put. */
    stranded: boolean;
}

/**
 * Owns every location of a session and the placement of creatures in them.
 */
export class WorldGraph {
    private readonly byName = new Map<string, Location>();

    constructor(private readonly random: Random) {}

    addLocation(location: Location): void {
        if (this.byName.has(location.name)) {
            throw new Error(`Location already exists: ${location.name}`);
        }
        this.byName.set(location.name, location);
    }

    getLocation(name: string): Location | undefined {
        return this.byName.get(name);
    }

    locations(): Location[] {
        return Array.from(this.byName.values());
    }

    /**
     * Symmetric connection; throws InvalidDirectionError for a non-cardinal direction.
     */
    connect(location: Location, direction: string, other: Location): void {
        location.connect(direction, other);
    }

    neighbours(location: Location): Location[] {
        return location.neighbours();
    }

    /**
     * Put a creature into a location, taking it out of wherever it was.
     */
    place(actor: Actor, location: Location): void {
        if (actor.location) {
            actor.location.removeCreature(actor);
        }
        location.addCreature(actor);
        actor.location = location;
    }

    /**
     * Take a creature out of the world entirely.
     */
    remove(actor: Actor): void {
        if (actor.location) {
            actor.location.removeCreature(actor);
        }
        actor.location = null;
    }

    move(pymon: Pymon, direction: string): CommandResult<MoveReport> {
        const from = pymon.location;
        if (!from) {
            return failure('InvalidDirection', `${pymon.nickname} is not anywhere in the world.`);
        }
        const normalized = direction.trim().toLowerCase();
        if (!isDirection(normalized)) {
            logger.warn(`[WorldGraph] Rejected direction: ${direction}`);
            return failure('InvalidDirection', `Direction - ${direction} does not contain any location.`);
        }
        const destination = from.getDoor(normalized);
        if (!destination) {
            return failure('InvalidDirection', `Direction - ${normalized} does not contain any location.`);
        }

        this.place(pymon, destination);
        const state = pymon.player;
        state.moveCount += 1;

        const report: MoveReport = {
            from: from.name,
            to: destination.name,
            drained: false,
            energy: state.energy,
            relocatedTo: null,
            stranded: false
        };
        let narrative = `You moved to: ${destination.name}.`;

        if (state.moveCount >= MOVES_PER_ENERGY) {
            state.moveCount = 0;
            state.drainEnergy(1);
            report.drained = true;
            report.energy = state.energy;
            narrative += ` Your Pymon's energy decreased by 1. Current energy: ${state.energy}.`;

            if (state.energy <= 0) {
                const escape = this.forceRelocate(pymon);
                if (escape) {
                    report.relocatedTo = escape.name;
                    narrative += ` ${pymon.nickname} has escaped to ${escape.name} due to lack of energy.`;
                } else {
                    report.stranded = true;
                    narrative += ` ${pymon.nickname} is out of energy and has nowhere to escape to.`;
                }
            }
        }

        logger.log(`[WorldGraph] ${pymon.nickname} moved ${normalized}:`, report);
        return success(narrative, report);
    }

    /**
     * Move an exhausted Pymon through a random open door of its current location.
     * Returns null, leaving it in place, when there is no open door.
     */
    private forceRelocate(pymon: Pymon): Location | null {
        const current = pymon.location;
        if (!current) return null;
        const options = this.neighbours(current);
        if (options.length === 0) {
            logger.warn(`[WorldGraph] ${pymon.nickname} is stranded at ${current.name}`);
            return null;
        }
        const target = pick(this.random, options);
        this.place(pymon, target);
        return target;
    }
}
