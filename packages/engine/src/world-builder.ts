import { Actor, createPymon } from './actor';
import { Item } from './item';
import { Location } from './location';
import { WorldGraph } from './world-graph';
import { CreatureRoster } from './roster';
import { GameSession } from './game-session';
import { BattleStats } from './battle-stats';
import { DIRECTIONS, GameRecords } from './types';
import { DUPLICATE_CONSUMABLE_CHANCE, DEFAULT_PYMON_DESCRIPTION, DEFAULT_PYMON_NICKNAME } from './constants';
import { InvalidInputFormatError } from './errors';
import { Random, pick } from './rng';
import { logger } from './logger';

export interface BuildOptions {
    random: Random;
    pymonNickname?: string;
    pymonDescription?: string;
    clock?: () => Date;
}

/**
 * Create every location, then wire the declared doors with `connect`, so a door
 * declared on either side opens both ways.
 */
export function buildWorldGraph(records: GameRecords, random: Random): WorldGraph {
    if (records.locations.length === 0) {
        throw new InvalidInputFormatError('locations.csv', 'No locations found in locations file');
    }

    const world = new WorldGraph(random);
    for (const record of records.locations) {
        world.addLocation(new Location(record.name, record.description));
    }
    for (const record of records.locations) {
        const location = world.getLocation(record.name);
        if (!location) continue;
        for (const direction of DIRECTIONS) {
            const targetName = record[direction];
            if (targetName === null) continue;
            const target = world.getLocation(targetName);
            if (!target) {
                throw new InvalidInputFormatError('locations.csv', `Location "${record.name}" has a ${direction} door to unknown location "${targetName}"`);
            }
            world.connect(location, direction, target);
        }
    }
    return world;
}

/**
 * Build a ready-to-play session: the player's Pymon, every creature and every
 * item land in uniformly random locations. Each consumable item gets a second
 * copy in another random draw half of the time.
 */
export function createGameSession(records: GameRecords, options: BuildOptions): GameSession {
    const { random } = options;
    const world = buildWorldGraph(records, random);
    const locations = world.locations();

    const pymon = createPymon({
        nickname: options.pymonNickname ?? DEFAULT_PYMON_NICKNAME,
        description: options.pymonDescription ?? DEFAULT_PYMON_DESCRIPTION
    });
    world.place(pymon, pick(random, locations));

    for (const record of records.creatures) {
        world.place(Actor.fromRecord(record), pick(random, locations));
    }

    for (const record of records.items) {
        const item = new Item(record);
        pick(random, locations).addItem(item);
        if (item.consumable && random.next() < DUPLICATE_CONSUMABLE_CHANCE) {
            pick(random, locations).addItem(item.clone());
        }
    }

    logger.log(`[WorldBuilder] ${pymon.nickname} starts at ${pymon.location?.name ?? 'nowhere'}`);
    return new GameSession({
        world,
        roster: new CreatureRoster(pymon),
        random,
        stats: new BattleStats(options.clock)
    });
}
