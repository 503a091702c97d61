import { Actor, createPymon } from '@/actor';
import type { Pymon } from '@/actor';
import { Battle, Hand } from '@/battle';
import { BattleStats } from '@/battle-stats';
import { GameSession } from '@/game-session';
import { Item } from '@/item';
import { Location } from '@/location';
import { Random } from '@/rng';
import { CreatureRoster } from '@/roster';
import { WorldGraph } from '@/world-graph';

/**
 * A Random that returns the given values in order and throws once they run out,
 * so a test fails loudly on an unexpected draw.
 */
export function scriptedRandom(values: number[]): Random & { remaining(): number } {
    const queue = [...values];
    return {
        next(): number {
            const value = queue.shift();
            if (value === undefined) {
                throw new Error('Scripted random exhausted');
            }
            return value;
        },
        remaining: () => queue.length
    };
}

/**
 * Draw that makes `pick(random, HANDS)` return the given hand.
 */
export function handDraw(hand: Hand): number {
    return { rock: 0, paper: 0.4, scissors: 0.8 }[hand];
}

export function createTestItem(name: string, overrides: Partial<{ description: string; pickable: boolean; consumable: boolean }> = {}): Item {
    return new Item({
        name,
        description: overrides.description ?? `A test ${name}`,
        pickable: overrides.pickable ?? true,
        consumable: overrides.consumable ?? true
    });
}

export function createTestCreature(nickname: string, adoptable: boolean = true): Actor {
    return new Actor({ nickname, description: `A test creature called ${nickname}`, adoptable });
}

/**
 * Playground -north-> Forest -east-> Cave, with Beach west of the Playground.
 */
export function createTestWorld(random: Random = scriptedRandom([])) {
    const world = new WorldGraph(random);
    const playground = new Location('Playground', 'A small playground');
    const forest = new Location('Forest', 'A dense forest');
    const cave = new Location('Cave', 'A dark cave');
    const beach = new Location('Beach', 'A sunny beach');
    for (const location of [playground, forest, cave, beach]) {
        world.addLocation(location);
    }
    world.connect(playground, 'north', forest);
    world.connect(forest, 'east', cave);
    world.connect(playground, 'west', beach);
    return { world, playground, forest, cave, beach };
}

export interface TestSession {
    session: GameSession;
    pymon: Pymon;
    world: WorldGraph;
    playground: Location;
    forest: Location;
    cave: Location;
    beach: Location;
    stats: BattleStats;
}

/**
 * A session on the test world with the active Pymon "Kimimon" in the Playground.
 */
export function createTestSession(random: Random = scriptedRandom([]), options: { energy?: number; clock?: () => Date } = {}): TestSession {
    const layout = createTestWorld(random);
    const pymon = createPymon({ nickname: 'Kimimon', description: 'The starter', energy: options.energy });
    layout.world.place(pymon, layout.playground);
    const stats = new BattleStats(options.clock ?? (() => new Date(2024, 0, 5, 14, 7)));
    const session = new GameSession({
        world: layout.world,
        roster: new CreatureRoster(pymon),
        random,
        stats
    });
    return { session, pymon, stats, ...layout };
}

/**
 * Start a battle against `opponent` (placed beside the active Pymon) and return it.
 */
export function startTestBattle(test: TestSession, opponent: Actor): Battle {
    const location = test.pymon.location ?? test.playground;
    test.world.place(opponent, location);
    const result = test.session.challenge(opponent.nickname);
    if (result.outcome !== 'success' || result.data.kind !== 'battle') {
        throw new Error(`Expected a battle against ${opponent.nickname}, got: ${result.narrative}`);
    }
    return result.data.battle;
}
