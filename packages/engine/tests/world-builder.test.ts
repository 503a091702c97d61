import { describe, it, expect } from 'vitest';
import { InvalidInputFormatError } from '@/errors';
import type { GameRecords } from '@/types';
import { buildWorldGraph, createGameSession } from '@/world-builder';
import { scriptedRandom } from './helpers/test-helpers';

function records(): GameRecords {
    return {
        locations: [
            { name: 'Forest', description: 'A dense forest', west: null, north: null, east: 'Cave', south: null },
            { name: 'Cave', description: 'A dark cave', west: null, north: null, east: null, south: null }
        ],
        creatures: [{ nickname: 'Sheep', description: 'A fluffy sheep', adoptable: false }],
        items: [
            { name: 'apple', description: 'A red apple', pickable: true, consumable: true },
            { name: 'tree', description: 'A tall oak', pickable: false, consumable: false }
        ]
    };
}

describe('WorldBuilder', () => {
    describe('buildWorldGraph', () => {
        it('should open a door declared on one side both ways', () => {
            const world = buildWorldGraph(records(), scriptedRandom([]));

            expect(world.getLocation('Forest')?.getDoor('east')?.name).toBe('Cave');
            expect(world.getLocation('Cave')?.getDoor('west')?.name).toBe('Forest');
        });

        it('should refuse data without locations', () => {
            expect(() => buildWorldGraph({ ...records(), locations: [] }, scriptedRandom([]))).toThrow(InvalidInputFormatError);
        });

        it('should refuse a door to an unknown location', () => {
            const data = records();
            data.locations[1].south = 'Lake';

            expect(() => buildWorldGraph(data, scriptedRandom([]))).toThrow(
                'Location "Cave" has a south door to unknown location "Lake"'
            );
        });
    });

    describe('createGameSession', () => {
        it('should place the Pymon, creatures and items with random draws', () => {
            // Pymon, Sheep, apple, duplicate roll, apple copy, tree
            const random = scriptedRandom([0, 0.6, 0, 0.3, 0.9, 0.6]);

            const session = createGameSession(records(), { random, pymonNickname: 'Testmon', pymonDescription: 'A test Pymon' });

            expect(random.remaining()).toBe(0);
            expect(session.activePymon()).toEqual({
                nickname: 'Testmon',
                description: 'A test Pymon',
                energy: 3,
                immune: false,
                location: 'Forest',
                inventory: []
            });
            const forest = session.world.getLocation('Forest');
            const cave = session.world.getLocation('Cave');
            expect(forest?.creatures.map(creature => creature.nickname)).toEqual(['Testmon']);
            expect(cave?.creatures.map(creature => creature.nickname)).toEqual(['Sheep']);
            expect(forest?.items.map(item => item.name)).toEqual(['apple']);
            expect(cave?.items.map(item => item.name)).toEqual(['apple', 'tree']);
            expect(cave?.items[0]).not.toBe(forest?.items[0]);
        });

        it('should skip the copy when the duplicate roll fails', () => {
            const random = scriptedRandom([0, 0, 0, 0.5, 0]);

            const session = createGameSession(records(), { random });

            expect(random.remaining()).toBe(0);
            expect(session.activePymon().nickname).toBe('Kimimon');
            expect(session.world.getLocation('Forest')?.items.map(item => item.name)).toEqual(['apple', 'tree']);
            expect(session.world.getLocation('Cave')?.items).toEqual([]);
        });
    });
});
