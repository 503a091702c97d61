import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { InvalidInputFormatError } from '@/errors';
import { loadRecords, parseCreatures, parseItems, parseLocations } from '@/loader';

const LOCATIONS = [
    'name,description,west,north,east,south',
    'Forest,A dense forest,west = None,north = None,east = Cave,south = None',
    '',
    'Cave,A dark cave,west = Forest,north = None,east = None,south = None'
].join('\n');

function dataFile(name: string): string {
    return fileURLToPath(new URL(`../../../data/${name}`, import.meta.url));
}

describe('Loader', () => {
    describe('parseLocations', () => {
        it('should read doors written as "direction = Name" or None', () => {
            expect(parseLocations(LOCATIONS)).toEqual([
                { name: 'Forest', description: 'A dense forest', west: null, north: null, east: 'Cave', south: null },
                { name: 'Cave', description: 'A dark cave', west: 'Forest', north: null, east: null, south: null }
            ]);
        });

        it('should accept bare door names and headers in any case', () => {
            const text = 'Name,Description,West,North,East,South\nForest,Trees,,Cave,,\nCave,Rocks,,,,Forest\n';

            expect(parseLocations(text)[0]).toEqual({
                name: 'Forest', description: 'Trees', west: null, north: 'Cave', east: null, south: null
            });
        });

        it('should report a missing column', () => {
            expect(() => parseLocations('name,description,west,north,east\nForest,Trees,None,None,None')).toThrow(
                'locations.csv has invalid content or is in an incorrect format: Missing required column "south" in header'
            );
        });

        it('should report a row with too few columns', () => {
            expect(() => parseLocations('name,description,west,north,east,south\nForest,Trees,None')).toThrow(
                'locations.csv has invalid content or is in an incorrect format: Line 2: Expected 6 columns, got 3'
            );
        });

        it('should report an empty name', () => {
            expect(() => parseLocations('name,description,west,north,east,south\n,Trees,None,None,None,None')).toThrow(
                'Line 2: Name cannot be empty'
            );
        });

        it('should report an empty file', () => {
            expect(() => parseLocations('\n\n', 'mine.csv')).toThrow(
                'mine.csv has invalid content or is in an incorrect format: File is empty'
            );
        });

        it('should report duplicate names and doors to unknown locations', () => {
            expect(() => parseLocations(`${LOCATIONS}\nCave,Another cave,None,None,None,None`)).toThrow(
                'Duplicate location name "Cave"'
            );
            expect(() => parseLocations('name,description,west,north,east,south\nForest,Trees,None,Lake,None,None')).toThrow(
                'Location "Forest" has a north door to unknown location "Lake"'
            );
        });
    });

    describe('parseCreatures and parseItems', () => {
        it('should read yes and no flags', () => {
            const creatures = parseCreatures('nickname,description,adoptable\nSheep,A fluffy sheep,no\nSparkymon,Bright yellow,Yes\n');
            const items = parseItems('name,description,pickable,consumable\ntree,A tall oak,no,no\napple,A red apple,yes,yes\n');

            expect(creatures).toEqual([
                { nickname: 'Sheep', description: 'A fluffy sheep', adoptable: false },
                { nickname: 'Sparkymon', description: 'Bright yellow', adoptable: true }
            ]);
            expect(items).toEqual([
                { name: 'tree', description: 'A tall oak', pickable: false, consumable: false },
                { name: 'apple', description: 'A red apple', pickable: true, consumable: true }
            ]);
        });
    });

    describe('Malformed rows', () => {
        it('should report a row with more cells than the header', () => {
            expect(() => parseCreatures('nickname,description,adoptable\nCocomon,Brown, round and friendly,yes')).toThrow(
                'creatures.csv has invalid content or is in an incorrect format: Line 2: Expected 3 columns, got 4'
            );
        });

        it('should report flags other than yes or no', () => {
            expect(() => parseItems('name,description,pickable,consumable\napple,A red apple,sure,Y')).toThrow(
                'items.csv has invalid content or is in an incorrect format: Line 2: Pickable must be yes or no; Consumable must be yes or no'
            );
            expect(() => parseCreatures('nickname,description,adoptable\nSparkymon,Bright yellow,maybe')).toThrow(
                'Line 2: Adoptable must be yes or no'
            );
        });

        it('should accept flags in any case', () => {
            expect(parseItems('name,description,pickable,consumable\napple,A red apple, YES ,No')).toEqual([
                { name: 'apple', description: 'A red apple', pickable: true, consumable: false }
            ]);
        });
    });

    describe('loadRecords', () => {
        it('should load the bundled data files', async () => {
            const records = await loadRecords({
                locations: dataFile('locations.csv'),
                creatures: dataFile('creatures.csv'),
                items: dataFile('items.csv')
            });

            expect(records.locations.map(location => location.name)).toEqual(['Playground', 'Beach', 'School', 'Forest', 'Cave']);
            expect(records.locations[3].east).toBe('Cave');
            expect(records.creatures.filter(creature => creature.adoptable)).toHaveLength(3);
            expect(records.items.map(item => item.name)).toContain('magic potion');
        });

        it('should turn a missing file into an input format error', async () => {
            await expect(loadRecords({
                locations: dataFile('no-such-file.csv'),
                creatures: dataFile('creatures.csv'),
                items: dataFile('items.csv')
            })).rejects.toBeInstanceOf(InvalidInputFormatError);
        });
    });
});
