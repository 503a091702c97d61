import { describe, it, expect } from 'vitest';
import { loadConfig } from '@/config';
import { InvalidConfigError } from '@/errors';
import { createRandom, createSeededRandom, pick } from '@/rng';

describe('Config', () => {
    it('should fall back to defaults', () => {
        expect(loadConfig({})).toEqual({
            title: 'Pymon World',
            pymonNickname: 'Kimimon',
            pymonDescription: 'White and yellow with a long tail. Your loyal companion.',
            dataFiles: {
                locations: 'data/locations.csv',
                creatures: 'data/creatures.csv',
                items: 'data/items.csv'
            },
            seed: undefined
        });
    });

    it('should read overrides from the environment', () => {
        const config = loadConfig({
            PYMON_NICKNAME: 'Testmon',
            PYMON_LOCATIONS_FILE: 'fixtures/rooms.csv',
            PYMON_SEED: '42'
        });

        expect(config.pymonNickname).toBe('Testmon');
        expect(config.dataFiles.locations).toBe('fixtures/rooms.csv');
        expect(config.dataFiles.items).toBe('data/items.csv');
        expect(config.seed).toBe(42);
    });

    it('should reject a seed that is not a whole number', () => {
        expect(() => loadConfig({ PYMON_SEED: 'abc' })).toThrow(InvalidConfigError);
        expect(() => loadConfig({ PYMON_SEED: 'abc' })).toThrow(
            'Invalid configuration: PYMON_SEED: Expected number, received nan'
        );
        expect(() => loadConfig({ PYMON_SEED: '1.5' })).toThrow(InvalidConfigError);
    });

    it('should name the variable behind an empty override', () => {
        expect(() => loadConfig({ PYMON_ITEMS_FILE: '' })).toThrow('Invalid configuration: PYMON_ITEMS_FILE:');
    });
});

describe('Random', () => {
    it('should repeat a sequence for the same seed', () => {
        const first = createSeededRandom(7);
        const second = createRandom(7);

        const a = [first.next(), first.next(), first.next()];
        const b = [second.next(), second.next(), second.next()];

        expect(a).toEqual(b);
        for (const value of a) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });

    it('should pick by position and refuse an empty list', () => {
        expect(pick({ next: () => 0.99 }, ['a', 'b', 'c'])).toBe('c');
        expect(pick({ next: () => 0 }, ['a', 'b', 'c'])).toBe('a');
        expect(() => pick({ next: () => 0 }, [])).toThrow(RangeError);
    });
});
