import { describe, it, expect } from 'vitest';
import { parseInput } from '../src/utils/input-parser';

const aliases = {
    singleWords: new Set(['look', 'pick', 'use', 'go']),
    phrasalVerbs: new Set(['pick up', 'look around'])
};

describe('parseInput', () => {
    it('should split the verb from the target', () => {
        expect(parseInput('use Magic   Potion', aliases)).toEqual({ verb: 'use', target: 'Magic Potion' });
    });

    it('should prefer a phrasal verb over its first word', () => {
        expect(parseInput('Pick Up apple', aliases)).toEqual({ verb: 'pick up', target: 'apple' });
        expect(parseInput('pick apple', aliases)).toEqual({ verb: 'pick', target: 'apple' });
    });

    it('should return a verb alone with no target', () => {
        expect(parseInput('  look around ', aliases)).toEqual({ verb: 'look around', target: null });
        expect(parseInput('LOOK', aliases)).toEqual({ verb: 'look', target: null });
    });

    it('should not match a verb that only prefixes a word', () => {
        expect(parseInput('looking glass', aliases)).toEqual({ verb: null, target: 'looking glass' });
    });

    it('should return a bare target for unknown words and nothing for blank input', () => {
        expect(parseInput('north', aliases)).toEqual({ verb: null, target: 'north' });
        expect(parseInput('   ', aliases)).toEqual({ verb: null, target: null });
    });
});
