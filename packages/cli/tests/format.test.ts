import { describe, it, expect } from 'vitest';
import {
    formatBattleReport,
    formatGlimpse,
    formatInventory,
    formatLocation,
    formatOutcome,
    formatPets,
    formatPymon,
    formatTimestamp
} from '../src/format';

describe('format', () => {
    it('should print a location with its doors, creatures and items', () => {
        const text = formatLocation({
            name: 'Forest',
            description: 'A dense forest',
            doors: { east: 'Cave', south: 'Playground' },
            creatures: [{ nickname: 'Sheep', description: 'A fluffy sheep', adoptable: false }],
            items: [{ name: 'apple', description: 'A red apple', pickable: true, consumable: true }]
        });

        expect(text).toBe([
            'Current Location: Forest',
            'Description: A dense forest',
            'Doors: east: Cave, south: Playground',
            'Creatures here:',
            ' * Sheep',
            'Items available here:',
            ' * apple'
        ].join('\n'));
    });

    it('should print an empty glimpse and a busy one', () => {
        const empty = { name: 'Cave', description: 'A dark cave', doors: {}, creatures: [], items: [] };
        expect(formatGlimpse(empty)).toBe('Cave: A dark cave. No creatures or items in this location.');
        expect(formatGlimpse({ ...empty, creatures: [{ nickname: 'Cat', description: 'A cat', adoptable: false }] })).toBe(
            'Cave: A dark cave. Creatures: Cat; Items: none'
        );
    });

    it('should show energy out of the maximum and pending immunity', () => {
        expect(formatPymon({
            nickname: 'Kimimon',
            description: 'The starter',
            energy: 2,
            immune: true,
            location: 'Forest',
            inventory: []
        })).toBe('Pymon Name: Kimimon\nDescription: The starter\nEnergy: 2/3 (immune next battle)');
    });

    it('should number inventory items and pets', () => {
        expect(formatInventory([])).toBe('Your inventory is empty.');
        expect(formatInventory([{ name: 'apple', description: 'A red apple', pickable: true, consumable: true }])).toBe(
            'Inventory items:\n1. apple - A red apple'
        );
        expect(formatPets([])).toBe("You don't have any other Pymon.");
        expect(formatPets([
            { nickname: 'Sparkymon', description: 'Bright yellow', energy: 3, immune: false, location: null, inventory: [] }
        ])).toBe('Available Pymons:\n1) Sparkymon - Bright yellow');
    });

    it('should print timestamps as day/month/year with a 12 hour clock', () => {
        expect(formatTimestamp(new Date(2024, 0, 5, 14, 7))).toBe('05/01/2024 02:07PM');
        expect(formatTimestamp(new Date(2024, 10, 23, 0, 45))).toBe('23/11/2024 12:45AM');
    });

    it('should print the battle report per Pymon', () => {
        const timestamp = new Date(2024, 0, 5, 14, 7);
        const text = formatBattleReport([
            {
                nickname: 'Kimimon',
                battles: [
                    { timestamp, opponent: 'Sparkymon', wins: 2, draws: 1, losses: 0 },
                    { timestamp, opponent: 'Cocomon', wins: 0, draws: 0, losses: 2 }
                ],
                totals: { wins: 2, draws: 1, losses: 2 }
            },
            {
                nickname: 'Sparkymon',
                battles: [{ timestamp, opponent: 'Glimmermon', wins: 2, draws: 0, losses: 0 }],
                totals: { wins: 2, draws: 0, losses: 0 }
            }
        ]);

        expect(text).toBe([
            'Pymon Nickname: "Kimimon"',
            'Battle 1, 05/01/2024 02:07PM Opponent: "Sparkymon", W: 2 D: 1 L: 0',
            'Battle 2, 05/01/2024 02:07PM Opponent: "Cocomon", W: 0 D: 0 L: 2',
            'Total: W: 2 D: 1 L: 2',
            '',
            'Pymon Nickname: "Sparkymon"',
            'Battle 1, 05/01/2024 02:07PM Opponent: "Glimmermon", W: 2 D: 0 L: 0',
            'Total: W: 2 D: 0 L: 0'
        ].join('\n'));
        expect(formatBattleReport([])).toBe('No battles fought yet.');
    });

    it('should describe battle outcomes', () => {
        expect(formatOutcome({ result: 'won', opponent: 'Sparkymon', captured: 'Sparkymon' })).toBe(
            'Congrats! You have won the battle and adopted a new Pymon called Sparkymon!'
        );
        expect(formatOutcome({ result: 'lost', opponent: 'Cocomon', defeated: 'Kimimon', promoted: 'Sparkymon', gameOver: false })).toBe(
            'You lost the battle. Kimimon ran away; Sparkymon is now your primary Pymon.'
        );
    });
});
