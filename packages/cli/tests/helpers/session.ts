import { createGameSession } from '@pymon-world/engine';
import type { GameRecords, GameSession } from '@pymon-world/engine';

/**
 * Playground -north-> School. A constant draw of 0.9 puts the Pymon, every
 * creature and every item in the School, never copies an item, and makes every
 * opponent throw scissors.
 */
export function createCliTestSession(): GameSession {
    const records: GameRecords = {
        locations: [
            { name: 'Playground', description: 'A small playground', west: null, north: 'School', east: null, south: null },
            { name: 'School', description: 'A quiet school', west: null, north: null, east: null, south: null }
        ],
        creatures: [
            { nickname: 'Sheep', description: 'A fluffy sheep', adoptable: false },
            { nickname: 'Sparkymon', description: 'Bright yellow', adoptable: true }
        ],
        items: [
            { name: 'apple', description: 'A red apple', pickable: true, consumable: true },
            { name: 'binocular', description: 'See far away', pickable: true, consumable: true },
            { name: 'tree', description: 'A tall oak', pickable: false, consumable: false }
        ]
    };
    return createGameSession(records, {
        random: { next: () => 0.9 },
        clock: () => new Date(2024, 0, 5, 14, 7)
    });
}
