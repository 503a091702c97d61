import type { PymonErrorKind } from './errors';

export type Direction = 'west' | 'north' | 'east' | 'south';

export const DIRECTIONS: readonly Direction[] = ['west', 'north', 'east', 'south'];

export const OPPOSITE_DIRECTION: Record<Direction, Direction> = {
    west: 'east',
    east: 'west',
    north: 'south',
    south: 'north'
};

export function isDirection(value: string): value is Direction {
    return DIRECTIONS.some(direction => direction === value);
}

// Records produced by the loader

export interface LocationRecord {
    name: string;
    description: string;
    west: string | null;
    north: string | null;
    east: string | null;
    south: string | null;
}

export interface CreatureRecord {
    nickname: string;
    description: string;
    adoptable: boolean;
}

export interface ItemRecord {
    name: string;
    description: string;
    pickable: boolean;
    consumable: boolean;
}

export interface GameRecords {
    locations: LocationRecord[];
    creatures: CreatureRecord[];
    items: ItemRecord[];
}

// Read-only views handed to the presentation layer

export interface ItemView {
    name: string;
    description: string;
    pickable: boolean;
    consumable: boolean;
}

export interface CreatureView {
    nickname: string;
    description: string;
    adoptable: boolean;
}

export interface LocationView {
    name: string;
    description: string;
    doors: Partial<Record<Direction, string>>;
    creatures: CreatureView[];
    items: ItemView[];
}

export interface PymonView {
    nickname: string;
    description: string;
    energy: number;
    immune: boolean;
    location: string | null;
    inventory: ItemView[];
}

// Command results

export type CommandResult<T = undefined> =
    | { outcome: 'success'; narrative: string; data: T }
    | { outcome: 'failure'; narrative: string; error: PymonErrorKind };

export function success<T>(narrative: string, data: T): CommandResult<T> {
    return { outcome: 'success', narrative, data };
}

export function failure<T = never>(error: PymonErrorKind, narrative: string): CommandResult<T> {
    return { outcome: 'failure', narrative, error };
}
