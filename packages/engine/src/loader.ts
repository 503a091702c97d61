import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';
import { CreatureRecord, GameRecords, ItemRecord, LocationRecord } from './types';
import { InvalidInputFormatError } from './errors';
import { creatureRowSchema, itemRowSchema, locationRowSchema } from './schemas';
import { logger } from './logger';

export interface DataFiles {
    locations: string;
    creatures: string;
    items: string;
}

const LOCATION_COLUMNS = ['name', 'description', 'west', 'north', 'east', 'south'] as const;
const CREATURE_COLUMNS = ['nickname', 'description', 'adoptable'] as const;
const ITEM_COLUMNS = ['name', 'description', 'pickable', 'consumable'] as const;

/**
 * Split comma-separated text into header-keyed rows. Blank lines are skipped.
 * Cells are trimmed; quoting is not supported.
 */
function readRows(
    text: string,
    file: string,
    columns: readonly string[]
): Array<{ line: number; cells: Record<string, string> }> {
    const lines = text.split(/\r?\n/);
    const headerIndex = lines.findIndex(line => line.trim() !== '');
    if (headerIndex === -1) {
        throw new InvalidInputFormatError(file, 'File is empty');
    }

    const header = lines[headerIndex].split(',').map(cell => cell.trim().toLowerCase());
    const positions = new Map<string, number>();
    for (const column of columns) {
        const position = header.indexOf(column);
        if (position === -1) {
            throw new InvalidInputFormatError(file, `Missing required column "${column}" in header`);
        }
        positions.set(column, position);
    }

    const rows: Array<{ line: number; cells: Record<string, string> }> = [];
    for (let i = headerIndex + 1; i < lines.length; i++) {
        if (lines[i].trim() === '') continue;
        const lineNumber = i + 1;
        const parts = lines[i].split(',').map(cell => cell.trim());
        if (parts.length !== header.length) {
            throw new InvalidInputFormatError(file, `Line ${lineNumber}: Expected ${header.length} columns, got ${parts.length}`);
        }
        const cells: Record<string, string> = {};
        for (const [column, position] of positions) {
            cells[column] = parts[position] ?? '';
        }
        rows.push({ line: lineNumber, cells });
    }
    return rows;
}

function parseRows<S extends z.ZodTypeAny>(
    text: string,
    file: string,
    columns: readonly string[],
    schema: S
): z.output<S>[] {
    return readRows(text, file, columns).map(({ line, cells }) => {
        const parsed = schema.safeParse(cells);
        if (!parsed.success) {
            const detail = parsed.error.issues.map(issue => issue.message).join('; ');
            throw new InvalidInputFormatError(file, `Line ${line}: ${detail}`);
        }
        return parsed.data;
    });
}

export function parseLocations(text: string, file: string = 'locations.csv'): LocationRecord[] {
    const records: LocationRecord[] = parseRows(text, file, LOCATION_COLUMNS, locationRowSchema);

    const names = new Set<string>();
    for (const record of records) {
        if (names.has(record.name)) {
            throw new InvalidInputFormatError(file, `Duplicate location name "${record.name}"`);
        }
        names.add(record.name);
    }
    for (const record of records) {
        for (const direction of ['west', 'north', 'east', 'south'] as const) {
            const target = record[direction];
            if (target !== null && !names.has(target)) {
                throw new InvalidInputFormatError(file, `Location "${record.name}" has a ${direction} door to unknown location "${target}"`);
            }
        }
    }
    return records;
}

export function parseCreatures(text: string, file: string = 'creatures.csv'): CreatureRecord[] {
    return parseRows(text, file, CREATURE_COLUMNS, creatureRowSchema);
}

export function parseItems(text: string, file: string = 'items.csv'): ItemRecord[] {
    return parseRows(text, file, ITEM_COLUMNS, itemRowSchema);
}

async function readDataFile(path: string): Promise<string> {
    try {
        return await readFile(path, 'utf-8');
    } catch (err) {
        logger.error(`Failed to read data file ${path}:`, err);
        throw new InvalidInputFormatError(basename(path), `File not found or unreadable: ${path}`);
    }
}

/**
 * Read and validate all three data files. Throws InvalidInputFormatError on the
 * first problem found.
 */
export async function loadRecords(files: DataFiles): Promise<GameRecords> {
    const [locationsText, creaturesText, itemsText] = await Promise.all([
        readDataFile(files.locations),
        readDataFile(files.creatures),
        readDataFile(files.items)
    ]);

    const records: GameRecords = {
        locations: parseLocations(locationsText, basename(files.locations)),
        creatures: parseCreatures(creaturesText, basename(files.creatures)),
        items: parseItems(itemsText, basename(files.items))
    };
    logger.log(`[Loader] Loaded ${records.locations.length} locations, ${records.creatures.length} creatures, ${records.items.length} items`);
    return records;
}
