#!/usr/bin/env tsx

import { Command } from 'commander';
import prompts from 'prompts';
import {
    PymonError,
    createGameSession,
    createRandom,
    loadConfig,
    loadRecords,
    logger
} from '@pymon-world/engine';
import type { DataFiles, GameConfig, GameRecords } from '@pymon-world/engine';
import { GameIO, runGame } from './game-loop';

const program = new Command();

program
    .name('pymon')
    .description('Explore Pymon World, collect items and adopt creatures in rock, paper, scissors battles')
    .version('1.0.0');

function dataFiles(config: GameConfig, locations?: string, creatures?: string, items?: string): DataFiles {
    return {
        locations: locations ?? config.dataFiles.locations,
        creatures: creatures ?? config.dataFiles.creatures,
        items: items ?? config.dataFiles.items
    };
}

function configOrExit(): GameConfig {
    try {
        return loadConfig();
    } catch (err) {
        if (err instanceof PymonError) {
            logger.error('[cli] Bad configuration:', err);
            console.error(`Error: ${err.message}`);
            process.exit(1);
        }
        throw err;
    }
}

async function loadOrExit(files: DataFiles): Promise<GameRecords> {
    try {
        return await loadRecords(files);
    } catch (err) {
        if (err instanceof PymonError) {
            logger.error('[cli] Failed to load game data:', err);
            console.error(`Error: ${err.message}`);
            process.exit(1);
        }
        throw err;
    }
}

const terminal: GameIO = {
    async ask(message: string): Promise<string | null> {
        let cancelled = false;
        const response = await prompts(
            { type: 'text', name: 'value', message },
            { onCancel: () => { cancelled = true; } }
        );
        const value: unknown = response.value;
        if (cancelled || typeof value !== 'string') {
            return null;
        }
        return value;
    },
    print(text: string): void {
        console.log(text);
    }
};

program
    .command('play', { isDefault: true })
    .description('Start a new game')
    .argument('[locations]', 'Locations file')
    .argument('[creatures]', 'Creatures file')
    .argument('[items]', 'Items file')
    .action(async (locations?: string, creatures?: string, items?: string) => {
        const config = configOrExit();
        const records = await loadOrExit(dataFiles(config, locations, creatures, items));
        try {
            const session = createGameSession(records, {
                random: createRandom(config.seed),
                pymonNickname: config.pymonNickname,
                pymonDescription: config.pymonDescription
            });
            process.exitCode = await runGame(session, terminal, config.title);
        } catch (err) {
            if (err instanceof PymonError) {
                logger.error('[cli] Game stopped:', err);
                console.error(`Error: ${err.message}`);
                process.exit(1);
            }
            throw err;
        }
    });

program
    .command('validate')
    .description('Check that the data files load and build a world')
    .argument('[locations]', 'Locations file')
    .argument('[creatures]', 'Creatures file')
    .argument('[items]', 'Items file')
    .action(async (locations?: string, creatures?: string, items?: string) => {
        const config = configOrExit();
        const files = dataFiles(config, locations, creatures, items);
        const records = await loadOrExit(files);
        try {
            createGameSession(records, { random: createRandom(config.seed) });
        } catch (err) {
            if (err instanceof PymonError) {
                console.error('Validation errors:');
                console.error(`  ✗ ${err.message}`);
                process.exit(1);
            }
            throw err;
        }
        console.log('✓ Game data validation passed');
        console.log(`  ${records.locations.length} locations (${files.locations})`);
        console.log(`  ${records.creatures.length} creatures (${files.creatures})`);
        console.log(`  ${records.items.length} items (${files.items})`);
    });

program.parseAsync().catch((err: unknown) => {
    logger.error('[cli] Unexpected failure:', err);
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
});
