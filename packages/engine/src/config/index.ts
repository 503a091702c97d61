import { z } from 'zod';
import { DEFAULT_PYMON_DESCRIPTION, DEFAULT_PYMON_NICKNAME } from '../constants';
import { InvalidConfigError } from '../errors';

const configSchema = z.object({
    /**
     * Title printed when a game starts.
     */
    title: z.string().min(1),
    pymonNickname: z.string().min(1),
    pymonDescription: z.string(),
    /**
     * Default data files, relative to the working directory.
     */
    dataFiles: z.object({
        locations: z.string().min(1),
        creatures: z.string().min(1),
        items: z.string().min(1)
    }),
    /**
     * Seed for the random source. Unset means Math.random.
     */
    seed: z.coerce.number().int().optional()
});

export type GameConfig = z.infer<typeof configSchema>;

const defaultConfig: GameConfig = {
    title: 'Pymon World',
    pymonNickname: DEFAULT_PYMON_NICKNAME,
    pymonDescription: DEFAULT_PYMON_DESCRIPTION,
    dataFiles: {
        locations: 'data/locations.csv',
        creatures: 'data/creatures.csv',
        items: 'data/items.csv'
    },
    seed: undefined
};

const ENV_NAMES: Record<string, string> = {
    title: 'PYMON_TITLE',
    pymonNickname: 'PYMON_NICKNAME',
    pymonDescription: 'PYMON_DESCRIPTION',
    'dataFiles.locations': 'PYMON_LOCATIONS_FILE',
    'dataFiles.creatures': 'PYMON_CREATURES_FILE',
    'dataFiles.items': 'PYMON_ITEMS_FILE',
    seed: 'PYMON_SEED'
};

/**
 * Defaults overridden by PYMON_* environment variables.
 * Throws InvalidConfigError when an override is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GameConfig {
    const parsed = configSchema.safeParse({
        title: env.PYMON_TITLE ?? defaultConfig.title,
        pymonNickname: env.PYMON_NICKNAME ?? defaultConfig.pymonNickname,
        pymonDescription: env.PYMON_DESCRIPTION ?? defaultConfig.pymonDescription,
        dataFiles: {
            locations: env.PYMON_LOCATIONS_FILE ?? defaultConfig.dataFiles.locations,
            creatures: env.PYMON_CREATURES_FILE ?? defaultConfig.dataFiles.creatures,
            items: env.PYMON_ITEMS_FILE ?? defaultConfig.dataFiles.items
        },
        seed: env.PYMON_SEED === undefined || env.PYMON_SEED === '' ? undefined : env.PYMON_SEED
    });
    if (!parsed.success) {
        const detail = parsed.error.issues
            .map(issue => {
                const path = issue.path.join('.');
                return `${ENV_NAMES[path] ?? path}: ${issue.message}`;
            })
            .join('; ');
        throw new InvalidConfigError(detail);
    }
    return parsed.data;
}
