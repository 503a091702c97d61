import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Logger } from '@/logger';

describe('Logger', () => {
    let dir: string | null = null;

    afterEach(async () => {
        if (dir) {
            await rm(dir, { recursive: true, force: true });
            dir = null;
        }
    });

    it('should keep every line written in the same tick, in order', async () => {
        dir = await mkdtemp(join(tmpdir(), 'pymon-log-'));
        const logger = new Logger({ logsDir: join(dir, 'logs'), enabled: true });

        logger.log('first');
        logger.warn('second');
        logger.error('third', { code: 1 });
        await logger.flush();

        const lines = (await readFile(logger.getLogFile(), 'utf8')).trimEnd().split('\n');
        expect(lines[0]).toMatch(/Logger initialized$/);
        expect(lines[1]).toMatch(/\[INFO\] first$/);
        expect(lines[2]).toMatch(/\[WARN\] second$/);
        expect(lines[3]).toMatch(/\[ERROR\] third \{$/);
        expect(lines).toHaveLength(6);
    });

    it('should write nothing while disabled', async () => {
        dir = await mkdtemp(join(tmpdir(), 'pymon-log-'));
        const logger = new Logger({ logsDir: join(dir, 'logs'), enabled: false });

        logger.log('ignored');
        await logger.flush();

        await expect(readFile(logger.getLogFile(), 'utf8')).rejects.toThrow();
    });
});
