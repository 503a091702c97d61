import { writeFile, appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { existsSync } from 'node:fs';

export interface LoggerOptions {
    logsDir?: string;
    enabled?: boolean;
}

/**
 * Logger that writes to a file instead of console so that diagnostics never
 * interleave with the game's terminal output.
 */
export class Logger {
    private logsDir: string;
    private logFile: string;
    private initialization: Promise<void> | null = null;
    private pending: Promise<void> = Promise.resolve();
    private enabled: boolean;

    constructor(options: LoggerOptions = {}) {
        this.logsDir = options.logsDir ?? join(process.cwd(), 'logs');
        this.logFile = join(this.logsDir, 'pymon.log');
        this.enabled = options.enabled ?? (process.env.PYMON_LOG ?? '').toLowerCase() !== 'off';
    }

    /**
     * Create the logs directory and truncate the log file, once.
     */
    private ensureInitialized(): Promise<void> {
        if (!this.initialization) {
            this.initialization = (async () => {
                if (!existsSync(this.logsDir)) {
                    await mkdir(this.logsDir, { recursive: true });
                }
                const timestamp = new Date().toISOString();
                await writeFile(this.logFile, `[${timestamp}] Logger initialized\n`, { flag: 'w' });
            })();
        }
        return this.initialization;
    }

    private format(level: string, message: string, args: unknown[]): string {
        const timestamp = new Date().toISOString();
        const formattedArgs = args.length > 0
            ? ' ' + args.map(arg => typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)).join(' ')
            : '';
        return `[${timestamp}] [${level}] ${message}${formattedArgs}`;
    }

    /**
     * Write a log entry to the file.
     * Fire-and-forget - doesn't block execution. Entries are appended in call order.
     */
    private write(level: string, message: string, args: unknown[]): void {
        if (!this.enabled) return;

        const logLine = this.format(level, message, args);
        this.pending = this.pending
            .then(() => this.ensureInitialized())
            .then(() => appendFile(this.logFile, logLine + '\n', 'utf8'))
            .catch((error: unknown) => {
                // Fallback to console if file write fails
                console.error('Failed to write to log file:', error);
                console.log(logLine);
            });
    }

    log(message: string, ...args: unknown[]): void {
        this.write('INFO', message, args);
    }

    error(message: string, ...args: unknown[]): void {
        this.write('ERROR', message, args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.write('WARN', message, args);
    }

    debug(message: string, ...args: unknown[]): void {
        this.write('DEBUG', message, args);
    }

    /**
     * Turn file logging on or off at runtime.
     */
    setEnabled(enabled: boolean): void {
        this.enabled = enabled;
    }

    getLogFile(): string {
        return this.logFile;
    }

    /**
     * Resolves once every entry written so far has reached the file.
     */
    flush(): Promise<void> {
        return this.pending;
    }
}

// Export singleton instance
export const logger = new Logger();
