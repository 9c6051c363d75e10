import { config, LogLevel } from '../config';

const SEVERITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

/**
 * Writes to stderr so that reports printed on stdout stay clean
 */
export class Logger {
    private level: LogLevel;

    constructor(level: LogLevel) {
        this.level = level;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    isEnabled(level: LogLevel): boolean {
        return SEVERITY[level] >= SEVERITY[this.level];
    }

    debug(message: string, meta?: unknown): void {
        this.write('debug', message, meta);
    }

    info(message: string, meta?: unknown): void {
        this.write('info', message, meta);
    }

    warn(message: string, meta?: unknown): void {
        this.write('warn', message, meta);
    }

    error(message: string, meta?: unknown): void {
        this.write('error', message, meta);
    }

    private write(level: LogLevel, message: string, meta?: unknown): void {
        if (!this.isEnabled(level)) {
            return;
        }

        const line = `${new Date().toISOString()} ${level.toUpperCase()} ${message}`;
        if (meta === undefined) {
            console.error(line);
        } else {
            console.error(line, meta instanceof Error ? meta : JSON.stringify(meta));
        }
    }
}

export const logger = new Logger(config.logLevel);
