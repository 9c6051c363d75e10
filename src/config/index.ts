/**
 * Calculator Configuration
 * Centralized config for environment variables and settings
 */

import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(raw: string | undefined): LogLevel {
    const value = (raw || 'info').toLowerCase();
    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) {
        console.warn(`[Config] Unknown LOG_LEVEL "${raw}", falling back to info`);
        return 'info';
    }
    return level;
}

function parseNumber(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        console.warn(`[Config] ${name}="${raw}" is not a number, using ${fallback}`);
        return fallback;
    }
    return value;
}

// Only the interactive mode needs a database
if (process.env.NODE_ENV === 'production' && !process.env.DATABASE_URL && !process.env.PGDATABASE) {
    console.warn('[Config] Missing DATABASE_URL (or PGDATABASE): history and profiles are unavailable');
}

const config = {
    env: process.env.NODE_ENV || 'development',

    logLevel: parseLogLevel(process.env.LOG_LEVEL),

    // Tax defaults
    tax: {
        fiscalYear: parseNumber('SAS_FISCAL_YEAR', 2025),
        defaultVatRate: parseNumber('SAS_DEFAULT_VAT_RATE', 0.22)
    },

    // PostgreSQL
    database: {
        url: process.env.DATABASE_URL || '',
        host: process.env.PGHOST || 'localhost',
        port: parseNumber('PGPORT', 5432),
        user: process.env.PGUSER,
        password: process.env.PGPASSWORD,
        database: process.env.PGDATABASE,
        ssl: process.env.PGSSL === 'true',
        connectionTimeoutMs: parseNumber('PG_CONNECTION_TIMEOUT_MS', 8000)
    },

    // Sentry
    sentry: {
        dsn: process.env.SENTRY_DSN || '',
        tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.1 : 1.0
    }
};

export type AppConfig = typeof config;

// Named export for destructuring
export { config };

export default config;
