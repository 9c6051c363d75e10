/**
 * Schema migrations
 * Applies migrations/*.sql in filename order, once each
 */

import * as fs from 'fs';
import * as path from 'path';
import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { createPostgresPool, SqlClient } from './config/database';
import { logger } from './utils/logger';

export const MIGRATIONS_DIR = path.join(__dirname, '..', 'migrations');

const AppliedRowSchema = Type.Object({ filename: Type.String() });

export async function runMigrations(client: SqlClient, migrationsDir: string = MIGRATIONS_DIR): Promise<string[]> {
    if (!fs.existsSync(migrationsDir)) {
        throw new Error(`Migrations directory not found at: ${migrationsDir}`);
    }

    await client.query(
        `CREATE TABLE IF NOT EXISTS schema_migrations (
            filename TEXT PRIMARY KEY,
            applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        );`
    );

    const appliedResult = await client.query('SELECT filename FROM schema_migrations;');
    const applied = new Set(
        appliedResult.rows.flatMap((row) => (Value.Check(AppliedRowSchema, row) ? [row.filename] : []))
    );

    const files = fs.readdirSync(migrationsDir)
        .filter((file) => file.endsWith('.sql'))
        .sort();

    const ran: string[] = [];
    for (const file of files) {
        if (applied.has(file)) {
            continue;
        }

        const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf8');
        logger.info(`[Migrate] Running ${file}`);
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (filename) VALUES ($1);', [file]);
        ran.push(file);
    }

    if (ran.length === 0) {
        logger.debug('[Migrate] Schema is up to date');
    }
    return ran;
}

async function main(): Promise<void> {
    const pool = createPostgresPool();
    try {
        const ran = await runMigrations(pool);
        console.log(`✅ Applied ${ran.length} migration(s)`);
    } finally {
        await pool.end();
    }
}

if (require.main === module) {
    main().catch((error: unknown) => {
        logger.error('[Migrate] Failed', error);
        process.exitCode = 1;
    });
}
