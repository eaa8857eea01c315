import { Client } from 'pg';
import { env } from '../config/env';
import { REQUESTS_TABLE, SCHEMA_SQL } from '../db/schema';

async function runPgMigration() {
    if (!env.DATABASE_URL) {
        console.error('[Migrate] No DATABASE_URL found. Set it in the environment or in .env.');
        process.exitCode = 1;
        return;
    }

    const client = new Client({
        connectionString: env.DATABASE_URL,
        ssl: env.DATABASE_SSL ? { rejectUnauthorized: false } : undefined,
    });

    console.log('[Migrate] Connecting to PostgreSQL...');
    await client.connect();

    try {
        console.log(`[Migrate] Applying schema for ${REQUESTS_TABLE}...`);
        await client.query(SCHEMA_SQL);
        console.log('[Migrate] Schema applied successfully.');
    } finally {
        await client.end();
    }
}

runPgMigration().catch(err => {
    console.error('[Migrate] Schema execution failed:', err);
    process.exitCode = 1;
});
