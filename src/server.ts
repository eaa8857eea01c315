import { createApp } from './app';
import { env } from './config/env';
import { createPool } from './db/pool';
import { InMemoryRequestStore } from './tracker/memory_store';
import { PgRequestStore } from './tracker/pg_store';
import { RequestStore } from './tracker/request_store';

function createStore(): RequestStore {
    if (env.DATABASE_URL) {
        const pool = createPool({ connectionString: env.DATABASE_URL, ssl: env.DATABASE_SSL });
        pool.on('error', err => console.error('[Store] Idle client error:', err.message));
        console.log('[Store] Using PostgreSQL');
        return new PgRequestStore(pool);
    }
    console.warn('[Store] DATABASE_URL is not set. Requests are kept in memory and lost on restart.');
    return new InMemoryRequestStore();
}

const app = createApp({ store: createStore(), env });

const PORT = Number(env.PORT);
app.listen(PORT, () => {
    console.log(`[Server] Records request backend running on port ${PORT}`);
    console.log(`[Server] Environment: ${env.NODE_ENV}`);
    console.log(`[Server] CORS Policy: ${env.CORS_ORIGIN}`);
});
