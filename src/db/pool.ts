import { Pool } from 'pg';

export interface PoolSettings {
    connectionString: string;
    ssl: boolean;
}

export function createPool(settings: PoolSettings): Pool {
    return new Pool({
        connectionString: settings.connectionString,
        ssl: settings.ssl ? { rejectUnauthorized: false } : undefined,
    });
}
