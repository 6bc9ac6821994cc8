import { Pool } from 'pg';
import { cfg } from '../config';
import { createLogger } from '../utils/logger';

const log = createLogger('db');

if (!cfg.DATABASE_URL) {
  throw new Error('[ERROR] DATABASE_URL missing.');
}

export const pool: Pool = new Pool({
  connectionString: cfg.DATABASE_URL,
  ssl: cfg.DATABASE_URL.includes('localhost')
    ? false
    : { rejectUnauthorized: false },
  max: cfg.DB_MAX_CONNECTIONS,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 10000,
});

pool.on('connect', () => log.debug('Connected to Postgres'));
pool.on('error', (err: Error) =>
  log.error({ err: err.message }, 'Database pool error')
);
