import pg from 'pg';
import { Kysely, PostgresDialect, sql, type PostgresPool } from 'kysely';
import type { Database } from './db/types.js';
import { moduleLogger } from './logger.js';

const { Pool } = pg;

const log = moduleLogger('db');

export interface DbHandle {
  db: Kysely<Database>;
  /** Cheap round trip used by the readiness probe. */
  ping(): Promise<void>;
  close(): Promise<void>;
}

export interface DbOptions {
  /** Postgres connection string. */
  databaseUrl?: string;
  sslRejectUnauthorized?: boolean;
  /** A ready pool, used instead of `databaseUrl`. */
  pool?: PostgresPool;
}

function createPool(databaseUrl: string, sslRejectUnauthorized: boolean): pg.Pool {
  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: /sslmode=disable|localhost|127\.0\.0\.1/i.test(databaseUrl)
      ? undefined
      : { rejectUnauthorized: sslRejectUnauthorized },
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    statement_timeout: 30000,
  });
  pool.on('error', (err) => {
    log.error({ err }, 'Unexpected idle pool client error');
  });
  return pool;
}

export function createDb(options: DbOptions = {}): DbHandle {
  let pool = options.pool;
  if (!pool) {
    const databaseUrl = String(options.databaseUrl || '').trim();
    if (!databaseUrl) {
      throw new Error('DATABASE_URL is not configured');
    }
    pool = createPool(databaseUrl, options.sslRejectUnauthorized ?? true);
  }
  const db = new Kysely<Database>({ dialect: new PostgresDialect({ pool }) });
  return {
    db,
    async ping() {
      await sql`SELECT 1`.execute(db);
    },
    async close() {
      await db.destroy();
    },
  };
}
