import pg from 'pg';
import type { Pool, PoolConfig } from 'pg';

const readPositiveInt = (value: string | undefined, fallback: number) => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

/**
 * Pool settings for the read-only warehouse connection. `DATABASE_URL` takes precedence over the
 * `PG*` variables. With a URL, SSL is on unless `PGSSL=false`; with `PG*` vars it needs `PGSSL=true`.
 * Report loads are a handful of large `SELECT`s,
 * so the pool stays small and each statement is bounded by `PG_STATEMENT_TIMEOUT_MS`.
 */
export const resolveWarehousePoolConfig = (env: NodeJS.ProcessEnv = process.env): PoolConfig => {
  const ssl = env.PGSSL === 'false' ? false : { rejectUnauthorized: false };
  const shared: PoolConfig = {
    application_name: 'job-performance-reporting',
    max: readPositiveInt(env.PG_POOL_MAX, 4),
    connectionTimeoutMillis: readPositiveInt(env.PG_CONNECTION_TIMEOUT_MS, 8000),
    statement_timeout: readPositiveInt(env.PG_STATEMENT_TIMEOUT_MS, 120_000),
    ssl
  };

  if (env.DATABASE_URL) {
    return { ...shared, connectionString: env.DATABASE_URL };
  }

  const missing = ['PGHOST', 'PGUSER', 'PGDATABASE'].filter((key) => !env[key]);
  if (env.NODE_ENV === 'production' && missing.length) {
    throw new Error(`Warehouse connection is missing ${missing.join(', ')}. Provide DATABASE_URL or PG* vars.`);
  }

  return {
    ...shared,
    host: env.PGHOST ?? 'localhost',
    port: readPositiveInt(env.PGPORT, 5432),
    user: env.PGUSER,
    password: env.PGPASSWORD,
    database: env.PGDATABASE,
    ssl: env.PGSSL === 'true' ? ssl : false
  };
};

let pool: Pool | null = null;

// Created on first use, so the API can start while the warehouse is unreachable.
export const getWarehousePool = (): Pool => {
  if (!pool) {
    pool = new pg.Pool(resolveWarehousePoolConfig());
    pool.on('error', (error: Error) => {
      console.error('Warehouse connection pool reported an error:', error);
    });
  }
  return pool;
};

export const pingWarehouse = async () => {
  await getWarehousePool().query('SELECT 1;');
};
