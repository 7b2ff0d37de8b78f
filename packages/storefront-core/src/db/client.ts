// Database client for PostgreSQL
// The pool is created on first use so the in-memory driver never connects.

import { readFileSync } from 'fs';
import { join } from 'path';
import { Pool, PoolClient, PoolConfig } from 'pg';
import type { StorefrontConfig } from '../config';
import { logger } from '../utils/logger';

let pool: Pool | null = null;

export function poolConfigFrom(config: StorefrontConfig): PoolConfig {
  const { database } = config;
  const isProduction = config.env === 'production';
  return database.connectionString
    ? {
        connectionString: database.connectionString,
        ssl: isProduction ? { rejectUnauthorized: false } : false,
        max: database.poolMax,
        idleTimeoutMillis: 10000,
        connectionTimeoutMillis: 5000,
      }
    : {
        host: database.host,
        port: database.port,
        database: database.database,
        user: database.user,
        password: database.password,
        max: database.poolMax,
        idleTimeoutMillis: 10000,
        connectionTimeoutMillis: 5000,
      };
}

export function initPool(config: StorefrontConfig): Pool {
  if (pool) return pool;

  pool = new Pool(poolConfigFrom(config));

  pool.on('error', (err) => {
    logger.error('Unexpected error on idle client', {}, err);
  });

  return pool;
}

export function getPool(): Pool {
  if (!pool) {
    throw new Error('Database pool not initialised; call initPool(config) first');
  }
  return pool;
}

// Query helper with automatic client release
export async function query<T = unknown>(
  text: string,
  params?: unknown[]
): Promise<T[]> {
  const start = Date.now();
  const result = await getPool().query(text, params);
  const duration = Date.now() - start;

  if (process.env.DB_DEBUG === '1') {
    logger.debug('Executed query', { text: text.substring(0, 50), duration, rows: result.rowCount });
  }

  return result.rows as T[];
}

// Single row query
export async function queryOne<T = unknown>(
  text: string,
  params?: unknown[]
): Promise<T | null> {
  const rows = await query<T>(text, params);
  return rows[0] || null;
}

// Query on a transaction's client
export async function queryRows<T = unknown>(
  client: PoolClient,
  text: string,
  params?: unknown[]
): Promise<T[]> {
  const result = await client.query(text, params);
  return result.rows as T[];
}

// Transaction helper
export async function transaction<T>(
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (e) {
    await client.query('ROLLBACK');
    throw e;
  } finally {
    client.release();
  }
}

export async function checkDatabaseHealth(): Promise<boolean> {
  try {
    await query('SELECT 1');
    return true;
  } catch (error) {
    logger.error('Database health check failed', {}, error instanceof Error ? error : undefined);
    return false;
  }
}

/**
 * Apply schema.sql. Every statement is idempotent.
 */
export async function migrate(): Promise<void> {
  const schema = readFileSync(join(__dirname, 'schema.sql'), 'utf-8');
  await query(schema);
  logger.info('Database schema applied');
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  await pool.end();
  pool = null;
}
