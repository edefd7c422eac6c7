import { Pool } from 'pg';
import type { Logger } from './logger';
import { withTimeout } from '../utils/backoff';

export function createDatabasePool(params: { connectionString: string; max: number }, logger: Logger): Pool {
  const pool = new Pool({
    connectionString: params.connectionString,
    max: params.max,
  });

  // Idle client errors (e.g. server restart) surface here instead of crashing the process.
  pool.on('error', (err) => {
    logger.error({ event: 'database.pool.error', err: { message: err.message } }, 'database.pool.error');
  });

  return pool;
}

export async function checkDatabase(pool: Pool, timeoutMs: number): Promise<{ ok: boolean; error?: string }> {
  try {
    await withTimeout('database ping', timeoutMs, () => pool.query('SELECT 1'));
    return { ok: true };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }
}
