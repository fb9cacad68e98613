import type { Pool, PoolClient } from 'pg';
import type { KeyValueStore } from './store.js';
import { TransientStoreError } from './errors.js';
import { parseBigInt } from './utils.js';

/**
 * Rows with an expiry in the past are invisible to every read
 */
const LIVE = '(expires_at IS NULL OR expires_at > NOW())';

/**
 * Escape LIKE wildcards so a prefix is matched literally
 */
function escapeLikePattern(prefix: string): string {
  return prefix.replace(/[\\%_]/g, (match) => `\\${match}`);
}

/**
 * KeyValueStore backed by the kv_store table (see sql/schema.sql)
 *
 * Any driver failure (connection refused, pool timeout, query error) is
 * surfaced as TransientStoreError so the retrying decorator can take over.
 */
export class PostgresKeyValueStore implements KeyValueStore {
  constructor(private readonly pool: Pool) {}

  async get(key: string): Promise<string | null> {
    return this.withClient('get', async (client) => {
      const result = await client.query<{ value: string }>(
        `SELECT value FROM kv_store WHERE key = $1 AND ${LIVE}`,
        [key]
      );
      return result.rows[0]?.value ?? null;
    });
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    await this.withClient('set', async (client) => {
      await client.query(
        `INSERT INTO kv_store (key, value, expires_at, updated_at)
         VALUES ($1, $2, CASE WHEN $3::int IS NULL THEN NULL ELSE NOW() + make_interval(secs => $3::int) END, NOW())
         ON CONFLICT (key) DO UPDATE SET
           value = EXCLUDED.value,
           expires_at = EXCLUDED.expires_at,
           updated_at = NOW()`,
        [key, value, ttlSeconds ?? null]
      );
    });
  }

  async delete(key: string): Promise<void> {
    await this.withClient('delete', async (client) => {
      await client.query('DELETE FROM kv_store WHERE key = $1', [key]);
    });
  }

  async exists(key: string): Promise<boolean> {
    return this.withClient('exists', async (client) => {
      const result = await client.query(`SELECT 1 FROM kv_store WHERE key = $1 AND ${LIVE}`, [key]);
      return result.rows.length > 0;
    });
  }

  async increment(key: string, ttlSeconds?: number): Promise<number> {
    return this.withClient('increment', async (client) => {
      // An expired counter restarts at 1 with a fresh expiry
      const result = await client.query<{ value: string }>(
        `INSERT INTO kv_store (key, value, expires_at, updated_at)
         VALUES ($1, '1', CASE WHEN $2::int IS NULL THEN NULL ELSE NOW() + make_interval(secs => $2::int) END, NOW())
         ON CONFLICT (key) DO UPDATE SET
           value = CASE
             WHEN kv_store.expires_at IS NOT NULL AND kv_store.expires_at <= NOW() THEN '1'
             ELSE (kv_store.value::bigint + 1)::text
           END,
           expires_at = CASE
             WHEN kv_store.expires_at IS NOT NULL AND kv_store.expires_at <= NOW() THEN EXCLUDED.expires_at
             ELSE kv_store.expires_at
           END,
           updated_at = NOW()
         RETURNING value`,
        [key, ttlSeconds ?? null]
      );
      return parseBigInt(result.rows[0]?.value);
    });
  }

  async keys(prefix: string): Promise<string[]> {
    return this.withClient('keys', async (client) => {
      const result = await client.query<{ key: string }>(
        `SELECT key FROM kv_store WHERE key LIKE $1 || '%' AND ${LIVE} ORDER BY key`,
        [escapeLikePattern(prefix)]
      );
      return result.rows.map((row) => row.key);
    });
  }

  /**
   * Delete expired rows (daily cleanup job)
   * @returns Number of rows removed
   */
  async pruneExpired(): Promise<number> {
    return this.withClient('pruneExpired', async (client) => {
      const result = await client.query('DELETE FROM kv_store WHERE expires_at IS NOT NULL AND expires_at <= NOW()');
      return result.rowCount ?? 0;
    });
  }

  private async withClient<T>(operation: string, fn: (client: PoolClient) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new TransientStoreError(operation, error);
    }
    try {
      return await fn(client);
    } catch (error) {
      throw new TransientStoreError(operation, error);
    } finally {
      client.release();
    }
  }
}
