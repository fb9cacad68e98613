import pg from 'pg';
import { Config } from '../config.js';
import { safeLogger as logger } from './safe-logger.js';

const { Pool } = pg;

/**
 * PostgreSQL connection pool
 */
export const pool = new Pool({
  host: Config.database.host,
  port: Config.database.port,
  database: Config.database.database,
  user: Config.database.user,
  password: Config.database.password,
  max: 20, // Maximum connections in pool
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
  // SSL in production only (managed databases); plain TCP for localhost
  ssl: process.env.NODE_ENV === 'production' ? { rejectUnauthorized: true } : false,
});

/**
 * Initialize database connection and verify schema
 */
export async function initializeDatabase(): Promise<void> {
  const client = await pool.connect();
  try {
    // Test connection
    const result = await client.query<{ now: Date }>('SELECT NOW() AS now');
    logger.info(`✓ Database connected at ${result.rows[0].now}`);

    // Verify tables exist
    const tables = await client.query<{ table_name: string }>(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
      AND table_type = 'BASE TABLE'
    `);

    const requiredTables = ['kv_store'];

    const existingTables = tables.rows.map((row) => row.table_name);
    const missingTables = requiredTables.filter((t) => !existingTables.includes(t));

    if (missingTables.length > 0) {
      throw new Error(`Missing required tables: ${missingTables.join(', ')} (apply sql/schema.sql)`);
    }

    logger.info(`✓ All required tables present (${existingTables.length} total)`);
  } catch (error) {
    logger.error('Failed to initialize database:', error);
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Gracefully close database connection pool
 */
export async function closeDatabase(): Promise<void> {
  await pool.end();
  logger.info('Database connection pool closed');
}
