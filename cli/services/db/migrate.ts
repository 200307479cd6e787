import fs from 'fs-extra';
import path from 'path';
import { Pool } from 'pg';
import { logger } from '../../utils/logger';

export interface MigrateOptions {
  connectionString: string;
  schemaPath?: string;
}

/**
 * Apply `config/schema.sql`. Every statement is idempotent, so running it
 * against an up-to-date database is a no-op.
 */
export async function applySchema(options: MigrateOptions): Promise<void> {
  const schemaPath = options.schemaPath ?? path.join(process.cwd(), 'config', 'schema.sql');
  if (!(await fs.pathExists(schemaPath))) {
    throw new Error(`Schema file not found: ${schemaPath}`);
  }
  const sql = await fs.readFile(schemaPath, 'utf-8');

  const pool = new Pool({ connectionString: options.connectionString, max: 1 });
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('COMMIT');
    logger.info('Schema applied', { schemaPath });
  } catch (error) {
    await client.query('ROLLBACK').catch(rollbackError => {
      logger.error('Rollback failed', { error: String(rollbackError) });
    });
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}
