#!/usr/bin/env node
/**
 * Create or update the gallery tables from config/schema.sql.
 *
 * Usage:
 *   npm run migrate
 */
import * as dotenv from 'dotenv';
import { ConfigLoader } from '../lib/config';
import { applySchema } from '../services/db/migrate';
import { errorMessage, logger } from '../utils/logger';

dotenv.config({ path: '.env.local' });
dotenv.config();

async function main() {
  try {
    const config = await new ConfigLoader().load();
    logger.setLevel(config.logLevel);
    if (!config.database.url) {
      throw new Error('DATABASE_URL is required to run migrate');
    }
    await applySchema({ connectionString: config.database.url });
    console.log('[migrate] Schema is up to date');
  } catch (error) {
    console.error('[migrate] Failed:', errorMessage(error));
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}

export default main;
