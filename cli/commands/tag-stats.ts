#!/usr/bin/env node
/**
 * Print the most used tags.
 *
 * Usage:
 *   npm run tag-stats -- [--limit 20]
 */
import * as dotenv from 'dotenv';
import { ConfigLoader } from '../lib/config';
import { PgGalleryStore } from '../services/db/pg-store';
import { TagRegistry } from '../services/tags/tag-registry';
import { readNumberFlag } from '../utils/args';
import { errorMessage, logger } from '../utils/logger';

dotenv.config({ path: '.env.local' });
dotenv.config();

async function main() {
  const args = process.argv.slice(2);
  const config = await new ConfigLoader().load();
  logger.setLevel(config.logLevel);
  const store = new PgGalleryStore({
    connectionString: config.database.url,
    maxConnections: config.database.maxConnections,
  });

  try {
    const tags = await new TagRegistry(store).listPopular(readNumberFlag(args, 'limit', 20));
    console.log('Tags by usage');
    console.log('-------------');
    if (tags.length === 0) {
      console.log('n/a');
    }
    for (const tag of tags) {
      console.log(`${String(tag.usageCount).padStart(6)}  ${tag.name}  (${tag.slug})`);
    }
  } catch (error) {
    console.error('[tag-stats] Failed:', errorMessage(error));
    process.exitCode = 1;
  } finally {
    await store.close();
  }
}

if (require.main === module) {
  void main();
}

export default main;
