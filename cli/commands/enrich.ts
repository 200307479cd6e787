#!/usr/bin/env node
/**
 * Run enrichment for existing pictures without going through the queue.
 *
 * Usage:
 *   npm run enrich -- <pictureId...> [--job detect|exif]
 */
import * as dotenv from 'dotenv';
import { createGalleryServices } from '../index';
import { ConfigLoader } from '../lib/config';
import { positionals, readFlag } from '../utils/args';
import { errorMessage } from '../utils/logger';

dotenv.config({ path: '.env.local' });
dotenv.config();

async function main() {
  const args = process.argv.slice(2);
  const pictureIds = positionals(args, ['job']);
  const job = readFlag(args, 'job');
  if (pictureIds.length === 0 || (job !== undefined && job !== 'detect' && job !== 'exif')) {
    console.error('Usage: npm run enrich -- <pictureId...> [--job detect|exif]');
    process.exit(1);
  }

  const config = await new ConfigLoader().load();
  const services = createGalleryServices(config);
  try {
    for (const pictureId of pictureIds) {
      if (job !== 'exif') {
        const result = await services.detectionJob.run(pictureId);
        console.log(`[enrich] ${pictureId} detect: ${result.status}${result.reason ? ` (${result.reason})` : ''}`);
      }
      if (job !== 'detect') {
        const result = await services.exifJob.run(pictureId);
        console.log(`[enrich] ${pictureId} exif: ${result.status}${result.reason ? ` (${result.reason})` : ''}`);
      }
    }
  } catch (error) {
    console.error('[enrich] Failed:', errorMessage(error));
    process.exitCode = 1;
  } finally {
    await services.close();
  }
}

if (require.main === module) {
  void main();
}

export default main;
