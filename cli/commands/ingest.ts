#!/usr/bin/env node
/**
 * Upload pictures (or ZIP/TAR archives of pictures) into an album, then wait
 * for their enrichment jobs to finish.
 *
 * Usage:
 *   npm run ingest -- <albumId> <file...> [--tags "sunset, beach"] [--title "Title"]
 */
import * as dotenv from 'dotenv';
import fs from 'fs-extra';
import path from 'path';
import { createGalleryServices } from '../index';
import { ConfigLoader } from '../lib/config';
import { detectArchiveFormat } from '../services/ingest/archive';
import { BatchResult, UploadInput } from '../services/ingest/ingestion-pipeline';
import { mimeTypeForFilename } from '../services/ingest/storage-key';
import { positionals, readFlag } from '../utils/args';
import { errorMessage } from '../utils/logger';

dotenv.config({ path: '.env.local' });
dotenv.config();

function isArchive(filename: string): boolean {
  try {
    detectArchiveFormat(filename);
    return true;
  } catch {
    return false;
  }
}

function report(result: BatchResult): void {
  for (const { filename, error } of result.failed) {
    console.error(`[ingest] Failed to upload ${filename}: ${error}`);
  }
  for (const picture of result.created) {
    console.log(`[ingest] ${picture.id} ${picture.title} (${picture.width ?? '?'}x${picture.height ?? '?'})`);
  }
}

async function main() {
  const args = process.argv.slice(2);
  const [albumId, ...files] = positionals(args, ['tags', 'title']);
  if (!albumId || files.length === 0) {
    console.error('Usage: npm run ingest -- <albumId> <file...> [--tags "a, b"] [--title "Title"]');
    process.exit(1);
  }
  const options = { tags: readFlag(args, 'tags'), title: readFlag(args, 'title') };

  const config = await new ConfigLoader().load();
  const services = createGalleryServices(config);
  let failed = 0;

  try {
    const uploads: UploadInput[] = [];
    for (const file of files) {
      const bytes = await fs.readFile(file);
      const filename = path.basename(file);
      if (isArchive(filename)) {
        const result = await services.ingestion.ingestArchive(albumId, filename, bytes, options);
        report(result);
        failed += result.failed.length;
      } else {
        uploads.push({ filename, bytes, contentType: mimeTypeForFilename(filename) });
      }
    }

    if (uploads.length > 0) {
      const result = await services.ingestion.ingestBatch(albumId, uploads, options);
      report(result);
      failed += result.failed.length;
    }
  } catch (error) {
    console.error('[ingest] Failed:', errorMessage(error));
    failed += 1;
  } finally {
    console.log('[ingest] Waiting for enrichment jobs...');
    await services.close();
  }

  if (failed > 0) process.exit(1);
}

if (require.main === module) {
  void main();
}

export default main;
