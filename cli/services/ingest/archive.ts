import AdmZip from 'adm-zip';
import * as tar from 'tar-stream';
import { createGunzip } from 'zlib';
import { ArchiveLimitError, UnsupportedArchiveError, ValidationError } from '../../lib/errors';
import { formatBytes } from '../../utils/format';
import { errorMessage, logger } from '../../utils/logger';
import { PICTURE_EXTENSIONS } from './storage-key';

export const DEFAULT_ARCHIVE_MAX_BYTES = 100 * 1024 * 1024;

export type ArchiveFormat = 'zip' | 'tar' | 'tar.gz';

export interface ArchiveImage {
  filename: string;
  bytes: Buffer;
}

export interface ExtractOptions {
  /** Ceiling on the summed uncompressed size of the images taken from the archive. */
  maxBytes?: number;
}

export function detectArchiveFormat(filename: string): ArchiveFormat {
  const name = filename.toLowerCase();
  if (name.endsWith('.zip')) return 'zip';
  if (name.endsWith('.tar.gz') || name.endsWith('.tgz')) return 'tar.gz';
  if (name.endsWith('.tar')) return 'tar';
  throw new UnsupportedArchiveError(filename);
}

/**
 * Top-level entries with a picture extension. Anything inside a directory, or
 * carrying a path separator at all, is skipped.
 */
export function isImageEntryName(name: string): boolean {
  if (!name || name.includes('/') || name.includes('\\')) return false;
  const dot = name.lastIndexOf('.');
  if (dot < 0) return false;
  const ext = name.slice(dot + 1).toLowerCase();
  return PICTURE_EXTENSIONS.some(allowed => allowed === ext);
}

/**
 * Pull every picture out of a ZIP, TAR or gzip TAR upload. Sizes are taken from
 * entry headers and checked before the entry's content is read; going over
 * `maxBytes` aborts the whole extraction.
 */
export async function extractArchiveImages(
  filename: string,
  bytes: Buffer,
  options: ExtractOptions = {}
): Promise<ArchiveImage[]> {
  const format = detectArchiveFormat(filename);
  const maxBytes = options.maxBytes ?? DEFAULT_ARCHIVE_MAX_BYTES;

  const images = format === 'zip'
    ? extractZip(filename, bytes, maxBytes)
    : await extractTar(filename, bytes, format === 'tar.gz', maxBytes);

  logger.debug('Extracted archive', { filename, format, images: images.length });
  return images;
}

function limitError(maxBytes: number): ArchiveLimitError {
  return new ArchiveLimitError(`Archive exceeds maximum uncompressed size (${formatBytes(maxBytes)})`, maxBytes);
}

function extractZip(filename: string, bytes: Buffer, maxBytes: number): ArchiveImage[] {
  let zip: AdmZip;
  try {
    zip = new AdmZip(bytes);
  } catch (error) {
    throw new ValidationError(`Could not read archive ${filename}: ${errorMessage(error)}`);
  }

  const entries = zip.getEntries().filter(entry => !entry.isDirectory && isImageEntryName(entry.entryName));

  let total = 0;
  for (const entry of entries) {
    total += entry.header.size;
    if (total > maxBytes) throw limitError(maxBytes);
  }

  try {
    return entries.map(entry => ({ filename: entry.entryName, bytes: entry.getData() }));
  } catch (error) {
    throw new ValidationError(`Could not read archive ${filename}: ${errorMessage(error)}`);
  }
}

async function extractTar(filename: string, bytes: Buffer, gzipped: boolean, maxBytes: number): Promise<ArchiveImage[]> {
  const images: ArchiveImage[] = [];
  const extract = tar.extract();
  let total = 0;

  extract.on('entry', (header, stream, next) => {
    if (header.type !== 'file' || !isImageEntryName(header.name)) {
      stream.on('end', () => next());
      stream.resume();
      return;
    }

    total += header.size ?? 0;
    if (total > maxBytes) {
      stream.resume();
      extract.destroy(limitError(maxBytes));
      return;
    }

    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk));
    stream.on('end', () => {
      images.push({ filename: header.name, bytes: Buffer.concat(chunks) });
      next();
    });
  });

  try {
    await new Promise<void>((resolve, reject) => {
      extract.on('finish', () => resolve());
      extract.on('error', reject);
      if (gzipped) {
        const gunzip = createGunzip();
        gunzip.on('error', reject);
        gunzip.pipe(extract);
        gunzip.end(bytes);
      } else {
        extract.end(bytes);
      }
    });
  } catch (error) {
    if (error instanceof ValidationError) throw error;
    throw new ValidationError(`Could not read archive ${filename}: ${errorMessage(error)}`);
  }

  return images;
}
