import { randomUUID } from 'crypto';
import path from 'path';

export const PICTURE_EXTENSIONS = ['jpg', 'jpeg', 'png', 'gif', 'webp', 'heic', 'heif'] as const;

/**
 * Lowercased extension of `filename` when it is a known picture type, `jpg` otherwise.
 */
export function normalizeExtension(filename: string): string {
  const ext = path.extname(filename).slice(1).toLowerCase();
  return PICTURE_EXTENSIONS.some(allowed => allowed === ext) ? ext : 'jpg';
}

/**
 * `pictures/<albumId>/<32 hex chars>.<ext>`
 */
export function buildStorageKey(albumId: string, filename: string): string {
  const id = randomUUID().replace(/-/g, '');
  return `pictures/${albumId}/${id}.${normalizeExtension(filename)}`;
}

const MIME_TYPES: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
  heic: 'image/heic',
  heif: 'image/heif',
};

/**
 * MIME type implied by a picture filename; archive entries carry no content type of their own.
 */
export function mimeTypeForFilename(filename: string): string {
  return MIME_TYPES[normalizeExtension(filename)] ?? 'image/jpeg';
}
