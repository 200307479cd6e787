import { Picture } from '../../lib/types';
import { errorMessage, logger } from '../../utils/logger';
import { GalleryStore } from '../db/store';
import { ObjectStorage } from '../storage/object-storage';

export type JobStatus = 'completed' | 'skipped';

/**
 * Outcome of one enrichment run. Only logs and tests read it.
 */
export interface JobResult {
  status: JobStatus;
  reason?: string;
}

export type LoadedPicture =
  | { ok: true; picture: Picture; bytes: Buffer }
  | { ok: false; result: JobResult };

function skipped(job: string, pictureId: string, reason: string): LoadedPicture {
  logger.warn(`Skipping ${job}: ${reason}`, { pictureId });
  return { ok: false, result: { status: 'skipped', reason } };
}

/**
 * Fetch a live picture and its stored bytes. A deleted picture, a missing
 * storage key, an unreadable object or an empty one all end the job without
 * touching anything.
 */
export async function loadPictureBytes(
  job: string,
  pictureId: string,
  store: GalleryStore,
  storage: ObjectStorage
): Promise<LoadedPicture> {
  const picture = await store.transaction(tx => tx.findPicture(pictureId));
  if (!picture) {
    return skipped(job, pictureId, 'picture not found or deleted');
  }
  if (!picture.storageKey) {
    return skipped(job, pictureId, 'picture has no storage key');
  }

  let bytes: Buffer | null;
  try {
    bytes = await storage.get(picture.storageKey);
  } catch (error) {
    return skipped(job, pictureId, `could not read ${picture.storageKey}: ${errorMessage(error)}`);
  }
  if (!bytes) {
    return skipped(job, pictureId, `object ${picture.storageKey} not found`);
  }
  if (bytes.length === 0) {
    return { ok: false, result: { status: 'skipped', reason: 'empty object' } };
  }

  return { ok: true, picture, bytes };
}
