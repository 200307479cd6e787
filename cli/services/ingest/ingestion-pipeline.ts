import { NotFoundError, ValidationError } from '../../lib/errors';
import { Album, Picture } from '../../lib/types';
import { errorMessage, logger } from '../../utils/logger';
import { GalleryStore } from '../db/store';
import type { EnrichmentDispatcher } from '../enrichment/dispatcher';
import { ObjectStorage } from '../storage/object-storage';
import { TagLedger } from '../tags/tag-ledger';
import { parseTagInput, slugifyTagName } from '../tags/normalize';
import { DEFAULT_ARCHIVE_MAX_BYTES, extractArchiveImages } from './archive';
import { probeDimensions } from './image-probe';
import { buildStorageKey, mimeTypeForFilename } from './storage-key';

export interface IngestionPipelineOptions {
  store: GalleryStore;
  storage: ObjectStorage;
  ledger: TagLedger;
  dispatcher?: EnrichmentDispatcher;
  archiveMaxBytes?: number;
}

export interface PictureDetails {
  title?: string;
  description?: string;
}

export interface UploadInput extends PictureDetails {
  filename: string;
  bytes: Buffer;
  contentType?: string | null;
}

export interface BatchOptions extends PictureDetails {
  /** Either a list of names or a comma separated field such as "sunset, beach". */
  tags?: string | string[];
}

export interface FailedUpload {
  filename: string;
  error: string;
}

export interface BatchResult {
  created: Picture[];
  failed: FailedUpload[];
}

/**
 * Turns uploaded bytes into stored objects and Picture rows.
 *
 * Bytes are written to storage before the row exists, so a Picture never
 * references a missing object. When the row or its user tags cannot be
 * written the object is removed again and the error reaches the caller.
 */
export class IngestionPipeline {
  private readonly store: GalleryStore;
  private readonly storage: ObjectStorage;
  private readonly ledger: TagLedger;
  private readonly dispatcher?: EnrichmentDispatcher;
  private readonly archiveMaxBytes: number;

  constructor(options: IngestionPipelineOptions) {
    this.store = options.store;
    this.storage = options.storage;
    this.ledger = options.ledger;
    this.dispatcher = options.dispatcher;
    this.archiveMaxBytes = options.archiveMaxBytes ?? DEFAULT_ARCHIVE_MAX_BYTES;
  }

  async ingest(
    albumId: string,
    bytes: Buffer,
    filename: string,
    contentType: string | null | undefined,
    userTagNames: string[] = [],
    details: PictureDetails = {}
  ): Promise<Picture> {
    await this.requireLiveAlbum(albumId);

    const { width, height } = await probeDimensions(bytes);
    const mimeType = contentType || 'image/jpeg';
    const storageKey = await this.storage.put(buildStorageKey(albumId, filename), bytes, mimeType);

    let picture: Picture;
    try {
      picture = await this.store.transaction(async tx => {
        const created = await tx.insertPicture({
          albumId,
          title: details.title || filename || 'Untitled',
          description: details.description ?? '',
          storageKey,
          fileSize: bytes.length,
          mimeType,
          width,
          height,
        });
        for (const name of userTagNames) {
          if (!slugifyTagName(name)) {
            logger.debug('Skipping unusable tag name', { name, pictureId: created.id });
            continue;
          }
          await this.ledger.addLink(created.id, name, 'user', tx);
        }
        return created;
      });
    } catch (error) {
      await this.storage.delete(storageKey).catch(deleteError => {
        logger.warn('Failed to remove orphaned object', { storageKey, error: errorMessage(deleteError) });
      });
      throw error;
    }

    logger.info('Picture ingested', { pictureId: picture.id, albumId, storageKey, width, height });
    this.dispatcher?.dispatchPicture(picture.id);
    return picture;
  }

  /**
   * Ingest each upload on its own. A file that fails is reported in `failed`
   * and does not stop the rest. Empty files are ignored; a batch with nothing
   * left to ingest is rejected.
   */
  async ingestBatch(albumId: string, uploads: UploadInput[], options: BatchOptions = {}): Promise<BatchResult> {
    const pending = uploads.filter(upload => upload.bytes.length > 0);
    if (pending.length === 0) {
      throw new ValidationError('Please select one or more images, or upload a ZIP/TAR archive.');
    }
    await this.requireLiveAlbum(albumId);

    const tagNames = parseTagInput(options.tags);
    const result: BatchResult = { created: [], failed: [] };

    for (const upload of pending) {
      try {
        const picture = await this.ingest(albumId, upload.bytes, upload.filename, upload.contentType, tagNames, {
          title: upload.title ?? options.title,
          description: upload.description ?? options.description,
        });
        result.created.push(picture);
      } catch (error) {
        logger.warn(`Failed to upload ${upload.filename}`, { albumId, error: errorMessage(error) });
        result.failed.push({ filename: upload.filename, error: errorMessage(error) });
      }
    }

    logger.info('Batch ingested', { albumId, created: result.created.length, failed: result.failed.length });
    return result;
  }

  /**
   * Extract every picture from the archive first, then ingest them as a batch.
   * Format and size errors are raised before any Picture exists.
   */
  async ingestArchive(
    albumId: string,
    archiveFilename: string,
    bytes: Buffer,
    options: BatchOptions = {}
  ): Promise<BatchResult> {
    await this.requireLiveAlbum(albumId);
    const images = await extractArchiveImages(archiveFilename, bytes, { maxBytes: this.archiveMaxBytes });
    if (images.length === 0) {
      throw new ValidationError(`No images found in ${archiveFilename}`);
    }
    return this.ingestBatch(
      albumId,
      images.map(image => ({
        filename: image.filename,
        bytes: image.bytes,
        contentType: mimeTypeForFilename(image.filename),
      })),
      options
    );
  }

  private async requireLiveAlbum(albumId: string): Promise<Album> {
    const album = await this.store.transaction(tx => tx.findAlbum(albumId));
    if (!album) {
      throw new NotFoundError('album', albumId);
    }
    return album;
  }
}
