import { logger } from '../../utils/logger';
import { GalleryStore } from '../db/store';
import { ObjectStorage } from '../storage/object-storage';
import { TagLedger } from '../tags/tag-ledger';
import { deriveExifResult, ExifReader, readExifTags } from './exif';
import { JobResult, loadPictureBytes } from './job-support';

export const EXIF_JOB = 'picture.exif';

export interface ExifJobDeps {
  store: GalleryStore;
  storage: ObjectStorage;
  ledger: TagLedger;
  readExif?: ExifReader;
}

export class ExifJob {
  private readonly readExif: ExifReader;

  constructor(private readonly deps: ExifJobDeps) {
    this.readExif = deps.readExif ?? readExifTags;
  }

  async run(pictureId: string): Promise<JobResult> {
    const { store, storage, ledger } = this.deps;
    const loaded = await loadPictureBytes(EXIF_JOB, pictureId, store, storage);
    if (!loaded.ok) return loaded.result;

    const { tagNames, exifData, takenAt } = deriveExifResult(await this.readExif(loaded.bytes));

    if (Object.keys(exifData).length > 0 || takenAt) {
      await store.transaction(async tx => {
        if (Object.keys(exifData).length > 0) {
          await tx.mergePictureExif(pictureId, exifData);
        }
        if (takenAt) {
          await tx.updatePicture(pictureId, { takenAt });
        }
      });
    }

    // no derived tags means no camera data, which is not the same as "clear the exif tags"
    if (tagNames.length > 0) {
      await ledger.replaceSourceLinks(pictureId, 'exif', tagNames);
    }

    logger.info(`Picture ${pictureId}: exif_tags=${tagNames.length}`);
    return { status: 'completed' };
  }
}
