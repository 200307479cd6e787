import { NotFoundError } from '../../lib/errors';
import { TagSet } from '../../lib/tag-set';
import { Picture } from '../../lib/types';
import { errorMessage, logger } from '../../utils/logger';
import { FindOptions, GalleryStore, PicturePatch } from '../db/store';
import { ObjectStorage } from '../storage/object-storage';
import { slugifyTagName } from '../tags/normalize';
import { ReplaceResult, TagLedger } from '../tags/tag-ledger';

export type PictureEdit = Pick<PicturePatch, 'title' | 'description'>;

/**
 * Picture lifecycle after ingestion: edits, favorites, soft delete, user
 * tags, tag search and permanent removal.
 */
export class PictureService {
  constructor(
    private readonly store: GalleryStore,
    private readonly storage: ObjectStorage,
    private readonly ledger: TagLedger
  ) {}

  async get(id: string, opts: FindOptions = {}): Promise<Picture> {
    const picture = await this.store.transaction(tx => tx.findPicture(id, opts));
    if (!picture) throw new NotFoundError('picture', id);
    return picture;
  }

  async update(id: string, edit: PictureEdit): Promise<Picture> {
    return this.patch(id, edit);
  }

  async toggleFavorite(id: string): Promise<Picture> {
    const picture = await this.get(id);
    return this.patch(id, { isFavorite: !picture.isFavorite });
  }

  async softDelete(id: string): Promise<Picture> {
    return this.patch(id, { deletedAt: new Date() });
  }

  async restore(id: string): Promise<Picture> {
    return this.patch(id, { deletedAt: null });
  }

  async addTag(id: string, tagName: string): Promise<boolean> {
    return this.ledger.addLink(id, tagName, 'user');
  }

  async removeTag(id: string, tagName: string): Promise<boolean> {
    return this.ledger.removeLink(id, tagName, 'user');
  }

  /**
   * Replace the user tags only; detected and EXIF tags are untouched.
   */
  async setTags(id: string, tagNames: string[]): Promise<ReplaceResult> {
    return this.ledger.replaceSourceLinks(id, 'user', tagNames);
  }

  async tags(id: string): Promise<TagSet> {
    return this.ledger.tagSet(id);
  }

  /**
   * Live pictures carrying any of the tags, from any source.
   */
  async searchByTags(tagNames: string[], albumId?: string): Promise<Picture[]> {
    const slugs = [...new Set(tagNames.map(slugifyTagName).filter(Boolean))];
    return this.store.transaction(tx => tx.listPicturesByTagSlugs(slugs, albumId));
  }

  /**
   * Delete the row, its links (releasing their usage) and the stored object.
   */
  async purge(id: string): Promise<void> {
    const picture = await this.get(id, { includeDeleted: true });
    await this.store.transaction(async tx => {
      const removed = await this.ledger.removeAllLinks(id, tx);
      await tx.deletePicture(id);
      logger.info('Picture purged', { pictureId: id, links: removed });
    });
    await this.storage.delete(picture.storageKey).catch(error => {
      logger.warn('Failed to remove stored object', { storageKey: picture.storageKey, error: errorMessage(error) });
    });
  }

  private async patch(id: string, patch: PicturePatch): Promise<Picture> {
    const picture = await this.store.transaction(tx => tx.updatePicture(id, patch));
    if (!picture) throw new NotFoundError('picture', id);
    return picture;
  }
}
