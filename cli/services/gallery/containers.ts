import { NotFoundError, PermissionError, ValidationError } from '../../lib/errors';
import { Album, ContainerKind, Gallery, GalleryShare, Tag } from '../../lib/types';
import { logger } from '../../utils/logger';
import { FindOptions, GalleryStore, GalleryTx, NewAlbum, NewGallery } from '../db/store';
import { slugifyTagName } from '../tags/normalize';
import { TagRegistry } from '../tags/tag-registry';

/**
 * Galleries and albums: creation, soft delete, and their plain tag sets.
 *
 * Container tags carry no source. Each membership counts once towards the
 * tag's usage, exactly like a picture link.
 */
export class ContainerService {
  constructor(
    private readonly store: GalleryStore,
    private readonly registry: TagRegistry
  ) {}

  async createGallery(data: NewGallery): Promise<Gallery> {
    const gallery = await this.store.transaction(tx => tx.insertGallery(data));
    logger.info('Gallery created', { galleryId: gallery.id, ownerId: gallery.ownerId });
    return gallery;
  }

  async createAlbum(data: NewAlbum): Promise<Album> {
    const album = await this.store.transaction(async tx => {
      if (!(await tx.findGallery(data.galleryId))) {
        throw new NotFoundError('gallery', data.galleryId);
      }
      return tx.insertAlbum(data);
    });
    logger.info('Album created', { albumId: album.id, galleryId: album.galleryId });
    return album;
  }

  async getGallery(id: string, opts: FindOptions = {}): Promise<Gallery> {
    const gallery = await this.store.transaction(tx => tx.findGallery(id, opts));
    if (!gallery) throw new NotFoundError('gallery', id);
    return gallery;
  }

  async getAlbum(id: string, opts: FindOptions = {}): Promise<Album> {
    const album = await this.store.transaction(tx => tx.findAlbum(id, opts));
    if (!album) throw new NotFoundError('album', id);
    return album;
  }

  /**
   * Grant `userId` access to a live gallery. Only the owner may share; sharing
   * again with the same user updates `canEdit`.
   */
  async share(galleryId: string, actorId: string, userId: string, canEdit = false): Promise<GalleryShare> {
    if (!userId) throw new ValidationError('userId is required');
    const { share, created } = await this.store.transaction(async tx => {
      await this.requireOwnedGallery(tx, galleryId, actorId, 'share');
      return tx.upsertGalleryShare(galleryId, userId, canEdit);
    });
    logger.info(created ? 'Gallery shared' : 'Gallery share updated', { galleryId, userId, canEdit });
    return share;
  }

  /**
   * Returns true when a share was removed.
   */
  async unshare(galleryId: string, actorId: string, userId: string): Promise<boolean> {
    if (!userId) throw new ValidationError('userId is required');
    const removed = await this.store.transaction(async tx => {
      await this.requireOwnedGallery(tx, galleryId, actorId, 'unshare');
      return tx.deleteGalleryShare(galleryId, userId);
    });
    if (removed) logger.info('Gallery share removed', { galleryId, userId });
    return removed;
  }

  async listShares(galleryId: string): Promise<GalleryShare[]> {
    return this.store.transaction(tx => tx.listGalleryShares(galleryId));
  }

  /**
   * Live galleries owned by or shared with `userId`, newest first.
   */
  async listAccessible(userId: string): Promise<Gallery[]> {
    return this.store.transaction(tx => tx.listAccessibleGalleries(userId));
  }

  async softDelete(kind: ContainerKind, id: string): Promise<void> {
    await this.setDeletedAt(kind, id, new Date());
  }

  async restore(kind: ContainerKind, id: string): Promise<void> {
    await this.setDeletedAt(kind, id, null);
  }

  /**
   * Returns true when the tag was not yet a member.
   */
  async addTag(kind: ContainerKind, id: string, tagName: string): Promise<boolean> {
    return this.store.transaction(tx => this.addTagIn(tx, kind, id, tagName));
  }

  /**
   * Returns true when a membership was removed. Unknown tags are a no-op.
   */
  async removeTag(kind: ContainerKind, id: string, tagName: string): Promise<boolean> {
    return this.store.transaction(async tx => {
      const tag = await this.registry.find(tagName, tx);
      if (!tag) return false;
      return this.removeTagIn(tx, kind, id, tag);
    });
  }

  /**
   * Make the container's tags exactly `tagNames`. Unusable names are ignored.
   */
  async setTags(kind: ContainerKind, id: string, tagNames: string[]): Promise<Tag[]> {
    const wanted = new Set(tagNames.map(slugifyTagName).filter(Boolean));
    return this.store.transaction(async tx => {
      for (const tag of await tx.listContainerTags(kind, id)) {
        if (!wanted.has(tag.slug)) {
          await this.removeTagIn(tx, kind, id, tag);
        }
      }
      for (const name of tagNames) {
        if (slugifyTagName(name)) {
          await this.addTagIn(tx, kind, id, name);
        }
      }
      return tx.listContainerTags(kind, id);
    });
  }

  async listTags(kind: ContainerKind, id: string): Promise<Tag[]> {
    return this.store.transaction(tx => tx.listContainerTags(kind, id));
  }

  private async addTagIn(tx: GalleryTx, kind: ContainerKind, id: string, tagName: string): Promise<boolean> {
    const { tag } = await this.registry.getOrCreate(tagName, tx);
    if (!(await tx.insertContainerTag(kind, id, tag.id))) return false;
    await this.registry.incrementUsage(tag, tx);
    return true;
  }

  private async removeTagIn(tx: GalleryTx, kind: ContainerKind, id: string, tag: Tag): Promise<boolean> {
    if (!(await tx.deleteContainerTag(kind, id, tag.id))) return false;
    await this.registry.decrementUsage(tag, tx);
    return true;
  }

  private async requireOwnedGallery(
    tx: GalleryTx,
    galleryId: string,
    actorId: string,
    action: 'share' | 'unshare'
  ): Promise<Gallery> {
    const gallery = await tx.findGallery(galleryId);
    if (!gallery) throw new NotFoundError('gallery', galleryId);
    if (gallery.ownerId !== actorId) {
      throw new PermissionError(`Only gallery owner can ${action}`);
    }
    return gallery;
  }

  private async setDeletedAt(kind: ContainerKind, id: string, deletedAt: Date | null): Promise<void> {
    const updated = await this.store.transaction(tx => tx.setContainerDeletedAt(kind, id, deletedAt));
    if (!updated) throw new NotFoundError(kind, id);
    logger.info(deletedAt ? `${kind} deleted` : `${kind} restored`, { id });
  }
}
