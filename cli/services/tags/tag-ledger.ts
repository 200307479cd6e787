import { TagSet } from '../../lib/tag-set';
import { TAG_SOURCES, Tag, TagSource } from '../../lib/types';
import { logger } from '../../utils/logger';
import { GalleryStore, GalleryTx } from '../db/store';
import { slugifyTagName } from './normalize';
import { TagRegistry } from './tag-registry';

export interface ReplaceResult {
  added: string[];
  removed: string[];
}

/**
 * Per-picture tag links, each attributed to exactly one source.
 *
 * A (picture, tag, source) triple exists at most once. Every link created
 * adds one to the tag's usage count and every link deleted takes one away,
 * in the same transaction. Writers for one (picture, source) pair are
 * serialized by a store lock; writers for different sources never wait on
 * each other.
 */
export class TagLedger {
  constructor(
    private readonly store: GalleryStore,
    private readonly registry: TagRegistry
  ) {}

  /**
   * Returns true when a new link was created, false when it already existed.
   */
  async addLink(pictureId: string, tagName: string, source: TagSource, tx?: GalleryTx): Promise<boolean> {
    return this.within(tx, async db => {
      await db.lockPictureSource(pictureId, source);
      return (await this.linkLocked(db, pictureId, tagName, source)) !== null;
    });
  }

  /**
   * Returns true when a link was removed. Unknown tags and absent links are no-ops.
   */
  async removeLink(pictureId: string, tagName: string, source: TagSource, tx?: GalleryTx): Promise<boolean> {
    return this.within(tx, async db => {
      const tag = await this.registry.find(tagName, db);
      if (!tag) return false;

      await db.lockPictureSource(pictureId, source);
      const deleted = await db.deleteTagLink(pictureId, tag.id, source);
      if (deleted) {
        await this.registry.decrementUsage(tag, db);
      }
      return deleted;
    });
  }

  /**
   * Make the links of one source on one picture exactly `tagNames`: links
   * missing from the list are dropped, new names are linked, links that
   * survive are left alone. Blank names and names without a usable slug
   * are ignored.
   */
  async replaceSourceLinks(pictureId: string, source: TagSource, tagNames: string[]): Promise<ReplaceResult> {
    const wanted = new Map<string, string>();
    for (const raw of tagNames) {
      const slug = slugifyTagName(raw);
      if (!slug) {
        if (raw.trim()) logger.debug('Ignoring tag without usable characters', { raw, source });
        continue;
      }
      if (!wanted.has(slug)) wanted.set(slug, raw);
    }

    return this.store.transaction(async db => {
      await db.lockPictureSource(pictureId, source);

      const current = await db.listTagLinks(pictureId, source);
      const kept = new Set<string>();
      const removed: string[] = [];

      for (const link of current) {
        if (wanted.has(link.tag.slug)) {
          kept.add(link.tag.slug);
          continue;
        }
        if (await db.deleteTagLink(pictureId, link.tagId, source)) {
          await this.registry.decrementUsage(link.tag, db);
          removed.push(link.tag.name);
        }
      }

      const added: string[] = [];
      for (const [slug, raw] of wanted) {
        if (kept.has(slug)) continue;
        const linked = await this.linkLocked(db, pictureId, raw, source);
        if (linked) added.push(linked.name);
      }

      return { added, removed };
    });
  }

  async linksBySource(pictureId: string, source: TagSource): Promise<TagSet> {
    const links = await this.store.transaction(db => db.listTagLinks(pictureId, source));
    return TagSet.fromLinks(links);
  }

  /**
   * Tag names from every source, deduplicated, in the order they were first linked.
   */
  async allTags(pictureId: string): Promise<string[]> {
    return (await this.tagSet(pictureId)).toArray();
  }

  async tagSet(pictureId: string): Promise<TagSet> {
    const links = await this.store.transaction(db => db.listTagLinks(pictureId));
    return TagSet.fromLinks(links);
  }

  /**
   * Drop every link of a picture, releasing one usage per link. Run before a
   * picture row is deleted so the cascade has nothing left to remove.
   */
  async removeAllLinks(pictureId: string, tx?: GalleryTx): Promise<number> {
    return this.within(tx, async db => {
      for (const source of TAG_SOURCES) {
        await db.lockPictureSource(pictureId, source);
      }
      let removed = 0;
      for (const link of await db.listTagLinks(pictureId)) {
        if (await db.deleteTagLink(pictureId, link.tagId, link.source)) {
          await this.registry.decrementUsage(link.tag, db);
          removed += 1;
        }
      }
      return removed;
    });
  }

  /**
   * Caller holds the (picture, source) lock. Returns the tag when a link was created.
   */
  private async linkLocked(db: GalleryTx, pictureId: string, tagName: string, source: TagSource): Promise<Tag | null> {
    const { tag } = await this.registry.getOrCreate(tagName, db);
    if (!(await db.insertTagLink(pictureId, tag.id, source))) {
      return null;
    }
    return this.registry.incrementUsage(tag, db);
  }

  private within<T>(tx: GalleryTx | undefined, fn: (db: GalleryTx) => Promise<T>): Promise<T> {
    return tx ? fn(tx) : this.store.transaction(fn);
  }
}
