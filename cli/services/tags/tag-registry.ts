import { TagNameError } from '../../lib/errors';
import { Tag } from '../../lib/types';
import { GalleryStore, GalleryTx } from '../db/store';
import { normalizeTagName, slugifyTagName } from './normalize';

export interface GetOrCreateResult {
  tag: Tag;
  created: boolean;
}

/**
 * Canonical tag identities and their usage counters.
 *
 * Every method takes an optional transaction so callers that are already
 * inside one (the ledger, container tagging) keep counter updates in the same
 * commit as the link they describe.
 */
export class TagRegistry {
  constructor(private readonly store: GalleryStore) {}

  /**
   * Resolve a raw name to its tag, creating it with a zero usage count when
   * missing. Creating a tag does not count as using it.
   */
  async getOrCreate(rawName: string, tx?: GalleryTx): Promise<GetOrCreateResult> {
    const name = normalizeTagName(rawName);
    const slug = slugifyTagName(name);
    if (!slug) {
      throw new TagNameError(rawName);
    }
    return this.within(tx, async db => {
      const existing = await db.findTagBySlug(slug);
      if (existing) return { tag: existing, created: false };
      return db.insertTagIfAbsent(name, slug);
    });
  }

  /**
   * Look up a tag without creating it. Names that slugify to nothing match no tag.
   */
  async find(rawName: string, tx?: GalleryTx): Promise<Tag | null> {
    const slug = slugifyTagName(rawName);
    if (!slug) return null;
    return this.within(tx, db => db.findTagBySlug(slug));
  }

  async incrementUsage(tag: Tag, tx?: GalleryTx): Promise<Tag> {
    return this.within(tx, db => db.incrementTagUsage(tag.id));
  }

  async decrementUsage(tag: Tag, tx?: GalleryTx): Promise<Tag> {
    return this.within(tx, db => db.decrementTagUsage(tag.id));
  }

  async listPopular(limit = 10): Promise<Tag[]> {
    return this.within(undefined, db => db.listTagsByUsage(limit));
  }

  private within<T>(tx: GalleryTx | undefined, fn: (db: GalleryTx) => Promise<T>): Promise<T> {
    return tx ? fn(tx) : this.store.transaction(fn);
  }
}
