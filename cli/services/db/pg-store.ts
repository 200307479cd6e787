import { Pool, PoolClient } from 'pg';
import {
  Album,
  ContainerKind,
  ExifData,
  Gallery,
  GalleryShare,
  GalleryType,
  Picture,
  Tag,
  TagLinkWithTag,
  TagSource,
  isTagSource,
} from '../../lib/types';
import { logger } from '../../utils/logger';
import {
  FindOptions,
  GalleryStore,
  GalleryTx,
  NewAlbum,
  NewGallery,
  NewPicture,
  PicturePatch,
} from './store';

type TagRow = {
  id: string;
  name: string;
  slug: string;
  usage_count: number;
  created_at: Date;
};

type TagLinkRow = TagRow & {
  picture_id: string;
  tag_id: string;
  source: string;
  linked_at: Date;
};

type GalleryRow = {
  id: string;
  owner_id: string;
  name: string;
  description: string;
  gallery_type: GalleryType;
  is_favorite: boolean;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
};

type GalleryShareRow = {
  gallery_id: string;
  user_id: string;
  can_edit: boolean;
  shared_at: Date;
};

type AlbumRow = {
  id: string;
  gallery_id: string;
  name: string;
  description: string;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
};

export type PictureRow = {
  id: string;
  album_id: string;
  title: string;
  description: string;
  storage_key: string;
  // bigint columns arrive as strings
  file_size: string | number;
  mime_type: string;
  width: number | null;
  height: number | null;
  ocr_text: string;
  exif_data: ExifData | null;
  taken_at: Date | null;
  is_favorite: boolean;
  uploaded_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
};

const CONTAINER_TABLES: Record<ContainerKind, { table: string; joinTable: string; fk: string }> = {
  gallery: { table: 'galleries', joinTable: 'gallery_tags', fk: 'gallery_id' },
  album: { table: 'albums', joinTable: 'album_tags', fk: 'album_id' },
};

const PICTURE_PATCH_COLUMNS: Array<[keyof PicturePatch, string]> = [
  ['title', 'title'],
  ['description', 'description'],
  ['ocrText', 'ocr_text'],
  ['takenAt', 'taken_at'],
  ['isFavorite', 'is_favorite'],
  ['deletedAt', 'deleted_at'],
];

export interface PgGalleryStoreOptions {
  connectionString?: string;
  maxConnections?: number;
  pool?: Pool;
}

/**
 * PostgreSQL-backed store. Every unit of work checks out one client and runs
 * inside BEGIN/COMMIT so that link rows and usage counters move together.
 */
export class PgGalleryStore implements GalleryStore {
  private readonly pool: Pool;
  private readonly ownsPool: boolean;

  constructor(options: PgGalleryStoreOptions = {}) {
    if (options.pool) {
      this.pool = options.pool;
      this.ownsPool = false;
    } else {
      const connectionString = options.connectionString ?? process.env.DATABASE_URL;
      if (!connectionString) {
        throw new Error('DATABASE_URL is required for the gallery store');
      }
      this.pool = new Pool({ connectionString, max: options.maxConnections });
      this.ownsPool = true;
    }
  }

  async transaction<T>(fn: (tx: GalleryTx) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(new PgGalleryTx(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch(rollbackError => {
        logger.error('Rollback failed', { error: String(rollbackError) });
      });
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    if (this.ownsPool) {
      await this.pool.end();
    }
  }
}

export class PgGalleryTx implements GalleryTx {
  constructor(private readonly client: PoolClient) {}

  async findTagBySlug(slug: string): Promise<Tag | null> {
    const { rows } = await this.client.query<TagRow>('SELECT * FROM tags WHERE slug = $1', [slug]);
    return rows[0] ? mapTag(rows[0]) : null;
  }

  async insertTagIfAbsent(name: string, slug: string): Promise<{ tag: Tag; created: boolean }> {
    const inserted = await this.client.query<TagRow>(
      'INSERT INTO tags (name, slug) VALUES ($1, $2) ON CONFLICT DO NOTHING RETURNING *',
      [name, slug]
    );
    if (inserted.rows[0]) {
      return { tag: mapTag(inserted.rows[0]), created: true };
    }
    const existing = await this.findTagBySlug(slug);
    if (!existing) {
      // the conflicting row matched on name but not on slug
      throw new Error(`Tag "${name}" conflicts with an existing tag of a different slug`);
    }
    return { tag: existing, created: false };
  }

  async incrementTagUsage(tagId: string): Promise<Tag> {
    const { rows } = await this.client.query<TagRow>(
      'UPDATE tags SET usage_count = usage_count + 1 WHERE id = $1 RETURNING *',
      [tagId]
    );
    return mapTag(requireRow(rows, `tag ${tagId}`));
  }

  async decrementTagUsage(tagId: string): Promise<Tag> {
    const { rows } = await this.client.query<TagRow>(
      'UPDATE tags SET usage_count = usage_count - 1 WHERE id = $1 AND usage_count > 0 RETURNING *',
      [tagId]
    );
    if (rows[0]) return mapTag(rows[0]);
    const current = await this.client.query<TagRow>('SELECT * FROM tags WHERE id = $1', [tagId]);
    return mapTag(requireRow(current.rows, `tag ${tagId}`));
  }

  async listTagsByUsage(limit: number): Promise<Tag[]> {
    const { rows } = await this.client.query<TagRow>(
      'SELECT * FROM tags ORDER BY usage_count DESC, name ASC LIMIT $1',
      [limit]
    );
    return rows.map(mapTag);
  }

  async lockPictureSource(pictureId: string, source: TagSource): Promise<void> {
    await this.client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [`${pictureId}:${source}`]);
  }

  async insertTagLink(pictureId: string, tagId: string, source: TagSource): Promise<boolean> {
    const result = await this.client.query(
      'INSERT INTO picture_tags (picture_id, tag_id, source) VALUES ($1, $2, $3) ON CONFLICT DO NOTHING',
      [pictureId, tagId, source]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async deleteTagLink(pictureId: string, tagId: string, source: TagSource): Promise<boolean> {
    const result = await this.client.query(
      'DELETE FROM picture_tags WHERE picture_id = $1 AND tag_id = $2 AND source = $3',
      [pictureId, tagId, source]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async listTagLinks(pictureId: string, source?: TagSource): Promise<TagLinkWithTag[]> {
    const params: string[] = [pictureId];
    let filter = '';
    if (source) {
      params.push(source);
      filter = ' AND pt.source = $2';
    }
    const { rows } = await this.client.query<TagLinkRow>(
      `SELECT t.*, pt.picture_id, pt.tag_id, pt.source, pt.created_at AS linked_at
         FROM picture_tags pt
         JOIN tags t ON t.id = pt.tag_id
        WHERE pt.picture_id = $1${filter}
        ORDER BY pt.id ASC`,
      params
    );
    return rows.map(mapTagLink);
  }

  async insertContainerTag(kind: ContainerKind, containerId: string, tagId: string): Promise<boolean> {
    const { joinTable, fk } = CONTAINER_TABLES[kind];
    const result = await this.client.query(
      `INSERT INTO ${joinTable} (${fk}, tag_id) VALUES ($1, $2) ON CONFLICT DO NOTHING`,
      [containerId, tagId]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async deleteContainerTag(kind: ContainerKind, containerId: string, tagId: string): Promise<boolean> {
    const { joinTable, fk } = CONTAINER_TABLES[kind];
    const result = await this.client.query(
      `DELETE FROM ${joinTable} WHERE ${fk} = $1 AND tag_id = $2`,
      [containerId, tagId]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async listContainerTags(kind: ContainerKind, containerId: string): Promise<Tag[]> {
    const { joinTable, fk } = CONTAINER_TABLES[kind];
    const { rows } = await this.client.query<TagRow>(
      `SELECT t.* FROM ${joinTable} ct JOIN tags t ON t.id = ct.tag_id
        WHERE ct.${fk} = $1 ORDER BY ct.created_at ASC, t.name ASC`,
      [containerId]
    );
    return rows.map(mapTag);
  }

  async insertGallery(data: NewGallery): Promise<Gallery> {
    const { rows } = await this.client.query<GalleryRow>(
      `INSERT INTO galleries (owner_id, name, description, gallery_type)
       VALUES ($1, $2, $3, $4) RETURNING *`,
      [data.ownerId, data.name, data.description ?? '', data.galleryType ?? 'private']
    );
    return mapGallery(requireRow(rows, 'inserted gallery'));
  }

  async findGallery(id: string, opts: FindOptions = {}): Promise<Gallery | null> {
    const { rows } = await this.client.query<GalleryRow>(
      `SELECT * FROM galleries WHERE id = $1${opts.includeDeleted ? '' : ' AND deleted_at IS NULL'}`,
      [id]
    );
    return rows[0] ? mapGallery(rows[0]) : null;
  }

  async insertAlbum(data: NewAlbum): Promise<Album> {
    const { rows } = await this.client.query<AlbumRow>(
      'INSERT INTO albums (gallery_id, name, description) VALUES ($1, $2, $3) RETURNING *',
      [data.galleryId, data.name, data.description ?? '']
    );
    return mapAlbum(requireRow(rows, 'inserted album'));
  }

  async findAlbum(id: string, opts: FindOptions = {}): Promise<Album | null> {
    const { rows } = await this.client.query<AlbumRow>(
      `SELECT * FROM albums WHERE id = $1${opts.includeDeleted ? '' : ' AND deleted_at IS NULL'}`,
      [id]
    );
    return rows[0] ? mapAlbum(rows[0]) : null;
  }

  async setContainerDeletedAt(kind: ContainerKind, id: string, deletedAt: Date | null): Promise<boolean> {
    const { table } = CONTAINER_TABLES[kind];
    const result = await this.client.query(
      `UPDATE ${table} SET deleted_at = $2, updated_at = now() WHERE id = $1`,
      [id, deletedAt]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async upsertGalleryShare(
    galleryId: string,
    userId: string,
    canEdit: boolean
  ): Promise<{ share: GalleryShare; created: boolean }> {
    // xmax is 0 only on a freshly inserted row
    const { rows } = await this.client.query<GalleryShareRow & { created: boolean }>(
      `INSERT INTO gallery_shares (gallery_id, user_id, can_edit) VALUES ($1, $2, $3)
       ON CONFLICT (gallery_id, user_id) DO UPDATE SET can_edit = EXCLUDED.can_edit
       RETURNING *, (xmax = 0) AS created`,
      [galleryId, userId, canEdit]
    );
    const row = requireRow(rows, 'gallery share');
    return { share: mapGalleryShare(row), created: row.created };
  }

  async deleteGalleryShare(galleryId: string, userId: string): Promise<boolean> {
    const result = await this.client.query(
      'DELETE FROM gallery_shares WHERE gallery_id = $1 AND user_id = $2',
      [galleryId, userId]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async listGalleryShares(galleryId: string): Promise<GalleryShare[]> {
    const { rows } = await this.client.query<GalleryShareRow>(
      'SELECT * FROM gallery_shares WHERE gallery_id = $1 ORDER BY shared_at ASC, user_id ASC',
      [galleryId]
    );
    return rows.map(mapGalleryShare);
  }

  async listAccessibleGalleries(userId: string): Promise<Gallery[]> {
    const { rows } = await this.client.query<GalleryRow>(
      `SELECT g.* FROM galleries g
        WHERE g.deleted_at IS NULL
          AND (g.owner_id = $1
               OR EXISTS (SELECT 1 FROM gallery_shares s WHERE s.gallery_id = g.id AND s.user_id = $1))
        ORDER BY g.created_at DESC`,
      [userId]
    );
    return rows.map(mapGallery);
  }

  async insertPicture(data: NewPicture): Promise<Picture> {
    const { rows } = await this.client.query<PictureRow>(
      `INSERT INTO pictures (album_id, title, description, storage_key, file_size, mime_type, width, height)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8) RETURNING *`,
      [
        data.albumId,
        data.title,
        data.description,
        data.storageKey,
        data.fileSize,
        data.mimeType,
        data.width,
        data.height,
      ]
    );
    return mapPicture(requireRow(rows, 'inserted picture'));
  }

  async findPicture(id: string, opts: FindOptions = {}): Promise<Picture | null> {
    const { rows } = await this.client.query<PictureRow>(
      `SELECT * FROM pictures WHERE id = $1${opts.includeDeleted ? '' : ' AND deleted_at IS NULL'}`,
      [id]
    );
    return rows[0] ? mapPicture(rows[0]) : null;
  }

  async updatePicture(id: string, patch: PicturePatch): Promise<Picture | null> {
    const assignments: string[] = [];
    const values: Array<string | boolean | Date | null> = [id];
    for (const [key, column] of PICTURE_PATCH_COLUMNS) {
      const value = patch[key];
      if (value === undefined) continue;
      values.push(value);
      assignments.push(`${column} = $${values.length}`);
    }
    if (assignments.length === 0) {
      return this.findPicture(id, { includeDeleted: true });
    }
    const { rows } = await this.client.query<PictureRow>(
      `UPDATE pictures SET ${assignments.join(', ')}, updated_at = now() WHERE id = $1 RETURNING *`,
      values
    );
    return rows[0] ? mapPicture(rows[0]) : null;
  }

  async mergePictureExif(id: string, data: ExifData): Promise<Picture | null> {
    const { rows } = await this.client.query<PictureRow>(
      `UPDATE pictures SET exif_data = exif_data || $2::jsonb, updated_at = now()
        WHERE id = $1 RETURNING *`,
      [id, JSON.stringify(data)]
    );
    return rows[0] ? mapPicture(rows[0]) : null;
  }

  async deletePicture(id: string): Promise<boolean> {
    const result = await this.client.query('DELETE FROM pictures WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async listPicturesByTagSlugs(slugs: string[], albumId?: string): Promise<Picture[]> {
    if (slugs.length === 0) return [];
    const params: Array<string | string[]> = [slugs];
    let albumFilter = '';
    if (albumId) {
      params.push(albumId);
      albumFilter = ' AND p.album_id = $2';
    }
    const { rows } = await this.client.query<PictureRow>(
      `SELECT DISTINCT p.* FROM pictures p
         JOIN picture_tags pt ON pt.picture_id = p.id
         JOIN tags t ON t.id = pt.tag_id
        WHERE t.slug = ANY($1) AND p.deleted_at IS NULL${albumFilter}
        ORDER BY p.uploaded_at DESC`,
      params
    );
    return rows.map(mapPicture);
  }
}

function requireRow<T>(rows: T[], label: string): T {
  const row = rows[0];
  if (!row) {
    throw new Error(`Expected a row for ${label}`);
  }
  return row;
}

function mapTag(row: TagRow): Tag {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    usageCount: row.usage_count,
    createdAt: row.created_at,
  };
}

function mapTagLink(row: TagLinkRow): TagLinkWithTag {
  if (!isTagSource(row.source)) {
    throw new Error(`Unknown tag source "${row.source}" on picture ${row.picture_id}`);
  }
  return {
    pictureId: row.picture_id,
    tagId: row.tag_id,
    source: row.source,
    createdAt: row.linked_at,
    tag: mapTag(row),
  };
}

function mapGallery(row: GalleryRow): Gallery {
  return {
    id: row.id,
    ownerId: row.owner_id,
    name: row.name,
    description: row.description,
    galleryType: row.gallery_type,
    isFavorite: row.is_favorite,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  };
}

function mapGalleryShare(row: GalleryShareRow): GalleryShare {
  return {
    galleryId: row.gallery_id,
    userId: row.user_id,
    canEdit: row.can_edit,
    sharedAt: row.shared_at,
  };
}

function mapAlbum(row: AlbumRow): Album {
  return {
    id: row.id,
    galleryId: row.gallery_id,
    name: row.name,
    description: row.description,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  };
}

export function mapPicture(row: PictureRow): Picture {
  return {
    id: row.id,
    albumId: row.album_id,
    title: row.title,
    description: row.description,
    storageKey: row.storage_key,
    fileSize: Number(row.file_size),
    mimeType: row.mime_type,
    width: row.width,
    height: row.height,
    ocrText: row.ocr_text,
    exifData: row.exif_data ?? {},
    takenAt: row.taken_at,
    isFavorite: row.is_favorite,
    uploadedAt: row.uploaded_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  };
}
