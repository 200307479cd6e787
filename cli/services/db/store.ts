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
} from '../../lib/types';

export interface NewGallery {
  ownerId: string;
  name: string;
  description?: string;
  galleryType?: GalleryType;
}

export interface NewAlbum {
  galleryId: string;
  name: string;
  description?: string;
}

export interface NewPicture {
  albumId: string;
  title: string;
  description: string;
  storageKey: string;
  fileSize: number;
  mimeType: string;
  width: number | null;
  height: number | null;
}

export interface PicturePatch {
  title?: string;
  description?: string;
  ocrText?: string;
  takenAt?: Date | null;
  isFavorite?: boolean;
  deletedAt?: Date | null;
}

export interface FindOptions {
  includeDeleted?: boolean;
}

/**
 * Operations available inside a store transaction. Counter updates are single
 * atomic statements; nothing here reads a value and writes it back.
 */
export interface GalleryTx {
  findTagBySlug(slug: string): Promise<Tag | null>;
  /** Inserts the tag unless a row with the same slug exists; returns whichever row wins. */
  insertTagIfAbsent(name: string, slug: string): Promise<{ tag: Tag; created: boolean }>;
  incrementTagUsage(tagId: string): Promise<Tag>;
  /** Never goes below zero. */
  decrementTagUsage(tagId: string): Promise<Tag>;
  listTagsByUsage(limit: number): Promise<Tag[]>;

  /** Held until the surrounding transaction ends. */
  lockPictureSource(pictureId: string, source: TagSource): Promise<void>;
  insertTagLink(pictureId: string, tagId: string, source: TagSource): Promise<boolean>;
  deleteTagLink(pictureId: string, tagId: string, source: TagSource): Promise<boolean>;
  listTagLinks(pictureId: string, source?: TagSource): Promise<TagLinkWithTag[]>;

  insertContainerTag(kind: ContainerKind, containerId: string, tagId: string): Promise<boolean>;
  deleteContainerTag(kind: ContainerKind, containerId: string, tagId: string): Promise<boolean>;
  listContainerTags(kind: ContainerKind, containerId: string): Promise<Tag[]>;

  insertGallery(data: NewGallery): Promise<Gallery>;
  findGallery(id: string, opts?: FindOptions): Promise<Gallery | null>;
  insertAlbum(data: NewAlbum): Promise<Album>;
  findAlbum(id: string, opts?: FindOptions): Promise<Album | null>;
  setContainerDeletedAt(kind: ContainerKind, id: string, deletedAt: Date | null): Promise<boolean>;

  /** Creates the share or updates `canEdit` on the existing one. */
  upsertGalleryShare(galleryId: string, userId: string, canEdit: boolean): Promise<{ share: GalleryShare; created: boolean }>;
  deleteGalleryShare(galleryId: string, userId: string): Promise<boolean>;
  listGalleryShares(galleryId: string): Promise<GalleryShare[]>;
  /** Live galleries the user owns or has been shared, newest first. */
  listAccessibleGalleries(userId: string): Promise<Gallery[]>;

  insertPicture(data: NewPicture): Promise<Picture>;
  findPicture(id: string, opts?: FindOptions): Promise<Picture | null>;
  updatePicture(id: string, patch: PicturePatch): Promise<Picture | null>;
  /** Shallow merge of `data` into the stored EXIF object. */
  mergePictureExif(id: string, data: ExifData): Promise<Picture | null>;
  deletePicture(id: string): Promise<boolean>;
  /** Live pictures linked to any of the slugs, by any source. */
  listPicturesByTagSlugs(slugs: string[], albumId?: string): Promise<Picture[]>;
}

export interface GalleryStore {
  /**
   * Runs `fn` in a transaction: commits when it resolves, rolls back when it throws.
   */
  transaction<T>(fn: (tx: GalleryTx) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
