export const TAG_SOURCES = ['user', 'ai', 'exif'] as const;

/**
 * Who attached a tag to a picture: the user, automated detection, or EXIF extraction.
 */
export type TagSource = (typeof TAG_SOURCES)[number];

export type ContainerKind = 'gallery' | 'album';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ExifData = { [key: string]: JsonValue };

export interface Tag {
  id: string;
  name: string;
  slug: string;
  usageCount: number;
  createdAt: Date;
}

export interface TagLink {
  pictureId: string;
  tagId: string;
  source: TagSource;
  createdAt: Date;
}

export interface TagLinkWithTag extends TagLink {
  tag: Tag;
}

export type GalleryType = 'private' | 'public';

export interface Gallery {
  id: string;
  ownerId: string;
  name: string;
  description: string;
  galleryType: GalleryType;
  isFavorite: boolean;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

/**
 * Access to a gallery granted by its owner. At most one per (gallery, user).
 */
export interface GalleryShare {
  galleryId: string;
  userId: string;
  canEdit: boolean;
  sharedAt: Date;
}

export interface Album {
  id: string;
  galleryId: string;
  name: string;
  description: string;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export interface Picture {
  id: string;
  albumId: string;
  title: string;
  description: string;
  storageKey: string;
  fileSize: number;
  mimeType: string;
  width: number | null;
  height: number | null;
  ocrText: string;
  exifData: ExifData;
  takenAt: Date | null;
  isFavorite: boolean;
  uploadedAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export function isTagSource(value: string): value is TagSource {
  return TAG_SOURCES.some(source => source === value);
}
