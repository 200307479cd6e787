import sharp from 'sharp';
import { Album } from '../../cli/lib/types';
import { FakeGalleryStore } from './fake-gallery-store';

export async function createJpeg(width: number, height: number, color = '#228be6'): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: color } }).jpeg().toBuffer();
}

export async function createPng(width: number, height: number): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 4, background: '#ffffff' } }).png().toBuffer();
}

export async function seedAlbum(store: FakeGalleryStore): Promise<Album> {
  return store.transaction(async tx => {
    const gallery = await tx.insertGallery({ ownerId: 'owner-1', name: 'Holidays' });
    return tx.insertAlbum({ galleryId: gallery.id, name: 'Beach' });
  });
}

export async function seedPicture(store: FakeGalleryStore, albumId: string, storageKey: string): Promise<string> {
  const picture = await store.transaction(tx =>
    tx.insertPicture({
      albumId,
      title: 'photo.jpg',
      description: '',
      storageKey,
      fileSize: 3,
      mimeType: 'image/jpeg',
      width: null,
      height: null,
    })
  );
  return picture.id;
}
