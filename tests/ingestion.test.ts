import { beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import AdmZip from 'adm-zip';
import { ArchiveLimitError, NotFoundError, UnsupportedArchiveError, ValidationError } from '../cli/lib/errors';
import { Album } from '../cli/lib/types';
import { EnrichmentDispatcher } from '../cli/services/enrichment/dispatcher';
import { IngestionPipeline } from '../cli/services/ingest/ingestion-pipeline';
import { buildStorageKey, normalizeExtension } from '../cli/services/ingest/storage-key';
import { parseTagInput } from '../cli/services/tags/normalize';
import { TagLedger } from '../cli/services/tags/tag-ledger';
import { TagRegistry } from '../cli/services/tags/tag-registry';
import { logger } from '../cli/utils/logger';
import { FakeGalleryStore } from './helpers/fake-gallery-store';
import { createJpeg, createPng, seedAlbum } from './helpers/fixtures';
import { MemoryStorage } from './helpers/memory-storage';

logger.setLevel('silent');

let store: FakeGalleryStore;
let storage: MemoryStorage;
let dispatched: string[];
let pipeline: IngestionPipeline;
let album: Album;

function createPipeline(archiveMaxBytes?: number): IngestionPipeline {
  const dispatcher: EnrichmentDispatcher = {
    dispatchPicture: pictureId => {
      dispatched.push(pictureId);
    },
  };
  return new IngestionPipeline({
    store,
    storage,
    ledger: new TagLedger(store, new TagRegistry(store)),
    dispatcher,
    archiveMaxBytes,
  });
}

beforeEach(async () => {
  store = new FakeGalleryStore();
  storage = new MemoryStorage();
  dispatched = [];
  pipeline = createPipeline();
  album = await seedAlbum(store);
});

test('storage keys use the album, a random hex id and a known extension', () => {
  const key = buildStorageKey('album-1', 'Holiday.PNG');
  assert.match(key, /^pictures\/album-1\/[0-9a-f]{32}\.png$/);
  assert.notEqual(buildStorageKey('album-1', 'a.jpg'), buildStorageKey('album-1', 'a.jpg'));
  assert.equal(normalizeExtension('scan.bmp'), 'jpg');
  assert.equal(normalizeExtension('noext'), 'jpg');
  assert.equal(normalizeExtension('photo.HEIC'), 'heic');
});

test('ingest stores the bytes, creates the picture and links user tags', async () => {
  const bytes = await createJpeg(800, 600);
  const picture = await pipeline.ingest(album.id, bytes, 'photo.jpg', 'image/jpeg', parseTagInput('sunset, beach'));

  assert.equal(picture.width, 800);
  assert.equal(picture.height, 600);
  assert.equal(picture.mimeType, 'image/jpeg');
  assert.equal(picture.fileSize, bytes.length);
  assert.equal(picture.title, 'photo.jpg');
  assert.equal(picture.ocrText, '');
  assert.match(picture.storageKey, new RegExp(`^pictures/${album.id}/[0-9a-f]{32}\\.jpg$`));
  assert.deepEqual(storage.objects.get(picture.storageKey), bytes);

  assert.deepEqual(store.linkNames(picture.id, 'user'), ['sunset', 'beach']);
  assert.equal(store.usageOf('sunset'), 1);
  assert.equal(store.usageOf('beach'), 1);
  assert.deepEqual(dispatched, [picture.id]);
});

test('undecodable images are stored without dimensions', async () => {
  const bytes = Buffer.from('definitely not an image');
  const picture = await pipeline.ingest(album.id, bytes, 'broken.jpg', 'image/jpeg');

  assert.equal(picture.width, null);
  assert.equal(picture.height, null);
  assert.equal(storage.objects.has(picture.storageKey), true);
});

test('unknown extensions get a jpg key but keep their MIME type', async () => {
  const bytes = await createPng(10, 10);
  const picture = await pipeline.ingest(album.id, bytes, 'scan.bmp', 'image/bmp');
  assert.match(picture.storageKey, /\.jpg$/);
  assert.equal(picture.mimeType, 'image/bmp');

  const untyped = await pipeline.ingest(album.id, bytes, 'untyped.png', null);
  assert.equal(untyped.mimeType, 'image/jpeg');
});

test('ingest refuses albums that are missing or deleted', async () => {
  await store.transaction(tx => tx.setContainerDeletedAt('album', album.id, new Date()));
  await assert.rejects(
    () => pipeline.ingest(album.id, Buffer.from('x'), 'a.jpg', 'image/jpeg'),
    (error: unknown) => error instanceof NotFoundError && error.entity === 'album'
  );
  await assert.rejects(() => pipeline.ingest('missing', Buffer.from('x'), 'a.jpg', 'image/jpeg'), NotFoundError);
  assert.equal(storage.objects.size, 0);
});

test('a failed row insert removes the stored object', async () => {
  store.insertPictureError = new Error('disk full');
  await assert.rejects(
    () => pipeline.ingest(album.id, Buffer.from('x'), 'a.jpg', 'image/jpeg', ['cat']),
    /disk full/
  );
  assert.equal(storage.objects.size, 0);
  assert.equal(store.pictureRows.size, 0);
  assert.equal(store.usageOf('cat'), 0);
  assert.deepEqual(dispatched, []);
});

test('ingestBatch reports failures per file and keeps going', async () => {
  store.insertPictureError = new Error('disk full');
  const result = await pipeline.ingestBatch(
    album.id,
    [
      { filename: 'a.jpg', bytes: Buffer.from('a'), contentType: 'image/jpeg' },
      { filename: 'empty.jpg', bytes: Buffer.alloc(0) },
      { filename: 'b.jpg', bytes: Buffer.from('b'), contentType: 'image/jpeg' },
    ],
    { tags: 'trip, Trip', description: 'Day one' }
  );

  assert.deepEqual(result.failed, [{ filename: 'a.jpg', error: 'disk full' }]);
  assert.equal(result.created.length, 1);
  assert.equal(result.created[0].title, 'b.jpg');
  assert.equal(result.created[0].description, 'Day one');
  assert.deepEqual(store.linkNames(result.created[0].id, 'user'), ['trip']);
  assert.equal(store.usageOf('trip'), 1);
});

test('ingestBatch rejects an empty upload set', async () => {
  await assert.rejects(() => pipeline.ingestBatch(album.id, []), ValidationError);
  await assert.rejects(
    () => pipeline.ingestBatch(album.id, [{ filename: 'a.jpg', bytes: Buffer.alloc(0) }]),
    ValidationError
  );
});

test('ingestArchive ingests top-level images only', async () => {
  const zip = new AdmZip();
  zip.addFile('one.jpg', await createJpeg(40, 30));
  zip.addFile('two.PNG', await createPng(20, 20));
  zip.addFile('notes.txt', Buffer.from('hello'));
  zip.addFile('nested/three.jpg', await createJpeg(10, 10));

  const result = await pipeline.ingestArchive(album.id, 'holiday.zip', zip.toBuffer(), { tags: 'holiday' });

  assert.deepEqual(result.failed, []);
  assert.deepEqual(result.created.map(picture => picture.title).sort(), ['one.jpg', 'two.PNG']);
  const png = result.created.find(picture => picture.title === 'two.PNG');
  assert.equal(png?.mimeType, 'image/png');
  assert.equal(png?.width, 20);
  assert.equal(store.usageOf('holiday'), 2);
});

test('an oversized archive is rejected before any picture exists', async () => {
  pipeline = createPipeline(1500);
  const zip = new AdmZip();
  zip.addFile('a.jpg', Buffer.alloc(1000, 1));
  zip.addFile('b.jpg', Buffer.alloc(1000, 2));

  await assert.rejects(() => pipeline.ingestArchive(album.id, 'big.zip', zip.toBuffer()), ArchiveLimitError);
  assert.equal(store.pictureRows.size, 0);
  assert.equal(storage.objects.size, 0);
});

test('unsupported archive formats are rejected', async () => {
  await assert.rejects(
    () => pipeline.ingestArchive(album.id, 'photos.rar', Buffer.from('x')),
    UnsupportedArchiveError
  );
});

test('an archive without images is a validation error', async () => {
  const zip = new AdmZip();
  zip.addFile('readme.md', Buffer.from('# nothing'));
  await assert.rejects(
    () => pipeline.ingestArchive(album.id, 'docs.zip', zip.toBuffer()),
    (error: unknown) => error instanceof ValidationError && error.message === 'No images found in docs.zip'
  );
});
