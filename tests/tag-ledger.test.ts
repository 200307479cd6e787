import { beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import { TagSource } from '../cli/lib/types';
import { TagLedger } from '../cli/services/tags/tag-ledger';
import { TagRegistry } from '../cli/services/tags/tag-registry';
import { logger } from '../cli/utils/logger';
import { FakeGalleryStore } from './helpers/fake-gallery-store';
import { seedAlbum, seedPicture } from './helpers/fixtures';

logger.setLevel('silent');

let store: FakeGalleryStore;
let ledger: TagLedger;
let pictureId: string;

function assertUsageMatchesLinks(): void {
  for (const tag of store.tagRows.values()) {
    assert.equal(tag.usageCount, store.liveReferences(tag.id), `usage of "${tag.name}"`);
  }
}

beforeEach(async () => {
  store = new FakeGalleryStore();
  ledger = new TagLedger(store, new TagRegistry(store));
  const album = await seedAlbum(store);
  pictureId = await seedPicture(store, album.id, 'pictures/a/one.jpg');
});

test('addLink is idempotent per source', async () => {
  assert.equal(await ledger.addLink(pictureId, 'Cat', 'user'), true);
  assert.equal(await ledger.addLink(pictureId, ' cat', 'user'), false);
  assert.equal(store.usageOf('cat'), 1);
  assert.equal(store.links.length, 1);
});

test('the same tag is tracked separately for each source', async () => {
  await ledger.addLink(pictureId, 'cat', 'user');
  await ledger.addLink(pictureId, 'cat', 'ai');

  assert.equal(store.usageOf('cat'), 2);
  assert.deepEqual(await ledger.allTags(pictureId), ['cat']);
  const set = await ledger.tagSet(pictureId);
  assert.deepEqual(set.sourcesOf('cat'), ['user', 'ai']);
});

test('removeLink decrements once and ignores absent links', async () => {
  await ledger.addLink(pictureId, 'cat', 'user');

  assert.equal(await ledger.removeLink(pictureId, 'cat', 'ai'), false);
  assert.equal(await ledger.removeLink(pictureId, 'CAT', 'user'), true);
  assert.equal(await ledger.removeLink(pictureId, 'cat', 'user'), false);
  assert.equal(await ledger.removeLink(pictureId, 'never-seen', 'user'), false);

  assert.equal(store.usageOf('cat'), 0);
  assert.equal(store.tagByName('never-seen'), undefined);
  assert.ok(store.tagByName('cat'), 'tag survives losing its last link');
});

test('replaceSourceLinks twice with the same names changes nothing the second time', async () => {
  const first = await ledger.replaceSourceLinks(pictureId, 'ai', ['cat', 'tree']);
  assert.deepEqual(first, { added: ['cat', 'tree'], removed: [] });

  const second = await ledger.replaceSourceLinks(pictureId, 'ai', ['cat', 'tree']);
  assert.deepEqual(second, { added: [], removed: [] });

  assert.deepEqual(store.linkNames(pictureId, 'ai'), ['cat', 'tree']);
  assert.equal(store.usageOf('cat'), 1);
  assert.equal(store.usageOf('tree'), 1);
});

test('replaceSourceLinks drops names that are no longer present', async () => {
  await ledger.replaceSourceLinks(pictureId, 'ai', ['cat', 'tree']);
  const result = await ledger.replaceSourceLinks(pictureId, 'ai', ['dog']);

  assert.deepEqual(result, { added: ['dog'], removed: ['cat', 'tree'] });
  assert.deepEqual(store.linkNames(pictureId, 'ai'), ['dog']);
  assert.equal(store.usageOf('cat'), 0);
  assert.equal(store.usageOf('tree'), 0);
  assert.equal(store.usageOf('dog'), 1);
});

test('replaceSourceLinks leaves other sources alone', async () => {
  await ledger.addLink(pictureId, 'cat', 'user');
  await ledger.replaceSourceLinks(pictureId, 'ai', ['cat']);
  await ledger.replaceSourceLinks(pictureId, 'ai', []);

  assert.deepEqual(store.linkNames(pictureId, 'user'), ['cat']);
  assert.deepEqual(store.linkNames(pictureId, 'ai'), []);
  assert.equal(store.usageOf('cat'), 1);
});

test('replaceSourceLinks skips blank names and duplicates', async () => {
  const result = await ledger.replaceSourceLinks(pictureId, 'exif', ['  ', 'Cat', 'cat ', '???']);
  assert.deepEqual(result.added, ['cat']);
  assert.deepEqual(store.linkNames(pictureId, 'exif'), ['cat']);
});

test('concurrent replaces for one picture and source are serialized', async () => {
  await Promise.all([
    ledger.replaceSourceLinks(pictureId, 'ai', ['a', 'b']),
    ledger.replaceSourceLinks(pictureId, 'ai', ['b', 'c']),
  ]);

  assert.deepEqual(store.linkNames(pictureId, 'ai'), ['b', 'c']);
  assert.equal(store.usageOf('a'), 0);
  assert.equal(store.usageOf('b'), 1);
  assert.equal(store.usageOf('c'), 1);
  assertUsageMatchesLinks();
});

test('concurrent replaces for different sources do not interfere', async () => {
  await Promise.all([
    ledger.replaceSourceLinks(pictureId, 'ai', ['cat', 'tree']),
    ledger.replaceSourceLinks(pictureId, 'exif', ['make:canon', 'gps']),
    ledger.addLink(pictureId, 'cat', 'user'),
  ]);

  assert.deepEqual(store.linkNames(pictureId, 'ai'), ['cat', 'tree']);
  assert.deepEqual(store.linkNames(pictureId, 'exif'), ['make:canon', 'gps']);
  assert.equal(store.usageOf('cat'), 2);
  assertUsageMatchesLinks();
});

test('usage always equals the number of live links', async () => {
  const album = await seedAlbum(store);
  const other = await seedPicture(store, album.id, 'pictures/b/two.jpg');
  const steps: Array<[string, string, TagSource, string[]]> = [
    [pictureId, 'replace', 'ai', ['cat', 'dog']],
    [other, 'replace', 'ai', ['dog']],
    [pictureId, 'add', 'user', ['dog']],
    [other, 'replace', 'ai', ['cat', 'bird']],
    [pictureId, 'remove', 'ai', ['dog']],
    [pictureId, 'replace', 'ai', []],
    [other, 'add', 'exif', ['gps']],
    [other, 'remove', 'user', ['gps']],
  ];

  for (const [id, op, source, names] of steps) {
    if (op === 'replace') {
      await ledger.replaceSourceLinks(id, source, names);
    } else {
      for (const name of names) {
        if (op === 'add') await ledger.addLink(id, name, source);
        else await ledger.removeLink(id, name, source);
      }
    }
    assertUsageMatchesLinks();
  }

  assert.equal(store.usageOf('dog'), 1);
  assert.equal(store.usageOf('cat'), 1);
  assert.equal(store.usageOf('gps'), 1);
});

test('a failed transaction rolls back links and counters together', async () => {
  await assert.rejects(
    () =>
      store.transaction(async tx => {
        await ledger.addLink(pictureId, 'cat', 'user', tx);
        throw new Error('boom');
      }),
    /boom/
  );
  assert.equal(store.links.length, 0);
  assert.equal(store.tagByName('cat'), undefined);
});

test('removeAllLinks releases every link of the picture', async () => {
  await ledger.addLink(pictureId, 'cat', 'user');
  await ledger.replaceSourceLinks(pictureId, 'ai', ['cat', 'tree']);
  await ledger.replaceSourceLinks(pictureId, 'exif', ['gps']);

  assert.equal(await ledger.removeAllLinks(pictureId), 4);
  assert.equal(store.links.length, 0);
  assert.equal(store.usageOf('cat'), 0);
  assert.equal(store.usageOf('tree'), 0);
  assert.equal(store.usageOf('gps'), 0);
});

test('linksBySource returns one partition as a TagSet', async () => {
  await ledger.addLink(pictureId, 'beach', 'user');
  await ledger.replaceSourceLinks(pictureId, 'ai', ['cat']);

  const ai = await ledger.linksBySource(pictureId, 'ai');
  assert.deepEqual(ai.toArray(), ['cat']);
  assert.deepEqual(ai.bySource('ai'), ['cat']);
});
