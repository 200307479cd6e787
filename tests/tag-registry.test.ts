import { beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import { TagNameError } from '../cli/lib/errors';
import { normalizeTagName, parseTagInput, slugifyTagName } from '../cli/services/tags/normalize';
import { TagRegistry } from '../cli/services/tags/tag-registry';
import { logger } from '../cli/utils/logger';
import { FakeGalleryStore } from './helpers/fake-gallery-store';

logger.setLevel('silent');

let store: FakeGalleryStore;
let registry: TagRegistry;

beforeEach(() => {
  store = new FakeGalleryStore();
  registry = new TagRegistry(store);
});

test('slugifyTagName folds accents and collapses separators', () => {
  assert.equal(normalizeTagName('  Sunset  '), 'sunset');
  assert.equal(slugifyTagName('Café au Lait!'), 'cafe-au-lait');
  assert.equal(slugifyTagName('make:canon'), 'make-canon');
  assert.equal(slugifyTagName('camera:canon eos r5'), 'camera-canon-eos-r5');
  assert.equal(slugifyTagName('--Hello___World--'), 'hello-world');
  assert.equal(slugifyTagName('日本'), '');
});

test('parseTagInput splits comma separated fields', () => {
  assert.deepEqual(parseTagInput('sunset, beach, ,'), ['sunset', 'beach']);
  assert.deepEqual(parseTagInput([' a ', '', 'b']), ['a', 'b']);
  assert.deepEqual(parseTagInput(undefined), []);
});

test('getOrCreate returns the same tag for inputs differing by case and whitespace', async () => {
  const first = await registry.getOrCreate('  Sunset ');
  const second = await registry.getOrCreate('sunset');
  const third = await registry.getOrCreate('SUNSET');

  assert.equal(first.created, true);
  assert.equal(second.created, false);
  assert.equal(third.created, false);
  assert.equal(second.tag.id, first.tag.id);
  assert.equal(third.tag.id, first.tag.id);
  assert.equal(first.tag.name, 'sunset');
  assert.equal(first.tag.slug, 'sunset');
  assert.equal(store.tagRows.size, 1);
});

test('names sharing a slug resolve to the first tag created', async () => {
  const spaced = await registry.getOrCreate('Hello World');
  const dashed = await registry.getOrCreate('hello-world');
  assert.equal(dashed.tag.id, spaced.tag.id);
  assert.equal(dashed.tag.name, 'hello world');
});

test('new tags start unused', async () => {
  const { tag } = await registry.getOrCreate('beach');
  assert.equal(tag.usageCount, 0);
});

test('getOrCreate rejects names without usable characters', async () => {
  await assert.rejects(() => registry.getOrCreate('   '), TagNameError);
  await assert.rejects(() => registry.getOrCreate('日本'), TagNameError);
  assert.equal(store.tagRows.size, 0);
});

test('find never creates tags', async () => {
  assert.equal(await registry.find('missing'), null);
  assert.equal(await registry.find('!!!'), null);
  const { tag } = await registry.getOrCreate('Cat');
  assert.equal((await registry.find(' CAT '))?.id, tag.id);
  assert.equal(store.tagRows.size, 1);
});

test('usage counter floors at zero', async () => {
  const { tag } = await registry.getOrCreate('tree');
  assert.equal((await registry.incrementUsage(tag)).usageCount, 1);
  assert.equal((await registry.incrementUsage(tag)).usageCount, 2);
  assert.equal((await registry.decrementUsage(tag)).usageCount, 1);
  assert.equal((await registry.decrementUsage(tag)).usageCount, 0);
  assert.equal((await registry.decrementUsage(tag)).usageCount, 0);
});

test('listPopular orders by usage then name', async () => {
  const a = (await registry.getOrCreate('alpha')).tag;
  const b = (await registry.getOrCreate('beta')).tag;
  await registry.getOrCreate('gamma');
  await registry.incrementUsage(b);
  await registry.incrementUsage(b);
  await registry.incrementUsage(a);

  const popular = await registry.listPopular(2);
  assert.deepEqual(popular.map(tag => tag.name), ['beta', 'alpha']);
});
