import assert from 'node:assert/strict';
import test from 'node:test';

import type { AppListPage, AppListQuery } from '../../scripts/steam_api_client.js';
import { serializeJsonDocument, type DocumentBackend } from '../../subscriptions/document_backend.js';
import { buildCatalogMaps, CatalogStore, type AppListClient } from '../catalog_store.js';

const silentLogger = { info: () => {}, warn: () => {}, error: () => {} };

class MemoryBackend implements DocumentBackend {
  readonly location = 'memory#game_list';

  constructor(public text: string | null = null) {}

  async read() {
    return this.text;
  }

  async write(text: string) {
    this.text = text;
  }
}

class ScriptedClient implements AppListClient {
  readonly queries: AppListQuery[] = [];

  constructor(private readonly pages: Array<AppListPage | Error>) {}

  async fetchAppListPage(query: AppListQuery): Promise<AppListPage> {
    this.queries.push(query);
    const next = this.pages.shift();
    if (!next) throw new Error('no more scripted pages');
    if (next instanceof Error) throw next;
    return next;
  }
}

function createStore(client: AppListClient, snapshot = new MemoryBackend()) {
  const sleeps: number[] = [];
  const store = new CatalogStore(client, snapshot, {
    logger: silentLogger,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { store, snapshot, sleeps };
}

test('sync walks every page and persists a snapshot', async () => {
  const client = new ScriptedClient([
    {
      apps: [
        { appid: 10, name: 'Alpha' },
        { appid: 20, name: '   ' },
      ],
      haveMoreResults: true,
      lastAppId: 20,
    },
    { apps: [{ appid: 30, name: 'Gamma' }], haveMoreResults: false, lastAppId: null },
  ]);
  const { store, snapshot, sleeps } = createStore(client);

  const outcome = await store.sync();

  assert.deepEqual(outcome, { status: 'synced', entries: 2, pages: 2, collisions: 0 });
  assert.deepEqual(client.queries, [
    { lastAppId: 0, maxResults: 50000 },
    { lastAppId: 20, maxResults: 50000 },
  ]);
  assert.deepEqual(sleeps, [200]);
  assert.equal(store.resolve(10), 'Alpha');
  assert.equal(store.resolve(20), undefined);
  assert.equal(store.resolveReverse('Gamma'), 30);
  assert.equal(store.isReady, true);
  assert.equal(snapshot.text, serializeJsonDocument({ Alpha: 10, Gamma: 30 }));
});

test('the cursor falls back to the last app id on the page', async () => {
  const client = new ScriptedClient([
    { apps: [{ appid: 5, name: 'Five' }], haveMoreResults: true, lastAppId: null },
    { apps: [{ appid: 6, name: 'Six' }], haveMoreResults: false, lastAppId: null },
  ]);
  const { store } = createStore(client);

  await store.sync();

  assert.equal(client.queries[1].lastAppId, 5);
  assert.equal(store.size, 2);
});

test('a stuck cursor aborts the sync instead of looping', async () => {
  const client = new ScriptedClient([{ apps: [], haveMoreResults: true, lastAppId: null }]);
  const { store } = createStore(client);

  const outcome = await store.sync();

  assert.deepEqual(outcome, { status: 'failed', reason: 'App list cursor did not advance past 0', source: 'empty' });
});

test('a failed first sync falls back to the cached snapshot', async () => {
  const client = new ScriptedClient([new Error('steam down')]);
  const snapshot = new MemoryBackend(JSON.stringify({ 'Portal 2': 620, Broken: 'x' }));
  const { store } = createStore(client, snapshot);

  const outcome = await store.sync();

  assert.deepEqual(outcome, { status: 'failed', reason: 'steam down', source: 'snapshot' });
  assert.equal(store.size, 1);
  assert.equal(store.resolve(620), 'Portal 2');
  assert.equal(store.isReady, true);
});

test('with no snapshot the catalog is ready but empty', async () => {
  const { store } = createStore(new ScriptedClient([new Error('offline')]));

  const outcome = await store.sync();
  await store.whenReady();

  assert.deepEqual(outcome, { status: 'failed', reason: 'offline', source: 'empty' });
  assert.equal(store.size, 0);
  assert.equal(store.isReady, true);
});

test('an empty app list counts as a failure', async () => {
  const { store } = createStore(new ScriptedClient([{ apps: [], haveMoreResults: false, lastAppId: null }]));

  assert.deepEqual(await store.sync(), { status: 'failed', reason: 'empty app list', source: 'empty' });
});

test('a failed refresh keeps the catalog already in memory', async () => {
  const client = new ScriptedClient([
    { apps: [{ appid: 620, name: 'Portal 2' }], haveMoreResults: false, lastAppId: null },
    new Error('timeout'),
  ]);
  const { store } = createStore(client);

  await store.sync();
  const outcome = await store.sync();

  assert.deepEqual(outcome, { status: 'failed', reason: 'timeout', source: 'memory' });
  assert.equal(store.resolveReverse('Portal 2'), 620);
});

test('concurrent sync calls share one fetch', async () => {
  const client = new ScriptedClient([{ apps: [{ appid: 620, name: 'Portal 2' }], haveMoreResults: false, lastAppId: null }]);
  const { store } = createStore(client);

  const [first, second] = await Promise.all([store.sync(), store.sync()]);

  assert.equal(client.queries.length, 1);
  assert.deepEqual(first, second);
});

test('buildCatalogMaps keeps the last occurrence and counts collisions', () => {
  const maps = buildCatalogMaps([
    { name: 'A', appid: 1 },
    { name: 'B', appid: 2 },
    { name: 'A', appid: 3 },
    { name: 'C', appid: 2 },
  ]);

  assert.equal(maps.collisions, 2);
  assert.deepEqual(Array.from(maps.byName), [
    ['A', 3],
    ['B', 2],
    ['C', 2],
  ]);
  assert.deepEqual(Array.from(maps.byId), [
    [1, 'A'],
    [2, 'C'],
    [3, 'A'],
  ]);
});
