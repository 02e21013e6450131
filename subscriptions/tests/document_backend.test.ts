import assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';

import {
  JsonFileBackend,
  openDocumentBackends,
  parseJsonDocument,
  serializeJsonDocument,
  StorageCorruptError,
} from '../document_backend.js';

function tempDir(t: { after: (fn: () => void) => void }) {
  const dir = mkdtempSync(path.join(os.tmpdir(), 'price-watch-docs-'));
  t.after(() => rmSync(dir, { recursive: true, force: true }));
  return dir;
}

test('json backend reads null before the first write', async (t) => {
  const dir = tempDir(t);
  const backend = new JsonFileBackend(path.join(dir, 'nested', 'monitor_list.json'));
  assert.equal(await backend.read(), null);

  await backend.write('{"a": 1}\n');
  assert.equal(await backend.read(), '{"a": 1}\n');
  assert.equal(readFileSync(path.join(dir, 'nested', 'monitor_list.json'), 'utf-8'), '{"a": 1}\n');
});

test('json backend replaces the previous document', async (t) => {
  const dir = tempDir(t);
  const file = path.join(dir, 'game_list.json');
  writeFileSync(file, 'old', 'utf-8');
  const backend = new JsonFileBackend(file);

  await backend.write('new');

  assert.equal(await backend.read(), 'new');
});

test('serializeJsonDocument pretty-prints with four spaces and keeps non-ascii text', () => {
  assert.equal(serializeJsonDocument({ 'Café Owner': 42 }), '{\n    "Café Owner": 42\n}\n');
});

test('parseJsonDocument reports corrupt text with its location', () => {
  assert.deepEqual(parseJsonDocument('{"ok": true}', 'x.json'), { ok: true });
  assert.throws(
    () => parseJsonDocument('{not json', 'x.json'),
    (error: unknown) => error instanceof StorageCorruptError && error.location === 'x.json' && error.message === 'Document at x.json is not valid JSON',
  );
});

test('json driver maps both documents into the data directory', (t) => {
  const dir = tempDir(t);
  const backends = openDocumentBackends({ driver: 'json', dataDir: dir, sqliteFile: path.join(dir, 'unused.db') });
  assert.equal(backends.driver, 'json');
  assert.equal(backends.catalog.location, path.join(dir, 'game_list.json'));
  assert.equal(backends.subscriptions.location, path.join(dir, 'monitor_list.json'));
  backends.close();
});

test('sqlite driver stores each document in its own row', async (t) => {
  const dir = tempDir(t);
  const sqliteFile = path.join(dir, 'db', 'price_watch.db');
  const backends = openDocumentBackends({ driver: 'sqlite', dataDir: dir, sqliteFile });
  t.after(() => backends.close());

  assert.equal(await backends.subscriptions.read(), null);
  await backends.subscriptions.write('{"620": {}}');
  await backends.catalog.write('{"Portal 2": 620}');
  await backends.subscriptions.write('{}');

  assert.equal(await backends.subscriptions.read(), '{}');
  assert.equal(await backends.catalog.read(), '{"Portal 2": 620}');
  assert.equal(backends.subscriptions.location, `${sqliteFile}#monitor_list`);
});
