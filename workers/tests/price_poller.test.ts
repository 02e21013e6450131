import assert from 'node:assert/strict';
import path from 'node:path';
import test from 'node:test';

import { loadConfig } from '../../api/src/config.js';
import { parseArgs } from '../price_poller.js';

const base = loadConfig({ DATA_DIR: 'data' });

test('no flags keeps the environment configuration', () => {
  assert.deepEqual(parseArgs([], base), { once: false, config: base });
});

test('flags override the environment configuration', () => {
  const { once, config } = parseArgs(
    ['--interval-mins', '5', '--storage', 'sqlite', '--sqlite', 'tmp/watch.db', '--data-dir', 'state', '--once'],
    base,
  );

  assert.equal(once, true);
  assert.equal(config.pollIntervalMs, 5 * 60 * 1000);
  assert.equal(config.storageDriver, 'sqlite');
  assert.equal(config.sqliteFile, path.resolve('tmp/watch.db'));
  assert.equal(config.dataDir, path.resolve('state'));
  assert.equal(base.pollIntervalMs, 30 * 60 * 1000);
});

test('the bot config path is resolved', () => {
  const { config } = parseArgs(['--bot-config', 'configs/discord_bot.json'], base);
  assert.equal(config.discordBotConfig, path.resolve('configs/discord_bot.json'));
});

test('bad flags are rejected', () => {
  assert.throws(() => parseArgs(['--interval-mins', '0'], base), /at least 1 minute/);
  assert.throws(() => parseArgs(['--interval-mins', '43200'], base), {
    message: '--interval-mins must be at most 35791 minutes',
  });
  assert.throws(() => parseArgs(['--interval-mins'], base), /Missing value for --interval-mins/);
  assert.throws(() => parseArgs(['--storage', 'mongo'], base), /json or sqlite/);
  assert.throws(() => parseArgs(['--verbose'], base), { message: 'Unknown flag: --verbose' });
  assert.throws(() => parseArgs(['extra'], base), { message: 'Unexpected argument: extra' });
});
