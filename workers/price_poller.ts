#!/usr/bin/env tsx
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { buildContainer } from '../api/src/container.js';
import { loadConfig, type AppConfig } from '../api/src/config.js';
import { taggedLogger } from '../shared/logger.js';
import { MAX_TIMER_DELAY_MS } from './scheduler.js';

const MAX_INTERVAL_MINUTES = Math.floor(MAX_TIMER_DELAY_MS / 60_000);

export type PollerCliOptions = {
  once: boolean;
  config: AppConfig;
};

export function parseArgs(argv: string[], base: AppConfig = loadConfig()): PollerCliOptions {
  const config: AppConfig = { ...base };
  let once = false;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith('--')) {
      throw new Error(`Unexpected argument: ${token}`);
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    switch (key) {
      case 'interval-mins': {
        if (!next) throw new Error('Missing value for --interval-mins');
        const minutes = Number.parseInt(next, 10);
        if (!Number.isFinite(minutes) || minutes < 1) {
          throw new Error('--interval-mins must be at least 1 minute');
        }
        if (minutes > MAX_INTERVAL_MINUTES) {
          throw new Error(`--interval-mins must be at most ${MAX_INTERVAL_MINUTES} minutes`);
        }
        config.pollIntervalMs = minutes * 60 * 1000;
        i += 1;
        break;
      }
      case 'data-dir':
        if (!next) throw new Error('Missing value for --data-dir');
        config.dataDir = path.resolve(next);
        i += 1;
        break;
      case 'storage':
        if (next !== 'json' && next !== 'sqlite') {
          throw new Error('--storage must be json or sqlite');
        }
        config.storageDriver = next;
        i += 1;
        break;
      case 'sqlite':
        if (!next) throw new Error('Missing value for --sqlite');
        config.sqliteFile = path.resolve(next);
        i += 1;
        break;
      case 'bot-config':
        if (!next) throw new Error('Missing value for --bot-config');
        config.discordBotConfig = path.resolve(next);
        i += 1;
        break;
      case 'once':
        once = true;
        break;
      case 'help':
        showUsage();
        process.exit(0);
      default:
        throw new Error(`Unknown flag: --${key}`);
    }
  }

  return { once, config };
}

function showUsage(): void {
  console.log(`price poller

Usage:
  tsx workers/price_poller.ts [--interval-mins 30] [--data-dir data] [--storage json|sqlite] [--once]

Flags:
  --interval-mins <m>   Minutes between price checks (default: POLL_INTERVAL_MINUTES or 30)
  --data-dir <path>     Directory holding game_list.json and monitor_list.json
  --storage <driver>    json (default) or sqlite
  --sqlite <path>       SQLite file when --storage sqlite
  --bot-config <path>   Discord bot config used to deliver notifications
  --once                Sync the catalog, run one price check, deliver, then exit
  --help                Show this message
`);
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  const container = await buildContainer({ config: options.config });
  const logger = taggedLogger('worker');

  if (options.once) {
    try {
      await container.catalog.sync();
      const summary = await container.runRound('cli');
      logger.info(`Delivered ${summary.sent}/${summary.received} notifications.`);
    } finally {
      await container.close();
    }
    return;
  }

  let shuttingDown = false;
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info(`Received ${signal}, shutting down...`);
      void container.close().catch((error: unknown) => {
        logger.error('Shutdown failed:', error);
        process.exitCode = 1;
      });
    });
  }

  container.start();
  logger.info(
    `Watching prices every ${Math.round(options.config.pollIntervalMs / 60000)}m (storage=${options.config.storageDriver}, data=${options.config.dataDir})`,
  );
}

const isDirectRun = process.argv[1] === fileURLToPath(import.meta.url);

if (isDirectRun) {
  void main().catch((error) => {
    console.error('Price poller failed to start:', error);
    process.exit(1);
  });
}
