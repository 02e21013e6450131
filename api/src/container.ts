import { CatalogStore, type SyncOutcome } from '../../catalog/catalog_store.js';
import { FuzzyResolver } from '../../catalog/fuzzy_resolver.js';
import { ConsoleTransport } from '../../notifications/console_transport.js';
import { DiscordTransport } from '../../notifications/discord/adapter.js';
import { DiscordBot, loadDiscordBotConfig } from '../../notifications/discord/bot.js';
import type { NotificationTransport } from '../../notifications/types.js';
import { SteamPriceSource } from '../../pricing/price_source.js';
import { SteamApiClient, type FetchLike } from '../../scripts/steam_api_client.js';
import { errorMessage, taggedLogger, type Logger } from '../../shared/logger.js';
import { openDocumentBackends, type StorageDriver } from '../../subscriptions/document_backend.js';
import { SubscriptionStore } from '../../subscriptions/subscription_store.js';
import { NotificationDispatcher, type DispatchSummary } from '../../workers/notification_dispatcher.js';
import { PricePoller, type RoundTrigger } from '../../workers/poll_engine.js';
import { IntervalScheduler } from '../../workers/scheduler.js';
import type { AppConfig } from './config.js';
import { WatchService } from './services/watchService.js';

export type ContainerDeps = {
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  /** Replaces the transports built from config, e.g. with in-memory ones. */
  transports?: NotificationTransport[];
  logger?: Logger;
};

export interface AppContainer {
  config: AppConfig;
  storageDriver: StorageDriver;
  catalog: CatalogStore;
  store: SubscriptionStore;
  poller: PricePoller;
  dispatcher: NotificationDispatcher;
  watch: WatchService;
  runRound: (trigger: RoundTrigger) => Promise<DispatchSummary>;
  refreshCatalog: () => Promise<SyncOutcome>;
  /** Kicks off the first catalog sync and both schedulers. */
  start: () => void;
  close: () => Promise<void>;
}

export async function buildContainer({ config, deps = {} }: { config: AppConfig; deps?: ContainerDeps }): Promise<AppContainer> {
  const log = (tag: string) => taggedLogger(tag, deps.logger ?? console);
  const logger = log('app');
  const backends = openDocumentBackends({ driver: config.storageDriver, dataDir: config.dataDir, sqliteFile: config.sqliteFile });

  const client = new SteamApiClient({ apiKey: config.steamApiKey ?? undefined, timeoutMs: config.httpTimeoutMs, fetch: deps.fetch });
  const catalog = new CatalogStore(client, backends.catalog, {
    pageSize: config.catalogPageSize,
    pageDelayMs: config.catalogPageDelayMs,
    logger: log('catalog'),
    sleep: deps.sleep,
  });
  const store = new SubscriptionStore(backends.subscriptions, { defaultRegion: config.defaultRegion, logger: log('subscriptions') });
  const resolver = new FuzzyResolver(catalog);
  const prices = new SteamPriceSource(client, { language: config.storeLanguage, logger: log('prices') });
  const poller = new PricePoller(store, prices, { logger: log('poller') });

  const transports = deps.transports ?? (await buildTransports(config, deps, log('discord')));
  const dispatcher = new NotificationDispatcher(transports, {
    delayMs: config.dispatchDelayMs,
    fallback: new ConsoleTransport(log('notify')),
    logger: log('dispatch'),
    sleep: deps.sleep,
  });

  // Work started outside a scheduler, awaited by close().
  const background = new Set<Promise<unknown>>();
  const track = <T>(task: Promise<T>): Promise<T> => {
    background.add(task);
    const forget = () => {
      background.delete(task);
    };
    void task.then(forget, forget);
    return task;
  };

  const runRound = (trigger: RoundTrigger) => track(dispatcher.drain(poller.pollRound(trigger)));
  const refreshCatalog = () => track(catalog.sync());

  const watch = new WatchService({
    catalog,
    resolver,
    store,
    defaultRegion: config.defaultRegion,
    runRound,
    pollAfterSubscribe: config.pollAfterSubscribe,
    logger: log('watch'),
  });

  const pollScheduler = new IntervalScheduler({
    name: 'price check',
    intervalMs: config.pollIntervalMs,
    runOnStart: true,
    logger: log('scheduler'),
    task: async () => {
      await catalog.whenReady();
      await runRound('schedule');
    },
  });
  const catalogScheduler = new IntervalScheduler({
    name: 'app list refresh',
    intervalMs: config.catalogRefreshMs,
    logger: log('scheduler'),
    task: async () => {
      await refreshCatalog();
    },
  });

  let started = false;
  const start = () => {
    if (started) return;
    started = true;
    void refreshCatalog().catch((error: unknown) => {
      logger.error(`Initial app list sync failed: ${errorMessage(error)}`);
    });
    pollScheduler.start();
    catalogScheduler.start();
  };

  let closed = false;
  const close = async () => {
    if (closed) return;
    closed = true;
    await Promise.all([pollScheduler.stop(), catalogScheduler.stop()]);
    await Promise.allSettled(Array.from(background));
    backends.close();
  };

  return {
    config,
    storageDriver: backends.driver,
    catalog,
    store,
    poller,
    dispatcher,
    watch,
    runRound,
    refreshCatalog,
    start,
    close,
  };
}

async function buildTransports(config: AppConfig, deps: ContainerDeps, logger: Logger): Promise<NotificationTransport[]> {
  if (!config.discordBotConfig) {
    logger.warn('DISCORD_BOT_CONFIG not set; notifications will only be logged.');
    return [];
  }
  const botConfig = await loadDiscordBotConfig(config.discordBotConfig);
  return [new DiscordTransport(new DiscordBot(botConfig, { fetch: deps.fetch, logger, sleep: deps.sleep }))];
}
