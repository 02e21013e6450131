import type { CatalogStore } from '../../../catalog/catalog_store.js';
import type { FuzzyResolver } from '../../../catalog/fuzzy_resolver.js';
import { formatAmount } from '../../../pricing/price_format.js';
import { storePageUrl } from '../../../scripts/steam_api_client.js';
import { errorMessage, taggedLogger, type Logger } from '../../../shared/logger.js';
import { describeSubscriber, parseSubscriberAddress } from '../../../subscriptions/subscriber_address.js';
import type { MonitoredItem, SubscriptionStore } from '../../../subscriptions/subscription_store.js';
import type { DispatchSummary } from '../../../workers/notification_dispatcher.js';
import type { RoundTrigger } from '../../../workers/poll_engine.js';

export type CommandFailure = {
  kind: 'not_found' | 'unavailable' | 'invalid';
  message: string;
};

export type SubscribeReply =
  | { kind: 'subscribed'; appid: string; name: string; alreadySubscribed: boolean; message: string }
  | CommandFailure;

export type UnsubscribeReply =
  | { kind: 'unsubscribed'; appid: string; name: string; itemRemoved: boolean; message: string }
  | CommandFailure;

export type WatchEntry = {
  appid: string;
  name: string;
  region: string;
  lastPrice: number | null;
  originalPrice: number | null;
  discount: number | null;
  currency: string | null;
  purchaseUrl: string;
};

export type AdminWatchEntry = WatchEntry & { subscribers: string[]; subscriberLabels: string[] };

type CatalogView = Pick<CatalogStore, 'whenReady' | 'size' | 'resolve'>;

export type WatchServiceDeps = {
  catalog: CatalogView;
  resolver: Pick<FuzzyResolver, 'resolve'>;
  store: Pick<SubscriptionStore, 'subscribe' | 'unsubscribe' | 'listByAddress' | 'listAll'>;
  defaultRegion: string;
  /** Runs one price check and delivers its notifications. */
  runRound: (trigger: RoundTrigger) => Promise<DispatchSummary>;
  /** Check prices right after a new subscription so its baseline is recorded promptly. */
  pollAfterSubscribe?: boolean;
  logger?: Logger;
};

const APPID_PATTERN = /^\d+$/;

/** The user-facing commands: subscribe, unsubscribe, listings and a forced price check. */
export class WatchService {
  private readonly logger: Logger;

  constructor(private readonly deps: WatchServiceDeps) {
    this.logger = deps.logger ?? taggedLogger('watch');
  }

  async subscribe(rawQuery: string, address: string): Promise<SubscribeReply> {
    const invalid = validateCommand(rawQuery, address);
    if (invalid) return invalid;
    const query = rawQuery.trim();

    await this.deps.catalog.whenReady();
    if (this.deps.catalog.size === 0) {
      return { kind: 'unavailable', message: 'The game list is not available yet; try again later.' };
    }

    let appid: number;
    let name: string;
    if (APPID_PATTERN.test(query)) {
      appid = Number(query);
      const known = this.deps.catalog.resolve(appid);
      if (!known) {
        return { kind: 'not_found', message: `No game with app id ${query} was found.` };
      }
      name = known;
    } else {
      const match = await this.deps.resolver.resolve(query);
      if (!match) {
        return { kind: 'not_found', message: `No game matching "${query}" was found.` };
      }
      this.logger.info(`"${query}" resolved to "${match.name}" (${match.appid}) with score ${match.score}.`);
      ({ appid, name } = match);
    }

    const result = await this.deps.store.subscribe({ appid, name, region: this.deps.defaultRegion, address });
    const key = String(appid);
    if (result === 'already-subscribed') {
      return { kind: 'subscribed', appid: key, name, alreadySubscribed: true, message: `You are already watching "${name}".` };
    }

    this.logger.info(`${address} is now watching "${name}" (${key}).`);
    if (this.deps.pollAfterSubscribe) {
      void this.deps.runRound('subscribe').catch((error: unknown) => {
        this.logger.error(`Price check after subscribing failed: ${errorMessage(error)}`);
      });
    }
    return {
      kind: 'subscribed',
      appid: key,
      name,
      alreadySubscribed: false,
      message: `Now watching "${name}" (${key}); you will be notified when its price changes.`,
    };
  }

  /** Name queries only match among the caller's own watched games. */
  async unsubscribe(rawQuery: string, address: string): Promise<UnsubscribeReply> {
    const invalid = validateCommand(rawQuery, address);
    if (invalid) return invalid;
    const query = rawQuery.trim();

    const own = await this.deps.store.listByAddress(address);
    let target: MonitoredItem | undefined;
    if (APPID_PATTERN.test(query)) {
      target = own.find((item) => item.appid === String(Number(query)));
    } else {
      const universe = new Map(own.map((item) => [item.name, Number(item.appid)]));
      const match = await this.deps.resolver.resolve(query, universe);
      target = match ? own.find((item) => item.appid === String(match.appid)) : undefined;
    }
    if (!target) {
      return { kind: 'not_found', message: `You are not watching anything matching "${query}".` };
    }

    const result = await this.deps.store.unsubscribe(target.appid, address);
    if (result.status === 'not-subscribed') {
      return { kind: 'not_found', message: `You are not watching "${target.name}".` };
    }
    this.logger.info(`${address} stopped watching "${target.name}" (${target.appid}).`);
    return {
      kind: 'unsubscribed',
      appid: target.appid,
      name: target.name,
      itemRemoved: result.itemRemoved,
      message: `Stopped watching "${target.name}".`,
    };
  }

  forcePoll(): Promise<DispatchSummary> {
    return this.deps.runRound('manual');
  }

  async list(address: string): Promise<WatchEntry[]> {
    const items = await this.deps.store.listByAddress(address);
    return items.map(toWatchEntry);
  }

  async listAll(): Promise<AdminWatchEntry[]> {
    const items = await this.deps.store.listAll();
    return items.map((item) => ({
      ...toWatchEntry(item),
      subscribers: [...item.subscribers],
      subscriberLabels: item.subscribers.map((raw) => describeSubscriber(parseSubscriberAddress(raw))),
    }));
  }
}

function validateCommand(query: string, address: string): CommandFailure | null {
  if (parseSubscriberAddress(address).kind === 'unknown') {
    return { kind: 'invalid', message: `Unrecognized subscriber address "${address}".` };
  }
  if (!query.trim()) {
    return { kind: 'invalid', message: 'Provide a game name or app id.' };
  }
  return null;
}

function toWatchEntry(item: MonitoredItem): WatchEntry {
  return {
    appid: item.appid,
    name: item.name,
    region: item.region,
    lastPrice: item.lastPrice,
    originalPrice: item.originalPrice,
    discount: item.discount,
    currency: item.currency,
    purchaseUrl: storePageUrl(item.appid),
  };
}

/** Chat-style rendering of a watch list. */
export function formatWatchList(entries: WatchEntry[]): string {
  if (entries.length === 0) {
    return 'You are not watching any games.';
  }
  const lines = entries.map((entry) => {
    const price = entry.lastPrice === null ? 'price pending' : formatAmount(entry.lastPrice, entry.currency);
    const discount = entry.discount ? ` (-${entry.discount}%)` : '';
    return `- ${entry.name} (${entry.appid}): ${price}${discount}`;
  });
  return ['Watched games:', ...lines].join('\n');
}
