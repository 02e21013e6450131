import { performance } from 'node:perf_hooks';

import type { ChangeKind, NotificationEvent, PriceChangeNotification } from '../notifications/types.js';
import { formatAmount, toCents } from '../pricing/price_format.js';
import type { PriceSource } from '../pricing/price_source.js';
import { storePageUrl } from '../scripts/steam_api_client.js';
import { errorMessage, taggedLogger, type Logger } from '../shared/logger.js';
import { mentionTargetsFor, parseSubscriberAddress } from '../subscriptions/subscriber_address.js';
import type { MonitoredItem, PriceSnapshot, SubscriptionStore } from '../subscriptions/subscription_store.js';

export type RoundTrigger = 'schedule' | 'manual' | 'subscribe' | 'cli';

export type PollMetrics = {
  roundsTotal: number;
  itemsChecked: number;
  fetchFailures: number;
  itemFailures: number;
  baselinesRecorded: number;
  changesDetected: number;
  notificationsEmitted: number;
  lastRoundAt: string | null;
  lastRoundDurationMs: number;
};

type ItemOutcome =
  | { kind: 'gone' }
  | { kind: 'baseline' }
  | { kind: 'unchanged' }
  | { kind: 'changed'; notification: PriceChangeNotification; subscribers: string[] };

type StoreAccess = Pick<SubscriptionStore, 'listAll' | 'withExclusiveAccess'>;

export function createMetrics(): PollMetrics {
  return {
    roundsTotal: 0,
    itemsChecked: 0,
    fetchFailures: 0,
    itemFailures: 0,
    baselinesRecorded: 0,
    changesDetected: 0,
    notificationsEmitted: 0,
    lastRoundAt: null,
    lastRoundDurationMs: 0,
  };
}

export class PricePoller {
  readonly metrics: PollMetrics = createMetrics();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly store: StoreAccess,
    private readonly prices: PriceSource,
    deps: { logger?: Logger; now?: () => Date } = {},
  ) {
    this.logger = deps.logger ?? taggedLogger('poller');
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * One pass over every monitored item. Events are produced lazily: the next
   * item is only fetched once the caller has taken the previous item's events.
   */
  async *pollRound(trigger: RoundTrigger = 'schedule'): AsyncGenerator<NotificationEvent, void, undefined> {
    const started = performance.now();
    this.metrics.roundsTotal += 1;

    let items: MonitoredItem[];
    try {
      items = await this.store.listAll();
    } catch (error) {
      this.logger.error(`Unable to read the watch list; skipping this round: ${errorMessage(error)}`);
      items = [];
    }
    this.logger.info(`Price check (${trigger}) started for ${items.length} items.`);

    let changed = 0;
    let emitted = 0;
    for (const item of items) {
      let events: NotificationEvent[];
      try {
        events = await this.checkItem(item);
      } catch (error) {
        this.metrics.itemFailures += 1;
        this.logger.error(`Checking "${item.name}" (${item.appid}) failed: ${errorMessage(error)}`);
        continue;
      }
      if (events.length > 0) {
        changed += 1;
      }
      for (const event of events) {
        emitted += 1;
        this.metrics.notificationsEmitted += 1;
        yield event;
      }
    }

    const durationMs = performance.now() - started;
    this.metrics.lastRoundAt = this.now().toISOString();
    this.metrics.lastRoundDurationMs = durationMs;
    this.logger.info(
      `Price check (${trigger}) finished: items=${items.length} changed=${changed} notifications=${emitted} durationMs=${durationMs.toFixed(0)}`,
    );
  }

  private async checkItem(item: MonitoredItem): Promise<NotificationEvent[]> {
    this.metrics.itemsChecked += 1;
    const lookup = await this.prices.fetchPrice(item.appid, item.region);
    if (lookup.status !== 'ok') {
      this.metrics.fetchFailures += 1;
      this.logger.warn(`No price for "${item.name}" (${item.appid}) this round: ${lookup.reason}.`);
      return [];
    }
    const snapshot = lookup.snapshot;
    const detectedAt = this.now().toISOString();

    // Compare against the stored value read under the lock, not the copy taken
    // at round start: a concurrent round may already have recorded this price.
    const outcome = await this.store.withExclusiveAccess((doc): ItemOutcome => {
      const current = doc[item.appid];
      if (!current) {
        return { kind: 'gone' };
      }
      if (current.lastPrice === null) {
        applySnapshot(current, snapshot);
        return { kind: 'baseline' };
      }
      const deltaCents = toCents(snapshot.currentPrice) - toCents(current.lastPrice);
      if (deltaCents === 0) {
        return { kind: 'unchanged' };
      }
      const notification = buildNotification(current, snapshot, deltaCents, detectedAt);
      applySnapshot(current, snapshot);
      return { kind: 'changed', notification, subscribers: [...current.subscribers] };
    });

    switch (outcome.kind) {
      case 'gone':
        this.logger.info(`"${item.name}" (${item.appid}) was unsubscribed during the round.`);
        return [];
      case 'baseline':
        this.metrics.baselinesRecorded += 1;
        this.logger.info(`Recorded first price for "${item.name}": ${formatAmount(snapshot.currentPrice, snapshot.currency)}`);
        return [];
      case 'unchanged':
        this.logger.info(`"${item.name}" price unchanged.`);
        return [];
      case 'changed':
        this.metrics.changesDetected += 1;
        this.logger.info(`"${item.name}" price changed (${outcome.notification.kind}, delta ${outcome.notification.delta.toFixed(2)}).`);
        return this.fanOut(outcome.notification, outcome.subscribers);
    }
  }

  private fanOut(notification: PriceChangeNotification, subscribers: string[]): NotificationEvent[] {
    const events: NotificationEvent[] = [];
    for (const raw of subscribers) {
      const address = parseSubscriberAddress(raw);
      if (address.kind === 'unknown') {
        this.logger.warn(`Skipping unrecognized subscriber address "${raw}" for "${notification.name}".`);
        continue;
      }
      events.push({ address: raw, mentionTargets: mentionTargetsFor(address), notification });
    }
    return events;
  }
}

export function classifyChange(snapshot: PriceSnapshot, deltaCents: number): ChangeKind {
  if (snapshot.isFree) return 'free';
  return deltaCents > 0 ? 'increase' : 'decrease';
}

export function buildNotification(
  item: MonitoredItem,
  snapshot: PriceSnapshot,
  deltaCents: number,
  detectedAt: string,
): PriceChangeNotification {
  const kind = classifyChange(snapshot, deltaCents);
  const delta = deltaCents / 100;
  const previousPrice = item.lastPrice ?? 0;
  const currency = snapshot.isFree ? item.currency : snapshot.currency;
  const fmt = (amount: number) => formatAmount(amount, currency);
  const purchaseUrl = storePageUrl(item.appid);

  const headline =
    kind === 'free'
      ? `🎉 "${item.name}" is now free!\n`
      : kind === 'increase'
        ? `⬆️ "${item.name}" went up by ${fmt(delta)}\n`
        : `⬇️ "${item.name}" dropped by ${fmt(-delta)}\n`;

  return {
    appid: item.appid,
    name: item.name,
    kind,
    previousPrice,
    currentPrice: snapshot.currentPrice,
    originalPrice: snapshot.originalPrice,
    discountPercent: snapshot.discountPercent,
    delta,
    currency,
    purchaseUrl,
    detectedAt,
    segments: [
      headline,
      `Was ${fmt(previousPrice)}, now ${fmt(snapshot.currentPrice)} (original ${fmt(snapshot.originalPrice)}, ${snapshot.discountPercent}% off)\n`,
      `Store page: ${purchaseUrl}\n`,
    ],
  };
}

function applySnapshot(item: MonitoredItem, snapshot: PriceSnapshot): void {
  item.lastPrice = snapshot.currentPrice;
  item.originalPrice = snapshot.originalPrice;
  item.discount = snapshot.discountPercent;
  item.currency = snapshot.currency;
}
