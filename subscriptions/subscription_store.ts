import { z } from 'zod';

import { errorMessage, taggedLogger, type Logger } from '../shared/logger.js';
import {
  parseJsonDocument,
  serializeJsonDocument,
  StorageCorruptError,
  type DocumentBackend,
} from './document_backend.js';
import { ExclusiveSection } from './exclusive_section.js';

export type PriceSnapshot = {
  currentPrice: number;
  originalPrice: number;
  discountPercent: number;
  isFree: boolean;
  currency: string;
};

export type MonitoredItem = {
  appid: string;
  name: string;
  region: string;
  /** null until the first successful poll records a baseline. */
  lastPrice: number | null;
  originalPrice: number | null;
  discount: number | null;
  currency: string | null;
  subscribers: string[];
};

/**
 * appid (as string) → item. Object keys that look like integers always
 * enumerate in ascending order, and the stored JSON reads back the same way,
 * so rounds and listings visit items by ascending appid rather than by the
 * order they were first subscribed.
 */
export type SubscriptionDocument = Record<string, MonitoredItem>;

export type SubscribeResult = 'newly-subscribed' | 'already-subscribed';

export type UnsubscribeResult = { status: 'removed'; itemRemoved: boolean } | { status: 'not-subscribed' };

// On-disk shape: snapshot fields sit beside the item's name, not nested.
const storedItemSchema = z.object({
  name: z.string(),
  appid: z.union([z.string(), z.number()]).optional(),
  region: z.string().min(1).optional(),
  last_price: z.number().nonnegative().nullable().optional(),
  original_price: z.number().nonnegative().nullable().optional(),
  discount: z.number().min(0).max(100).nullable().optional(),
  currency: z.string().nullable().optional(),
  subscribers: z.array(z.string()).optional(),
});

type StoredItem = z.infer<typeof storedItemSchema>;

export type SubscriptionStoreOptions = {
  defaultRegion?: string;
  logger?: Logger;
};

export class SubscriptionStore {
  private readonly section = new ExclusiveSection();
  private readonly defaultRegion: string;
  private readonly logger: Logger;

  constructor(
    private readonly backend: DocumentBackend,
    options: SubscriptionStoreOptions = {},
  ) {
    this.defaultRegion = options.defaultRegion ?? 'cn';
    this.logger = options.logger ?? taggedLogger('subscriptions');
  }

  get location(): string {
    return this.backend.location;
  }

  /** Reads the durable document, reinitializing it when missing or corrupt. Never throws; an unreadable store yields `{}` and is left as it is. */
  async load(): Promise<SubscriptionDocument> {
    try {
      return await this.withExclusiveAccess((doc) => cloneDocument(doc));
    } catch (error) {
      this.logger.error(`Unable to load ${this.backend.location}; continuing with an empty store: ${errorMessage(error)}`);
      return {};
    }
  }

  /**
   * Runs `fn` against a fresh copy of the document while holding the store's
   * only lock, then persists the document if `fn` changed it.
   */
  async withExclusiveAccess<T>(fn: (doc: SubscriptionDocument) => T): Promise<T> {
    return this.section.run(async () => {
      const { doc, reinitialize } = await this.readDocument();
      const before = reinitialize ? null : this.serialize(doc);
      const result = fn(doc);
      const after = this.serialize(doc);
      if (after !== before) {
        await this.backend.write(after);
      }
      return result;
    });
  }

  async subscribe(input: { appid: string | number; name: string; region?: string; address: string }): Promise<SubscribeResult> {
    const appid = String(input.appid);
    return this.withExclusiveAccess((doc) => {
      const item =
        doc[appid] ??
        (doc[appid] = {
          appid,
          name: input.name,
          region: input.region ?? this.defaultRegion,
          lastPrice: null,
          originalPrice: null,
          discount: null,
          currency: null,
          subscribers: [],
        });
      if (item.subscribers.includes(input.address)) {
        return 'already-subscribed';
      }
      item.subscribers.push(input.address);
      return 'newly-subscribed';
    });
  }

  async unsubscribe(appid: string | number, address: string): Promise<UnsubscribeResult> {
    const key = String(appid);
    return this.withExclusiveAccess((doc): UnsubscribeResult => {
      const item = doc[key];
      if (!item) {
        return { status: 'not-subscribed' };
      }
      const index = item.subscribers.indexOf(address);
      if (index === -1) {
        return { status: 'not-subscribed' };
      }
      item.subscribers.splice(index, 1);
      if (item.subscribers.length === 0) {
        delete doc[key];
        this.logger.info(`"${item.name}" (${key}) has no subscribers left; removed from the watch list.`);
        return { status: 'removed', itemRemoved: true };
      }
      return { status: 'removed', itemRemoved: false };
    });
  }

  async listByAddress(address: string): Promise<MonitoredItem[]> {
    return this.withExclusiveAccess((doc) =>
      Object.values(doc)
        .filter((item) => item.subscribers.includes(address))
        .map(cloneItem),
    );
  }

  async listAll(): Promise<MonitoredItem[]> {
    return this.withExclusiveAccess((doc) => Object.values(doc).map(cloneItem));
  }

  private async readDocument(): Promise<{ doc: SubscriptionDocument; reinitialize: boolean }> {
    // A failed read propagates: the section aborts and the stored document is left untouched.
    const text = await this.backend.read();
    if (text === null) {
      this.logger.info(`${this.backend.location} does not exist yet; creating an empty watch list.`);
      return { doc: {}, reinitialize: true };
    }
    try {
      return { doc: this.decode(parseJsonDocument(text, this.backend.location)), reinitialize: false };
    } catch (error) {
      if (error instanceof StorageCorruptError) {
        this.logger.error(`${error.message} (${error.detail ?? 'no detail'}); reinitializing an empty watch list.`);
        return { doc: {}, reinitialize: true };
      }
      throw error;
    }
  }

  private decode(raw: unknown): SubscriptionDocument {
    if (!isPlainObject(raw)) {
      throw new StorageCorruptError(`Document at ${this.backend.location} is not a JSON object`, this.backend.location);
    }
    const doc: SubscriptionDocument = {};
    for (const [appid, value] of Object.entries(raw)) {
      const parsed = storedItemSchema.safeParse(value);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        this.logger.warn(
          `Dropping malformed entry ${appid} from ${this.backend.location}: ${issue ? `${issue.path.join('.') || 'root'} ${issue.message}` : 'invalid'}`,
        );
        continue;
      }
      const item = this.fromStored(appid, parsed.data);
      if (item.subscribers.length === 0) {
        this.logger.warn(`Dropping entry ${appid} from ${this.backend.location}: it has no subscribers.`);
        continue;
      }
      doc[appid] = item;
    }
    return doc;
  }

  private fromStored(appid: string, stored: StoredItem): MonitoredItem {
    return {
      appid,
      name: stored.name,
      region: stored.region ?? this.defaultRegion,
      lastPrice: stored.last_price ?? null,
      originalPrice: stored.original_price ?? null,
      discount: stored.discount ?? null,
      currency: stored.currency ?? null,
      subscribers: Array.from(new Set(stored.subscribers ?? [])),
    };
  }

  private serialize(doc: SubscriptionDocument): string {
    const stored: Record<string, StoredItem> = {};
    for (const [appid, item] of Object.entries(doc)) {
      stored[appid] = {
        name: item.name,
        appid,
        region: item.region,
        last_price: item.lastPrice,
        original_price: item.originalPrice,
        discount: item.discount,
        currency: item.currency,
        subscribers: item.subscribers,
      };
    }
    return serializeJsonDocument(stored);
  }
}

function cloneItem(item: MonitoredItem): MonitoredItem {
  return { ...item, subscribers: [...item.subscribers] };
}

function cloneDocument(doc: SubscriptionDocument): SubscriptionDocument {
  const copy: SubscriptionDocument = {};
  for (const [appid, item] of Object.entries(doc)) {
    copy[appid] = cloneItem(item);
  }
  return copy;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
