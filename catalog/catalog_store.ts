import type { AppListPage, AppListQuery } from '../scripts/steam_api_client.js';
import { errorMessage, taggedLogger, type Logger } from '../shared/logger.js';
import {
  parseJsonDocument,
  serializeJsonDocument,
  type DocumentBackend,
} from '../subscriptions/document_backend.js';

export type CatalogEntry = {
  name: string;
  appid: number;
};

export interface AppListClient {
  fetchAppListPage(query: AppListQuery): Promise<AppListPage>;
}

/** What the resolver and the command layer need from a catalog. */
export interface CatalogSource {
  whenReady(): Promise<void>;
  universe(): ReadonlyMap<string, number>;
}

export type SyncOutcome =
  | { status: 'synced'; entries: number; pages: number; collisions: number }
  | { status: 'failed'; reason: string; source: 'memory' | 'snapshot' | 'empty' };

export type CatalogStoreOptions = {
  pageSize?: number;
  pageDelayMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

type CatalogMaps = {
  byName: Map<string, number>;
  byId: Map<number, string>;
  collisions: number;
};

export class CatalogStore implements CatalogSource {
  private byName = new Map<string, number>();
  private byId = new Map<number, string>();
  private readonly ready: Promise<void>;
  private markReady: () => void = () => {};
  private initialized = false;
  private inflight: Promise<SyncOutcome> | null = null;
  private readonly pageSize: number;
  private readonly pageDelayMs: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly client: AppListClient,
    private readonly snapshot: DocumentBackend,
    options: CatalogStoreOptions = {},
  ) {
    this.pageSize = options.pageSize ?? 50000;
    this.pageDelayMs = options.pageDelayMs ?? 200;
    this.logger = options.logger ?? taggedLogger('catalog');
    this.sleep = options.sleep ?? ((ms: number) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.ready = new Promise<void>((resolve) => {
      this.markReady = resolve;
    });
  }

  /** Resolves once the first sync has finished, whether it succeeded or fell back. */
  whenReady(): Promise<void> {
    return this.ready;
  }

  get isReady(): boolean {
    return this.initialized;
  }

  get size(): number {
    return this.byName.size;
  }

  resolve(appid: number): string | undefined {
    return this.byId.get(appid);
  }

  resolveReverse(name: string): number | undefined {
    return this.byName.get(name);
  }

  universe(): ReadonlyMap<string, number> {
    return this.byName;
  }

  /** Concurrent callers share the sync already in flight. */
  sync(): Promise<SyncOutcome> {
    if (!this.inflight) {
      this.inflight = this.runSync().finally(() => {
        this.inflight = null;
        if (!this.initialized) {
          this.initialized = true;
          this.markReady();
        }
      });
    }
    return this.inflight;
  }

  private async runSync(): Promise<SyncOutcome> {
    this.logger.info('Fetching the full Steam app list...');
    let entries: CatalogEntry[];
    let pages: number;
    try {
      ({ entries, pages } = await this.fetchAll());
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.error(`App list sync aborted: ${reason}`);
      return { status: 'failed', reason, source: await this.fallBack() };
    }

    if (entries.length === 0) {
      this.logger.warn('App list sync returned no apps.');
      return { status: 'failed', reason: 'empty app list', source: await this.fallBack() };
    }

    const maps = buildCatalogMaps(entries);
    this.byName = maps.byName;
    this.byId = maps.byId;
    if (maps.collisions > 0) {
      this.logger.warn(`App list contained ${maps.collisions} duplicate names or ids; the last occurrence was kept.`);
    }
    await this.persistSnapshot();
    this.logger.info(`App list updated: ${this.byName.size} names across ${pages} pages.`);
    return { status: 'synced', entries: this.byName.size, pages, collisions: maps.collisions };
  }

  private async fetchAll(): Promise<{ entries: CatalogEntry[]; pages: number }> {
    const entries: CatalogEntry[] = [];
    let cursor = 0;
    let pages = 0;
    for (;;) {
      const page = await this.client.fetchAppListPage({ lastAppId: cursor, maxResults: this.pageSize });
      pages += 1;
      for (const app of page.apps) {
        if (app.name && app.name.trim().length > 0) {
          entries.push({ name: app.name, appid: app.appid });
        }
      }
      this.logger.info(`Fetched ${entries.length} apps so far...`);
      if (!page.haveMoreResults) {
        return { entries, pages };
      }
      const next = page.lastAppId ?? page.apps.at(-1)?.appid ?? null;
      if (next === null || next <= cursor) {
        throw new Error(`App list cursor did not advance past ${cursor}`);
      }
      cursor = next;
      await this.sleep(this.pageDelayMs);
    }
  }

  private async fallBack(): Promise<'memory' | 'snapshot' | 'empty'> {
    if (this.byName.size > 0) {
      this.logger.warn(`Keeping the ${this.byName.size} apps already in memory.`);
      return 'memory';
    }
    const loaded = await this.loadSnapshot();
    if (loaded > 0) {
      this.logger.info(`Fell back to the cached app list (${loaded} names) at ${this.snapshot.location}.`);
      return 'snapshot';
    }
    this.logger.error('No cached app list available; name lookups will fail until the next successful sync.');
    return 'empty';
  }

  private async loadSnapshot(): Promise<number> {
    try {
      const text = await this.snapshot.read();
      if (text === null) {
        return 0;
      }
      const raw = parseJsonDocument(text, this.snapshot.location);
      if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        this.logger.error(`Cached app list at ${this.snapshot.location} is not a JSON object.`);
        return 0;
      }
      const entries: CatalogEntry[] = [];
      for (const [name, appid] of Object.entries(raw)) {
        if (typeof appid === 'number' && Number.isInteger(appid) && name.trim().length > 0) {
          entries.push({ name, appid });
        }
      }
      const maps = buildCatalogMaps(entries);
      this.byName = maps.byName;
      this.byId = maps.byId;
      return this.byName.size;
    } catch (error) {
      this.logger.error(`Failed to load the cached app list: ${errorMessage(error)}`);
      return 0;
    }
  }

  private async persistSnapshot(): Promise<void> {
    try {
      await this.snapshot.write(serializeJsonDocument(Object.fromEntries(this.byName)));
    } catch (error) {
      this.logger.error(`Failed to write the app list cache to ${this.snapshot.location}: ${errorMessage(error)}`);
    }
  }
}

/**
 * Entries are applied in order and both directions are last-write-wins, so a
 * name listed twice maps to its later id while each id still maps back to
 * the name it was listed with.
 */
export function buildCatalogMaps(entries: CatalogEntry[]): CatalogMaps {
  const byName = new Map<string, number>();
  const byId = new Map<number, string>();
  let collisions = 0;
  for (const { name, appid } of entries) {
    const previousId = byName.get(name);
    if (previousId !== undefined && previousId !== appid) {
      collisions += 1;
    }
    const previousName = byId.get(appid);
    if (previousName !== undefined && previousName !== name) {
      collisions += 1;
    }
    byName.set(name, appid);
    byId.set(appid, name);
  }
  return { byName, byId, collisions };
}
