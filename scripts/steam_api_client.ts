import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';

import { z } from 'zod';

export type SteamEndpoint = 'appList' | 'appDetails';

const APP_LIST_URL = 'https://api.steampowered.com/IStoreService/GetAppList/v1/';
const APP_DETAILS_URL = 'https://store.steampowered.com/api/appdetails';
const STORE_APP_URL = 'https://store.steampowered.com/app';

export type FetchLike = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

export type SteamErrorKind = 'HTTP' | 'TIMEOUT' | 'NETWORK' | 'JSON_PARSE' | 'FORMAT';

export class SteamRequestError extends Error {
  constructor(
    message: string,
    public readonly kind: SteamErrorKind,
    public readonly requestId: string,
    public readonly endpoint: SteamEndpoint,
    public readonly statusCode?: number,
    public readonly retryHint?: string,
    public readonly detail?: string,
  ) {
    super(message);
    this.name = 'SteamRequestError';
  }
}

const appListSchema = z.object({
  response: z
    .object({
      apps: z
        .array(
          z
            .object({
              appid: z.number().int(),
              name: z.string().optional(),
            })
            .passthrough(),
        )
        .optional(),
      have_more_results: z.boolean().optional(),
      last_appid: z.number().int().optional(),
    })
    .passthrough(),
});

const priceOverviewSchema = z
  .object({
    currency: z.string(),
    initial: z.number(),
    final: z.number(),
    discount_percent: z.number(),
  })
  .passthrough();

const appDetailsEntrySchema = z.object({
  success: z.boolean(),
  data: z
    .object({
      name: z.string().optional(),
      is_free: z.boolean().optional(),
      price_overview: priceOverviewSchema.optional(),
    })
    .passthrough()
    .optional(),
});

export type AppDetailsEntry = z.infer<typeof appDetailsEntrySchema>;

export type AppListPage = {
  apps: Array<{ appid: number; name?: string }>;
  haveMoreResults: boolean;
  lastAppId: number | null;
};

export type AppListQuery = {
  lastAppId: number;
  maxResults: number;
};

export type SteamApiClientOptions = {
  apiKey?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
};

export function storePageUrl(appid: string | number): string {
  return `${STORE_APP_URL}/${appid}`;
}

export class SteamApiClient {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(private readonly options: SteamApiClientOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  /** One page of the store catalog. Hardware and video entries are excluded. */
  async fetchAppListPage(query: AppListQuery): Promise<AppListPage> {
    const params = new URLSearchParams({
      max_results: String(query.maxResults),
      last_appid: String(query.lastAppId),
      include_games: 'true',
      include_dlc: 'true',
      include_software: 'true',
      include_videos: 'false',
      include_hardware: 'false',
    });
    if (this.options.apiKey) {
      params.set('key', this.options.apiKey);
    }
    const { body, requestId } = await this.requestJson('appList', `${APP_LIST_URL}?${params.toString()}`);
    const parsed = appListSchema.safeParse(body);
    if (!parsed.success) {
      throw formatError('appList', requestId, parsed.error);
    }
    const { response } = parsed.data;
    return {
      apps: (response.apps ?? []).map((app) => ({ appid: app.appid, name: app.name })),
      haveMoreResults: response.have_more_results ?? false,
      lastAppId: response.last_appid ?? null,
    };
  }

  /** The appdetails entry for one app, or null when Steam returned nothing for it. */
  async fetchAppDetails(appid: string | number, region: string, language: string): Promise<AppDetailsEntry | null> {
    const params = new URLSearchParams({ appids: String(appid), cc: region, l: language });
    const { body, requestId } = await this.requestJson('appDetails', `${APP_DETAILS_URL}?${params.toString()}`);
    if (!isRecord(body)) {
      return null;
    }
    const entry = body[String(appid)];
    if (entry === undefined || entry === null) {
      return null;
    }
    const parsed = appDetailsEntrySchema.safeParse(entry);
    if (!parsed.success) {
      throw formatError('appDetails', requestId, parsed.error);
    }
    return parsed.data;
  }

  private async requestJson(endpoint: SteamEndpoint, url: string): Promise<{ body: unknown; requestId: string }> {
    const requestId = randomUUID();
    const controller = new AbortController();
    const timeoutHandle = setTimeout(() => controller.abort(), this.timeoutMs);
    const started = performance.now();
    const loggedUrl = redactKey(url);

    try {
      const response = await this.fetchImpl(url, {
        headers: { accept: 'application/json' },
        signal: controller.signal,
      });
      const text = await response.text();

      if (!response.ok) {
        const retryHint = deriveRetryHint(response.status);
        emitStructuredError({
          requestId,
          endpoint,
          url: loggedUrl,
          httpStatus: response.status,
          retryHint,
          errorType: 'HTTP',
          detail: text.slice(0, 400),
        });
        throw new SteamRequestError(
          `Request failed with status ${response.status}`,
          'HTTP',
          requestId,
          endpoint,
          response.status,
          retryHint,
        );
      }

      try {
        const body: unknown = JSON.parse(text);
        return { body, requestId };
      } catch (error) {
        const detail = error instanceof Error ? error.message : 'invalid JSON';
        emitStructuredError({ requestId, endpoint, url: loggedUrl, errorType: 'JSON_PARSE', detail });
        throw new SteamRequestError('Unable to parse JSON response', 'JSON_PARSE', requestId, endpoint, response.status, undefined, detail);
      }
    } catch (error) {
      if (error instanceof SteamRequestError) {
        throw error;
      }
      const durationMs = Math.round(performance.now() - started);
      if (error instanceof Error && error.name === 'AbortError') {
        const retryHint = 'Request timed out. Increase the timeout or retry next round.';
        emitStructuredError({ requestId, endpoint, url: loggedUrl, errorType: 'TIMEOUT', durationMs, retryHint });
        throw new SteamRequestError('Request timed out', 'TIMEOUT', requestId, endpoint, undefined, retryHint);
      }
      const detail = error instanceof Error ? error.message : String(error);
      const retryHint = 'Check network connectivity.';
      emitStructuredError({ requestId, endpoint, url: loggedUrl, errorType: 'NETWORK', durationMs, retryHint, detail });
      throw new SteamRequestError('Network error while contacting Steam', 'NETWORK', requestId, endpoint, undefined, retryHint, detail);
    } finally {
      clearTimeout(timeoutHandle);
    }
  }
}

export function deriveRetryHint(status: number): string {
  if (status === 429) {
    return 'Rate limited (429). Wait before the next round.';
  }
  if (status === 401 || status === 403) {
    return 'Check STEAM_API_KEY.';
  }
  if (status >= 500) {
    return 'Steam server error. Retry after a short delay.';
  }
  return 'Verify request parameters before retrying.';
}

function formatError(endpoint: SteamEndpoint, requestId: string, error: z.ZodError): SteamRequestError {
  const detail = error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`).join('; ');
  emitStructuredError({ requestId, endpoint, errorType: 'FORMAT', detail });
  return new SteamRequestError('Unexpected response shape', 'FORMAT', requestId, endpoint, undefined, undefined, detail);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function redactKey(url: string): string {
  return url.replace(/([?&]key=)[^&]*/, '$1***');
}

function emitStructuredError(entry: Record<string, unknown>): void {
  const payload = {
    level: 'error',
    timestamp: new Date().toISOString(),
    ...entry,
  };
  console.error(JSON.stringify(payload));
}
