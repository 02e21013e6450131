import fs from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { errorMessage, taggedLogger, type Logger } from '../../shared/logger.js';

const DISCORD_API_BASE = 'https://discord.com/api/v10';

type FetchLike = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

const retrySchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  backoffMs: z.array(z.number().int().nonnegative()).default([0, 2000, 7000]),
  jitter: z.number().min(0).max(1).default(0.25),
});

const configSchema = z.object({
  botTokenEnv: z.string().min(1).default('DISCORD_BOT_TOKEN'),
  defaultChannelId: z.string().optional(),
  dm: z
    .object({
      enabled: z.boolean().default(true),
      fallbackChannelId: z.string().optional(),
    })
    .default({ enabled: true }),
  retry: retrySchema.default({}),
  requestTimeoutMs: z.number().int().min(1).default(10000),
  messageTemplate: z
    .object({
      prefix: z.string().optional(),
      footer: z.string().optional(),
    })
    .default({}),
  logging: z
    .object({
      redactSnowflakes: z.boolean().default(true),
    })
    .default({ redactSnowflakes: true }),
  testHooks: z
    .object({
      dryRun: z.boolean().default(false),
      overrideChannelId: z.string().nullable().default(null),
    })
    .default({ dryRun: false, overrideChannelId: null }),
});

// Only the fields read from Discord's JSON replies.
const responseBodySchema = z
  .object({
    id: z.string().optional(),
    message: z.string().optional(),
    retry_after: z.number().optional(),
  })
  .passthrough();

type ResponseBody = z.infer<typeof responseBodySchema>;

export type DiscordBotConfig = z.infer<typeof configSchema>;
export type ResolvedDiscordBotConfig = Omit<DiscordBotConfig, 'botTokenEnv'> & { botToken: string };

export type DiscordTarget = {
  channelId?: string;
  userId?: string;
};

export type AllowedMentions = {
  parse?: Array<'roles' | 'users' | 'everyone'>;
  users?: string[];
};

export type DiscordMessagePayload = {
  content: string;
  allowedMentions?: AllowedMentions;
};

export type DiscordSendRequest = {
  target: DiscordTarget;
  message: DiscordMessagePayload;
  dedupeKey?: string;
};

export type DiscordSendStatus = 'sent' | 'retryable' | 'failed';
export type DiscordSendErrorCode = 'validation_error' | 'rate_limited' | 'unauthorized' | 'not_found' | 'network_error' | 'no_channel';

export type DiscordSendResult = {
  status: DiscordSendStatus;
  attempt: number;
  channelId?: string;
  messageId?: string;
  retryAfterSeconds?: number;
  error?: { code: DiscordSendErrorCode; message: string; statusCode?: number };
};

type AttemptResult = Omit<DiscordSendResult, 'attempt'>;

export async function loadDiscordBotConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<ResolvedDiscordBotConfig> {
  const raw = await fs.readFile(path.resolve(configPath), 'utf8');
  return resolveDiscordBotConfig(JSON.parse(raw), env);
}

export function resolveDiscordBotConfig(rawConfig: unknown, env: NodeJS.ProcessEnv = process.env): ResolvedDiscordBotConfig {
  const { botTokenEnv, ...parsed } = configSchema.parse(rawConfig);
  const token = env[botTokenEnv];
  if (!token) {
    throw new Error(`Missing Discord bot token env variable: ${botTokenEnv}`);
  }
  return { ...parsed, botToken: token };
}

export class DiscordBot {
  private readonly dmChannels = new Map<string, string>();
  private readonly inflight = new Map<string, Promise<DiscordSendResult>>();
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(
    private readonly config: ResolvedDiscordBotConfig,
    deps: { fetch?: FetchLike; logger?: Logger; sleep?: (ms: number) => Promise<void>; random?: () => number } = {},
  ) {
    this.fetchImpl = deps.fetch ?? fetch;
    this.logger = deps.logger ?? taggedLogger('discord');
    this.sleep = deps.sleep ?? ((ms: number) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.random = deps.random ?? Math.random;
  }

  /** Sends with retries. Identical requests already in flight share one send. */
  send(request: DiscordSendRequest): Promise<DiscordSendResult> {
    const dedupeKey = request.dedupeKey;
    if (dedupeKey) {
      const existing = this.inflight.get(dedupeKey);
      if (existing) return existing;
    }

    const promise = this.sendWithRetry(request).finally(() => {
      if (dedupeKey) {
        this.inflight.delete(dedupeKey);
      }
    });
    if (dedupeKey) {
      this.inflight.set(dedupeKey, promise);
    }
    return promise;
  }

  private async sendWithRetry(request: DiscordSendRequest): Promise<DiscordSendResult> {
    const channelId = await this.resolveChannel(request.target);
    if (!channelId) {
      return { status: 'failed', attempt: 0, error: { code: 'no_channel', message: 'No channel resolved for Discord message' } };
    }
    const message = this.applyTemplate(request.message);

    let last: DiscordSendResult = { status: 'failed', attempt: 0, error: { code: 'network_error', message: 'No attempts performed' } };
    for (let attempt = 1; attempt <= this.config.retry.maxAttempts; attempt++) {
      last = { ...(await this.performSend(channelId, message)), attempt };
      if (last.status !== 'retryable' || attempt >= this.config.retry.maxAttempts) {
        return last;
      }
      const delayMs = this.computeDelay(attempt, last);
      this.log('warn', 'Retrying Discord send after backoff', {
        attempt,
        delayMs,
        channelId,
        retryAfterSeconds: last.retryAfterSeconds,
      });
      if (delayMs > 0) {
        await this.sleep(delayMs);
      }
    }
    return last;
  }

  private async performSend(channelId: string, message: DiscordMessagePayload): Promise<AttemptResult> {
    if (this.config.testHooks.dryRun) {
      this.log('info', 'Discord send dry-run', { channelId, content: message.content });
      return { status: 'sent', channelId, messageId: 'dry-run' };
    }

    try {
      const { response, body } = await this.post(
        new URL(`${DISCORD_API_BASE}/channels/${channelId}/messages`),
        toDiscordPayload(message),
      );

      if (response.status === 429) {
        const retryAfterSeconds = extractRetryAfterSeconds(response, body);
        this.log('warn', 'Discord rate limited', { channelId, retryAfterSeconds });
        return {
          status: 'retryable',
          channelId,
          retryAfterSeconds,
          error: { code: 'rate_limited', message: body?.message ?? 'rate limited', statusCode: 429 },
        };
      }

      if (response.ok) {
        this.log('info', 'Discord message sent', { channelId, messageId: body?.id });
        return { status: 'sent', channelId, messageId: body?.id };
      }

      const result = normalizeError(response.status, body);
      this.log('error', 'Discord send failed', { channelId, status: response.status, error: result.error?.message });
      return { ...result, channelId };
    } catch (error) {
      this.log('error', 'Discord send threw', { channelId, error: errorMessage(error) });
      return {
        status: 'retryable',
        channelId,
        error: { code: 'network_error', message: error instanceof Error ? error.message : 'network error' },
      };
    }
  }

  private async resolveChannel(target: DiscordTarget): Promise<string | null> {
    if (this.config.testHooks.overrideChannelId) {
      return this.config.testHooks.overrideChannelId;
    }
    if (target.channelId) {
      return target.channelId;
    }
    if (target.userId && this.config.dm.enabled) {
      try {
        return await this.ensureDmChannel(target.userId);
      } catch (error) {
        this.log('warn', 'Failed to open DM channel, attempting fallback', {
          userId: target.userId,
          error: errorMessage(error),
        });
      }
    }
    return this.config.dm.fallbackChannelId ?? this.config.defaultChannelId ?? null;
  }

  private async ensureDmChannel(userId: string): Promise<string> {
    const cached = this.dmChannels.get(userId);
    if (cached) return cached;

    const { response, body } = await this.post(new URL(`${DISCORD_API_BASE}/users/@me/channels`), {
      recipient_id: userId,
    });
    if (!response.ok) {
      throw new Error(body?.message ?? `Failed to create DM channel (status ${response.status})`);
    }
    if (!body?.id) {
      throw new Error('DM creation returned no channel id');
    }
    this.dmChannels.set(userId, body.id);
    return body.id;
  }

  /** One POST and its body, aborted after `requestTimeoutMs` even if the fetch ignores the signal. */
  private async post(url: URL, payload: unknown): Promise<{ response: Response; body: ResponseBody | null }> {
    const controller = new AbortController();
    const timeoutMs = this.config.requestTimeoutMs;
    const exchange = (async () => {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          Authorization: `Bot ${this.config.botToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      return { response, body: await readBody(response) };
    })();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        void exchange.catch((error: unknown) => {
          this.log('warn', 'Discord request settled after its timeout', { error: errorMessage(error) });
        });
        reject(new Error(`Discord request timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([exchange, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private applyTemplate(message: DiscordMessagePayload): DiscordMessagePayload {
    const { prefix, footer } = this.config.messageTemplate;
    const content = [prefix, message.content, footer].filter((part): part is string => Boolean(part)).join('\n');
    return { content, allowedMentions: message.allowedMentions ?? { parse: [] } };
  }

  private computeDelay(attempt: number, result: AttemptResult): number {
    const { backoffMs, jitter } = this.config.retry;
    const base = backoffMs[Math.min(attempt - 1, backoffMs.length - 1)] ?? 0;
    const retryAfterMs = result.retryAfterSeconds ? Math.round(result.retryAfterSeconds * 1000) : 0;
    const chosen = Math.max(base, retryAfterMs);
    if (!chosen) return 0;
    return chosen + (jitter > 0 ? Math.round(chosen * jitter * this.random()) : 0);
  }

  private log(level: keyof Logger, message: string, meta: Record<string, unknown>) {
    const output: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(meta)) {
      if (value === null || value === undefined) continue;
      output[key] = typeof value === 'string' && key.toLowerCase().endsWith('id') ? this.redact(value) : value;
    }
    this.logger[level](message, output);
  }

  private redact(value: string): string {
    if (!this.config.logging.redactSnowflakes) return value;
    if (value.length <= 4) return '****';
    return `${'*'.repeat(value.length - 4)}${value.slice(-4)}`;
  }
}

function toDiscordPayload(message: DiscordMessagePayload): Record<string, unknown> {
  const mentions = message.allowedMentions;
  return {
    content: message.content,
    allowed_mentions: mentions ? pruneUndefined({ parse: mentions.parse, users: mentions.users }) : undefined,
  };
}

async function readBody(response: Response): Promise<ResponseBody | null> {
  let json: unknown;
  try {
    json = await response.json();
  } catch {
    return null;
  }
  const parsed = responseBodySchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

function extractRetryAfterSeconds(response: Response, body: ResponseBody | null): number | undefined {
  const headerValue = response.headers.get('Retry-After');
  const fromHeader = headerValue ? Number(headerValue) : Number.NaN;
  if (Number.isFinite(fromHeader)) {
    return fromHeader;
  }
  return body?.retry_after;
}

function pruneUndefined(value: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    if (val !== undefined) output[key] = val;
  }
  return output;
}

function normalizeError(status: number, body: ResponseBody | null): AttemptResult {
  if (status === 401 || status === 403) {
    return { status: 'failed', error: { code: 'unauthorized', message: body?.message ?? 'unauthorized', statusCode: status } };
  }
  if (status === 404) {
    return { status: 'failed', error: { code: 'not_found', message: body?.message ?? 'channel or user not found', statusCode: status } };
  }
  if (status >= 500) {
    return { status: 'retryable', error: { code: 'network_error', message: body?.message ?? 'server error', statusCode: status } };
  }
  return { status: 'failed', error: { code: 'validation_error', message: body?.message ?? 'bad request', statusCode: status } };
}
