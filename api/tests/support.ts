import { mkdtempSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { DeliveryResult, NotificationEvent, NotificationTransport } from '../../notifications/types.js';
import type { FetchLike } from '../../scripts/steam_api_client.js';
import { createServer } from '../src/server.js';

export const ALICE = 'discord:FriendMessage:1001';
export const BOB = 'discord:GroupMessage:1002_9001';
export const ADMIN_TOKEN = 'test-secret';

export const silentLogger = { info: () => {}, warn: () => {}, error: () => {} };

export type FakeSteam = {
  apps: Array<{ appid: number; name: string }>;
  /** appid → price in cents; missing apps answer with no data. */
  prices: Map<string, { final: number; initial: number }>;
  appListStatus: number;
  fetch: FetchLike;
};

const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

export function createFakeSteam(): FakeSteam {
  const steam: FakeSteam = {
    apps: [
      { appid: 400, name: 'Portal' },
      { appid: 620, name: 'Portal 2' },
      { appid: 1091500, name: 'Cyberpunk 2077' },
    ],
    prices: new Map(),
    appListStatus: 200,
    fetch: async (input) => {
      const url = new URL(String(input));
      if (url.hostname === 'api.steampowered.com') {
        if (steam.appListStatus !== 200) {
          return new Response('unavailable', { status: steam.appListStatus });
        }
        return json({ response: { apps: steam.apps, have_more_results: false } });
      }
      const appid = url.searchParams.get('appids') ?? '';
      const price = steam.prices.get(appid);
      if (!price) {
        return json({ [appid]: null });
      }
      const discount = Math.round((1 - price.final / price.initial) * 100);
      return json({
        [appid]: {
          success: true,
          data: {
            name: `App ${appid}`,
            price_overview: { currency: 'USD', initial: price.initial, final: price.final, discount_percent: discount },
          },
        },
      });
    },
  };
  return steam;
}

export class RecordingTransport implements NotificationTransport {
  readonly platform = 'discord';
  readonly events: NotificationEvent[] = [];

  async deliver(event: NotificationEvent): Promise<DeliveryResult> {
    this.events.push(event);
    return { status: 'sent', messageId: `m-${this.events.length}` };
  }
}

/** A server over a temp data directory, a fake Steam and an in-memory transport. */
export async function createTestServer(
  t: { after: (fn: () => Promise<void>) => void },
  env: NodeJS.ProcessEnv = {},
) {
  const dataDir = mkdtempSync(path.join(os.tmpdir(), 'price-watch-api-'));
  const steam = createFakeSteam();
  const transport = new RecordingTransport();
  const server = await createServer({
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      DATA_DIR: dataDir,
      POLL_AFTER_SUBSCRIBE: 'false',
      DISPATCH_DELAY_MS: '0',
      ADMIN_TOKEN,
      ...env,
    },
    deps: { fetch: steam.fetch, transports: [transport], logger: silentLogger, sleep: async () => {} },
  });
  t.after(async () => {
    await server.close();
    rmSync(dataDir, { recursive: true, force: true });
  });
  return { server, steam, transport, dataDir };
}
