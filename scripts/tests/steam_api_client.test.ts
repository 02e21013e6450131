import assert from 'node:assert/strict';
import test from 'node:test';

import { deriveRetryHint, SteamApiClient, SteamRequestError, storePageUrl, type FetchLike } from '../steam_api_client.js';

function recordingFetch(respond: (url: string) => Response | Promise<Response>) {
  const urls: string[] = [];
  const fetchImpl: FetchLike = async (input) => {
    const url = String(input);
    urls.push(url);
    return respond(url);
  };
  return { urls, fetchImpl };
}

const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

test('app list pages carry the cursor, the filters and the key', async () => {
  const { urls, fetchImpl } = recordingFetch(() =>
    json({ response: { apps: [{ appid: 10, name: 'Alpha' }, { appid: 20 }], have_more_results: true, last_appid: 20 } }),
  );
  const client = new SteamApiClient({ apiKey: 'test-secret', fetch: fetchImpl });

  const page = await client.fetchAppListPage({ lastAppId: 0, maxResults: 50000 });

  assert.equal(
    urls[0],
    'https://api.steampowered.com/IStoreService/GetAppList/v1/?max_results=50000&last_appid=0&include_games=true&include_dlc=true&include_software=true&include_videos=false&include_hardware=false&key=test-secret',
  );
  assert.deepEqual(page, {
    apps: [
      { appid: 10, name: 'Alpha' },
      { appid: 20, name: undefined },
    ],
    haveMoreResults: true,
    lastAppId: 20,
  });
});

test('an empty app list response means no more results', async () => {
  const { fetchImpl } = recordingFetch(() => json({ response: {} }));
  const client = new SteamApiClient({ fetch: fetchImpl });

  assert.deepEqual(await client.fetchAppListPage({ lastAppId: 0, maxResults: 10 }), {
    apps: [],
    haveMoreResults: false,
    lastAppId: null,
  });
});

test('app details are requested per region and language', async () => {
  const entry = {
    success: true,
    data: { name: 'Portal 2', is_free: false, price_overview: { currency: 'USD', initial: 999, final: 199, discount_percent: 80 } },
  };
  const { urls, fetchImpl } = recordingFetch(() => json({ '620': entry }));
  const client = new SteamApiClient({ fetch: fetchImpl });

  assert.deepEqual(await client.fetchAppDetails(620, 'us', 'english'), entry);
  assert.equal(urls[0], 'https://store.steampowered.com/api/appdetails?appids=620&cc=us&l=english');
});

test('missing app details come back as null', async () => {
  const client = new SteamApiClient({ fetch: recordingFetch(() => json({ '620': null })).fetchImpl });
  assert.equal(await client.fetchAppDetails(620, 'us', 'english'), null);

  const other = new SteamApiClient({ fetch: recordingFetch(() => json(null)).fetchImpl });
  assert.equal(await other.fetchAppDetails(620, 'us', 'english'), null);
});

test('http failures log a redacted structured line and carry a retry hint', async (t) => {
  const errors = t.mock.method(console, 'error', () => {});
  const client = new SteamApiClient({ apiKey: 'test-secret', fetch: recordingFetch(() => new Response('busy', { status: 503 })).fetchImpl });

  await assert.rejects(client.fetchAppListPage({ lastAppId: 0, maxResults: 1 }), (error: unknown) => {
    assert.ok(error instanceof SteamRequestError);
    assert.equal(error.kind, 'HTTP');
    assert.equal(error.statusCode, 503);
    assert.equal(error.endpoint, 'appList');
    assert.equal(error.retryHint, 'Steam server error. Retry after a short delay.');
    return true;
  });

  assert.equal(errors.mock.callCount(), 1);
  const logged: unknown = JSON.parse(String(errors.mock.calls[0].arguments[0]));
  assert.ok(typeof logged === 'object' && logged !== null);
  assert.equal(Reflect.get(logged, 'errorType'), 'HTTP');
  assert.equal(Reflect.get(logged, 'detail'), 'busy');
  const url = String(Reflect.get(logged, 'url'));
  assert.ok(url.endsWith('&key=***'));
});

test('unparseable bodies, wrong shapes and network errors get their own kinds', async (t) => {
  t.mock.method(console, 'error', () => {});
  const kindOf = async (respond: () => Response | Promise<Response>) => {
    const client = new SteamApiClient({ fetch: recordingFetch(respond).fetchImpl });
    try {
      await client.fetchAppDetails(620, 'us', 'english');
    } catch (error) {
      return error instanceof SteamRequestError ? error.kind : 'other';
    }
    return 'resolved';
  };

  assert.equal(await kindOf(() => new Response('<html>', { status: 200 })), 'JSON_PARSE');
  assert.equal(await kindOf(() => json({ '620': { success: 'yes' } })), 'FORMAT');
  assert.equal(
    await kindOf(() => {
      throw new TypeError('fetch failed');
    }),
    'NETWORK',
  );
});

test('requests that outlive the timeout are aborted', async (t) => {
  t.mock.method(console, 'error', () => {});
  const fetchImpl: FetchLike = (_input, init) =>
    new Promise((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => {
        const aborted = new Error('aborted');
        aborted.name = 'AbortError';
        reject(aborted);
      });
    });
  const client = new SteamApiClient({ fetch: fetchImpl, timeoutMs: 5 });

  await assert.rejects(client.fetchAppDetails(620, 'us', 'english'), (error: unknown) => {
    assert.ok(error instanceof SteamRequestError);
    assert.equal(error.kind, 'TIMEOUT');
    return true;
  });
});

test('retry hints follow the status class', () => {
  assert.equal(deriveRetryHint(429), 'Rate limited (429). Wait before the next round.');
  assert.equal(deriveRetryHint(403), 'Check STEAM_API_KEY.');
  assert.equal(deriveRetryHint(400), 'Verify request parameters before retrying.');
  assert.equal(storePageUrl(620), 'https://store.steampowered.com/app/620');
});
