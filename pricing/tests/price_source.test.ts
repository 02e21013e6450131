import assert from 'node:assert/strict';
import test from 'node:test';

import { SteamRequestError, type AppDetailsEntry } from '../../scripts/steam_api_client.js';
import { formatAmount, toCents } from '../price_format.js';
import { SteamPriceSource } from '../price_source.js';

const silentLogger = { info: () => {}, warn: () => {}, error: () => {} };

function sourceReturning(result: AppDetailsEntry | null | Error) {
  const calls: Array<[string | number, string, string]> = [];
  const source = new SteamPriceSource(
    {
      fetchAppDetails: async (appid, region, language) => {
        calls.push([appid, region, language]);
        if (result instanceof Error) throw result;
        return result;
      },
    },
    { language: 'schinese', logger: silentLogger },
  );
  return { source, calls };
}

test('paid apps convert minor units to amounts', async () => {
  const { source, calls } = sourceReturning({
    success: true,
    data: { name: 'Portal 2', price_overview: { currency: 'USD', initial: 5999, final: 3999, discount_percent: 33 } },
  });

  assert.deepEqual(await source.fetchPrice('620', 'us'), {
    status: 'ok',
    snapshot: { currentPrice: 39.99, originalPrice: 59.99, discountPercent: 33, isFree: false, currency: 'USD' },
  });
  assert.deepEqual(calls, [['620', 'us', 'schinese']]);
});

test('free apps report a zero price in the FREE currency', async () => {
  const { source } = sourceReturning({ success: true, data: { name: 'Dota 2', is_free: true } });

  assert.deepEqual(await source.fetchPrice(570, 'cn'), {
    status: 'ok',
    snapshot: { currentPrice: 0, originalPrice: 0, discountPercent: 100, isFree: true, currency: 'FREE' },
  });
});

test('missing data and missing prices are distinguished', async () => {
  assert.deepEqual(await sourceReturning(null).source.fetchPrice(1, 'cn'), { status: 'unavailable', reason: 'not_found' });
  assert.deepEqual(await sourceReturning({ success: false }).source.fetchPrice(1, 'cn'), {
    status: 'unavailable',
    reason: 'not_found',
  });
  assert.deepEqual(await sourceReturning({ success: true, data: { name: 'Coming Soon' } }).source.fetchPrice(1, 'cn'), {
    status: 'unavailable',
    reason: 'no_price',
  });
});

test('client failures never escape as exceptions', async () => {
  const format = new SteamRequestError('Unexpected response shape', 'FORMAT', 'req-1', 'appDetails');
  const timeout = new SteamRequestError('Request timed out', 'TIMEOUT', 'req-2', 'appDetails');

  assert.deepEqual(await sourceReturning(format).source.fetchPrice(1, 'cn'), { status: 'unavailable', reason: 'format' });
  assert.deepEqual(await sourceReturning(timeout).source.fetchPrice(1, 'cn'), { status: 'unavailable', reason: 'transport' });
  assert.deepEqual(await sourceReturning(new Error('socket hang up')).source.fetchPrice(1, 'cn'), {
    status: 'unavailable',
    reason: 'transport',
  });
});

test('amounts are compared in cents and printed with their currency', () => {
  assert.equal(toCents(39.99) - toCents(59.99), -2000);
  assert.equal(toCents(0.1 + 0.2), 30);
  assert.equal(formatAmount(20, 'USD'), '20.00 USD');
  assert.equal(formatAmount(0, 'FREE'), '0.00');
  assert.equal(formatAmount(5.5, null), '5.50');
});
