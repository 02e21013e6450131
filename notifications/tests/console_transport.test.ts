import assert from 'node:assert/strict';
import test from 'node:test';

import { parseSubscriberAddress } from '../../subscriptions/subscriber_address.js';
import { ConsoleTransport, renderPlainText } from '../console_transport.js';
import type { NotificationEvent } from '../types.js';

const event: NotificationEvent = {
  address: 'telegram:GroupMessage:5_77',
  mentionTargets: ['5'],
  notification: {
    appid: '620',
    name: 'Portal 2',
    kind: 'increase',
    previousPrice: 4.99,
    currentPrice: 9.99,
    originalPrice: 9.99,
    discountPercent: 0,
    delta: 5,
    currency: 'USD',
    purchaseUrl: 'https://store.steampowered.com/app/620',
    detectedAt: '2026-01-02T03:04:05.000Z',
    segments: ['⬆️ "Portal 2" went up by 5.00 USD\n', 'Store page: https://store.steampowered.com/app/620\n'],
  },
};

test('plain text puts mentions on their own line', () => {
  assert.equal(
    renderPlainText(event),
    '@5\n⬆️ "Portal 2" went up by 5.00 USD\nStore page: https://store.steampowered.com/app/620\n',
  );
  assert.equal(renderPlainText({ ...event, mentionTargets: [] }).startsWith('⬆️'), true);
});

test('the console transport logs the rendered message', async () => {
  const lines: string[] = [];
  const transport = new ConsoleTransport({ info: (message?: unknown) => lines.push(String(message)), warn: () => {}, error: () => {} });

  const result = await transport.deliver(event, parseSubscriberAddress(event.address));

  assert.deepEqual(result, { status: 'sent' });
  assert.deepEqual(lines, [`[notify] → telegram:GroupMessage:5_77\n${renderPlainText(event)}`]);
});
