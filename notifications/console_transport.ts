import type { SubscriberAddress } from '../subscriptions/subscriber_address.js';
import type { DeliveryResult, NotificationEvent, NotificationTransport } from './types.js';
import type { Logger } from '../shared/logger.js';

/** Plain-text rendering shared by transports that cannot format rich messages. */
export function renderPlainText(event: NotificationEvent): string {
  const mentions = event.mentionTargets.map((id) => `@${id}`).join(' ');
  const body = event.notification.segments.join('');
  return mentions ? `${mentions}\n${body}` : body;
}

/** Writes notifications to the log; stands in where no chat transport is configured. */
export class ConsoleTransport implements NotificationTransport {
  readonly platform = 'console';

  constructor(private readonly logger: Logger = console) {}

  async deliver(event: NotificationEvent, address: SubscriberAddress): Promise<DeliveryResult> {
    this.logger.info(`[notify] → ${address.raw}\n${renderPlainText(event)}`);
    return { status: 'sent' };
  }
}
