import type { NotificationEvent, NotificationTransport } from '../notifications/types.js';
import { errorMessage, taggedLogger, type Logger } from '../shared/logger.js';
import { parseSubscriberAddress } from '../subscriptions/subscriber_address.js';

export type DispatchSummary = {
  received: number;
  sent: number;
  skipped: number;
  failed: number;
};

export type DispatcherOptions = {
  /** Pause between two deliveries, so chat platforms are not flooded. */
  delayMs?: number;
  /** Used for platforms without a dedicated transport. */
  fallback?: NotificationTransport;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class NotificationDispatcher {
  private readonly transports = new Map<string, NotificationTransport>();
  private readonly delayMs: number;
  private readonly fallback?: NotificationTransport;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(transports: NotificationTransport[], options: DispatcherOptions = {}) {
    for (const transport of transports) {
      this.transports.set(transport.platform, transport);
    }
    this.delayMs = options.delayMs ?? 1000;
    this.fallback = options.fallback;
    this.logger = options.logger ?? taggedLogger('dispatch');
    this.sleep = options.sleep ?? sleep;
  }

  get platforms(): string[] {
    return Array.from(this.transports.keys());
  }

  /** Delivers every event of one round, in order, one at a time. */
  async drain(events: AsyncIterable<NotificationEvent>): Promise<DispatchSummary> {
    const summary: DispatchSummary = { received: 0, sent: 0, skipped: 0, failed: 0 };
    try {
      for await (const event of events) {
        if (summary.received > 0 && this.delayMs > 0) {
          await this.sleep(this.delayMs);
        }
        summary.received += 1;
        await this.deliver(event, summary);
      }
    } catch (error) {
      this.logger.error(`Price check aborted after ${summary.received} notifications: ${errorMessage(error)}`);
    }
    if (summary.received > 0) {
      this.logger.info(
        `Round delivered: sent=${summary.sent} skipped=${summary.skipped} failed=${summary.failed}`,
      );
    }
    return summary;
  }

  private async deliver(event: NotificationEvent, summary: DispatchSummary): Promise<void> {
    const address = parseSubscriberAddress(event.address);
    if (address.kind === 'unknown' || !address.platform) {
      summary.skipped += 1;
      this.logger.warn(`Cannot route a notification to "${event.address}".`);
      return;
    }
    if (address.kind === 'group' && event.mentionTargets.length === 0) {
      this.logger.warn(`Group address "${event.address}" has no user to mention; sending without a mention.`);
    }

    const transport = this.transports.get(address.platform) ?? this.fallback;
    if (!transport) {
      summary.skipped += 1;
      this.logger.warn(`No transport for platform "${address.platform}"; dropping notification for ${event.address}.`);
      return;
    }

    try {
      const result = await transport.deliver(event, address);
      switch (result.status) {
        case 'sent':
          summary.sent += 1;
          break;
        case 'skipped':
          summary.skipped += 1;
          this.logger.info(`Skipped ${event.address}: ${result.reason}`);
          break;
        case 'failed':
          summary.failed += 1;
          this.logger.error(`Delivery to ${event.address} failed: ${result.error}`);
          break;
      }
    } catch (error) {
      summary.failed += 1;
      this.logger.error(`Delivery to ${event.address} threw: ${errorMessage(error)}`);
    }
  }
}
