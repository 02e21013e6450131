import type { SubscriberAddress } from '../subscriptions/subscriber_address.js';

export type ChangeKind = 'free' | 'increase' | 'decrease';

export type PriceChangeNotification = {
  appid: string;
  name: string;
  kind: ChangeKind;
  previousPrice: number;
  currentPrice: number;
  originalPrice: number;
  discountPercent: number;
  /** current − previous, rounded to cents. */
  delta: number;
  currency: string | null;
  purchaseUrl: string;
  detectedAt: string;
  /** Rendered text, one line per segment; transports decide how to join them. */
  segments: string[];
};

export type NotificationEvent = {
  address: string;
  mentionTargets: string[];
  notification: PriceChangeNotification;
};

export type DeliveryResult =
  | { status: 'sent'; messageId?: string }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: string };

export interface NotificationTransport {
  /** Address platform this transport delivers for, e.g. `discord`. */
  readonly platform: string;
  deliver(event: NotificationEvent, address: SubscriberAddress): Promise<DeliveryResult>;
}
