import type { SubscriberAddress } from '../../subscriptions/subscriber_address.js';
import type { DeliveryResult, NotificationEvent, NotificationTransport } from '../types.js';
import type { DiscordBot, DiscordSendRequest } from './bot.js';

export const DISCORD_PLATFORM = 'discord';

export type DiscordBuildResult =
  | { ok: true; request: DiscordSendRequest }
  | { ok: false; code: 'unsupported_address' | 'invalid_target'; message: string };

/**
 * Direct addresses go to the user's DM channel; group addresses post in the
 * group's channel and mention the subscriber who asked for the alert.
 */
export function buildDiscordSend(event: NotificationEvent, address: SubscriberAddress): DiscordBuildResult {
  if (address.kind === 'unknown' || address.platform !== DISCORD_PLATFORM) {
    return { ok: false, code: 'unsupported_address', message: `address ${address.raw}` };
  }

  const body = event.notification.segments.join('').trimEnd();
  const dedupeKey = `${event.notification.appid}:${event.notification.detectedAt}:${address.raw}`;

  if (address.kind === 'direct') {
    return {
      ok: true,
      request: { target: { userId: address.userId }, message: { content: body, allowedMentions: { parse: [] } }, dedupeKey },
    };
  }

  if (!address.groupId) {
    return { ok: false, code: 'invalid_target', message: 'missing channel id' };
  }
  const mentions = event.mentionTargets;
  const content = mentions.length ? `${mentions.map((id) => `<@${id}>`).join(' ')}\n${body}` : body;
  return {
    ok: true,
    request: {
      target: { channelId: address.groupId },
      message: { content, allowedMentions: { parse: [], users: mentions.length ? mentions : undefined } },
      dedupeKey,
    },
  };
}

export class DiscordTransport implements NotificationTransport {
  readonly platform = DISCORD_PLATFORM;

  constructor(private readonly bot: Pick<DiscordBot, 'send'>) {}

  async deliver(event: NotificationEvent, address: SubscriberAddress): Promise<DeliveryResult> {
    const built = buildDiscordSend(event, address);
    if (!built.ok) {
      return { status: 'skipped', reason: `${built.code}: ${built.message}` };
    }
    const result = await this.bot.send(built.request);
    if (result.status === 'sent') {
      return { status: 'sent', messageId: result.messageId };
    }
    return { status: 'failed', error: `${result.error?.code ?? 'unknown'}: ${result.error?.message ?? 'send failed'}` };
  }
}
