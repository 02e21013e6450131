// Subscriber addresses look like `platform:MessageType:identifiers`, e.g.
//   discord:FriendMessage:4242
//   discord:GroupMessage:4242_9001   (user 4242 subscribed inside group 9001)
//   discord:GroupMessage:9001        (group subscription without a user)

export type DirectAddress = {
  kind: 'direct';
  raw: string;
  platform: string;
  userId: string;
};

export type GroupAddress = {
  kind: 'group';
  raw: string;
  platform: string;
  userId: string | null;
  groupId: string | null;
};

export type UnknownAddress = {
  kind: 'unknown';
  raw: string;
  platform: string | null;
};

export type SubscriberAddress = DirectAddress | GroupAddress | UnknownAddress;

const DIRECT_MESSAGE_TYPE = 'FriendMessage';
const GROUP_MESSAGE_TYPE = 'GroupMessage';
const ADDRESS_SEPARATOR = ':';
const MEMBER_SEPARATOR = '_';

export function parseSubscriberAddress(raw: string): SubscriberAddress {
  const parts = raw.split(ADDRESS_SEPARATOR);
  if (parts.length < 3) {
    return { kind: 'unknown', raw, platform: parts.length > 1 && parts[0] ? parts[0] : null };
  }
  const [platform, messageType, ...rest] = parts;
  const identifiers = rest.join(ADDRESS_SEPARATOR);
  if (!platform || !identifiers) {
    return { kind: 'unknown', raw, platform: platform || null };
  }

  if (messageType === DIRECT_MESSAGE_TYPE) {
    return { kind: 'direct', raw, platform, userId: identifiers };
  }

  if (messageType === GROUP_MESSAGE_TYPE) {
    const split = identifiers.indexOf(MEMBER_SEPARATOR);
    if (split === -1) {
      return { kind: 'group', raw, platform, userId: null, groupId: identifiers };
    }
    const userId = identifiers.slice(0, split);
    const groupId = identifiers.slice(split + 1);
    return { kind: 'group', raw, platform, userId: userId || null, groupId: groupId || null };
  }

  return { kind: 'unknown', raw, platform };
}

/** User ids the transport should mention when delivering to this address. */
export function mentionTargetsFor(address: SubscriberAddress): string[] {
  if (address.kind === 'group' && address.userId) {
    return [address.userId];
  }
  return [];
}

/** Human-readable label for admin listings. */
export function describeSubscriber(address: SubscriberAddress): string {
  switch (address.kind) {
    case 'direct':
      return `direct user ${address.userId}`;
    case 'group': {
      const group = address.groupId ? `group ${address.groupId}` : 'unknown group';
      return address.userId ? `${group}, subscriber ${address.userId}` : group;
    }
    default:
      return `unrecognized address ${address.raw}`;
  }
}
