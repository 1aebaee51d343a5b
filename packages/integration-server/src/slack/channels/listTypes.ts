export const CHANNEL_PREFIX = '#';
export const MEMBER_PREFIX = '@';

export type ChannelPrefix = typeof CHANNEL_PREFIX | typeof MEMBER_PREFIX;

export type ListTypeName = 'conversations' | 'users';

export type ListTypeSpec = {
  listType: ListTypeName;
  /** Key of the item array in the `<listType>.list` response. */
  resultKey: 'channels' | 'members';
  prefix: ChannelPrefix;
};

// Searched in this order: channels before users.
export const LIST_TYPES: readonly ListTypeSpec[] = [
  { listType: 'conversations', resultKey: 'channels', prefix: CHANNEL_PREFIX },
  { listType: 'users', resultKey: 'members', prefix: MEMBER_PREFIX },
] as const;

const LEADING_PREFIX_RE = /^[#@]+/;

export function stripChannelName(name: string): string {
  return name.replace(LEADING_PREFIX_RE, '');
}
