import { NotificationSettingType, NotificationSettingValue, type LegacyOptionValue } from './types';

export const KEYS_TO_LEGACY_KEYS: Readonly<Partial<Record<NotificationSettingType, string>>> = {
  [NotificationSettingType.DEPLOY]: 'deploy-emails',
  [NotificationSettingType.ISSUE_ALERTS]: 'mail:alert',
  [NotificationSettingType.WORKFLOW]: 'workflow:notifications',
};

// Issue alerts without a project are stored under the user-wide default key
export const ISSUE_ALERTS_DEFAULT_KEY = 'subscribe_by_default';

const KEY_VALUE_TO_LEGACY_VALUE: Readonly<
  Partial<Record<NotificationSettingType, Partial<Record<NotificationSettingValue, string>>>>
> = {
  [NotificationSettingType.DEPLOY]: {
    [NotificationSettingValue.ALWAYS]: '2',
    [NotificationSettingValue.COMMITTED_ONLY]: '3',
    [NotificationSettingValue.NEVER]: '4',
  },
  [NotificationSettingType.ISSUE_ALERTS]: {
    [NotificationSettingValue.ALWAYS]: '1',
    [NotificationSettingValue.NEVER]: '0',
  },
  [NotificationSettingType.WORKFLOW]: {
    [NotificationSettingValue.ALWAYS]: '0',
    [NotificationSettingValue.SUBSCRIBE_ONLY]: '1',
    [NotificationSettingValue.NEVER]: '2',
  },
};

export function getLegacyKey(type: NotificationSettingType): string | null {
  return KEYS_TO_LEGACY_KEYS[type] ?? null;
}

export function getLegacyValue(type: NotificationSettingType, value: NotificationSettingValue): string | null {
  return KEY_VALUE_TO_LEGACY_VALUE[type]?.[value] ?? null;
}

export function isValidSettingValue(type: NotificationSettingType, value: NotificationSettingValue): boolean {
  return getLegacyValue(type, value) !== null;
}

/** Legacy option key a setting is mirrored under. */
export function legacyKeyFor(type: NotificationSettingType, hasProject: boolean): string | null {
  const key = getLegacyKey(type);
  if (key !== null && type === NotificationSettingType.ISSUE_ALERTS && !hasProject) return ISSUE_ALERTS_DEFAULT_KEY;
  return key;
}

/** Key and value to mirror into the legacy table, null when the type has no legacy form. */
export function toLegacyOption(
  type: NotificationSettingType,
  value: NotificationSettingValue,
  hasProject: boolean,
): { key: string; value: LegacyOptionValue } | null {
  const key = legacyKeyFor(type, hasProject);
  const legacyValue = getLegacyValue(type, value);
  if (key === null || legacyValue === null) return null;
  // Issue alert options are stored as integers
  return { key, value: type === NotificationSettingType.ISSUE_ALERTS ? Number(legacyValue) : legacyValue };
}
