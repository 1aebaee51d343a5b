import { describe, expect, it } from 'vitest';
import { getLegacyKey, legacyKeyFor, toLegacyOption } from '../src/notification-settings/legacyMappings';
import { NotificationSettingType, NotificationSettingValue } from '../src/notification-settings/types';

describe('legacy option mapping', () => {
  it('maps each type to its legacy key', () => {
    expect(getLegacyKey(NotificationSettingType.DEPLOY)).toBe('deploy-emails');
    expect(getLegacyKey(NotificationSettingType.ISSUE_ALERTS)).toBe('mail:alert');
    expect(getLegacyKey(NotificationSettingType.WORKFLOW)).toBe('workflow:notifications');
    expect(getLegacyKey(NotificationSettingType.DEFAULT)).toBeNull();
  });

  it('uses the user-wide key for issue alerts outside a project', () => {
    expect(legacyKeyFor(NotificationSettingType.ISSUE_ALERTS, false)).toBe('subscribe_by_default');
    expect(legacyKeyFor(NotificationSettingType.DEPLOY, false)).toBe('deploy-emails');
  });

  it('stores deploy values as strings and issue alert values as numbers', () => {
    expect(toLegacyOption(NotificationSettingType.DEPLOY, NotificationSettingValue.COMMITTED_ONLY, true)).toEqual({
      key: 'deploy-emails',
      value: '3',
    });
    expect(toLegacyOption(NotificationSettingType.ISSUE_ALERTS, NotificationSettingValue.ALWAYS, true)).toEqual({
      key: 'mail:alert',
      value: 1,
    });
    expect(toLegacyOption(NotificationSettingType.WORKFLOW, NotificationSettingValue.COMMITTED_ONLY, true)).toBeNull();
  });
});
