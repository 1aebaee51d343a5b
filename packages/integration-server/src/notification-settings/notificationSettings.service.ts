import { Inject, Injectable } from '@nestjs/common';
import { LoggerService } from '../core/services/logger.service';
import { InvalidSettingValueError } from './errors';
import { ISSUE_ALERTS_DEFAULT_KEY, KEYS_TO_LEGACY_KEYS, isValidSettingValue, legacyKeyFor, toLegacyOption } from './legacyMappings';
import { NOTIFICATION_SETTINGS_STORE, type NotificationSettingsStore } from './notificationSettings.store';
import { resolveScope, resolveTarget } from './scope';
import {
  NotificationSettingType,
  NotificationSettingValue,
  type EntityRef,
  type ExternalProvider,
  type LegacyOptionValue,
  type SettingCoordinates,
  type SettingKey,
  type UserOptionKey,
} from './types';

/**
 * Notification preferences per user or team. Every write lands in the settings
 * table and, for user targets, in the legacy per-user option that older readers
 * still consult. Both writes share one store transaction.
 */
@Injectable()
export class NotificationSettingsService {
  constructor(
    @Inject(NOTIFICATION_SETTINGS_STORE) private readonly store: NotificationSettingsStore,
    @Inject(LoggerService) private readonly logger: LoggerService,
  ) {}

  validate(type: NotificationSettingType, value: NotificationSettingValue): boolean {
    return isValidSettingValue(type, value);
  }

  async getSettings(
    provider: ExternalProvider,
    type: NotificationSettingType,
    coordinates: SettingCoordinates,
  ): Promise<NotificationSettingValue> {
    const value = await this.store.findSetting(this.settingKey(provider, type, coordinates));
    return value ?? NotificationSettingValue.DEFAULT;
  }

  async updateSettings(
    provider: ExternalProvider,
    type: NotificationSettingType,
    value: NotificationSettingValue,
    coordinates: SettingCoordinates,
  ): Promise<void> {
    // A missing row already reads as DEFAULT
    if (value === NotificationSettingValue.DEFAULT) {
      return this.removeSettings(provider, type, coordinates);
    }
    if (!this.validate(type, value)) throw new InvalidSettingValueError(type, value);

    const key = this.settingKey(provider, type, coordinates);
    const legacy = toLegacyOption(type, value, Boolean(coordinates.project));
    const option = this.userOptionKey(coordinates, legacy?.key ?? null);

    await this.store.transaction(async (tx) => {
      await tx.upsertSetting(key, value);
      if (option && legacy) await tx.setUserOption(option, legacy.value);
    });
    this.logger.debug('notification_settings.updated', {
      provider,
      type,
      value,
      scopeType: key.scopeType,
      targetType: key.target.type,
    });
  }

  async removeSettings(provider: ExternalProvider, type: NotificationSettingType, coordinates: SettingCoordinates): Promise<void> {
    const key = this.settingKey(provider, type, coordinates);
    const option = this.userOptionKey(coordinates, legacyKeyFor(type, Boolean(coordinates.project)));

    await this.store.transaction(async (tx) => {
      await tx.deleteSetting(key);
      if (option) await tx.unsetUserOption(option);
    });
  }

  /** Drops every setting the user has, or only those of one type. */
  async removeSettingsForUser(user: EntityRef, type?: NotificationSettingType): Promise<void> {
    const legacyKeys = type === undefined ? allLegacyKeys() : legacyKeysForType(type);
    await this.store.transaction(async (tx) => {
      await tx.deleteUserOptions(user.id, legacyKeys);
      await tx.deleteSettingsForTarget({ type: 'user', id: user.id }, type);
    });
  }

  /** Legacy option values of the given users for a project, keyed by user id. */
  async getSettingsForUsers(
    provider: ExternalProvider,
    type: NotificationSettingType,
    userIds: string[],
    projectId: string,
  ): Promise<Map<string, LegacyOptionValue>> {
    const key = legacyKeyFor(type, true);
    if (key === null) return new Map();
    const values = await this.store.findUserOptionValues(userIds, projectId, key);
    this.logger.debug('notification_settings.users_loaded', { provider, type, requested: userIds.length, found: values.size });
    return values;
  }

  private settingKey(provider: ExternalProvider, type: NotificationSettingType, coordinates: SettingCoordinates): SettingKey {
    const target = resolveTarget(coordinates);
    const scope = resolveScope(coordinates);
    return { provider, type, target, ...scope };
  }

  // Legacy options are per user; team targets and unmapped types have none
  private userOptionKey(coordinates: SettingCoordinates, key: string | null): UserOptionKey | null {
    const { user, project, organization } = coordinates;
    if (!user || key === null) return null;
    return {
      userId: user.id,
      key,
      projectId: project?.id ?? null,
      organizationId: project ? null : (organization?.id ?? null),
    };
  }
}

function legacyKeysForType(type: NotificationSettingType): string[] {
  const key = KEYS_TO_LEGACY_KEYS[type];
  if (key === undefined) return [];
  return type === NotificationSettingType.ISSUE_ALERTS ? [key, ISSUE_ALERTS_DEFAULT_KEY] : [key];
}

function allLegacyKeys(): string[] {
  const keys = Object.values(KEYS_TO_LEGACY_KEYS).filter((key): key is string => typeof key === 'string');
  return [...keys, ISSUE_ALERTS_DEFAULT_KEY];
}
