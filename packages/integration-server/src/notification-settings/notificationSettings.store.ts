import { Inject, Injectable } from '@nestjs/common';
import type { PoolClient } from 'pg';
import { DatabaseService } from '../core/services/database.service';
import {
  NotificationSettingValue,
  type LegacyOptionValue,
  type NotificationSettingType,
  type SettingKey,
  type SettingTarget,
  type UserOptionKey,
} from './types';

/** Writes that must land together: the settings row and its legacy mirror. */
export interface NotificationSettingsTransaction {
  upsertSetting(key: SettingKey, value: NotificationSettingValue): Promise<void>;
  deleteSetting(key: SettingKey): Promise<void>;
  deleteSettingsForTarget(target: SettingTarget, type?: NotificationSettingType): Promise<void>;
  setUserOption(option: UserOptionKey, value: LegacyOptionValue): Promise<void>;
  unsetUserOption(option: UserOptionKey): Promise<void>;
  deleteUserOptions(userId: string, keys: string[]): Promise<void>;
}

export interface NotificationSettingsStore {
  findSetting(key: SettingKey): Promise<NotificationSettingValue | null>;
  findUserOptionValues(userIds: string[], projectId: string, key: string): Promise<Map<string, LegacyOptionValue>>;
  transaction<T>(fn: (tx: NotificationSettingsTransaction) => Promise<T>): Promise<T>;
}

export const NOTIFICATION_SETTINGS_STORE = Symbol('NOTIFICATION_SETTINGS_STORE');

const SETTING_KEY_WHERE = `provider = $1 AND type = $2 AND scope_type = $3 AND scope_identifier = $4
   AND target_type = $5 AND target_identifier = $6`;

const settingKeyParams = (key: SettingKey): Array<string | number> => [
  key.provider,
  key.type,
  key.scopeType,
  key.scopeIdentifier,
  key.target.type,
  key.target.id,
];

const isSettingValue = (value: unknown): value is NotificationSettingValue =>
  typeof value === 'number' && Object.values(NotificationSettingValue).includes(value);

const isLegacyValue = (value: unknown): value is LegacyOptionValue => typeof value === 'string' || typeof value === 'number';

class PgNotificationSettingsTransaction implements NotificationSettingsTransaction {
  constructor(private readonly client: PoolClient) {}

  async upsertSetting(key: SettingKey, value: NotificationSettingValue): Promise<void> {
    await this.client.query(
      `INSERT INTO notification_setting (provider, type, scope_type, scope_identifier, target_type, target_identifier, value)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (provider, type, scope_type, scope_identifier, target_type, target_identifier)
       DO UPDATE SET value = EXCLUDED.value
       WHERE notification_setting.value IS DISTINCT FROM EXCLUDED.value`,
      [...settingKeyParams(key), value],
    );
  }

  async deleteSetting(key: SettingKey): Promise<void> {
    await this.client.query(`DELETE FROM notification_setting WHERE ${SETTING_KEY_WHERE}`, settingKeyParams(key));
  }

  async deleteSettingsForTarget(target: SettingTarget, type?: NotificationSettingType): Promise<void> {
    if (type === undefined) {
      await this.client.query('DELETE FROM notification_setting WHERE target_type = $1 AND target_identifier = $2', [
        target.type,
        target.id,
      ]);
      return;
    }
    await this.client.query(
      'DELETE FROM notification_setting WHERE target_type = $1 AND target_identifier = $2 AND type = $3',
      [target.type, target.id, type],
    );
  }

  async setUserOption(option: UserOptionKey, value: LegacyOptionValue): Promise<void> {
    await this.unsetUserOption(option);
    await this.client.query(
      'INSERT INTO user_option (user_id, project_id, organization_id, key, value) VALUES ($1, $2, $3, $4, $5::jsonb)',
      [option.userId, option.projectId, option.organizationId, option.key, JSON.stringify(value)],
    );
  }

  async unsetUserOption(option: UserOptionKey): Promise<void> {
    await this.client.query(
      `DELETE FROM user_option
        WHERE user_id = $1 AND project_id IS NOT DISTINCT FROM $2 AND organization_id IS NOT DISTINCT FROM $3 AND key = $4`,
      [option.userId, option.projectId, option.organizationId, option.key],
    );
  }

  async deleteUserOptions(userId: string, keys: string[]): Promise<void> {
    if (keys.length === 0) return;
    await this.client.query('DELETE FROM user_option WHERE user_id = $1 AND key = ANY($2::text[])', [userId, keys]);
  }
}

@Injectable()
export class PgNotificationSettingsStore implements NotificationSettingsStore {
  constructor(@Inject(DatabaseService) private readonly db: DatabaseService) {}

  async findSetting(key: SettingKey): Promise<NotificationSettingValue | null> {
    const { rows } = await this.db
      .getPool()
      .query<{ value: number }>(`SELECT value FROM notification_setting WHERE ${SETTING_KEY_WHERE} LIMIT 1`, settingKeyParams(key));
    const value = rows[0]?.value;
    return isSettingValue(value) ? value : null;
  }

  async findUserOptionValues(userIds: string[], projectId: string, key: string): Promise<Map<string, LegacyOptionValue>> {
    const values = new Map<string, LegacyOptionValue>();
    if (userIds.length === 0) return values;
    const { rows } = await this.db.getPool().query<{ user_id: string; value: unknown }>(
      'SELECT user_id, value FROM user_option WHERE user_id = ANY($1::text[]) AND project_id = $2 AND key = $3',
      [userIds, projectId, key],
    );
    for (const row of rows) {
      if (isLegacyValue(row.value)) values.set(row.user_id, row.value);
    }
    return values;
  }

  async transaction<T>(fn: (tx: NotificationSettingsTransaction) => Promise<T>): Promise<T> {
    return this.db.transaction((client) => fn(new PgNotificationSettingsTransaction(client)));
  }
}
