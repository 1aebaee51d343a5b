export enum ExternalProvider {
  EMAIL = 100,
  SLACK = 110,
}

export enum NotificationSettingType {
  // Top-level fallback for every type
  DEFAULT = 0,
  DEPLOY = 10,
  ISSUE_ALERTS = 20,
  WORKFLOW = 30,
}

export enum NotificationSettingValue {
  // No stored row; inherit from the parent scope
  DEFAULT = 0,
  NEVER = 10,
  ALWAYS = 20,
  SUBSCRIBE_ONLY = 30,
  COMMITTED_ONLY = 40,
}

export enum NotificationScopeType {
  USER = 0,
  ORGANIZATION = 10,
  PROJECT = 20,
}

export type EntityRef = { id: string };

/**
 * Whose preference and where it applies. Exactly one of `user`/`team` is the
 * target; the scope is taken from `project`, then `organization`, then `user`.
 */
export type SettingCoordinates = {
  user?: EntityRef | null;
  team?: EntityRef | null;
  project?: EntityRef | null;
  organization?: EntityRef | null;
};

export type SettingTarget = { type: 'user' | 'team'; id: string };

export type SettingScope = { scopeType: NotificationScopeType; scopeIdentifier: string };

export type SettingKey = SettingScope & {
  provider: ExternalProvider;
  type: NotificationSettingType;
  target: SettingTarget;
};

/** Value stored in the legacy per-user option table. */
export type LegacyOptionValue = string | number;

export type UserOptionKey = {
  userId: string;
  key: string;
  projectId: string | null;
  organizationId: string | null;
};
