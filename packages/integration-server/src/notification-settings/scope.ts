import { InvalidTargetError } from './errors';
import { NotificationScopeType, type SettingCoordinates, type SettingScope, type SettingTarget } from './types';

export function resolveScope(coordinates: SettingCoordinates): SettingScope {
  const { project, organization, user } = coordinates;
  if (project) return { scopeType: NotificationScopeType.PROJECT, scopeIdentifier: project.id };
  if (organization) return { scopeType: NotificationScopeType.ORGANIZATION, scopeIdentifier: organization.id };
  if (user) return { scopeType: NotificationScopeType.USER, scopeIdentifier: user.id };
  throw new InvalidTargetError('scope must be either user, organization, or project');
}

export function resolveTarget(coordinates: SettingCoordinates): SettingTarget {
  const { user, team } = coordinates;
  if (user && team) throw new InvalidTargetError('target must be either a user or a team, not both');
  if (user) return { type: 'user', id: user.id };
  if (team) return { type: 'team', id: team.id };
  throw new InvalidTargetError('target must be either a user or a team');
}
