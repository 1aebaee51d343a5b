import { Inject, Injectable } from '@nestjs/common';
import { TtlStore } from '../../common/ttlStore';
import { ConfigService } from '../../core/services/config.service';
import { SlackIntegrationsRepository } from '../integrations/slackIntegrations.repository';
import type { ActorLookup } from './actionText';
import { formatActorOption } from './actors';
import { AssigneesRepository } from './assignees.repository';
import { buildGroupAttachment, type GroupAttachmentOptions } from './groupAttachment';
import {
  buildIncidentAttachment,
  type IncidentAlertAction,
  type IncidentSnapshot,
} from './incidentAttachment';
import {
  createAttachmentTheme,
  type AssigneeChoices,
  type AttachmentPayload,
  type AttachmentTheme,
  type GroupSnapshot,
  type MessageAction,
  type ResolvedActor,
} from './types';

const HAS_RELEASES_TTL_MS = 60 * 60_000;
const NO_RELEASES_TTL_MS = 60_000;

export type SlackGroupAttachmentOptions = Omit<
  GroupAttachmentOptions,
  'theme' | 'hasReleases' | 'assignees' | 'actorLookup'
> & {
  /** Slack team id of the workspace the message is posted to. */
  teamExternalId: string;
};

export const hasReleasesCacheKey = (projectId: string): string => `has_releases:2:${projectId}`;

@Injectable()
export class SlackAttachmentsService {
  readonly theme: AttachmentTheme;
  private readonly releasesCache = new TtlStore<boolean>(NO_RELEASES_TTL_MS);

  constructor(
    @Inject(ConfigService) cfg: ConfigService,
    @Inject(SlackIntegrationsRepository) private readonly integrations: SlackIntegrationsRepository,
    @Inject(AssigneesRepository) private readonly assignees: AssigneesRepository,
  ) {
    this.theme = createAttachmentTheme(cfg.appBaseUrl);
  }

  /** Cached: a project gaining releases is picked up within a minute, losing them within an hour. */
  async projectHasReleases(projectId: string): Promise<boolean> {
    const key = hasReleasesCacheKey(projectId);
    const cached = this.releasesCache.get(key);
    if (cached !== undefined) return cached;

    const hasReleases = await this.integrations.projectHasReleases(projectId);
    this.releasesCache.set(key, hasReleases, hasReleases ? HAS_RELEASES_TTL_MS : NO_RELEASES_TTL_MS);
    return hasReleases;
  }

  /** Teams and members of the issue's project plus its current assignee, as picker options. */
  async getAssigneeChoices(group: GroupSnapshot): Promise<AssigneeChoices> {
    const [teams, members, assignee] = await Promise.all([
      this.assignees.findProjectTeams(group.project.id),
      this.assignees.findProjectMembers(group.project.id),
      this.assignees.findGroupAssignee(group.id),
    ]);
    return {
      teams: teams.map(formatActorOption),
      members: members.map(formatActorOption),
      assignee: assignee ? formatActorOption(assignee) : null,
    };
  }

  /**
   * Resolves the assignees picked in `actions` up front. Users are mentioned by
   * their linked Slack account in `teamExternalId` when they have one.
   */
  async buildActorLookup(teamExternalId: string, actions: readonly MessageAction[]): Promise<ActorLookup> {
    const picked = actions.flatMap((action) =>
      'selected_options' in action ? action.selected_options.map((option) => option.value) : [],
    );
    const resolved = new Map<string, ResolvedActor>();
    if (picked.length) {
      const actors = await this.assignees.findActors(picked);
      for (const [identifier, actor] of actors) {
        if (actor.type === 'team') {
          resolved.set(identifier, { type: 'team', slug: actor.slug });
          continue;
        }
        const identity = await this.integrations.findSlackIdentity(actor.id, teamExternalId);
        resolved.set(identifier, { type: 'user', displayName: actor.displayName, slackUserId: identity?.externalId ?? null });
      }
    }
    return (identifier) => resolved.get(identifier) ?? null;
  }

  async buildGroupAttachment(group: GroupSnapshot, options: SlackGroupAttachmentOptions): Promise<AttachmentPayload> {
    const { teamExternalId, ...rest } = options;
    const [hasReleases, assignees, actorLookup] = await Promise.all([
      this.projectHasReleases(group.project.id),
      this.getAssigneeChoices(group),
      this.buildActorLookup(teamExternalId, options.actions ?? []),
    ]);
    return buildGroupAttachment(group, { ...rest, theme: this.theme, hasReleases, assignees, actorLookup });
  }

  buildIncidentAttachment(
    action: IncidentAlertAction,
    incident: IncidentSnapshot,
    metricValue?: number | null,
  ): AttachmentPayload {
    return buildIncidentAttachment(this.theme, action, incident, metricValue);
  }
}
