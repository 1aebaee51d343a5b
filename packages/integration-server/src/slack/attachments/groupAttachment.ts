import type { SlackIdentity } from '../integrations/types';
import { buildActionText, buildAttachmentText, buildAttachmentTitle, type ActorLookup } from './actionText';
import type {
  AlertRuleRef,
  AssigneeChoices,
  AttachmentAction,
  AttachmentButton,
  AttachmentField,
  AttachmentOptionGroup,
  AttachmentPayload,
  AttachmentTheme,
  EventLevel,
  EventSnapshot,
  GroupSnapshot,
  MessageAction,
} from './types';

export type GroupAttachmentOptions = {
  theme: AttachmentTheme;
  assignees: AssigneeChoices;
  hasReleases: boolean;
  event?: EventSnapshot | null;
  /** Tag keys to render as fields. */
  tags?: ReadonlySet<string> | null;
  identity?: SlackIdentity | null;
  actions?: MessageAction[] | null;
  actorLookup?: ActorLookup;
  rules?: AlertRuleRef[] | null;
  linkToEvent?: boolean;
};

// Keys the tag store keeps under its reserved namespace
const INTERNAL_TAG_PREFIX = 'internal:';
const USER_TAG_VALUE_RE = /^(id|email|username|ip):/;

export function standardizeTagKey(key: string): string {
  return key.startsWith(INTERNAL_TAG_PREFIX) ? key.slice(INTERNAL_TAG_PREFIX.length) : key;
}

export function tagValueLabel(key: string, value: string): string {
  return standardizeTagKey(key) === 'user' ? value.replace(USER_TAG_VALUE_RE, '') : value;
}

export function buildRuleUrl(baseUrl: string, rule: AlertRuleRef, group: GroupSnapshot): string {
  return `${baseUrl}/organizations/${group.organization.slug}/alerts/rules/${group.project.slug}/${rule.id}/`;
}

export function buildIssueUrl(baseUrl: string, group: GroupSnapshot, eventId?: string): string {
  const path = `${baseUrl}/organizations/${group.organization.slug}/issues/${group.id}/`;
  const withEvent = eventId ? `${path}events/${eventId}/` : path;
  return `${withEvent}?${new URLSearchParams({ referrer: 'slack' }).toString()}`;
}

const isEventLevel = (value: string | undefined, theme: AttachmentTheme): value is EventLevel =>
  value !== undefined && Object.prototype.hasOwnProperty.call(theme.levelToColor, value);

function levelColor(theme: AttachmentTheme, event: EventSnapshot | null | undefined): string {
  const fallback = theme.levelToColor.error;
  if (!event) return fallback;
  const level = event.tags.find(([key]) => key === 'level')?.[1];
  return isEventLevel(level, theme) ? theme.levelToColor[level] : fallback;
}

function buildStatusButtons(group: GroupSnapshot, hasReleases: boolean): [AttachmentButton, AttachmentButton] {
  let resolve: AttachmentButton = { type: 'button', name: 'resolve_dialog', value: 'resolve_dialog', text: 'Resolve...' };
  let ignore: AttachmentButton = { type: 'button', name: 'status', value: 'ignored', text: 'Ignore' };

  // Without releases there is nothing to pick in the resolve dialog
  if (!hasReleases) resolve = { ...resolve, name: 'status', text: 'Resolve', value: 'resolved' };
  if (group.status === 'resolved') resolve = { ...resolve, name: 'status', text: 'Unresolve', value: 'unresolved' };
  if (group.status === 'ignored') ignore = { ...ignore, text: 'Stop Ignoring', value: 'unresolved' };

  return [resolve, ignore];
}

function buildFields(tags: ReadonlySet<string>, event: EventSnapshot | null | undefined): AttachmentField[] {
  const fields: AttachmentField[] = [];
  for (const [key, value] of event?.tags ?? []) {
    const stdKey = standardizeTagKey(key);
    if (!tags.has(stdKey)) continue;
    fields.push({ title: stdKey, value: tagValueLabel(key, value), short: true });
  }
  return fields;
}

function buildFooter(options: GroupAttachmentOptions, group: GroupSnapshot): string {
  let footer = group.qualifiedShortId;
  const rules = options.rules ?? [];
  const [first] = rules;
  if (first) {
    footer += ` via <${buildRuleUrl(options.theme.baseUrl, first, group)}|${first.label}>`;
    if (rules.length > 1) footer += ` (+${rules.length - 1} other)`;
  }
  return footer;
}

/**
 * Issue notification attachment: resolve/ignore buttons, an assignee picker,
 * level color and selected tags. Once actions were taken on the message the
 * buttons are dropped and the action texts are appended instead.
 */
export function buildGroupAttachment(group: GroupSnapshot, options: GroupAttachmentOptions): AttachmentPayload {
  const { theme, event } = options;
  let text = buildAttachmentText(group, event) ?? '';

  const optionGroups: AttachmentOptionGroup[] = [];
  if (options.assignees.teams.length) optionGroups.push({ text: 'Teams', options: options.assignees.teams });
  if (options.assignees.members.length) optionGroups.push({ text: 'People', options: options.assignees.members });

  let payloadActions: AttachmentAction[] = [
    ...buildStatusButtons(group, options.hasReleases),
    {
      type: 'select',
      name: 'assign',
      text: 'Select Assignee...',
      selected_options: [options.assignees.assignee],
      option_groups: optionGroups,
    },
  ];

  // Without an explicit event, tags and level come from the latest one
  const eventForTags = event ?? group.latestEvent ?? null;
  let color = levelColor(theme, eventForTags);
  const fields = options.tags ? buildFields(options.tags, eventForTags) : [];

  const actions = options.actions ?? [];
  if (actions.length) {
    const identity = options.identity;
    const lookup: ActorLookup = options.actorLookup ?? (() => null);
    const actionTexts = identity
      ? actions.map((a) => buildActionText(identity, a, lookup)).filter((t): t is string => !!t)
      : [];
    text += `\n${actionTexts.join('\n')}`;
    color = theme.actionedIssueColor;
    payloadActions = [];
  }

  const tsMs = event ? Math.max(group.lastSeen.getTime(), event.datetime.getTime()) : group.lastSeen.getTime();
  const obj = event ?? group;
  const titleLink = buildIssueUrl(theme.baseUrl, group, event && options.linkToEvent ? event.eventId : undefined);

  return {
    fallback: `[${group.project.slug}] ${obj.title}`,
    title: buildAttachmentTitle(obj),
    title_link: titleLink,
    text,
    fields,
    mrkdwn_in: ['text'],
    callback_id: JSON.stringify({ issue: group.id }),
    footer_icon: theme.logoUrl,
    footer: buildFooter(options, group),
    ts: tsMs / 1000,
    color,
    actions: payloadActions,
  };
}
