export type EventLevel = 'debug' | 'info' | 'warning' | 'error' | 'fatal';

export type AttachmentTheme = {
  levelToColor: Readonly<Record<EventLevel, string>>;
  /** Issues that already had an action taken from Slack. */
  actionedIssueColor: string;
  resolvedColor: string;
  logoUrl: string;
  /** Public web app URL, no trailing slash. */
  baseUrl: string;
};

export const LEVEL_TO_COLOR: Readonly<Record<EventLevel, string>> = {
  debug: '#fbe14f',
  info: '#2788ce',
  warning: '#FFC227',
  error: '#E03E2F',
  fatal: '#FA4747',
};

export function createAttachmentTheme(baseUrl: string): AttachmentTheme {
  return {
    levelToColor: LEVEL_TO_COLOR,
    actionedIssueColor: '#EDEEEF',
    resolvedColor: '#4dc771',
    logoUrl: `${baseUrl}/_static/images/email-avatar.png`,
    baseUrl,
  };
}

// --- payload -------------------------------------------------------------

export type AttachmentField = {
  title: string;
  value: string;
  short: boolean;
};

export type ActorOption = {
  text: string;
  /** `user:<id>` or `team:<id>` */
  value: string;
};

export type AttachmentOptionGroup = {
  text: string;
  options: ActorOption[];
};

export type AttachmentButton = {
  type: 'button';
  name: string;
  value: string;
  text: string;
};

export type AttachmentSelect = {
  type: 'select';
  name: 'assign';
  text: string;
  selected_options: Array<ActorOption | null>;
  option_groups: AttachmentOptionGroup[];
};

export type AttachmentAction = AttachmentButton | AttachmentSelect;

export type AttachmentPayload = {
  fallback: string;
  title: string;
  title_link: string;
  text: string;
  fields: AttachmentField[];
  mrkdwn_in: ['text'];
  callback_id?: string;
  footer_icon: string;
  footer: string;
  ts?: number;
  color: string;
  actions: AttachmentAction[];
};

// --- inputs --------------------------------------------------------------

export type EventMetadata = Readonly<Record<string, string | undefined>>;

export interface TitledEvent {
  title: string;
  /** `error`, `csp`, `default`, ... */
  eventType: string;
  metadata: EventMetadata;
}

export type EventSnapshot = TitledEvent & {
  eventId: string;
  datetime: Date;
  tags: ReadonlyArray<readonly [string, string]>;
};

export type GroupStatus = 'unresolved' | 'resolved' | 'ignored';

export type GroupSnapshot = TitledEvent & {
  id: string;
  /** Project-qualified short id, e.g. `BACKEND-3F`. */
  qualifiedShortId: string;
  status: GroupStatus;
  lastSeen: Date;
  project: { id: string; slug: string };
  organization: { slug: string };
  latestEvent?: EventSnapshot | null;
};

export type AlertRuleRef = {
  id: string;
  label: string;
};

export type AssigneeChoices = {
  teams: ActorOption[];
  members: ActorOption[];
  assignee: ActorOption | null;
};

/** An interactive action taken on a previous message. */
export type MessageAction =
  | { name: 'assign'; selected_options: Array<{ value: string }> }
  | { name: string; value: string };

/** What an actor identifier (`user:1`, `team:2`) resolves to. */
export type ResolvedActor =
  | { type: 'team'; slug: string }
  | { type: 'user'; displayName: string; slackUserId?: string | null };
