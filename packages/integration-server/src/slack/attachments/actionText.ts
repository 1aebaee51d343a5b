import type { SlackIdentity } from '../integrations/types';
import type { MessageAction, ResolvedActor, TitledEvent } from './types';

const STATUS_TEXT: ReadonlyMap<string, string> = new Map([
  ['resolved', 'resolved'],
  ['ignored', 'ignored'],
  ['unresolved', 're-opened'],
]);

export type ActorLookup = (actorIdentifier: string) => ResolvedActor | null;

export function buildAttachmentTitle(obj: TitledEvent): string {
  const { metadata, eventType } = obj;
  if (eventType === 'error' && metadata.type !== undefined) return metadata.type;
  if (eventType === 'csp') return `${metadata.directive ?? ''} - ${metadata.uri ?? ''}`;
  return obj.title;
}

export function buildAttachmentText(group: TitledEvent, event?: TitledEvent | null): string | null {
  const obj = event ?? group;
  if (obj.eventType !== 'error') return null;
  return obj.metadata.value || obj.metadata.function || null;
}

export function buildAssignedText(identity: SlackIdentity, assignee: string, lookup: ActorLookup): string | null {
  const actor = lookup(assignee);
  if (!actor) return null;

  const assigneeText =
    actor.type === 'team' ? `#${actor.slug}` : actor.slackUserId ? `<@${actor.slackUserId}>` : actor.displayName;

  return `*Issue assigned to ${assigneeText} by <@${identity.externalId}>*`;
}

/** Status line appended to a message once someone acted on it; null when the action has none. */
export function buildActionText(identity: SlackIdentity, action: MessageAction, lookup: ActorLookup): string | null {
  if ('selected_options' in action) {
    const [selected] = action.selected_options;
    return selected ? buildAssignedText(identity, selected.value, lookup) : null;
  }

  // Resolve actions carry extra parameters after ':'
  const [status = ''] = action.value.split(':', 1);
  const statusText = STATUS_TEXT.get(status);
  if (!statusText) return null;

  return `*Issue ${statusText} by <@${identity.externalId}>*`;
}
