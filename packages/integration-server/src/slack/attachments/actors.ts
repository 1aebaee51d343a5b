import type { ActorOption } from './types';

export type ActorType = 'user' | 'team';

/** A user or team that an issue can be assigned to. */
export type ActorRef = { type: 'user'; id: string; displayName: string } | { type: 'team'; id: string; slug: string };

export type ActorIdentifier = { type: ActorType; id: string };

const ACTOR_IDENTIFIER_RE = /^(user|team):(.+)$/;

export function parseActorIdentifier(value: string): ActorIdentifier | null {
  const match = ACTOR_IDENTIFIER_RE.exec(value);
  if (!match) return null;
  const [, type, id] = match;
  if ((type !== 'user' && type !== 'team') || !id) return null;
  return { type, id };
}

export const actorIdentifier = (actor: Pick<ActorRef, 'type' | 'id'>): string => `${actor.type}:${actor.id}`;

export function formatActorOption(actor: ActorRef): ActorOption {
  const text = actor.type === 'team' ? `#${actor.slug}` : actor.displayName;
  return { text, value: actorIdentifier(actor) };
}
