import { LoggerService } from '../../core/services/logger.service';
import type { SlackCredentials, SlackListPage, SlackListSource } from '../client/slackList.client';
import { DuplicateDisplayNameError, SlackApiError } from '../errors';
import { LIST_TYPES, MEMBER_PREFIX, type ChannelPrefix, type ListTypeSpec } from './listTypes';

export type ResolutionQuery = Readonly<{
  /** Channel or user name with leading `#`/`@` already stripped. */
  name: string;
  /** Absolute epoch milliseconds. */
  deadline: number;
  credentials: SlackCredentials;
}>;

export type ResolutionResult =
  | { kind: 'found'; prefix: ChannelPrefix; externalId: string }
  | { kind: 'not_found'; prefix: ChannelPrefix }
  | { kind: 'timed_out'; prefix: ChannelPrefix };

export type ChannelNameResolverOptions = {
  listTypes?: readonly ListTypeSpec[];
  now?: () => number;
};

/**
 * Walks Slack's list endpoints page by page looking for `query.name`.
 *
 * A case-insensitive match on the unique `name` field wins immediately. Among
 * users, an exact `profile.display_name` match is only a candidate: it is
 * returned once the users list is exhausted, unless a second user carries the
 * same display name, in which case `DuplicateDisplayNameError` is thrown.
 *
 * The deadline is checked after every page, so one slow page can overrun it.
 */
export class ChannelNameResolver {
  private readonly listTypes: readonly ListTypeSpec[];
  private readonly now: () => number;

  constructor(
    private readonly source: SlackListSource,
    private readonly logger: LoggerService,
    options: ChannelNameResolverOptions = {},
  ) {
    this.listTypes = options.listTypes ?? LIST_TYPES;
    this.now = options.now ?? (() => Date.now());
  }

  async resolve(query: ResolutionQuery): Promise<ResolutionResult> {
    const wanted = query.name.toLowerCase();
    let prefix: ChannelPrefix = MEMBER_PREFIX;

    for (const spec of this.listTypes) {
      prefix = spec.prefix;
      let candidate: string | null = null;
      let foundDuplicate = false;
      let cursor = '';

      for (;;) {
        let page: SlackListPage;
        try {
          page = await this.source.fetchPage(spec, cursor, query.credentials);
        } catch (err) {
          if (!(err instanceof SlackApiError)) throw err;
          this.logger.warn(`rule.slack.${spec.listType}_list_failed`, { listType: spec.listType, error: err.message, code: err.code });
          return { kind: 'not_found', prefix };
        }

        for (const item of page.items) {
          if (item.name.toLowerCase() === wanted) {
            return { kind: 'found', prefix, externalId: item.id };
          }
          if (spec.listType === 'users' && item.profile?.display_name === query.name) {
            if (candidate !== null) foundDuplicate = true;
            else candidate = item.id;
          }
        }

        if (this.now() > query.deadline) {
          return { kind: 'timed_out', prefix };
        }
        if (!page.nextCursor) break;
        cursor = page.nextCursor;
      }

      if (foundDuplicate) throw new DuplicateDisplayNameError(query.name);
      if (candidate !== null) return { kind: 'found', prefix, externalId: candidate };
    }

    return { kind: 'not_found', prefix };
  }
}
