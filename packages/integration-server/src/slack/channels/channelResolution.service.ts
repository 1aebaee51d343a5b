import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '../../core/services/config.service';
import { LoggerService } from '../../core/services/logger.service';
import { SlackListClient, type SlackCredentials } from '../client/slackList.client';
import { DuplicateDisplayNameError } from '../errors';
import { credentialsFor, type OrganizationRef, type SlackIntegration } from '../integrations/types';
import { ChannelNameResolver, type ResolutionResult } from './channelNameResolver';
import { stripChannelName, type ChannelPrefix } from './listTypes';

export type ChannelIdLookup = {
  prefix: ChannelPrefix;
  channelId: string | null;
  /** The self-imposed budget ran out; retry with `useAsyncLookup`. */
  timedOut: boolean;
};

export type ChannelQuery = {
  name: string;
  credentials: SlackCredentials;
};

@Injectable()
export class ChannelResolutionService {
  private readonly resolver: ChannelNameResolver;

  constructor(
    @Inject(ConfigService) private readonly cfg: ConfigService,
    @Inject(SlackListClient) lists: SlackListClient,
    @Inject(LoggerService) private readonly logger: LoggerService,
  ) {
    this.resolver = new ChannelNameResolver(lists, logger);
  }

  /**
   * Interactive callers get the short budget; background jobs, which can afford
   * to wait, get the long one.
   */
  async resolveChannel(query: ChannelQuery, isAsyncContext: boolean): Promise<ResolutionResult> {
    const budgetMs = isAsyncContext ? this.cfg.slackAsyncLookupTimeoutMs : this.cfg.slackLookupTimeoutMs;
    return this.resolver.resolve({
      name: stripChannelName(query.name),
      deadline: Date.now() + budgetMs,
      credentials: query.credentials,
    });
  }

  async resolveChannelId(
    organization: Pick<OrganizationRef, 'id'>,
    integration: SlackIntegration,
    rawName: string,
    useAsyncLookup = false,
  ): Promise<ChannelIdLookup> {
    let result: ResolutionResult;
    try {
      result = await this.resolveChannel({ name: rawName, credentials: credentialsFor(integration) }, useAsyncLookup);
    } catch (err) {
      // The resolver only sees credentials; the hint needs the workspace domain
      if (err instanceof DuplicateDisplayNameError && !err.workspaceDomain) {
        throw new DuplicateDisplayNameError(err.displayName, integration.metadata.domain_name);
      }
      throw err;
    }
    this.logger.debug('slack.channel_lookup.completed', {
      organizationId: organization.id,
      integrationId: integration.id,
      outcome: result.kind,
      async: useAsyncLookup,
    });
    switch (result.kind) {
      case 'found':
        return { prefix: result.prefix, channelId: result.externalId, timedOut: false };
      case 'timed_out':
        return { prefix: result.prefix, channelId: null, timedOut: true };
      case 'not_found':
        return { prefix: result.prefix, channelId: null, timedOut: false };
    }
  }
}
