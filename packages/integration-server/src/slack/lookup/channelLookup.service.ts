import { Inject, Injectable, NotFoundException, OnModuleDestroy } from '@nestjs/common';
import { LoggerService } from '../../core/services/logger.service';
import { ChannelResolutionService } from '../channels/channelResolution.service';
import type { ChannelPrefix } from '../channels/listTypes';
import { DuplicateDisplayNameError } from '../errors';
import { SlackIntegrationsRepository } from '../integrations/slackIntegrations.repository';
import type { SlackIntegration } from '../integrations/types';
import { ChannelLookupJobStore, type ChannelLookupJob, type ChannelLookupJobOutcome } from './channelLookupJob.store';

export type ChannelLookupResponse =
  | { status: 'resolved'; prefix: ChannelPrefix; channelId: string }
  | { status: 'not_found'; prefix: ChannelPrefix }
  | { status: 'pending'; jobId: string };

/**
 * Entry point for alert-rule configuration. Tries the interactive budget first;
 * when Slack is too slow to page through, the same lookup is retried in the
 * background with the long budget and the caller polls the job.
 */
@Injectable()
export class ChannelLookupService implements OnModuleDestroy {
  private readonly inflight = new Set<Promise<void>>();

  constructor(
    @Inject(SlackIntegrationsRepository) private readonly integrations: SlackIntegrationsRepository,
    @Inject(ChannelResolutionService) private readonly resolution: ChannelResolutionService,
    @Inject(ChannelLookupJobStore) private readonly jobs: ChannelLookupJobStore,
    @Inject(LoggerService) private readonly logger: LoggerService,
  ) {}

  async lookupForAlertRule(organizationId: string, integrationId: string, name: string): Promise<ChannelLookupResponse> {
    const integration = await this.integrations.findActiveIntegration(organizationId, integrationId);
    if (!integration) throw new NotFoundException({ error: 'integration_not_found' });

    const lookup = await this.resolution.resolveChannelId({ id: organizationId }, integration, name, false);
    if (!lookup.timedOut) {
      return lookup.channelId
        ? { status: 'resolved', prefix: lookup.prefix, channelId: lookup.channelId }
        : { status: 'not_found', prefix: lookup.prefix };
    }

    const job = this.jobs.create(name);
    this.logger.info('slack.channel_lookup.deferred', { organizationId, integrationId, jobId: job.id });
    this.track(this.runAsyncLookup(job.id, organizationId, integration, name));
    return { status: 'pending', jobId: job.id };
  }

  getJob(jobId: string): ChannelLookupJob {
    const job = this.jobs.get(jobId);
    if (!job) throw new NotFoundException({ error: 'lookup_job_not_found' });
    return job;
  }

  /** Resolves once every background lookup started so far has settled. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.drain();
  }

  private track(task: Promise<void>): void {
    this.inflight.add(task);
    void task.finally(() => this.inflight.delete(task));
  }

  private async runAsyncLookup(jobId: string, organizationId: string, integration: SlackIntegration, name: string): Promise<void> {
    let outcome: ChannelLookupJobOutcome;
    try {
      const lookup = await this.resolution.resolveChannelId({ id: organizationId }, integration, name, true);
      if (lookup.channelId) outcome = { status: 'success', prefix: lookup.prefix, channelId: lookup.channelId };
      else if (lookup.timedOut) outcome = { status: 'failed', error: 'timed_out' };
      else outcome = { status: 'not_found', prefix: lookup.prefix };
    } catch (err) {
      if (err instanceof DuplicateDisplayNameError) {
        outcome = { status: 'failed', error: err.code, message: err.message };
      } else {
        this.logger.error('slack.channel_lookup.async_failed', { jobId, integrationId: integration.id, error: err });
        outcome = { status: 'failed', error: 'internal_error' };
      }
    }
    this.jobs.complete(jobId, outcome);
  }
}
