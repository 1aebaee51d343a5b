import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { TtlStore } from '../../common/ttlStore';
import { ConfigService } from '../../core/services/config.service';
import type { ChannelPrefix } from '../channels/listTypes';

export type ChannelLookupJobOutcome =
  | { status: 'success'; prefix: ChannelPrefix; channelId: string }
  | { status: 'not_found'; prefix: ChannelPrefix }
  | { status: 'failed'; error: string; message?: string };

export type ChannelLookupJob = ({ status: 'pending' } | ChannelLookupJobOutcome) & {
  id: string;
  /** Name as typed by the user. */
  name: string;
};

@Injectable()
export class ChannelLookupJobStore {
  private readonly jobs: TtlStore<ChannelLookupJob>;

  constructor(@Inject(ConfigService) cfg: ConfigService) {
    this.jobs = new TtlStore<ChannelLookupJob>(cfg.channelLookupJobTtlMs);
  }

  create(name: string): ChannelLookupJob {
    const job: ChannelLookupJob = { id: randomUUID(), status: 'pending', name };
    this.jobs.set(job.id, job);
    return job;
  }

  get(id: string): ChannelLookupJob | null {
    return this.jobs.get(id) ?? null;
  }

  complete(id: string, outcome: ChannelLookupJobOutcome): ChannelLookupJob | null {
    const current = this.jobs.get(id);
    if (!current) return null;
    const next: ChannelLookupJob = { ...outcome, id, name: current.name };
    this.jobs.set(id, next);
    return next;
  }
}
