import { NotFoundException } from '@nestjs/common';
import { beforeEach, describe, expect, it, vi } from 'vitest';

const pg = vi.hoisted(() => ({
  queries: [] as Array<{ sql: string; params?: unknown[] }>,
  results: [] as unknown[][],
}));

vi.mock('pg', () => {
  class Pool {
    on() {
      return this;
    }
    async query(sql: string, params?: unknown[]) {
      pg.queries.push({ sql, params });
      return { rows: pg.results.shift() ?? [] };
    }
    async end() {}
  }
  return { Pool };
});

import { DatabaseService } from '../src/core/services/database.service';
import { SlackIntegrationsRepository } from '../src/slack/integrations/slackIntegrations.repository';
import { createTestConfig } from './helpers/config';
import { createSilentLogger } from './helpers/logger';

const integrationRow = {
  id: 'int-1',
  external_id: 'T0001',
  name: 'Acme Workspace',
  status: 'visible',
  metadata: { access_token: 'test-token', installation_type: 'born_as_bot' },
};

const setup = () => {
  const logger = createSilentLogger();
  return { logger, repository: new SlackIntegrationsRepository(new DatabaseService(createTestConfig()), logger) };
};

describe('SlackIntegrationsRepository', () => {
  beforeEach(() => {
    pg.queries.length = 0;
    pg.results.length = 0;
  });

  it('maps an active integration row', async () => {
    const { repository } = setup();
    pg.results.push([integrationRow]);

    await expect(repository.findActiveIntegration('org-1', 'int-1')).resolves.toEqual({
      id: 'int-1',
      provider: 'slack',
      externalId: 'T0001',
      name: 'Acme Workspace',
      status: 'visible',
      metadata: { access_token: 'test-token', installation_type: 'born_as_bot' },
    });
    expect(pg.queries[0]?.params).toEqual(['int-1', 'org-1']);
  });

  it('drops rows whose metadata has no token', async () => {
    const { repository, logger } = setup();
    pg.results.push([{ ...integrationRow, metadata: {} }]);

    await expect(repository.findActiveIntegration('org-1', 'int-1')).resolves.toBeNull();
    expect(logger.warn).toHaveBeenCalledWith('slack.integration.invalid_row', { integrationId: 'int-1', status: 'visible' });
  });

  it('resolves the identity context', async () => {
    const { repository } = setup();
    pg.results.push([{ id: 'org-1', slug: 'acme' }], [integrationRow], [{ id: 'idp-1', external_id: 'T0001' }]);

    const context = await repository.getIdentityContext('u1', 'org-1', 'int-1');

    expect(context.organization).toEqual({ id: 'org-1', slug: 'acme' });
    expect(context.integration.id).toBe('int-1');
    expect(context.identityProvider).toEqual({ id: 'idp-1', type: 'slack', externalId: 'T0001' });
    expect(pg.queries.map((q) => q.params)).toEqual([['org-1', 'u1'], ['int-1', 'org-1'], ['T0001']]);
  });

  it('404s on the first missing link', async () => {
    const { repository } = setup();
    pg.results.push([{ id: 'org-1', slug: 'acme' }], []);

    const pending = repository.getIdentityContext('u1', 'org-1', 'int-404');

    await expect(pending).rejects.toBeInstanceOf(NotFoundException);
    await expect(pending).rejects.toMatchObject({ response: { error: 'integration_not_found' } });
  });

  it('finds the Slack identity linked to a user', async () => {
    const { repository } = setup();
    pg.results.push([{ user_id: 'u1', external_id: 'U999' }], []);

    await expect(repository.findSlackIdentity('u1', 'T0001')).resolves.toEqual({ userId: 'u1', externalId: 'U999' });
    await expect(repository.findSlackIdentity('u2', 'T0001')).resolves.toBeNull();
    expect(pg.queries[0]?.params).toEqual(['u1', 'T0001']);
  });

  it('checks for releases', async () => {
    const { repository } = setup();
    pg.results.push([{ exists: true }], [{ exists: false }]);

    await expect(repository.projectHasReleases('7')).resolves.toBe(true);
    await expect(repository.projectHasReleases('8')).resolves.toBe(false);
  });
});
