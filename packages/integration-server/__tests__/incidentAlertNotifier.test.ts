import { describe, expect, it, vi } from 'vitest';
import { IncidentAlertNotifier } from '../src/slack/alerts/incidentAlertNotifier.service';
import type { IncidentAlertAction, IncidentSnapshot } from '../src/slack/attachments/incidentAttachment';
import { SlackAttachmentsService } from '../src/slack/attachments/slackAttachments.service';
import { SlackApiClient } from '../src/slack/client/slackApi.client';
import { SlackApiError } from '../src/slack/errors';
import { createTestConfig } from './helpers/config';
import { createSilentLogger } from './helpers/logger';
import { createAssigneesRepository, createIntegrationsRepository } from './helpers/services';
import { slackIntegration } from './helpers/slack';

const action: IncidentAlertAction = { integrationId: 'int-1', targetIdentifier: 'C123', triggerLabel: 'warning' };

const incident: IncidentSnapshot = {
  id: 'inc-1',
  identifier: 3,
  organization: { id: 'org-1', slug: 'acme' },
  status: 'open',
  dateStarted: new Date(Date.UTC(2024, 0, 15)),
  alertRule: { id: '77', name: 'Error count', aggregate: 'count()', timeWindowMinutes: 5 },
  currentMetricValue: 120,
};

const setup = () => {
  const config = createTestConfig({ slackPostTimeoutMs: 4_000 });
  const logger = createSilentLogger();
  const repository = createIntegrationsRepository(logger);
  const findIntegration = vi.spyOn(repository, 'findActiveIntegration').mockResolvedValue(slackIntegration());
  const attachments = new SlackAttachmentsService(config, repository, createAssigneesRepository());
  const api = new SlackApiClient();
  const post = vi.spyOn(api, 'post').mockResolvedValue({ ok: true });
  const notifier = new IncidentAlertNotifier(config, repository, attachments, api, logger);
  return { notifier, attachments, findIntegration, post, logger };
};

describe('IncidentAlertNotifier', () => {
  it('posts the incident attachment to the rule channel', async () => {
    const { notifier, attachments, findIntegration, post } = setup();

    await expect(notifier.send(action, incident)).resolves.toBe('sent');

    expect(findIntegration).toHaveBeenCalledWith('org-1', 'int-1');
    expect(post).toHaveBeenCalledWith(
      'chat.postMessage',
      { channel: 'C123', attachments: JSON.stringify([attachments.buildIncidentAttachment(action, incident)]) },
      { token: 'test-token', timeoutMs: 4_000 },
    );
  });

  it('skips sending when the integration is gone', async () => {
    const { notifier, findIntegration, post } = setup();
    findIntegration.mockResolvedValue(null);

    await expect(notifier.send(action, incident)).resolves.toBe('integration_missing');
    expect(post).not.toHaveBeenCalled();
  });

  it('logs and reports Slack failures instead of throwing', async () => {
    const { notifier, post, logger } = setup();
    post.mockRejectedValue(
      new SlackApiError('Slack API error: channel_not_found', { code: 'channel_not_found', method: 'chat.postMessage' }),
    );

    await expect(notifier.send(action, incident)).resolves.toBe('failed');
    expect(logger.info).toHaveBeenCalledWith('rule.fail.slack_post', {
      error: 'Slack API error: channel_not_found',
      code: 'channel_not_found',
      incidentId: 'inc-1',
    });
  });

  it('dispatch never rejects and logs unexpected failures', async () => {
    const { notifier, findIntegration, logger } = setup();
    const failure = new Error('connection refused');
    findIntegration.mockRejectedValue(failure);

    expect(() => notifier.dispatch(action, incident)).not.toThrow();

    await vi.waitFor(() => {
      expect(logger.error).toHaveBeenCalledWith('rule.fail.slack_dispatch', { error: failure, incidentId: 'inc-1' });
    });
  });
});
