import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '../../core/services/config.service';
import { LoggerService } from '../../core/services/logger.service';
import type { IncidentAlertAction, IncidentSnapshot } from '../attachments/incidentAttachment';
import { SlackAttachmentsService } from '../attachments/slackAttachments.service';
import { SlackApiClient } from '../client/slackApi.client';
import { SlackApiError } from '../errors';
import { SlackIntegrationsRepository } from '../integrations/slackIntegrations.repository';

export type IncidentAlertOutcome = 'sent' | 'integration_missing' | 'failed';

/**
 * Posts metric alert notifications. Delivery is best effort: Slack failures are
 * logged and reported through the outcome, never thrown at the alerting pipeline.
 */
@Injectable()
export class IncidentAlertNotifier {
  constructor(
    @Inject(ConfigService) private readonly cfg: ConfigService,
    @Inject(SlackIntegrationsRepository) private readonly integrations: SlackIntegrationsRepository,
    @Inject(SlackAttachmentsService) private readonly attachments: SlackAttachmentsService,
    @Inject(SlackApiClient) private readonly api: SlackApiClient,
    @Inject(LoggerService) private readonly logger: LoggerService,
  ) {}

  /** Fire-and-forget entry point for the alerting pipeline. */
  dispatch(action: IncidentAlertAction, incident: IncidentSnapshot, metricValue?: number | null): void {
    this.send(action, incident, metricValue).catch((err: unknown) => {
      this.logger.error('rule.fail.slack_dispatch', { error: err, incidentId: incident.id });
    });
  }

  async send(action: IncidentAlertAction, incident: IncidentSnapshot, metricValue?: number | null): Promise<IncidentAlertOutcome> {
    const integration = await this.integrations.findActiveIntegration(incident.organization.id, action.integrationId);
    // Integration removed while the rule is still active
    if (!integration) return 'integration_missing';

    const attachment = this.attachments.buildIncidentAttachment(action, incident, metricValue);
    try {
      await this.api.post(
        'chat.postMessage',
        { channel: action.targetIdentifier, attachments: JSON.stringify([attachment]) },
        { token: integration.metadata.access_token, timeoutMs: this.cfg.slackPostTimeoutMs },
      );
      return 'sent';
    } catch (err) {
      if (!(err instanceof SlackApiError)) throw err;
      this.logger.info('rule.fail.slack_post', { error: err.message, code: err.code, incidentId: incident.id });
      return 'failed';
    }
  }
}
