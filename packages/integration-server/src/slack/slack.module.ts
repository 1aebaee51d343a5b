import { Module } from '@nestjs/common';
import { CoreModule } from '../core/core.module';
import { IncidentAlertNotifier } from './alerts/incidentAlertNotifier.service';
import { AssigneesRepository } from './attachments/assignees.repository';
import { SlackAttachmentsService } from './attachments/slackAttachments.service';
import { ChannelResolutionService } from './channels/channelResolution.service';
import { SlackApiClient } from './client/slackApi.client';
import { SlackListClient } from './client/slackList.client';
import { SlackIntegrationsController } from './integrations/slackIntegrations.controller';
import { SlackIntegrationsRepository } from './integrations/slackIntegrations.repository';
import { ChannelLookupController } from './lookup/channelLookup.controller';
import { ChannelLookupService } from './lookup/channelLookup.service';
import { ChannelLookupJobStore } from './lookup/channelLookupJob.store';

@Module({
  imports: [CoreModule],
  controllers: [ChannelLookupController, SlackIntegrationsController],
  providers: [
    SlackApiClient,
    SlackListClient,
    SlackIntegrationsRepository,
    AssigneesRepository,
    ChannelResolutionService,
    ChannelLookupJobStore,
    ChannelLookupService,
    SlackAttachmentsService,
    IncidentAlertNotifier,
  ],
  exports: [ChannelResolutionService, ChannelLookupService, SlackAttachmentsService, IncidentAlertNotifier],
})
export class SlackModule {}
