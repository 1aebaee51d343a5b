import { Controller, Get, Inject, Param, Query } from '@nestjs/common';
import { IdentityContextQueryDto } from './dto/identity-context-query.dto';
import { SlackIntegrationsRepository } from './slackIntegrations.repository';
import { getIntegrationType } from './types';

@Controller('api/integrations/slack')
export class SlackIntegrationsController {
  constructor(@Inject(SlackIntegrationsRepository) private readonly integrations: SlackIntegrationsRepository) {}

  // Tokens stay server-side: only descriptive fields are returned.
  @Get(':integrationId/identity-context')
  async identityContext(@Param('integrationId') integrationId: string, @Query() query: IdentityContextQueryDto) {
    const { organization, integration, identityProvider } = await this.integrations.getIdentityContext(
      query.userId,
      query.organizationId,
      integrationId,
    );
    return {
      organization,
      integration: {
        id: integration.id,
        name: integration.name,
        externalId: integration.externalId,
        installationType: getIntegrationType(integration.metadata),
      },
      identityProvider,
    };
  }
}
