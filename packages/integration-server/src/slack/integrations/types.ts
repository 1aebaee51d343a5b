import { z } from 'zod';
import type { SlackCredentials } from '../client/slackList.client';

export const SlackIntegrationMetadataSchema = z
  .object({
    access_token: z.string().min(1),
    installation_type: z.string().min(1).optional(),
    // Only classic bots carry a user token
    user_access_token: z.string().min(1).optional(),
    domain_name: z.string().optional(),
  })
  .passthrough();

export type SlackIntegrationMetadata = z.infer<typeof SlackIntegrationMetadataSchema>;

export const INTEGRATION_STATUSES = ['visible', 'disabled', 'pending_deletion'] as const;
export type IntegrationStatus = (typeof INTEGRATION_STATUSES)[number];

export type SlackIntegration = {
  id: string;
  provider: 'slack';
  /** Slack team id. */
  externalId: string;
  name: string;
  status: IntegrationStatus;
  metadata: SlackIntegrationMetadata;
};

export type OrganizationRef = {
  id: string;
  slug: string;
};

export type IdentityProviderRef = {
  id: string;
  type: 'slack';
  externalId: string;
};

export type SlackIdentity = {
  userId: string;
  /** Slack user id, rendered as `<@U…>`. */
  externalId: string;
};

export type SlackInstallationType = 'classic_bot' | 'workspace_app' | (string & {});

export function getIntegrationType(metadata: SlackIntegrationMetadata): SlackInstallationType {
  const defaultInstallation = metadata.user_access_token !== undefined ? 'classic_bot' : 'workspace_app';
  return metadata.installation_type ?? defaultInstallation;
}

export function credentialsFor(integration: Pick<SlackIntegration, 'metadata'>): SlackCredentials {
  return { accessToken: integration.metadata.access_token };
}
