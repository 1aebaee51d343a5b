import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { DatabaseService } from '../../core/services/database.service';
import { LoggerService } from '../../core/services/logger.service';
import {
  INTEGRATION_STATUSES,
  SlackIntegrationMetadataSchema,
  type IdentityProviderRef,
  type IntegrationStatus,
  type OrganizationRef,
  type SlackIdentity,
  type SlackIntegration,
} from './types';

type IntegrationRow = {
  id: string;
  external_id: string;
  name: string;
  status: string;
  metadata: unknown;
};

export type IdentityContext = {
  organization: OrganizationRef;
  integration: SlackIntegration;
  identityProvider: IdentityProviderRef;
};

const isIntegrationStatus = (value: string): value is IntegrationStatus =>
  (INTEGRATION_STATUSES as readonly string[]).includes(value);

@Injectable()
export class SlackIntegrationsRepository {
  constructor(
    @Inject(DatabaseService) private readonly db: DatabaseService,
    @Inject(LoggerService) private readonly logger: LoggerService,
  ) {}

  /** A Slack integration installed on the organization and still visible. */
  async findActiveIntegration(organizationId: string, integrationId: string): Promise<SlackIntegration | null> {
    const { rows } = await this.db.getPool().query<IntegrationRow>(
      `SELECT i.id, i.external_id, i.name, i.status, i.metadata
         FROM integration i
         JOIN organization_integration oi ON oi.integration_id = i.id
        WHERE i.id = $1 AND oi.organization_id = $2 AND i.provider = 'slack' AND i.status = 'visible'
        LIMIT 1`,
      [integrationId, organizationId],
    );
    const [row] = rows;
    return row ? this.toIntegration(row) : null;
  }

  /**
   * Resolves the organization (which the user must belong to), the Slack
   * integration installed on it and the matching identity provider. Any missing
   * link is a 404.
   */
  async getIdentityContext(userId: string, organizationId: string, integrationId: string): Promise<IdentityContext> {
    const pool = this.db.getPool();
    const orgs = await pool.query<{ id: string; slug: string }>(
      `SELECT o.id, o.slug
         FROM organization o
         JOIN organization_member m ON m.organization_id = o.id
        WHERE o.id = $1 AND m.user_id = $2
        LIMIT 1`,
      [organizationId, userId],
    );
    const [organization] = orgs.rows;
    if (!organization) throw new NotFoundException({ error: 'organization_not_found' });

    const integrations = await pool.query<IntegrationRow>(
      `SELECT i.id, i.external_id, i.name, i.status, i.metadata
         FROM integration i
         JOIN organization_integration oi ON oi.integration_id = i.id
        WHERE i.id = $1 AND oi.organization_id = $2 AND i.provider = 'slack'
        LIMIT 1`,
      [integrationId, organization.id],
    );
    const [integrationRow] = integrations.rows;
    const integration = integrationRow ? this.toIntegration(integrationRow) : null;
    if (!integration) throw new NotFoundException({ error: 'integration_not_found' });

    const idps = await pool.query<{ id: string; external_id: string }>(
      `SELECT id, external_id FROM identity_provider WHERE external_id = $1 AND type = 'slack' LIMIT 1`,
      [integration.externalId],
    );
    const [idp] = idps.rows;
    if (!idp) throw new NotFoundException({ error: 'identity_provider_not_found' });

    return {
      organization,
      integration,
      identityProvider: { id: idp.id, type: 'slack', externalId: idp.external_id },
    };
  }

  /** The Slack user linked to `userId` in the workspace `teamExternalId`, if any. */
  async findSlackIdentity(userId: string, teamExternalId: string): Promise<SlackIdentity | null> {
    const { rows } = await this.db.getPool().query<{ user_id: string; external_id: string }>(
      `SELECT i.user_id, i.external_id
         FROM identity i
         JOIN identity_provider idp ON idp.id = i.identity_provider_id
        WHERE i.user_id = $1 AND idp.type = 'slack' AND idp.external_id = $2
        LIMIT 1`,
      [userId, teamExternalId],
    );
    const [row] = rows;
    return row ? { userId: row.user_id, externalId: row.external_id } : null;
  }

  async projectHasReleases(projectId: string): Promise<boolean> {
    const { rows } = await this.db
      .getPool()
      .query<{ exists: boolean }>('SELECT EXISTS (SELECT 1 FROM release_project WHERE project_id = $1) AS "exists"', [projectId]);
    return rows[0]?.exists === true;
  }

  private toIntegration(row: IntegrationRow): SlackIntegration | null {
    const metadata = SlackIntegrationMetadataSchema.safeParse(row.metadata);
    if (!metadata.success || !isIntegrationStatus(row.status)) {
      this.logger.warn('slack.integration.invalid_row', { integrationId: row.id, status: row.status });
      return null;
    }
    return {
      id: row.id,
      provider: 'slack',
      externalId: row.external_id,
      name: row.name,
      status: row.status,
      metadata: metadata.data,
    };
  }
}
