import { DatabaseService } from '../../src/core/services/database.service';
import type { LoggerService } from '../../src/core/services/logger.service';
import { AssigneesRepository } from '../../src/slack/attachments/assignees.repository';
import { SlackIntegrationsRepository } from '../../src/slack/integrations/slackIntegrations.repository';
import { createTestConfig } from './config';
import { createSilentLogger } from './logger';

/** Repository over a pool that is never opened; tests spy on its methods. */
export const createIntegrationsRepository = (logger: LoggerService = createSilentLogger()): SlackIntegrationsRepository =>
  new SlackIntegrationsRepository(new DatabaseService(createTestConfig()), logger);

export const createAssigneesRepository = (): AssigneesRepository => new AssigneesRepository(new DatabaseService(createTestConfig()));
