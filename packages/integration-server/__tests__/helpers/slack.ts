import type { ListTypeName, ListTypeSpec } from '../../src/slack/channels/listTypes';
import type { SlackListPage, SlackListSource } from '../../src/slack/client/slackList.client';
import type { SlackIntegration } from '../../src/slack/integrations/types';

/** Serves canned pages keyed by `<listType>:<cursor>`; unknown keys are empty pages. */
export class FakeListSource implements SlackListSource {
  readonly calls: Array<{ listType: ListTypeName; cursor: string }> = [];

  constructor(private readonly pages: Record<string, SlackListPage | Error>) {}

  async fetchPage(spec: ListTypeSpec, cursor: string): Promise<SlackListPage> {
    this.calls.push({ listType: spec.listType, cursor });
    const page = this.pages[`${spec.listType}:${cursor}`];
    if (page instanceof Error) throw page;
    return page ?? { items: [] };
  }
}

export const slackIntegration = (overrides: Partial<SlackIntegration> = {}): SlackIntegration => ({
  id: 'int-1',
  provider: 'slack',
  externalId: 'T0001',
  name: 'Acme Workspace',
  status: 'visible',
  metadata: { access_token: 'test-token' },
  ...overrides,
});
