import { Inject, Injectable } from '@nestjs/common';
import { z } from 'zod';
import type { ListTypeName, ListTypeSpec } from '../channels/listTypes';
import { SlackApiError } from '../errors';
import { SlackApiClient } from './slackApi.client';

// Slack caps `<listType>.list` at 1000 items per page.
export const SLACK_LIST_PAGE_LIMIT = 1000;

export const SlackListItemSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    profile: z
      .object({
        display_name: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type SlackListItem = z.infer<typeof SlackListItemSchema>;

const ResponseMetadataSchema = z
  .object({
    next_cursor: z.string().optional(),
  })
  .passthrough()
  .optional();

export type SlackListPage = {
  items: SlackListItem[];
  /** Absent when the list is exhausted. */
  nextCursor?: string;
};

export type SlackCredentials = {
  accessToken: string;
};

export interface SlackListSource {
  fetchPage(spec: ListTypeSpec, cursor: string, credentials: SlackCredentials, limit?: number): Promise<SlackListPage>;
}

@Injectable()
export class SlackListClient implements SlackListSource {
  constructor(@Inject(SlackApiClient) private readonly api: SlackApiClient) {}

  async fetchPage(
    spec: ListTypeSpec,
    cursor: string,
    credentials: SlackCredentials,
    limit: number = SLACK_LIST_PAGE_LIMIT,
  ): Promise<SlackListPage> {
    const method = listMethod(spec.listType);
    const resp = await this.api.get(method, credentials.accessToken, {
      exclude_archived: false,
      exclude_members: true,
      types: 'public_channel,private_channel',
      cursor,
      limit,
    });

    const parsed = z.array(SlackListItemSchema).safeParse(resp[spec.resultKey]);
    if (!parsed.success) {
      throw new SlackApiError(`Slack API error: ${method} response missing valid "${spec.resultKey}"`, {
        code: 'invalid_response',
        method,
      });
    }
    const metadata = ResponseMetadataSchema.safeParse(resp.response_metadata);
    const nextCursor = metadata.success ? metadata.data?.next_cursor : undefined;
    return { items: parsed.data, ...(nextCursor ? { nextCursor } : {}) };
  }
}

function listMethod(listType: ListTypeName): string {
  return `${listType}.list`;
}
