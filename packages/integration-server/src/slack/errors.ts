import { BadRequestException } from '@nestjs/common';

/**
 * Any failure talking to Slack: network, HTTP status, auth, rate limiting or a
 * `{ ok: false }` platform response. `code` is normalized (see `mapSlackError`),
 * `slackError` keeps the raw Slack error string when there was one.
 */
export class SlackApiError extends Error {
  readonly code: string;
  readonly method: string;
  readonly slackError?: string;
  readonly statusCode?: number;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    details: { code: string; method: string; slackError?: string; statusCode?: number; retryAfterMs?: number },
  ) {
    super(message);
    this.name = 'SlackApiError';
    this.code = details.code;
    this.method = details.method;
    this.slackError = details.slackError;
    this.statusCode = details.statusCode;
    this.retryAfterMs = details.retryAfterMs;
  }
}

/** Several Slack users share the display name that was typed. */
export class DuplicateDisplayNameError extends BadRequestException {
  readonly code = 'duplicate_display_name';

  constructor(
    readonly displayName: string,
    readonly workspaceDomain?: string,
  ) {
    const usernameHint = workspaceDomain
      ? `found at ${workspaceDomain}.slack.com/account#account`
      : 'found on your Slack account page';
    super({
      error: 'duplicate_display_name',
      message: `Multiple users were found with display name '${displayName}'. Please use your username, ${usernameHint}.`,
    });
    this.name = 'DuplicateDisplayNameError';
  }
}

export function mapSlackError(err?: string): string {
  if (!err) return 'unknown_error';
  switch (err) {
    case 'channel_not_found':
    case 'not_in_channel':
    case 'is_archived':
      return err;
    case 'invalid_auth':
    case 'not_authed':
    case 'account_inactive':
    case 'token_revoked':
      return 'auth_error';
    case 'ratelimited':
      return 'rate_limited';
    default:
      return err;
  }
}
