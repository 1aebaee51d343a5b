import { Injectable } from '@nestjs/common';
import { ErrorCode, WebClient, type WebAPICallResult } from '@slack/web-api';
import { SlackApiError, mapSlackError } from '../errors';

export type SlackCallParams = Record<string, unknown>;

export type SlackPostOptions = {
  token: string;
  timeoutMs?: number;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Thin wrapper over `WebClient.apiCall`. The SDK's own retry and rate-limit
 * queueing are switched off: one call is one request, and every failure comes
 * back as a `SlackApiError`.
 */
@Injectable()
export class SlackApiClient {
  async get(method: string, token: string, params: SlackCallParams = {}): Promise<WebAPICallResult> {
    return this.call(method, params, token);
  }

  async post(method: string, data: SlackCallParams, options: SlackPostOptions): Promise<WebAPICallResult> {
    return this.call(method, data, options.token, options.timeoutMs);
  }

  protected createClient(token: string, timeoutMs?: number): WebClient {
    return new WebClient(token, {
      logLevel: undefined,
      retryConfig: { retries: 0 },
      rejectRateLimitedCalls: true,
      ...(timeoutMs !== undefined ? { timeout: timeoutMs } : {}),
    });
  }

  private async call(method: string, params: SlackCallParams, token: string, timeoutMs?: number): Promise<WebAPICallResult> {
    const client = this.createClient(token, timeoutMs);
    let resp: WebAPICallResult;
    try {
      resp = await client.apiCall(method, params);
    } catch (err: unknown) {
      throw toSlackApiError(method, err);
    }
    if (!resp.ok) {
      throw new SlackApiError(`Slack API error: ${resp.error ?? 'unknown_error'}`, {
        code: mapSlackError(resp.error),
        method,
        slackError: resp.error,
      });
    }
    return resp;
  }
}

export function toSlackApiError(method: string, err: unknown): SlackApiError {
  if (err instanceof SlackApiError) return err;
  const message = err instanceof Error && err.message ? err.message : String(err);
  if (!isRecord(err)) {
    return new SlackApiError(message, { code: 'unknown_error', method });
  }

  const data = isRecord(err.data) ? err.data : undefined;
  const slackError = typeof data?.error === 'string' ? data.error : undefined;
  const statusCode = typeof err.statusCode === 'number' ? err.statusCode : undefined;
  const retryAfterSec = typeof err.retryAfter === 'number' ? err.retryAfter : undefined;
  const retryAfterMs = retryAfterSec !== undefined && Number.isFinite(retryAfterSec) ? retryAfterSec * 1000 : undefined;

  let code: string;
  switch (err.code) {
    case ErrorCode.PlatformError:
      code = mapSlackError(slackError);
      break;
    case ErrorCode.RateLimitedError:
      code = 'rate_limited';
      break;
    case ErrorCode.HTTPError:
      code = statusCode === 429 ? 'rate_limited' : `http_${statusCode ?? 'error'}`;
      break;
    case ErrorCode.RequestError:
      code = 'request_error';
      break;
    default:
      code = slackError ? mapSlackError(slackError) : 'unknown_error';
  }
  return new SlackApiError(message, { code, method, slackError, statusCode, retryAfterMs });
}
