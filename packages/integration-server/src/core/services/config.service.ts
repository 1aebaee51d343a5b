import { Injectable } from '@nestjs/common';
import * as dotenv from 'dotenv';
import { z } from 'zod';
dotenv.config();

const numberFromEnv = (fallback: number) =>
  z
    .union([z.string(), z.number()])
    .default(String(fallback))
    .transform((v) => {
      const n = typeof v === 'number' ? v : Number(v);
      return Number.isFinite(n) ? n : fallback;
    });

export const configSchema = z.object({
  databaseUrl: z.string().min(1, 'Database connection string is required'),
  // Public base URL of the error-tracking web app; used for issue, rule and asset links
  appBaseUrl: z
    .string()
    .default('http://localhost:8000')
    .transform((s) => s.replace(/\/+$/, '')),
  // Self-imposed budget for interactive channel lookups
  slackLookupTimeoutMs: numberFromEnv(10_000),
  // Budget once the lookup already runs as a background job
  slackAsyncLookupTimeoutMs: numberFromEnv(3 * 60_000),
  slackPostTimeoutMs: numberFromEnv(5_000),
  channelLookupJobTtlMs: numberFromEnv(10 * 60_000),
  // CORS origins (comma-separated in env; parsed to string[])
  corsOrigins: z
    .string()
    .default('')
    .transform((s) =>
      s
        .split(',')
        .map((x) => x.trim())
        .filter((x) => !!x),
    ),
});

export type Config = z.infer<typeof configSchema>;

@Injectable()
export class ConfigService implements Config {
  private static instance?: ConfigService;
  private _params?: Config;

  private get params(): Config {
    if (!this._params) {
      throw new Error('ConfigService not initialized with parameters');
    }
    return this._params;
  }

  init(params: Config): this {
    this._params = params;
    return this;
  }

  get databaseUrl(): string {
    return this.params.databaseUrl;
  }

  get appBaseUrl(): string {
    return this.params.appBaseUrl;
  }

  // Slack timing
  get slackLookupTimeoutMs(): number {
    return this.params.slackLookupTimeoutMs;
  }
  get slackAsyncLookupTimeoutMs(): number {
    return this.params.slackAsyncLookupTimeoutMs;
  }
  get slackPostTimeoutMs(): number {
    return this.params.slackPostTimeoutMs;
  }
  get channelLookupJobTtlMs(): number {
    return this.params.channelLookupJobTtlMs;
  }

  get corsOrigins(): string[] {
    return this.params.corsOrigins;
  }

  static getInstance(): ConfigService {
    if (!ConfigService.instance) {
      ConfigService.instance = ConfigService.fromEnv();
    }
    return ConfigService.instance;
  }

  static clearInstanceForTest(): void {
    ConfigService.instance = undefined;
  }

  static fromEnv(): ConfigService {
    const parsed = configSchema.parse({
      databaseUrl: process.env.DATABASE_URL,
      appBaseUrl: process.env.APP_BASE_URL,
      // Pass raw env; schema will validate/assign default
      slackLookupTimeoutMs: process.env.SLACK_LOOKUP_TIMEOUT_MS,
      slackAsyncLookupTimeoutMs: process.env.SLACK_ASYNC_LOOKUP_TIMEOUT_MS,
      slackPostTimeoutMs: process.env.SLACK_POST_TIMEOUT_MS,
      channelLookupJobTtlMs: process.env.CHANNEL_LOOKUP_JOB_TTL_MS,
      corsOrigins: process.env.CORS_ORIGINS,
    });
    return new ConfigService().init(parsed);
  }
}
