import { Injectable } from '@nestjs/common';

type Level = 'INFO' | 'DEBUG' | 'WARN' | 'ERROR';

type SanitizationOptions = {
  redactKeyRe: RegExp;
  redactValuePatterns: ReadonlyArray<RegExp>;
  maxString: number;
  maxJson: number;
  maxDepth: number;
  maxKeys: number;
};

const DEFAULT_SANITIZATION: SanitizationOptions = {
  redactKeyRe: /(authorization|token|access_token|accessToken|api[_-]?key|password|secret)/i,
  redactValuePatterns: [
    // Slack bot/user/app tokens
    /(xox[abposr]-[A-Za-z0-9-]{10,})/g,
    /(xapp-[A-Za-z0-9-]{10,})/g,
    /(Bearer)\s+[-A-Za-z0-9._~+/]+=*/gi,
  ],
  maxString: 2000,
  maxJson: 20000,
  maxDepth: 3,
  maxKeys: 100,
};

/**
 * Structured JSON logger for integration events (`rule.slack.conversations_list_failed`,
 * `rule.fail.slack_post`, ...). Every record is a single JSON line; credentials that
 * end up in the context are redacted before serialization.
 */
@Injectable()
export class LoggerService {
  info(message: string, ...optionalParams: unknown[]) {
    this.log('INFO', message, optionalParams);
  }

  debug(message: string, ...optionalParams: unknown[]) {
    this.log('DEBUG', message, optionalParams);
  }

  warn(message: string, ...optionalParams: unknown[]) {
    this.log('WARN', message, optionalParams);
  }

  error(message: string, ...optionalParams: unknown[]) {
    this.log('ERROR', message, optionalParams);
  }

  private log(level: Level, message: string, optionalParams: unknown[]) {
    const record: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level,
      message,
    };

    if (optionalParams.length > 0) {
      const context = this.sanitize(optionalParams, DEFAULT_SANITIZATION);
      const [first] = context;
      if (context.length === 1 && this.isPlainRecord(first) && !this.hasReservedKey(first)) {
        Object.assign(record, first);
      } else if (context.length > 0) {
        record.context = context;
      }
    }

    const payload = JSON.stringify(record);

    switch (level) {
      case 'DEBUG':
        console.debug(payload);
        break;
      case 'WARN':
        console.warn(payload);
        break;
      case 'ERROR':
        console.error(payload);
        break;
      default:
        console.info(payload);
    }
  }

  private sanitize(params: unknown[], options: SanitizationOptions): unknown[] {
    const seen = new WeakSet<object>();

    const redactString = (s: string): string => {
      let out = s;
      for (const re of options.redactValuePatterns) {
        out = out.replace(re, (_m: string, g1: string) => (/^Bearer$/i.test(g1) ? 'Bearer [REDACTED]' : '[REDACTED]'));
      }
      if (out.length > options.maxString) {
        out = `${out.slice(0, options.maxString)}…(+${out.length - options.maxString} chars)`;
      }
      return out;
    };

    const toSafe = (v: unknown, depth: number): unknown => {
      if (v instanceof Error) {
        const safe: Record<string, unknown> = {
          name: v.name,
          message: redactString(v.message),
        };
        if ('code' in v && typeof v.code === 'string') safe.code = v.code;
        if (v.stack) safe.stack = redactString(v.stack);
        if (v.cause !== undefined) {
          safe.cause = depth + 1 >= options.maxDepth ? '[Truncated]' : toSafe(v.cause, depth + 1);
        }
        return safe;
      }
      if (Array.isArray(v)) {
        if (seen.has(v)) return '[Circular]';
        seen.add(v);
        return v.slice(0, options.maxKeys).map((x) => toSafe(x, depth + 1));
      }
      if (this.isPlainRecord(v)) {
        if (seen.has(v)) return '[Circular]';
        seen.add(v);
        const out: Record<string, unknown> = {};
        const entries = Object.entries(v);
        for (const [index, [k, val]] of entries.entries()) {
          if (index >= options.maxKeys) {
            out['__truncated__'] = `[+${entries.length - options.maxKeys} keys omitted]`;
            break;
          }
          out[k] = options.redactKeyRe.test(k) ? '[REDACTED]' : toSafe(val, depth + 1);
        }
        return out;
      }
      if (typeof v === 'bigint') return v.toString();
      if (typeof v === 'string') return redactString(v);
      return v;
    };

    const safeParams = params.map((p) => toSafe(p, 0));
    const json = JSON.stringify(safeParams);
    if (json.length > options.maxJson) {
      return [{ __truncated__: `context truncated after ${options.maxJson} chars` }];
    }
    return safeParams;
  }

  private isPlainRecord(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
  }

  private hasReservedKey(obj: Record<string, unknown>): boolean {
    return ['ts', 'level', 'message'].some((key) => key in obj);
  }
}
