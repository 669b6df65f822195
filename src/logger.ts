/**
 * Log sanitizer — strips secrets from all output.
 * Every line carries a timestamp and level; class watchers log through a scoped
 * logger so interleaved sessions stay readable.
 */

import { inspect } from 'util';

const AUTHORIZATION_HEADER_PATTERN = /(?<=Authorization:\s*(?:Bearer\s+)?)\S+/gi;

// Dynamic secret redaction
const secretFragments: string[] = [];
let secretPattern: RegExp | null = null;

/** Register a secret value so it is redacted from all log output. */
export function registerSecret(secret: string): void {
  if (secret && secret.length >= 8) {
    secretFragments.push(secret.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
    secretPattern = new RegExp(secretFragments.join('|'), 'g');
  }
}

export function sanitize(message: string): string {
  let result = message.replace(AUTHORIZATION_HEADER_PATTERN, '[REDACTED]');
  if (secretPattern) {
    result = result.replace(secretPattern, '[REDACTED]');
  }
  return result;
}

export function formatArgs(args: unknown[]): string {
  return args
    .map((arg) => {
      if (arg instanceof Error) {
        const stack = arg.stack ?? arg.message;
        return sanitize(stack);
      }
      if (typeof arg === 'string') {
        return sanitize(arg);
      }
      return sanitize(inspect(arg, { depth: 3, breakLength: Infinity }));
    })
    .join(' ');
}

function timestamp(): string {
  return new Date().toISOString();
}

export interface Logger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

function createLogger(prefix: string): Logger {
  const head = prefix ? `${prefix} ` : '';
  return {
    info(...args: unknown[]): void {
      console.log(`[${timestamp()}] [INFO]`, head + formatArgs(args));
    },
    warn(...args: unknown[]): void {
      console.warn(`[${timestamp()}] [WARN]`, head + formatArgs(args));
    },
    error(...args: unknown[]): void {
      console.error(`[${timestamp()}] [ERROR]`, head + formatArgs(args));
    },
    debug(...args: unknown[]): void {
      if (process.env.DEBUG) {
        console.debug(`[${timestamp()}] [DEBUG]`, head + formatArgs(args));
      }
    },
  };
}

export const logger = {
  ...createLogger(''),
  /** Logger whose lines are prefixed with `[scope]` (one per class session). */
  scoped(scope: string): Logger {
    return createLogger(`[${sanitize(scope)}]`);
  },
};
