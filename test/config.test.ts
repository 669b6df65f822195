import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { getConfig, resetConfig } from '../src/config.js';
import { logger, sanitize } from '../src/logger.js';
import { buildQuestionMessage } from '../src/oracle/client.js';

const KEYS = [
  'ANTHROPIC_API_KEY',
  'MCP_TRANSPORT',
  'FALLBACK_RECIPIENT',
  'WATCHER_POLL_MS',
  'FALLBACK_MAX_WAIT_SECONDS',
  'SHUTDOWN_JOIN_SECONDS',
] as const;

describe('getConfig', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    resetConfig();
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    resetConfig();
  });

  it('uses the documented defaults', () => {
    const config = getConfig();
    expect(config.mcpTransport).toBe('streamable-http');
    expect(config.fallbackRecipient).toBe('');
    expect(config.watcherPollMs).toBe(500);
    expect(config.fallbackMaxWaitSeconds).toBe(0);
    expect(config.shutdownJoinSeconds).toBe(5);
  });

  it('reads overrides and ignores invalid numbers', () => {
    process.env.MCP_TRANSPORT = 'sse';
    process.env.FALLBACK_RECIPIENT = '  friend@example.test ';
    process.env.WATCHER_POLL_MS = '250';
    process.env.SHUTDOWN_JOIN_SECONDS = '-3';

    const config = getConfig();
    expect(config.mcpTransport).toBe('sse');
    expect(config.fallbackRecipient).toBe('friend@example.test');
    expect(config.watcherPollMs).toBe(250);
    expect(config.shutdownJoinSeconds).toBe(5);
  });

  it('caches until reset', () => {
    const first = getConfig();
    process.env.WATCHER_POLL_MS = '100';
    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig().watcherPollMs).toBe(100);
  });

  it('redacts the API key from log output', () => {
    process.env.ANTHROPIC_API_KEY = 'test-secret-key';
    getConfig();
    expect(sanitize('calling with test-secret-key now')).toBe('calling with [REDACTED] now');
  });
});

describe('logger', () => {
  it('redacts Authorization headers', () => {
    expect(sanitize('Authorization: test-token')).toBe('Authorization: [REDACTED]');
  });

  it('creates scoped loggers', () => {
    const scoped = logger.scoped('Bio');
    expect(typeof scoped.info).toBe('function');
    expect(typeof scoped.debug).toBe('function');
  });
});

describe('buildQuestionMessage', () => {
  it('numbers the options from 1', () => {
    expect(buildQuestionMessage('Q1', ['A', 'B'])).toBe(
      'QUESTION: Q1\n\nOPTIONS:\n  1. A\n  2. B\n\nbest_option must be an integer from 1 to 2. Respond with only the JSON object.',
    );
  });
});
