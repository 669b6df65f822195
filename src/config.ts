import { config as dotenvConfig } from 'dotenv';
import { registerSecret } from './logger.js';

dotenvConfig();

export type McpTransportKind = 'sse' | 'streamable-http';

export interface WatcherConfig {
  schedulePath: string;

  // Answer oracle
  anthropicApiKey: string;
  anthropicModel: string;
  oracleMaxTokens: number;
  oraclePromptPath: string;

  // MCP server URLs
  pageMcpUrl: string;
  messagesMcpUrl: string;   // optional — fallback channel only

  // MCP auth tokens
  pageMcpToken: string;
  messagesMcpToken: string;
  mcpTransport: McpTransportKind;

  /** Human asked to override low-confidence answers. Empty disables fallback. */
  fallbackRecipient: string;
  /** Discord-compatible webhook for operator notices (oracle errors, low confidence). */
  operatorWebhookUrl: string;

  // Timing
  schedulerTickSeconds: number;    // 10
  watcherPollMs: number;           // 500
  fallbackPollSeconds: number;     // 2
  /** Hard ceiling on a fallback wait; 0 keeps listening until the prompt changes. */
  fallbackMaxWaitSeconds: number;  // 0
  shutdownJoinSeconds: number;     // 5
}

function parseInt10(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const n = parseInt(raw, 10);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

let _config: WatcherConfig | null = null;

export function getConfig(): WatcherConfig {
  if (_config) return _config;

  const anthropicApiKey = process.env.ANTHROPIC_API_KEY ?? '';
  const pageMcpToken = process.env.PAGE_MCP_TOKEN ?? '';
  const messagesMcpToken = process.env.MESSAGES_MCP_TOKEN ?? '';
  const operatorWebhookUrl = process.env.OPERATOR_WEBHOOK_URL ?? '';

  // Register secrets for log redaction
  if (anthropicApiKey) registerSecret(anthropicApiKey);
  if (pageMcpToken) registerSecret(pageMcpToken);
  if (messagesMcpToken) registerSecret(messagesMcpToken);
  if (operatorWebhookUrl) registerSecret(operatorWebhookUrl);

  _config = {
    schedulePath: process.env.SCHEDULE_PATH ?? './data/classes.json',

    anthropicApiKey,
    anthropicModel: process.env.ANTHROPIC_MODEL ?? 'claude-sonnet-4-5-20250929',
    oracleMaxTokens: parseInt10(process.env.ORACLE_MAX_TOKENS, 1024),
    oraclePromptPath: process.env.ORACLE_PROMPT_PATH ?? './prompts/answer-system.md',

    pageMcpUrl: process.env.PAGE_MCP_URL ?? 'http://127.0.0.1:3101',
    messagesMcpUrl: process.env.MESSAGES_MCP_URL ?? '',
    pageMcpToken,
    messagesMcpToken,
    mcpTransport: process.env.MCP_TRANSPORT === 'sse' ? 'sse' : 'streamable-http',

    fallbackRecipient: (process.env.FALLBACK_RECIPIENT ?? '').trim(),
    operatorWebhookUrl,

    schedulerTickSeconds: parseInt10(process.env.SCHEDULER_TICK_SECONDS, 10),
    watcherPollMs: parseInt10(process.env.WATCHER_POLL_MS, 500),
    fallbackPollSeconds: parseInt10(process.env.FALLBACK_POLL_SECONDS, 2),
    fallbackMaxWaitSeconds: parseInt10(process.env.FALLBACK_MAX_WAIT_SECONDS, 0),
    shutdownJoinSeconds: parseInt10(process.env.SHUTDOWN_JOIN_SECONDS, 5),
  };

  return _config;
}

/** Reset cached config (for testing). */
export function resetConfig(): void {
  _config = null;
}
