/**
 * Class poll watcher — process entry point.
 *
 * Loads the class schedule, connects the MCP-backed page sessions and
 * messages channel, then runs the fleet scheduler until SIGINT/SIGTERM or
 * `exit` on stdin. One AbortController is the shutdown token for every loop.
 */

import { config as dotenvConfig } from 'dotenv';
dotenvConfig();

import readline from 'node:readline';
import { getConfig } from './config.js';
import { logger } from './logger.js';
import { ConfigError } from './errors.js';
import { JsonScheduleStore } from './schedule/store.js';
import { activeClasses, nextUpcomingClass } from './schedule/time-window.js';
import { McpAggregator } from './mcp/client.js';
import { McpPageSessionProvider } from './page/mcp-page-session.js';
import { McpFallbackChannel } from './channel/mcp-fallback-channel.js';
import { ClaudeAnswerOracle } from './oracle/client.js';
import { OperatorAlerts } from './output/index.js';
import { FleetScheduler } from './session/scheduler.js';
import { SessionWatcher } from './session/watcher.js';
import { systemClock } from './session/clock.js';

const config = getConfig();
const mcp = new McpAggregator();
const shutdown = new AbortController();

// ── Shutdown requests ──────────────────────────────────────────────────────

function requestShutdown(source: string): void {
  if (shutdown.signal.aborted) return;
  logger.info(`Shutdown requested (${source}) — sessions stop at their next check`);
  shutdown.abort();
}

process.on('SIGINT', () => requestShutdown('SIGINT'));
process.on('SIGTERM', () => requestShutdown('SIGTERM'));

function listenForExitCommand(): readline.Interface {
  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  rl.on('line', (line) => {
    if (['exit', 'quit', 'stop'].includes(line.trim().toLowerCase())) {
      requestShutdown('stdin');
    }
  });
  return rl;
}

// ── Startup ────────────────────────────────────────────────────────────────

async function connectMcp(): Promise<void> {
  const STARTUP_RETRIES = 3;
  const STARTUP_BACKOFF_BASE_MS = 2000;

  for (let attempt = 1; attempt <= STARTUP_RETRIES; attempt++) {
    try {
      await mcp.connect();
      const pageHealthy = await mcp.healthCheck('page');
      logger.info(`  page health: ${pageHealthy ? 'OK' : 'FAIL'}`);
      if (config.messagesMcpUrl) {
        logger.info(`  messages health: ${(await mcp.healthCheck('messages')) ? 'OK' : 'FAIL'}`);
      }
      if (pageHealthy) return;
    } catch (err) {
      logger.warn(`MCP startup failed (attempt ${attempt}/${STARTUP_RETRIES}):`, err);
    }

    if (attempt < STARTUP_RETRIES) {
      const delayMs = STARTUP_BACKOFF_BASE_MS * Math.pow(2, attempt - 1);
      logger.warn(`Retrying MCP startup in ${delayMs / 1000}s...`);
      await systemClock.sleep(delayMs, shutdown.signal);
      if (shutdown.signal.aborted) break;
    }
  }

  throw new Error(`Page MCP startup failed after ${STARTUP_RETRIES} attempts — cannot open class sessions.`);
}

async function main(): Promise<void> {
  logger.info('Class poll watcher starting...');
  logger.info(`  Model: ${config.anthropicModel}`);
  logger.info(`  Page MCP: ${config.pageMcpUrl}`);
  logger.info(`  Messages MCP: ${config.messagesMcpUrl || '(not set — fallback disabled)'}`);

  // ── Step 1: Schedules (fatal on ConfigError) ──────────────────────────
  const schedules = new JsonScheduleStore(config.schedulePath).loadSchedules();
  const now = systemClock.now();
  logger.info(`Loaded ${schedules.size} class(es): ${[...schedules.keys()].join(', ')}`);
  const activeNow = activeClasses(schedules, now).map(s => s.name);
  logger.info(`  Active now: ${activeNow.length > 0 ? activeNow.join(', ') : '(none)'}`);
  const upcoming = nextUpcomingClass(schedules, now);
  if (upcoming) {
    logger.info(`  Next class: ${upcoming.schedule.name} in ${Math.round(upcoming.startsInMs / 60_000)} min`);
  }

  // ── Step 2: Collaborators ─────────────────────────────────────────────
  await connectMcp();
  if (shutdown.signal.aborted) return;

  const oracle = new ClaudeAnswerOracle();
  oracle.loadPrompt();
  const pages = new McpPageSessionProvider(mcp);
  const notifier = new OperatorAlerts();

  const recipient = config.fallbackRecipient || null;
  const channel = recipient && config.messagesMcpUrl ? new McpFallbackChannel(mcp) : null;
  if (recipient && !channel) {
    logger.warn('  FALLBACK_RECIPIENT set but MESSAGES_MCP_URL is not — fallback disabled.');
  }
  if (!config.anthropicApiKey) {
    logger.warn('  ANTHROPIC_API_KEY not set — every oracle call will fail.');
  }

  // ── Step 3: Fleet scheduler ───────────────────────────────────────────
  const scheduler = new FleetScheduler(
    schedules,
    (schedule, signal) => new SessionWatcher(schedule, {
      pages,
      oracle,
      notifier,
      channel,
      fallbackRecipient: channel ? recipient : null,
      clock: systemClock,
      pollIntervalMs: config.watcherPollMs,
      fallbackPollIntervalMs: config.fallbackPollSeconds * 1000,
      fallbackMaxWaitMs: config.fallbackMaxWaitSeconds * 1000,
    }).run(signal),
    {
      clock: systemClock,
      tickIntervalMs: config.schedulerTickSeconds * 1000,
      joinTimeoutMs: config.shutdownJoinSeconds * 1000,
    },
  );

  const rl = listenForExitCommand();
  logger.info("Monitor ready — type 'exit' and press ENTER to stop all sessions");

  try {
    await scheduler.run(shutdown.signal);
  } finally {
    rl.close();
  }
}

main()
  .then(async () => {
    await mcp.disconnect();
    logger.info('All sessions closed. Exiting...');
    process.exit(0);
  })
  .catch(async (err) => {
    if (err instanceof ConfigError) {
      logger.error(`Configuration error: ${err.message}`);
    } else {
      logger.error('Fatal startup error:', err);
    }
    await mcp.disconnect();
    process.exit(1);
  });
