/**
 * Page sessions served by the `page` MCP server. The server owns the browser
 * and the markup scraping; this adapter only speaks its tool protocol:
 *
 *   open_session  { className, connection } → { sessionId }
 *   get_fingerprint / get_location / read_question / clear_choice / close_session { sessionId }
 *   apply_choice  { sessionId, option }
 */

import { SessionUnavailableError } from '../errors.js';
import { logger } from '../logger.js';
import { toolResultJson, toolResultText } from '../mcp/tool-result.js';
import type { ToolCaller } from '../mcp/tool-result.js';
import type { ClassSchedule, PageSession, PageSessionProvider, QuestionSnapshot } from '../types/index.js';

const SERVER = 'page';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `{question, options[]}` with a non-empty question and at least one option, else null. */
export function parseQuestionSnapshot(value: unknown): QuestionSnapshot | null {
  if (!isRecord(value)) return null;
  const { question, options } = value;
  if (typeof question !== 'string' || !question.trim()) return null;
  if (!Array.isArray(options) || options.length === 0) return null;
  if (!options.every((opt): opt is string => typeof opt === 'string')) return null;
  return { question: question.trim(), options: options.map(opt => opt.trim()) };
}

/** Accepts `true`/`false` or `{ ok: boolean }`. */
function parseBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (isRecord(value) && typeof value.ok === 'boolean') return value.ok;
  return false;
}

export class McpPageSession implements PageSession {
  constructor(
    private readonly mcp: ToolCaller,
    readonly sessionId: string,
  ) {}

  private async call(tool: string, args: Record<string, unknown> = {}): Promise<unknown> {
    const result = await this.mcp.callTool(`${SERVER}__${tool}`, { sessionId: this.sessionId, ...args });
    const { value, isError } = toolResultJson(result);
    if (isError) {
      throw new Error(`page__${tool} failed: ${typeof value === 'string' ? value : JSON.stringify(value)}`);
    }
    return value;
  }

  async fingerprint(): Promise<string> {
    try {
      const result = await this.mcp.callTool(`${SERVER}__get_fingerprint`, { sessionId: this.sessionId });
      const { text, isError } = toolResultText(result);
      return isError ? '' : text.trim();
    } catch (err) {
      logger.debug(`PageSession ${this.sessionId}: fingerprint read failed:`, err);
      return '';
    }
  }

  /** Empty when the location cannot be read this tick. */
  async currentLocation(): Promise<string> {
    try {
      const value = await this.call('get_location');
      return typeof value === 'string' ? value : '';
    } catch (err) {
      logger.debug(`PageSession ${this.sessionId}: location read failed:`, err);
      return '';
    }
  }

  /** Null when no prompt is shown or it cannot be read this tick. */
  async readQuestion(): Promise<QuestionSnapshot | null> {
    try {
      return parseQuestionSnapshot(await this.call('read_question'));
    } catch (err) {
      logger.debug(`PageSession ${this.sessionId}: question read failed:`, err);
      return null;
    }
  }

  async applyChoice(option: number): Promise<boolean> {
    return parseBoolean(await this.call('apply_choice', { option }));
  }

  async clearChoice(): Promise<boolean> {
    return parseBoolean(await this.call('clear_choice'));
  }

  async close(): Promise<void> {
    await this.call('close_session');
  }
}

export class McpPageSessionProvider implements PageSessionProvider {
  constructor(private readonly mcp: ToolCaller) {}

  async open(schedule: ClassSchedule): Promise<PageSession> {
    if (!this.mcp.isConnected(SERVER)) {
      throw new SessionUnavailableError(schedule.name, 'page MCP server is not connected');
    }

    let value: unknown;
    let isError: boolean;
    try {
      const result = await this.mcp.callTool(`${SERVER}__open_session`, {
        className: schedule.name,
        connection: schedule.connection,
      });
      ({ value, isError } = toolResultJson(result));
    } catch (err) {
      throw new SessionUnavailableError(schedule.name, `open_session failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }

    if (isError) {
      const detail = typeof value === 'string' ? value : JSON.stringify(value);
      throw new SessionUnavailableError(schedule.name, `no authenticated session: ${detail}`);
    }
    if (!isRecord(value) || typeof value.sessionId !== 'string' || !value.sessionId) {
      throw new SessionUnavailableError(schedule.name, 'open_session returned no sessionId');
    }

    logger.debug(`PageSessionProvider: opened ${value.sessionId} for "${schedule.name}"`);
    return new McpPageSession(this.mcp, value.sessionId);
  }
}
