/**
 * Fallback channel served by the `messages` MCP server:
 *
 *   send_message   { recipient, text }  → any non-error result
 *   latest_message { recipient }        → { text, id } | null   (newest inbound message)
 */

import { ChannelError } from '../errors.js';
import { logger } from '../logger.js';
import { toolResultJson } from '../mcp/tool-result.js';
import type { ToolCaller } from '../mcp/tool-result.js';
import type { FallbackChannel, InboundMessage } from '../types/index.js';

const SERVER = 'messages';

export function parseInboundMessage(value: unknown): InboundMessage | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
  if (!('text' in value) || !('id' in value)) return null;
  const { text, id } = value;
  if (typeof text !== 'string' || typeof id !== 'number' || !Number.isFinite(id)) return null;
  return { text, id };
}

export class McpFallbackChannel implements FallbackChannel {
  constructor(private readonly mcp: ToolCaller) {}

  async send(recipient: string, text: string): Promise<boolean> {
    try {
      const result = await this.mcp.callTool(`${SERVER}__send_message`, { recipient, text });
      const { value, isError } = toolResultJson(result);
      if (isError) {
        logger.warn(`FallbackChannel: send_message rejected: ${JSON.stringify(value)}`);
        return false;
      }
      logger.debug(`FallbackChannel: sent to ${recipient}: ${text.slice(0, 50)}...`);
      return true;
    } catch (err) {
      logger.warn('FallbackChannel: send_message failed:', err);
      return false;
    }
  }

  async latest(recipient: string): Promise<InboundMessage | null> {
    let result: unknown;
    try {
      result = await this.mcp.callTool(`${SERVER}__latest_message`, { recipient });
    } catch (err) {
      throw new ChannelError(`latest_message failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
    const { value, isError } = toolResultJson(result);
    if (isError) {
      throw new ChannelError(`latest_message rejected: ${JSON.stringify(value)}`);
    }
    return parseInboundMessage(value);
  }
}
