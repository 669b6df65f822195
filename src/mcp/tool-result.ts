/**
 * Helpers for MCP tool names and tool call results.
 */

/** Anything that can route a server-prefixed tool call. */
export interface ToolCaller {
  callTool(prefixedName: string, args: Record<string, unknown>): Promise<unknown>;
  isConnected(serverName: string): boolean;
}

export interface ToolText {
  text: string;
  isError: boolean;
}

/**
 * Parse a prefixed tool name back to server name and original tool name.
 * e.g., 'page__read_question' → { server: 'page', tool: 'read_question' }
 */
export function parsePrefixedToolName(prefixedName: string): { server: string; tool: string } | null {
  const idx = prefixedName.indexOf('__');
  if (idx === -1) return null;
  return {
    server: prefixedName.slice(0, idx),
    tool: prefixedName.slice(idx + 2),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Concatenate the text content blocks of a tool call result. */
export function toolResultText(result: unknown): ToolText {
  if (!isRecord(result)) {
    return { text: '', isError: false };
  }

  const isError = result.isError === true;

  // Legacy protocol shape
  if ('toolResult' in result) {
    const value = result.toolResult;
    return { text: typeof value === 'string' ? value : JSON.stringify(value ?? null), isError };
  }

  const content = Array.isArray(result.content) ? result.content : [];
  const text = content
    .filter((block): block is { type: 'text'; text: string } =>
      isRecord(block) && block.type === 'text' && typeof block.text === 'string')
    .map(block => block.text)
    .join('\n');

  return { text, isError };
}

/** Parse tool result text as JSON. Empty text gives null; non-JSON text comes back as the trimmed string. */
export function toolResultJson(result: unknown): { value: unknown; isError: boolean } {
  const { text, isError } = toolResultText(result);
  const trimmed = text.trim();
  if (!trimmed) return { value: null, isError };
  try {
    return { value: JSON.parse(trimmed), isError };
  } catch {
    return { value: trimmed, isError };
  }
}
