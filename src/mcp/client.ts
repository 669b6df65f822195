/**
 * MCP aggregator client — connects to the page-session server and, when a
 * fallback channel is configured, the messages server. Tool calls are
 * addressed as `<server>__<tool>`.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { getConfig } from '../config.js';
import type { McpTransportKind } from '../config.js';
import { logger } from '../logger.js';
import { parsePrefixedToolName } from './tool-result.js';
import type { ToolCaller } from './tool-result.js';

const CONNECT_TIMEOUT_MS = 10_000;
const CALL_TIMEOUT_MS = 15_000;

interface ServerConfig {
  name: string;
  url: string;
  token: string;
  required: boolean;
  transport: McpTransportKind;
}

interface ServerConnection {
  client: Client;
  transport: SSEClientTransport | StreamableHTTPClientTransport;
  config: ServerConfig;
}

export class McpAggregator implements ToolCaller {
  private servers = new Map<string, ServerConnection>();
  private reconnectTimers = new Map<string, ReturnType<typeof setTimeout>>();
  private serverConfigs: ServerConfig[] = [];
  private _shuttingDown = false;
  private _cleaningUp = false;

  /**
   * Connect to all configured MCP servers in parallel.
   * The page server is required; the messages server only backs the fallback channel.
   */
  async connect(): Promise<void> {
    const config = getConfig();
    this._shuttingDown = false;

    this.serverConfigs = [
      { name: 'page', url: config.pageMcpUrl, token: config.pageMcpToken, required: true, transport: config.mcpTransport },
    ];
    if (config.messagesMcpUrl) {
      this.serverConfigs.push({
        name: 'messages', url: config.messagesMcpUrl, token: config.messagesMcpToken, required: false, transport: config.mcpTransport,
      });
    }

    const pending = this.serverConfigs.filter(conn => !this.servers.has(conn.name));
    const results = await Promise.allSettled(pending.map((conn) => this.connectServer(conn)));

    let requiredFailure: string | null = null;
    for (let i = 0; i < results.length; i++) {
      const result = results[i];
      const conn = pending[i];
      if (result.status === 'rejected') {
        if (conn.required) {
          requiredFailure = `Failed to connect to required MCP server '${conn.name}': ${result.reason}`;
        } else {
          logger.warn(`Failed to connect to optional MCP server '${conn.name}':`, result.reason);
        }
      }
    }

    // Close partial connections before throwing; _cleaningUp keeps onclose from scheduling reconnects.
    if (requiredFailure) {
      this._cleaningUp = true;
      for (const [name, conn] of this.servers) {
        try {
          await conn.transport.close();
          logger.info(`MCP aggregator: cleaned up partial connection to '${name}'`);
        } catch (err) {
          logger.debug(`MCP aggregator: cleanup of '${name}' failed:`, err);
        }
      }
      this.servers.clear();
      this._cleaningUp = false;
      throw new Error(requiredFailure);
    }
  }

  private async connectServer(serverConfig: ServerConfig): Promise<void> {
    const { name, url: baseUrl, token } = serverConfig;
    const authHeaders: Record<string, string> = token ? { Authorization: `Bearer ${token}` } : {};

    let transport: SSEClientTransport | StreamableHTTPClientTransport;
    if (serverConfig.transport === 'streamable-http') {
      transport = new StreamableHTTPClientTransport(new URL('/mcp', baseUrl), {
        requestInit: { headers: authHeaders },
      });
    } else {
      const sseUrl = new URL('/sse', baseUrl);
      if (token) {
        sseUrl.searchParams.set('token', token);
      }
      transport = new SSEClientTransport(sseUrl, {
        requestInit: { headers: authHeaders },
      });
    }
    const client = new Client(
      { name: `class-poll-watcher-${name}`, version: '0.1.0' },
      { capabilities: {} }
    );

    let connectTimer: ReturnType<typeof setTimeout> | null = null;
    try {
      await Promise.race([
        client.connect(transport),
        new Promise<never>((_, reject) => {
          connectTimer = setTimeout(() => {
            transport.close().catch((err: unknown) => logger.debug(`MCP aggregator: close after timeout failed:`, err));
            reject(new Error(`MCP connect to '${name}' timed out after ${CONNECT_TIMEOUT_MS / 1000}s`));
          }, CONNECT_TIMEOUT_MS);
        }),
      ]);
    } finally {
      if (connectTimer) clearTimeout(connectTimer);
    }

    const toolsResult = await client.listTools();
    this.servers.set(name, { client, transport, config: serverConfig });
    logger.info(`MCP aggregator: connected to '${name}' — ${(toolsResult.tools ?? []).length} tools`);

    transport.onclose = () => {
      if (this._shuttingDown || this._cleaningUp) return;
      logger.warn(`MCP aggregator: lost connection to '${name}' — scheduling reconnect`);
      this.servers.delete(name);
      this.scheduleReconnect(serverConfig);
    };

    transport.onerror = (err) => {
      if (this._shuttingDown || this._cleaningUp) return;
      logger.warn(`MCP aggregator: error on '${name}':`, err);
      // onclose will fire after onerror, triggering reconnect
    };
  }

  private scheduleReconnect(serverConfig: ServerConfig, attempt = 1): void {
    const { name } = serverConfig;
    if (this._shuttingDown) return;
    if (this.reconnectTimers.has(name)) return;

    // Exponential backoff: 2s, 4s, 8s, 16s, 30s cap
    const delay = Math.min(2000 * Math.pow(2, attempt - 1), 30_000);
    logger.info(`MCP aggregator: reconnecting to '${name}' in ${delay}ms (attempt ${attempt})`);

    const timer = setTimeout(() => {
      this.reconnectTimers.delete(name);
      this.connectServer(serverConfig).then(() => {
        logger.info(`MCP aggregator: reconnected to '${name}'`);
      }).catch((err) => {
        logger.warn(`MCP aggregator: reconnect to '${name}' failed:`, err);
        this.scheduleReconnect(serverConfig, attempt + 1);
      });
    }, delay);

    this.reconnectTimers.set(name, timer);
  }

  /** Route a prefixed tool call to the correct server. */
  async callTool(prefixedName: string, args: Record<string, unknown>): Promise<unknown> {
    const parsed = parsePrefixedToolName(prefixedName);
    if (!parsed) {
      throw new Error(`Invalid tool name format: ${prefixedName}`);
    }

    const conn = this.servers.get(parsed.server);
    if (!conn) {
      throw new Error(`MCP server '${parsed.server}' not connected`);
    }

    return conn.client.callTool(
      { name: parsed.tool, arguments: args },
      undefined,
      { timeout: CALL_TIMEOUT_MS },
    );
  }

  /** Check if a specific server is connected. */
  isConnected(serverName: string): boolean {
    return this.servers.has(serverName);
  }

  /** Health check: the server answers a listTools probe. */
  async healthCheck(serverName: string): Promise<boolean> {
    const conn = this.servers.get(serverName);
    if (!conn) return false;
    try {
      await conn.client.listTools();
      return true;
    } catch (err) {
      logger.debug(`MCP aggregator: health probe for '${serverName}' failed:`, err);
      return false;
    }
  }

  /** Disconnect from all servers and cancel pending reconnects. */
  async disconnect(): Promise<void> {
    this._shuttingDown = true;

    for (const [, timer] of this.reconnectTimers) {
      clearTimeout(timer);
    }
    this.reconnectTimers.clear();

    for (const [name, conn] of this.servers) {
      try {
        await conn.transport.close();
        logger.info(`MCP aggregator: disconnected from '${name}'`);
      } catch (err) {
        logger.warn(`MCP aggregator: error disconnecting from '${name}':`, err);
      }
    }
    this.servers.clear();
  }
}
