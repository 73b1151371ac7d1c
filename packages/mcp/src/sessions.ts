import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { createHttpTransport } from './http.js';
import { createStdioTransport } from './stdio.js';
import type { MCPContentItem, MCPServerConfig, MCPTool, MCPToolResult } from './types.js';

const CLIENT_INFO = { name: 'factsieve', version: '0.1.0' };

/**
 * One long-lived connection to a named MCP server.
 */
export class MCPSession {
  constructor(
    readonly config: MCPServerConfig,
    private readonly client: Client,
    private readonly transport: Transport,
    readonly tools: MCPTool[],
  ) {}

  get serverName(): string {
    return this.config.name;
  }

  get transportKind(): 'stdio' | 'http' {
    return this.config.command ? 'stdio' : 'http';
  }

  async callTool(toolName: string, args: Record<string, unknown>): Promise<MCPToolResult> {
    const result = await this.client.callTool({ name: toolName, arguments: args });
    const content: MCPContentItem[] = Array.isArray(result.content) ? result.content : [];
    const isError = Boolean(result.isError);
    return { success: !isError, content, isError };
  }

  async close(): Promise<void> {
    try {
      await this.client.close();
    } finally {
      await this.transport.close();
    }
  }
}

export type SessionErrorHandler = (serverName: string, error: Error) => void;

/**
 * Lazily opens one session per configured server and reuses it.
 *
 * Concurrent first requests for the same server share a single in-flight
 * connection attempt. A failed attempt is not cached, so the next request
 * retries.
 */
export class MCPSessionPool {
  private readonly servers = new Map<string, MCPServerConfig>();
  private readonly sessions = new Map<string, MCPSession>();
  private readonly pending = new Map<string, Promise<MCPSession>>();

  constructor(
    servers: MCPServerConfig[],
    private readonly onCloseError?: SessionErrorHandler,
  ) {
    for (const server of servers) {
      this.servers.set(server.name, server);
    }
  }

  /** Names of every configured server, in configuration order. */
  serverNames(): string[] {
    return [...this.servers.keys()];
  }

  serverConfig(name: string): MCPServerConfig | undefined {
    return this.servers.get(name);
  }

  /** Number of sessions currently open. */
  get openCount(): number {
    return this.sessions.size;
  }

  isOpen(name: string): boolean {
    return this.sessions.has(name);
  }

  /**
   * Returns the session for `name`, connecting on first use.
   * Resolves to `undefined` when no server with that name is configured.
   */
  async getSession(name: string): Promise<MCPSession | undefined> {
    const existing = this.sessions.get(name);
    if (existing) return existing;

    const config = this.servers.get(name);
    if (!config) return undefined;

    const inFlight = this.pending.get(name);
    if (inFlight) return inFlight;

    const attempt = this.open(config).finally(() => {
      this.pending.delete(name);
    });
    this.pending.set(name, attempt);
    return attempt;
  }

  private async open(config: MCPServerConfig): Promise<MCPSession> {
    const transport = config.command
      ? createStdioTransport(config)
      : createHttpTransport(config);

    const client = new Client(CLIENT_INFO, { capabilities: {} });
    let tools: MCPTool[];
    try {
      await client.connect(transport);
      const listed = await client.listTools();
      tools = listed.tools.map(t => ({
        name: t.name,
        description: t.description,
        inputSchema: {
          type: 'object',
          properties: t.inputSchema.properties,
          required: t.inputSchema.required,
        },
      }));
    } catch (err) {
      // A half-open session is never pooled, so closeAll would not reach it.
      await this.discard(config, client, transport);
      throw err;
    }

    const session = new MCPSession(config, client, transport, tools);
    this.sessions.set(config.name, session);
    return session;
  }

  private async discard(config: MCPServerConfig, client: Client, transport: Transport): Promise<void> {
    try {
      await new MCPSession(config, client, transport, []).close();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.onCloseError?.(config.name, error);
    }
  }

  /**
   * Closes every open session. Never throws and may be called repeatedly;
   * close failures go to the `onCloseError` handler.
   */
  async closeAll(): Promise<void> {
    // Let in-flight connections land first so they are closed too.
    await Promise.allSettled([...this.pending.values()]);

    const open = [...this.sessions.values()];
    this.sessions.clear();

    await Promise.all(open.map(async (session) => {
      try {
        await session.close();
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        this.onCloseError?.(session.serverName, error);
      }
    }));
  }
}
