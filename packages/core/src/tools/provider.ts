import type { ToolSet } from 'ai';
import {
  MCPSessionPool,
  toToolSet,
  type MCPServerConfig,
  type MCPSession,
  type MCPTool,
  type MCPToolCaller,
  type SessionErrorHandler,
} from '@factsieve/mcp';
import { ALL_TOOLS, toolsForRole } from '../agents/roles.js';
import { toError } from '../errors.js';

interface ToolEntry {
  serverName: string;
  tool: MCPTool;
  callTool: MCPToolCaller;
}

/**
 * Answers "which tools may this role use" and hands out the shared MCP
 * sessions that serve them. One provider is shared by every executor of
 * an orchestrator, so sessions are opened at most once per server.
 */
export class ToolSessionProvider {
  constructor(private readonly pool: MCPSessionPool) {}

  static fromServers(servers: MCPServerConfig[], onCloseError?: SessionErrorHandler): ToolSessionProvider {
    return new ToolSessionProvider(new MCPSessionPool(servers, onCloseError));
  }

  /** Static tool names for a role; `['all']` for root, `[]` for unknown roles. */
  toolsFor(role: string): string[] {
    return toolsForRole(role);
  }

  serverNames(): string[] {
    return this.pool.serverNames();
  }

  get openSessionCount(): number {
    return this.pool.openCount;
  }

  /** Session for a configured server, or `undefined` when no such server exists. */
  getSession(serverName: string): Promise<MCPSession | undefined> {
    return this.pool.getSession(serverName);
  }

  /**
   * Builds the AI SDK tool set for a role from every server that can serve
   * it. Servers that fail to connect are reported and skipped.
   */
  async resolveTools(role: string, onError?: SessionErrorHandler): Promise<ToolSet> {
    const wanted = this.toolsFor(role);
    if (wanted.length === 0) return {};

    const wantsAll = wanted.includes(ALL_TOOLS);
    const candidates = this.pool.serverNames().filter(name => {
      const hint = this.pool.serverConfig(name)?.tools;
      return wantsAll || !hint || hint.some(t => wanted.includes(t));
    });

    const perServer = await Promise.all(candidates.map(async (name): Promise<ToolEntry[]> => {
      let session: MCPSession | undefined;
      try {
        session = await this.pool.getSession(name);
      } catch (err) {
        onError?.(name, toError(err));
        return [];
      }
      if (!session) return [];

      const open = session;
      return open.tools
        .filter(tool => wantsAll || wanted.includes(tool.name))
        .map(tool => ({
          serverName: name,
          tool,
          callTool: (toolName, args) => open.callTool(toolName, args),
        }));
    }));

    return toToolSet(perServer.flat());
  }

  /** Closes every open session. Safe to call repeatedly. */
  closeAll(): Promise<void> {
    return this.pool.closeAll();
  }
}
