/**
 * Connection parameters for one named MCP server.
 * Exactly one of `command` (stdio) or `url` (streamable HTTP) is set.
 */
export interface MCPServerConfig {
  name: string;
  /** Command to spawn (stdio transport) */
  command?: string;
  /** Arguments for the command */
  args?: string[];
  /** Extra environment for the spawned command */
  env?: Record<string, string>;
  /** URL for HTTP transport */
  url?: string;
  /** Extra request headers for HTTP transport */
  headers?: Record<string, string>;
  /**
   * Tool names this server is known to expose. When present, the pool
   * skips connecting to the server for roles that need none of them.
   */
  tools?: string[];
}

/** Tool description as listed by an MCP server. */
export interface MCPTool {
  name: string;
  description?: string;
  inputSchema: {
    type: 'object';
    properties?: Record<string, unknown>;
    required?: string[];
  };
}

export interface MCPContentItem {
  type: string;
  text?: string;
  data?: string;
  mimeType?: string;
}

/**
 * Result of executing an MCP tool.
 */
export interface MCPToolResult {
  success: boolean;
  content: MCPContentItem[];
  isError: boolean;
}

/** Signature used to invoke a tool on one server by its original name. */
export type MCPToolCaller = (toolName: string, args: Record<string, unknown>) => Promise<MCPToolResult>;
