import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { MCPServerConfig } from './types.js';

/**
 * Creates a Streamable HTTP transport for a remote MCP server
 * (POST for requests, Server-Sent Events for responses).
 */
export function createHttpTransport(config: MCPServerConfig): Transport {
  if (!config.url) {
    throw new Error(`MCP server "${config.name}" has no URL configured for HTTP transport`);
  }

  return new StreamableHTTPClientTransport(new URL(config.url), {
    requestInit: config.headers ? { headers: config.headers } : undefined,
  });
}
