export { MCPSession, MCPSessionPool, type SessionErrorHandler } from './sessions.js';

export {
  type MCPServerConfig,
  type MCPTool,
  type MCPToolResult,
  type MCPToolCaller,
  type MCPContentItem,
} from './types.js';

export {
  adaptMCPTool,
  toToolSet,
  jsonSchemaToZod,
  jsonSchemaPropertyToZod,
} from './adapter.js';

export { createStdioTransport } from './stdio.js';
export { createHttpTransport } from './http.js';
