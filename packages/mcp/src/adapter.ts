import { dynamicTool, type Tool, type ToolSet } from 'ai';
import { z } from 'zod';
import type { MCPTool, MCPToolCaller, MCPToolResult } from './types.js';

// ---------------------------------------------------------------------------
// JSON Schema → Zod conversion
// ---------------------------------------------------------------------------

type JsonSchema = Record<string, unknown>;

function isRecord(value: unknown): value is JsonSchema {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringTuple(values: unknown[]): values is [string, ...string[]] {
  return values.length > 0 && values.every(v => typeof v === 'string');
}

/**
 * Converts a JSON Schema property to a Zod schema.
 * Unsupported constructs (oneOf, anyOf, $ref) become z.unknown().
 */
export function jsonSchemaPropertyToZod(schema: unknown): z.ZodTypeAny {
  if (!isRecord(schema)) return z.unknown();

  if (Array.isArray(schema.enum)) {
    return isStringTuple(schema.enum) ? z.enum(schema.enum) : z.unknown();
  }

  let result: z.ZodTypeAny;
  switch (schema.type) {
    case 'string':
      result = z.string();
      break;
    case 'number':
    case 'integer': {
      let n = schema.type === 'integer' ? z.number().int() : z.number();
      if (typeof schema.minimum === 'number') n = n.min(schema.minimum);
      if (typeof schema.maximum === 'number') n = n.max(schema.maximum);
      result = n;
      break;
    }
    case 'boolean':
      result = z.boolean();
      break;
    case 'array':
      result = z.array(jsonSchemaPropertyToZod(schema.items));
      break;
    case 'object':
      result = isRecord(schema.properties) ? jsonSchemaToZod(schema) : z.record(z.unknown());
      break;
    default:
      result = z.unknown();
  }

  return typeof schema.description === 'string' ? result.describe(schema.description) : result;
}

/**
 * Converts an MCP tool inputSchema (a JSON Schema object) to a Zod object.
 * Properties not listed in `required` become optional.
 */
export function jsonSchemaToZod(schema: JsonSchema): z.ZodObject<z.ZodRawShape> {
  const required = new Set(
    Array.isArray(schema.required) ? schema.required.filter(k => typeof k === 'string') : [],
  );
  const properties = isRecord(schema.properties) ? schema.properties : {};
  const shape: z.ZodRawShape = {};

  for (const [key, propSchema] of Object.entries(properties)) {
    const prop = jsonSchemaPropertyToZod(propSchema);
    shape[key] = required.has(key) ? prop : prop.optional();
  }

  return z.object(shape);
}

// ---------------------------------------------------------------------------
// MCP tool → AI SDK tool
// ---------------------------------------------------------------------------

/** Per-call timeout for MCP tool invocations. */
const MCP_TOOL_TIMEOUT_MS = 30_000;

function textOf(result: MCPToolResult): string {
  return result.content
    .filter(c => c.type === 'text' && typeof c.text === 'string')
    .map(c => c.text)
    .join('\n');
}

function withToolTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`MCP tool call timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    promise.then(
      (value) => { clearTimeout(timer); resolve(value); },
      (error: unknown) => { clearTimeout(timer); reject(error); },
    );
  });
}

/**
 * Adapts one MCP tool into an AI SDK tool. Arguments are validated against
 * the converted schema before the server is called; server-side errors are
 * returned to the model as `{ error }` instead of throwing.
 */
export function adaptMCPTool(
  serverName: string,
  tool: MCPTool,
  callTool: MCPToolCaller,
  timeoutMs: number = MCP_TOOL_TIMEOUT_MS,
): Tool {
  const parameters = jsonSchemaToZod(tool.inputSchema);

  return dynamicTool({
    description: tool.description ?? `MCP tool: ${tool.name} (from ${serverName})`,
    inputSchema: parameters,
    execute: async (input: unknown): Promise<unknown> => {
      const validated = parameters.safeParse(input);
      if (!validated.success) {
        return { error: validated.error.issues.map(i => i.message).join('; ') };
      }

      const result = await withToolTimeout(callTool(tool.name, validated.data), timeoutMs);
      const text = textOf(result);

      if (result.isError) {
        return { error: text || 'MCP tool execution failed' };
      }

      if (text.startsWith('{') || text.startsWith('[')) {
        try {
          return JSON.parse(text);
        } catch {
          return text;
        }
      }
      return text;
    },
  });
}

/**
 * Builds a tool set keyed by the tools' original names. When two servers
 * expose the same name, the first one wins.
 */
export function toToolSet(
  entries: Array<{ serverName: string; tool: MCPTool; callTool: MCPToolCaller }>,
): ToolSet {
  const toolSet: ToolSet = {};
  for (const { serverName, tool, callTool } of entries) {
    if (tool.name in toolSet) continue;
    toolSet[tool.name] = adaptMCPTool(serverName, tool, callTool);
  }
  return toolSet;
}
