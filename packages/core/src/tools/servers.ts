import { existsSync, readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { MCPServerConfig } from '@factsieve/mcp';
import { ConfigInvalidError, ConfigMissingError, messageOf } from '../errors.js';

const stringMap = z.record(z.string(), z.string());

const ServerEntrySchema = z.object({
  command: z.string().optional(),
  args: z.array(z.string()).optional(),
  env: stringMap.optional(),
  url: z.string().url().optional(),
  headers: stringMap.optional(),
  tools: z.array(z.string()).optional(),
}).strict().superRefine((server, ctx) => {
  const hasCommand = typeof server.command === 'string' && server.command.length > 0;
  const hasUrl = typeof server.url === 'string' && server.url.length > 0;

  if (hasCommand === hasUrl) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'MCP server must define exactly one of command or url',
      path: ['command'],
    });
  }
  if (!hasCommand && server.args) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'MCP server args require command',
      path: ['args'],
    });
  }
});

export const MCPServersFileSchema = z.object({
  mcp_servers: z.record(z.string(), ServerEntrySchema).nullable().optional(),
});

/** Parses an MCP server table (`mcp_servers: { <name>: {...} }`). */
export function parseMCPServers(source: string, path = '<inline>'): MCPServerConfig[] {
  let raw: unknown;
  try {
    raw = parseYaml(source);
  } catch (err) {
    throw new ConfigInvalidError(path, [`YAML parse error: ${messageOf(err)}`]);
  }

  // An empty document means no servers.
  const result = MCPServersFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(i =>
      i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message,
    );
    throw new ConfigInvalidError(path, issues);
  }

  return Object.entries(result.data.mcp_servers ?? {}).map(([name, entry]) => ({ name, ...entry }));
}

export function loadMCPServers(path: string): MCPServerConfig[] {
  if (!existsSync(path)) {
    throw new ConfigMissingError(path);
  }
  return parseMCPServers(readFileSync(path, 'utf-8'), path);
}
