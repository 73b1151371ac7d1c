import { z } from 'zod';

const envVarPattern = /^(env:|\\?\$\{?)/;

const envVarSchema = z.string().refine(
  (val) => envVarPattern.test(val),
  { message: 'Must start with env:, $, or ${' }
).brand('envVar');

export type EnvVar = z.infer<typeof envVarSchema>;

const apiKeySchema = z.union([
  envVarSchema,
  z.string().min(1),
]);

const providerConfigSchema = z.object({
  api_key: apiKeySchema.optional(),
}).strict();

const providersSchema = z.object({
  anthropic: providerConfigSchema.optional(),
  openai: providerConfigSchema.optional(),
  google: providerConfigSchema.optional(),
}).strict();

const defaultsSchema = z.object({
  model: z.string().min(1).optional(),
  output_dir: z.string().min(1).optional(),
  documents_dir: z.string().min(1).optional(),
}).strict();

const retentionSchema = z.object({
  max_entries: z.number().int().positive().optional(),
  ttl_ms: z.number().int().nonnegative().optional(),
}).strict();

const workflowSchema = z.object({
  agents_file: z.string().min(1).optional(),
  mcp_servers_file: z.string().min(1).optional(),
  timeout_ms: z.number().int().nonnegative().optional(),
  verification_concurrency: z.number().int().positive().optional(),
  max_tool_steps: z.number().int().positive().optional(),
  retention: retentionSchema.optional(),
}).strict();

const ConfigSchema = z.object({
  providers: providersSchema.optional(),
  defaults: defaultsSchema.optional(),
  workflow: workflowSchema.optional(),
}).strict();

export type RawConfig = z.infer<typeof ConfigSchema>;

export const PROVIDER_KEYS = ['anthropic', 'openai', 'google'] as const;
export type ProviderKey = typeof PROVIDER_KEYS[number];

export interface ResolvedProviderConfig {
  api_key?: string;
}

export interface Config {
  providers: Record<ProviderKey, ResolvedProviderConfig>;
  defaults: {
    model: string;
    output_dir: string;
    documents_dir: string;
  };
  workflow: {
    agents_file: string;
    mcp_servers_file: string;
    /** Per agent task; 0 disables the deadline. */
    timeout_ms: number;
    verification_concurrency: number;
    max_tool_steps: number;
    retention: {
      max_entries: number;
      ttl_ms: number;
    };
  };
}

export const ConfigDefaults: Config = {
  providers: {
    anthropic: {},
    openai: {},
    google: {},
  },
  defaults: {
    model: 'anthropic/claude-sonnet-4-0',
    output_dir: './output',
    documents_dir: './data/documents',
  },
  workflow: {
    agents_file: './agents/factsieve_agents.yaml',
    mcp_servers_file: './config/mcp_servers.yaml',
    timeout_ms: 120_000,
    verification_concurrency: 1,
    max_tool_steps: 8,
    retention: {
      max_entries: 1000,
      ttl_ms: 3_600_000,
    },
  },
};

export { ConfigSchema };
