import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { resolve } from 'path';
import { parse } from 'yaml';
import { ConfigSchema, ConfigDefaults, PROVIDER_KEYS, type Config, type ProviderKey } from './schema.js';

const DEFAULT_CONFIG_PATH = 'factsieve.config.yaml';

/** Standard environment variables per provider, in lookup order. */
const PROVIDER_ENV_KEYS: Record<ProviderKey, string[]> = {
  anthropic: ['ANTHROPIC_API_KEY'],
  openai: ['OPENAI_API_KEY'],
  google: ['GEMINI_API_KEY', 'GOOGLE_API_KEY'],
};

export function expandTilde(path: string): string {
  if (path.startsWith('~/') || path === '~') {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

function resolveEnvVar(value: string): string {
  if (value.startsWith('env:')) {
    const envKey = value.slice(4);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  if (value.startsWith('${') && value.endsWith('}')) {
    const envKey = value.slice(2, -1);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  if (value.startsWith('$')) {
    const envKey = value.slice(1);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  return value;
}

function stripNullValues(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return undefined;
  }
  if (Array.isArray(obj)) {
    return obj.filter(item => item !== null).map(stripNullValues);
  }
  if (typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== null) {
        result[key] = stripNullValues(value);
      }
    }
    return result;
  }
  return obj;
}

function resolveEnvVarsInObject(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }
  if (typeof obj === 'string') {
    return resolveEnvVar(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVarsInObject);
  }
  if (typeof obj === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvVarsInObject(value);
    }
    return resolved;
  }
  return obj;
}

export interface LoadConfigOptions {
  configPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isUnresolvedEnvRef(value: string | undefined): boolean {
  if (!value) return false;
  return value.startsWith('env:') || value.startsWith('$');
}

function firstEnvValue(keys: string[]): { key: string; value: string } | undefined {
  for (const key of keys) {
    const value = process.env[key];
    if (value) return { key, value };
  }
  return undefined;
}

/**
 * Clears API keys that still hold an unresolved env reference, then falls
 * back to the standard environment variables. Returns the variables used.
 */
function applyEnvVarFallbacks(config: Config): string[] {
  const used: string[] = [];
  for (const provider of PROVIDER_KEYS) {
    const entry = config.providers[provider];
    if (isUnresolvedEnvRef(entry.api_key)) {
      entry.api_key = undefined;
    }
    if (!entry.api_key) {
      const found = firstEnvValue(PROVIDER_ENV_KEYS[provider]);
      if (found) {
        entry.api_key = found.value;
        used.push(found.key);
      }
    }
  }

  const agentsFile = process.env['FACTSIEVE_AGENTS_FILE'];
  if (agentsFile) config.workflow.agents_file = agentsFile;
  const mcpConfig = process.env['FACTSIEVE_MCP_CONFIG'];
  if (mcpConfig) config.workflow.mcp_servers_file = mcpConfig;

  return used;
}

export interface LoadConfigResult {
  config: Config;
  configFileExists: boolean;
  envKeysUsed: string[];
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return loadConfigWithMeta(options).config;
}

export function loadConfigWithMeta(options: LoadConfigOptions = {}): LoadConfigResult {
  const configPath = getConfigPath(options.configPath);
  const configFileExists = existsSync(configPath);

  const result = structuredClone(ConfigDefaults);

  if (configFileExists) {
    let fileContent: string;
    try {
      fileContent = readFileSync(configPath, 'utf-8');
    } catch {
      throw new ConfigError(`Failed to read config file: ${configPath}`);
    }

    let rawConfig: unknown;
    try {
      rawConfig = parse(fileContent);
    } catch {
      throw new ConfigError(`Failed to parse config file: ${configPath}`);
    }

    if (rawConfig !== null && rawConfig !== undefined) {
      const validated = ConfigSchema.safeParse(resolveEnvVarsInObject(stripNullValues(rawConfig)));

      if (!validated.success) {
        const issues = validated.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
        throw new ConfigError(`Invalid config: ${issues}`);
      }

      const { providers, defaults, workflow } = validated.data;
      if (providers) {
        for (const provider of PROVIDER_KEYS) {
          result.providers[provider] = { ...result.providers[provider], ...providers[provider] };
        }
      }
      if (defaults) {
        result.defaults = { ...result.defaults, ...defaults };
      }
      if (workflow) {
        const { retention, ...rest } = workflow;
        result.workflow = {
          ...result.workflow,
          ...rest,
          retention: { ...result.workflow.retention, ...retention },
        };
      }
    }
  }

  const envKeysUsed = applyEnvVarFallbacks(result);

  return { config: result, configFileExists, envKeysUsed };
}

export function getConfigPath(configPath?: string): string {
  if (configPath) {
    return expandTilde(configPath);
  }
  return resolve(process.cwd(), DEFAULT_CONFIG_PATH);
}

export function hasAnyApiKey(config: Config): boolean {
  return PROVIDER_KEYS.some(p => Boolean(config.providers[p].api_key));
}
