import { existsSync, readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { ConfigInvalidError, ConfigMissingError, NotFoundError, messageOf } from '../errors.js';
import { AgentsFileSchema, DEFAULT_AGENT_MODEL, type AgentDefinition, type AgentsFile } from './schema.js';

/**
 * Named agent definitions, loaded once from a YAML agent table:
 *
 * ```yaml
 * agents:
 *   fact_extractor:
 *     model: anthropic/claude-sonnet-4-0
 *     instruction: Extract every factual claim...
 *     sub_agents: []
 * ```
 */
export interface RegistryLoadOptions {
  /** Model for entries that name none (default: DEFAULT_AGENT_MODEL). */
  defaultModel?: string;
}

export class AgentRegistry {
  private readonly _agents = new Map<string, AgentDefinition>();

  constructor(definitions: AgentDefinition[]) {
    for (const def of definitions) {
      this._agents.set(def.name, def);
    }
  }

  /** Reads and validates an agent table from disk. */
  static load(path: string, options: RegistryLoadOptions = {}): AgentRegistry {
    if (!existsSync(path)) {
      throw new ConfigMissingError(path);
    }
    return AgentRegistry.parse(readFileSync(path, 'utf-8'), path, options);
  }

  static parse(source: string, path = '<inline>', options: RegistryLoadOptions = {}): AgentRegistry {
    let raw: unknown;
    try {
      raw = parseYaml(source);
    } catch (err) {
      throw new ConfigInvalidError(path, [`YAML parse error: ${messageOf(err)}`]);
    }

    const result = AgentsFileSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map(i =>
        i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message,
      );
      throw new ConfigInvalidError(path, issues);
    }

    return new AgentRegistry(toDefinitions(result.data, options.defaultModel ?? DEFAULT_AGENT_MODEL));
  }

  get size(): number {
    return this._agents.size;
  }

  names(): string[] {
    return [...this._agents.keys()];
  }

  has(name: string): boolean {
    return this._agents.has(name);
  }

  list(): AgentDefinition[] {
    return [...this._agents.values()];
  }

  get(name: string): AgentDefinition {
    const def = this._agents.get(name);
    if (!def) throw new NotFoundError('Agent', name);
    return def;
  }

  subAgents(name: string): string[] {
    return this.get(name).subAgents;
  }

  model(name: string): string {
    return this.get(name).model || DEFAULT_AGENT_MODEL;
  }
}

function toDefinitions(file: AgentsFile, defaultModel: string): AgentDefinition[] {
  return Object.entries(file.agents).map(([name, entry]) => ({
    name,
    model: entry?.model ?? defaultModel,
    instruction: entry?.instruction ?? '',
    subAgents: entry?.sub_agents ?? [],
  }));
}
