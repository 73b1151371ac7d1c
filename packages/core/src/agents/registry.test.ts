import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { AgentRegistry } from './registry.js';
import { DEFAULT_AGENT_MODEL } from './schema.js';
import { ConfigInvalidError, ConfigMissingError, NotFoundError } from '../errors.js';

const AGENTS_YAML = `
agents:
  root:
    model: anthropic/claude-opus-4-1
    instruction: Coordinate the analysis.
    sub_agents: [document_processor, fact_extractor]
  document_processor:
    instruction: Parse the document.
  fact_extractor:
`;

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'factsieve-agents-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('AgentRegistry.load', () => {
  it('loads agents from a YAML file', () => {
    const path = join(tempDir, 'agents.yaml');
    writeFileSync(path, AGENTS_YAML);

    const registry = AgentRegistry.load(path);

    expect(registry.names()).toEqual(['root', 'document_processor', 'fact_extractor']);
    expect(registry.size).toBe(3);
  });

  it('fails with ConfigMissingError when the file does not exist', () => {
    const path = join(tempDir, 'missing.yaml');
    expect(() => AgentRegistry.load(path)).toThrow(ConfigMissingError);
    expect(() => AgentRegistry.load(path)).toThrow(`Configuration file not found: ${path}`);
  });

  it('fails with ConfigInvalidError for malformed YAML', () => {
    const path = join(tempDir, 'agents.yaml');
    writeFileSync(path, 'agents: [unclosed');
    expect(() => AgentRegistry.load(path)).toThrow(ConfigInvalidError);
  });
});

describe('AgentRegistry.parse', () => {
  it('rejects a document without an agents table', () => {
    expect(() => AgentRegistry.parse('servers: {}')).toThrow(ConfigInvalidError);
  });

  it('lists schema issues with their paths', () => {
    try {
      AgentRegistry.parse('agents:\n  root:\n    model: 42\n');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigInvalidError);
      if (err instanceof ConfigInvalidError) {
        expect(err.issues[0]).toMatch(/^agents\.root\.model: /);
        expect(err.code).toBe('CONFIG_INVALID');
      }
    }
  });

  it('rejects unknown agent keys', () => {
    expect(() => AgentRegistry.parse('agents:\n  root:\n    temperature: 0.2\n')).toThrow(ConfigInvalidError);
  });
});

describe('AgentRegistry lookups', () => {
  const registry = AgentRegistry.parse(AGENTS_YAML);

  it('returns a full definition', () => {
    expect(registry.get('root')).toEqual({
      name: 'root',
      model: 'anthropic/claude-opus-4-1',
      instruction: 'Coordinate the analysis.',
      subAgents: ['document_processor', 'fact_extractor'],
    });
  });

  it('fills defaults for sparse entries', () => {
    expect(registry.get('fact_extractor')).toEqual({
      name: 'fact_extractor',
      model: DEFAULT_AGENT_MODEL,
      instruction: '',
      subAgents: [],
    });
  });

  it('falls back to the default model', () => {
    expect(registry.model('document_processor')).toBe('anthropic/claude-sonnet-4-0');
  });

  it('uses a caller-supplied default model for entries without one', () => {
    const custom = AgentRegistry.parse(AGENTS_YAML, '<inline>', { defaultModel: 'openai/gpt-4o' });
    expect(custom.model('document_processor')).toBe('openai/gpt-4o');
    expect(custom.model('root')).toBe('anthropic/claude-opus-4-1');
  });

  it('returns sub-agents', () => {
    expect(registry.subAgents('root')).toEqual(['document_processor', 'fact_extractor']);
    expect(registry.subAgents('document_processor')).toEqual([]);
  });

  it('fails with NotFoundError for unknown agents', () => {
    expect(() => registry.get('ghost')).toThrow(NotFoundError);
    expect(() => registry.model('ghost')).toThrow('Agent not found: ghost');
    expect(() => registry.subAgents('ghost')).toThrow(NotFoundError);
    expect(registry.has('ghost')).toBe(false);
  });
});
