import { describe, it, expect, vi } from 'vitest';
import { AgentExecutor, renderContext } from './executor.js';
import type { AgentRunRequest, AgentRunner } from './runner.js';
import type { AgentDefinition } from '../agents/schema.js';
import { ExecutionFailedError } from '../errors.js';
import { ToolSessionProvider } from '../tools/provider.js';

const AGENT: AgentDefinition = {
  name: 'fact_extractor',
  model: 'anthropic/claude-sonnet-4-0',
  instruction: 'Extract claims as JSON.',
  subAgents: [],
};

function makeExecutor(runner: AgentRunner, overrides: Partial<AgentDefinition> = {}, timeoutMs?: number) {
  return new AgentExecutor({
    agent: { ...AGENT, ...overrides },
    tools: ToolSessionProvider.fromServers([]),
    runner,
    timeoutMs,
  });
}

describe('renderContext', () => {
  it('renders nothing for empty context', () => {
    expect(renderContext({})).toBeUndefined();
  });

  it('renders a fenced JSON block', () => {
    expect(renderContext({ path: 'doc.pdf' })).toBe('Context:\n```json\n{\n  "path": "doc.pdf"\n}\n```');
  });
});

describe('AgentExecutor', () => {
  it('exposes the agent and its role tools', () => {
    const executor = makeExecutor(async () => '');
    expect(executor.name).toBe('fact_extractor');
    expect(executor.model).toBe('anthropic/claude-sonnet-4-0');
    expect(executor.toolNames).toEqual(['read_file', 'search']);
  });

  it('sends the instruction as system prompt and context before the prompt', async () => {
    const runner = vi.fn<AgentRunner>().mockResolvedValue('{"claims":[]}');
    const executor = makeExecutor(runner);

    const output = await executor.runTask('Extract claims.', { path: 'doc.pdf' });

    expect(output).toBe('{"claims":[]}');
    const request: AgentRunRequest = runner.mock.calls[0][0];
    expect(request.system).toBe('Extract claims as JSON.');
    expect(request.messages).toEqual([
      { role: 'user', content: 'Context:\n```json\n{\n  "path": "doc.pdf"\n}\n```' },
      { role: 'user', content: 'Extract claims.' },
    ]);
    expect(request.tools).toEqual({});
    expect(request.abortSignal.aborted).toBe(false);
  });

  it('sends only the prompt when there is no context', async () => {
    const runner = vi.fn<AgentRunner>().mockResolvedValue('ok');
    await makeExecutor(runner).runTask('Hello');
    expect(runner.mock.calls[0][0].messages).toEqual([{ role: 'user', content: 'Hello' }]);
  });

  it('falls back to a generic system prompt without an instruction', async () => {
    const runner = vi.fn<AgentRunner>().mockResolvedValue('ok');
    await makeExecutor(runner, { instruction: '' }).runTask('Hello');
    expect(runner.mock.calls[0][0].system).toBe('You are the fact_extractor agent.');
  });

  it('wraps runner failures with the agent name and cause', async () => {
    const cause = new Error('model exploded');
    const executor = makeExecutor(async () => {
      throw cause;
    });

    const error = await executor.runTask('Hello').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExecutionFailedError);
    expect(error).toMatchObject({ agentName: 'fact_extractor', message: 'model exploded', cause });
  });

  it('fails and aborts the runner when the deadline passes', async () => {
    let signal: AbortSignal | undefined;
    const executor = makeExecutor(request => {
      signal = request.abortSignal;
      return new Promise<string>(() => {});
    }, {}, 20);

    await expect(executor.runTask('Hello')).rejects.toThrow('Operation timed out after 20ms');
    expect(signal?.aborted).toBe(true);
  });
});
