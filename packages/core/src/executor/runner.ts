import type { ModelMessage, ToolSet } from 'ai';
import type { AgentDefinition } from '../agents/schema.js';
import { callLLM } from '../router/llm.js';
import type { ProviderRegistry } from '../router/providers.js';
import type { RetryPolicy } from '../router/retry.js';

export interface AgentRunRequest {
  agent: AgentDefinition;
  system: string;
  messages: ModelMessage[];
  tools: ToolSet;
  /** Aborted when the executor's deadline expires. */
  abortSignal: AbortSignal;
}

/** The opaque text-in/text-out call behind every agent. */
export type AgentRunner = (request: AgentRunRequest) => Promise<string>;

export interface LLMRunnerOptions {
  /** Tool-use steps per call (default: 8). */
  maxToolSteps?: number;
  maxOutputTokens?: number;
  temperature?: number;
  retry?: RetryPolicy;
}

const DEFAULT_MAX_TOOL_STEPS = 8;

/** Runner that sends the request to the agent's model through the AI SDK. */
export function createLLMRunner(providers: ProviderRegistry, options: LLMRunnerOptions = {}): AgentRunner {
  return async ({ agent, system, messages, tools, abortSignal }) => {
    const response = await callLLM({
      model: providers.getModel(agent.model),
      system,
      messages,
      tools,
      maxToolSteps: options.maxToolSteps ?? DEFAULT_MAX_TOOL_STEPS,
      maxOutputTokens: options.maxOutputTokens,
      temperature: options.temperature,
      retry: options.retry,
      abortSignal,
    });
    return response.content;
  };
}
