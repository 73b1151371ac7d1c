import type { ModelMessage } from 'ai';
import type { SessionErrorHandler } from '@factsieve/mcp';
import type { AgentDefinition } from '../agents/schema.js';
import { ExecutionFailedError } from '../errors.js';
import { withDeadline } from '../router/retry.js';
import type { ToolSessionProvider } from '../tools/provider.js';
import type { AgentRunner } from './runner.js';

export const DEFAULT_TASK_TIMEOUT_MS = 120_000;

/** Auxiliary data handed to an agent next to its prompt. Not validated. */
export type TaskContext = Record<string, unknown>;

export interface AgentExecutorOptions {
  agent: AgentDefinition;
  /** Role used for tool lookup; defaults to the agent name. */
  role?: string;
  tools: ToolSessionProvider;
  runner: AgentRunner;
  /** Deadline per task; 0 disables it. */
  timeoutMs?: number;
  onToolError?: SessionErrorHandler;
}

/**
 * Runs tasks for one configured agent. Every failure, the deadline
 * included, surfaces as ExecutionFailedError; the executor never reads
 * or writes analysis state.
 */
export class AgentExecutor {
  readonly agent: AgentDefinition;
  readonly role: string;
  private readonly tools: ToolSessionProvider;
  private readonly runner: AgentRunner;
  private readonly timeoutMs: number;
  private readonly onToolError?: SessionErrorHandler;

  constructor(options: AgentExecutorOptions) {
    this.agent = options.agent;
    this.role = options.role ?? options.agent.name;
    this.tools = options.tools;
    this.runner = options.runner;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TASK_TIMEOUT_MS;
    this.onToolError = options.onToolError;
  }

  get name(): string {
    return this.agent.name;
  }

  get model(): string {
    return this.agent.model;
  }

  /** Tool names this executor's role may invoke. */
  get toolNames(): string[] {
    return this.tools.toolsFor(this.role);
  }

  async runTask(prompt: string, context: TaskContext = {}): Promise<string> {
    const controller = new AbortController();
    try {
      return await withDeadline(
        this.invoke(prompt, context, controller.signal),
        this.timeoutMs,
        () => controller.abort(),
      );
    } catch (err) {
      throw new ExecutionFailedError(this.agent.name, err);
    }
  }

  private async invoke(prompt: string, context: TaskContext, abortSignal: AbortSignal): Promise<string> {
    const messages: ModelMessage[] = [];
    const rendered = renderContext(context);
    if (rendered) {
      messages.push({ role: 'user', content: rendered });
    }
    messages.push({ role: 'user', content: prompt });

    const tools = await this.tools.resolveTools(this.role, this.onToolError);

    return this.runner({
      agent: this.agent,
      system: this.agent.instruction || `You are the ${this.agent.name} agent.`,
      messages,
      tools,
      abortSignal,
    });
  }
}

/** Renders task context as a fenced JSON block; empty context renders nothing. */
export function renderContext(context: TaskContext): string | undefined {
  if (Object.keys(context).length === 0) return undefined;
  return `Context:\n\`\`\`json\n${JSON.stringify(context, null, 2)}\n\`\`\``;
}
