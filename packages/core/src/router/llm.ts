import { generateText, stepCountIs, type LanguageModel, type ModelMessage, type ToolSet } from 'ai';
import { withRetry, type RetryPolicy } from './retry.js';

export interface LLMCallOptions {
  model: LanguageModel;
  system: string;
  messages: ModelMessage[];
  tools?: ToolSet;
  maxOutputTokens?: number;
  temperature?: number;
  /** Retry policy; transient failures are retried until the signal aborts. */
  retry?: RetryPolicy;
  abortSignal?: AbortSignal;
  /** Maximum number of tool-use steps for multi-step agent loops. */
  maxToolSteps?: number;
}

export interface LLMToolCall {
  toolName: string;
  input: unknown;
}

export interface LLMResponse {
  content: string;
  toolCalls?: LLMToolCall[];
  usage: { inputTokens: number; outputTokens: number };
  /** Number of attempts made (1 = no retries needed). */
  attempts: number;
}

/**
 * Single-shot LLM call, retried on rate limits, 5xx and dropped connections.
 * With tools and `maxToolSteps > 1` the SDK runs the tool loop and the
 * returned content is the final text.
 */
export async function callLLM(options: LLMCallOptions): Promise<LLMResponse> {
  const maxSteps = options.tools && Object.keys(options.tools).length > 0 ? options.maxToolSteps ?? 1 : 1;
  const multiStep = maxSteps > 1;

  const { result, attempts } = await withRetry(
    async () => {
      const result = await generateText({
        model: options.model,
        system: options.system,
        messages: options.messages,
        tools: options.tools,
        maxOutputTokens: options.maxOutputTokens,
        temperature: options.temperature,
        abortSignal: options.abortSignal,
        ...(multiStep ? { stopWhen: stepCountIs(maxSteps) } : {}),
      });

      const usage = multiStep ? result.totalUsage : result.usage;
      const toolCalls = result.toolCalls.map(tc => ({
        toolName: tc.toolName,
        input: tc.input,
      }));

      return {
        content: result.text,
        toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
        usage: {
          inputTokens: usage.inputTokens ?? 0,
          outputTokens: usage.outputTokens ?? 0,
        },
      };
    },
    options.retry,
    options.abortSignal,
  );

  return { ...result, attempts };
}
