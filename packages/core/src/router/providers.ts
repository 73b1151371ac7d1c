import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { LanguageModel } from 'ai';

export type ProviderId = 'anthropic' | 'openai' | 'google';

export interface ProviderConfig {
  providers: {
    anthropic?: { apiKey?: string };
    openai?: { apiKey?: string };
    google?: { apiKey?: string };
  };
}

export interface ModelRef {
  provider: ProviderId;
  /** Model name as the provider knows it, without any `provider/` prefix. */
  model: string;
}

const PROVIDER_IDS: readonly ProviderId[] = ['anthropic', 'openai', 'google'];

const PROVIDER_LABELS: Record<ProviderId, string> = {
  anthropic: 'Anthropic',
  openai: 'OpenAI',
  google: 'Google',
};

function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some(id => id === value);
}

/**
 * Splits a model id into provider and model name. Accepts both
 * `anthropic/claude-sonnet-4-0` and bare names such as `gpt-4o`.
 */
export function parseModelId(modelId: string): ModelRef {
  const slash = modelId.indexOf('/');
  if (slash > 0) {
    const prefix = modelId.slice(0, slash);
    const model = modelId.slice(slash + 1);
    if (prefix === 'gemini') return { provider: 'google', model };
    if (isProviderId(prefix) && model.length > 0) return { provider: prefix, model };
    throw new Error(`Unknown model provider "${prefix}" in model id: ${modelId}`);
  }
  return { provider: detectProvider(modelId), model: modelId };
}

/** Determine which provider a bare model name belongs to. */
export function detectProvider(modelId: string): ProviderId {
  if (modelId.startsWith('claude-')) return 'anthropic';
  if (
    modelId.startsWith('gpt-') ||
    modelId.startsWith('o1') ||
    modelId.startsWith('o3')
  ) {
    return 'openai';
  }
  if (modelId.startsWith('gemini-')) return 'google';
  throw new Error(`Cannot determine provider for model: ${modelId}`);
}

/**
 * Registry that lazily initialises AI SDK providers and hands out
 * LanguageModel instances by model-id string.
 */
export class ProviderRegistry {
  private anthropicProvider: ReturnType<typeof createAnthropic> | null = null;
  private openaiProvider: ReturnType<typeof createOpenAI> | null = null;
  private googleProvider: ReturnType<typeof createGoogleGenerativeAI> | null = null;

  constructor(private readonly config: ProviderConfig) {}

  /** Return a LanguageModel for the given model-id, creating the provider lazily. */
  getModel(modelId: string): LanguageModel {
    const { provider, model } = parseModelId(modelId);

    switch (provider) {
      case 'anthropic': {
        if (!this.anthropicProvider) {
          this.anthropicProvider = createAnthropic({ apiKey: this.requireKey('anthropic') });
        }
        return this.anthropicProvider(model);
      }
      case 'openai': {
        if (!this.openaiProvider) {
          this.openaiProvider = createOpenAI({ apiKey: this.requireKey('openai') });
        }
        return this.openaiProvider(model);
      }
      case 'google': {
        if (!this.googleProvider) {
          this.googleProvider = createGoogleGenerativeAI({ apiKey: this.requireKey('google') });
        }
        return this.googleProvider(model);
      }
    }
  }

  private requireKey(provider: ProviderId): string {
    const apiKey = this.config.providers[provider]?.apiKey;
    if (!apiKey) {
      throw new Error(
        `${PROVIDER_LABELS[provider]} API key not configured. Set providers.${provider}.api_key in factsieve.config.yaml`,
      );
    }
    return apiKey;
  }
}
