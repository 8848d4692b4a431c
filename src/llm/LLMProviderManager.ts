/**
 * LLM Provider Manager
 * Registers the configured providers and routes requests to the default one
 */

import type { LlmConfig, ProviderName } from '../config.js';
import { CollaboratorError } from '../errors.js';
import { LLMProvider, LLMResponse, Message, LLMRequestOptions } from './LLMProvider.js';
import { OpenAIProvider } from './OpenAIProvider.js';
import { ClaudeProvider } from './ClaudeProvider.js';
import { SamplingProvider } from './SamplingProvider.js';

export interface LLMManagerConfig {
  llm: LlmConfig;
  enableSamplingFallback?: boolean;
}

export class LLMProviderManager {
  private providers = new Map<ProviderName, LLMProvider>();
  private defaultProvider: ProviderName;
  private defaultModel?: string;

  constructor(config: LLMManagerConfig) {
    this.defaultProvider = config.llm.provider;
    this.defaultModel = config.llm.model;
    this.initializeProviders(config);
  }

  private initializeProviders({ llm, enableSamplingFallback }: LLMManagerConfig): void {
    if (llm.openaiApiKey) {
      this.providers.set('openai', new OpenAIProvider({ apiKey: llm.openaiApiKey, timeoutMs: llm.timeoutMs }));
    } else if (this.defaultProvider === 'openai') {
      throw new Error('OPENAI_API_KEY must be set when using the OpenAI provider.');
    }

    if (llm.anthropicApiKey) {
      this.providers.set('claude', new ClaudeProvider({ apiKey: llm.anthropicApiKey, timeoutMs: llm.timeoutMs }));
    } else if (this.defaultProvider === 'claude') {
      throw new Error('ANTHROPIC_API_KEY must be set when using the Anthropic provider.');
    }

    if (enableSamplingFallback !== false || this.defaultProvider === 'sampling') {
      this.providers.set('sampling', new SamplingProvider(llm.timeoutMs));
    }

    if (!this.providers.has(this.defaultProvider)) {
      throw new Error(`Default provider '${this.defaultProvider}' could not be initialized.`);
    }
  }

  getAvailableProviders(): ProviderName[] {
    return Array.from(this.providers.keys());
  }

  async generateMessage(
    messages: Message[],
    options: LLMRequestOptions & { provider?: ProviderName } = {}
  ): Promise<LLMResponse> {
    const { provider: providerName, ...llmOptions } = options;
    const name = providerName ?? this.defaultProvider;

    const provider = this.providers.get(name);
    if (!provider) {
      throw new CollaboratorError(
        'llm',
        `Provider '${name}' not available. Available providers: ${this.getAvailableProviders().join(', ')}`,
        { retryable: false }
      );
    }

    return provider.generateMessage(messages, { model: this.defaultModel, ...llmOptions });
  }
}
