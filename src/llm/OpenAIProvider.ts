/**
 * OpenAI API Provider
 * Integration with OpenAI chat completion models
 */

import { CollaboratorError } from '../errors.js';
import { BaseLLMProvider, isRecord, LLMResponse, Message, LLMRequestOptions } from './LLMProvider.js';

interface OpenAIChoice {
  message: {
    content: string | null;
  };
  finish_reason: string;
}

interface OpenAIUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

interface OpenAIChatResponse {
  id: string;
  created: number;
  model: string;
  choices: OpenAIChoice[];
  usage?: OpenAIUsage;
}

function isOpenAIChatResponse(obj: unknown): obj is OpenAIChatResponse {
  return isRecord(obj) && typeof obj.model === 'string' && Array.isArray(obj.choices);
}

export interface OpenAIConfig {
  apiKey?: string;
  baseURL?: string;
  defaultModel?: string;
  organization?: string;
  timeoutMs?: number;
}

export class OpenAIProvider extends BaseLLMProvider {
  readonly name = 'OpenAI';

  private apiKey: string;
  private baseURL: string;
  private defaultModel: string;
  private organization?: string;
  private timeoutMs: number;

  constructor(config: OpenAIConfig = {}) {
    super();
    this.apiKey = this.validateApiKey(config.apiKey, 'OpenAI');
    this.baseURL = config.baseURL || 'https://api.openai.com/v1';
    this.defaultModel = config.defaultModel || 'gpt-4o-mini';
    this.organization = config.organization;
    this.timeoutMs = config.timeoutMs ?? 60_000;
  }

  async generateMessage(
    messages: Message[],
    options: LLMRequestOptions = {}
  ): Promise<LLMResponse> {
    try {
      const responseData = await this.makeRequest('/chat/completions', {
        model: options.model || this.defaultModel,
        messages: messages.map((msg) => ({ role: msg.role, content: msg.content })),
        max_tokens: options.maxTokens || 1000,
        temperature: options.temperature ?? 0.7,
        stop: options.stop,
        response_format: options.responseFormat === 'json' ? { type: 'json_object' } : undefined,
      });

      if (!isOpenAIChatResponse(responseData)) {
        throw new CollaboratorError(this.name, "Invalid response format: expected 'choices' and 'model'", {
          retryable: true,
        });
      }

      const choice = responseData.choices[0];
      if (!choice?.message) {
        throw new CollaboratorError(this.name, 'API returned no choices', { retryable: true });
      }

      return {
        content: choice.message.content || '',
        model: responseData.model,
        usage: responseData.usage
          ? {
              inputTokens: responseData.usage.prompt_tokens,
              outputTokens: responseData.usage.completion_tokens,
              totalTokens: responseData.usage.total_tokens,
            }
          : undefined,
        metadata: {
          id: responseData.id,
          created: responseData.created,
          finishReason: choice.finish_reason,
        },
      };
    } catch (error) {
      this.handleError(error, 'generateMessage');
    }
  }

  private async makeRequest(endpoint: string, body: Record<string, unknown>): Promise<unknown> {
    const headers: Record<string, string> = {
      'Authorization': `Bearer ${this.apiKey}`,
      'Content-Type': 'application/json',
    };

    if (this.organization) {
      headers['OpenAI-Organization'] = this.organization;
    }

    const response = await fetch(`${this.baseURL}${endpoint}`, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw await this.responseError(response);
    }

    return response.json();
  }
}
