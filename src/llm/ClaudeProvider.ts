/**
 * Anthropic Claude API Provider
 * Integration with the Messages API
 */

import { CollaboratorError } from '../errors.js';
import { BaseLLMProvider, isRecord, LLMResponse, Message, LLMRequestOptions } from './LLMProvider.js';

interface ClaudeMessageParam {
  role: 'user' | 'assistant';
  content: string;
}

interface ClaudeContentBlock {
  type: string;
  text?: string;
}

interface ClaudeMessage {
  id: string;
  type: string;
  role: string;
  content: ClaudeContentBlock[];
  model: string;
  stop_reason: string | null;
  usage?: {
    input_tokens: number;
    output_tokens: number;
  };
}

function isClaudeMessage(obj: unknown): obj is ClaudeMessage {
  return isRecord(obj) && typeof obj.model === 'string' && Array.isArray(obj.content);
}

export interface ClaudeConfig {
  apiKey?: string;
  baseURL?: string;
  defaultModel?: string;
  version?: string;
  timeoutMs?: number;
}

export class ClaudeProvider extends BaseLLMProvider {
  readonly name = 'Claude';

  private apiKey: string;
  private baseURL: string;
  private defaultModel: string;
  private version: string;
  private timeoutMs: number;

  constructor(config: ClaudeConfig = {}) {
    super();
    this.apiKey = this.validateApiKey(config.apiKey, 'Claude');
    this.baseURL = config.baseURL || 'https://api.anthropic.com';
    this.defaultModel = config.defaultModel || 'claude-3-5-sonnet-20241022';
    this.version = config.version || '2023-06-01';
    this.timeoutMs = config.timeoutMs ?? 60_000;
  }

  async generateMessage(
    messages: Message[],
    options: LLMRequestOptions = {}
  ): Promise<LLMResponse> {
    try {
      const { system, messages: formattedMessages } = this.formatMessages(messages);

      const response = await this.makeRequest('/v1/messages', {
        model: options.model || this.defaultModel,
        max_tokens: options.maxTokens || 1000,
        temperature: options.temperature ?? 0.7,
        stop_sequences: options.stop,
        system,
        messages: formattedMessages,
      });

      if (!isClaudeMessage(response)) {
        throw new CollaboratorError(this.name, "Invalid response format: expected 'content' and 'model'", {
          retryable: true,
        });
      }

      const text = response.content
        .filter((block) => block.type === 'text' && typeof block.text === 'string')
        .map((block) => block.text)
        .join('');

      return {
        content: text,
        model: response.model,
        usage: response.usage
          ? {
              inputTokens: response.usage.input_tokens,
              outputTokens: response.usage.output_tokens,
              totalTokens: response.usage.input_tokens + response.usage.output_tokens,
            }
          : undefined,
        metadata: {
          id: response.id,
          stopReason: response.stop_reason,
        },
      };
    } catch (error) {
      this.handleError(error, 'generateMessage');
    }
  }

  private formatMessages(messages: Message[]): {
    system?: string;
    messages: ClaudeMessageParam[];
  } {
    const system: string[] = [];
    const conversation: ClaudeMessageParam[] = [];
    for (const msg of messages) {
      if (msg.role === 'system') {
        system.push(msg.content);
      } else {
        conversation.push({ role: msg.role, content: msg.content });
      }
    }

    return {
      system: system.length > 0 ? system.join('\n') : undefined,
      messages: conversation,
    };
  }

  private async makeRequest(endpoint: string, body: Record<string, unknown>): Promise<unknown> {
    const headers: Record<string, string> = {
      'x-api-key': this.apiKey,
      'anthropic-version': this.version,
      'Content-Type': 'application/json',
    };

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
