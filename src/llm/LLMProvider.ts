/**
 * LLM Provider Interface
 * Base types shared by the OpenAI, Anthropic and MCP sampling providers
 */

import { CollaboratorError, errorMessage, isRetryableStatus, isTransientNetworkError } from '../errors.js';

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  metadata?: Record<string, unknown>;
}

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMRequestOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  stop?: string[];
  /** Ask the provider for a bare JSON object where it supports that. */
  responseFormat?: 'text' | 'json';
}

export interface LLMProvider {
  readonly name: string;

  generateMessage(
    messages: Message[],
    options?: LLMRequestOptions
  ): Promise<LLMResponse>;
}

export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;

  abstract generateMessage(
    messages: Message[],
    options?: LLMRequestOptions
  ): Promise<LLMResponse>;

  /** Rethrows any failure as a CollaboratorError carrying its retry classification. */
  protected handleError(error: unknown, operation: string): never {
    if (error instanceof CollaboratorError) {
      throw error;
    }
    throw new CollaboratorError(this.name, `${operation} failed: ${errorMessage(error)}`, {
      retryable: isTransientNetworkError(error),
      cause: error,
    });
  }

  protected async responseError(response: Response): Promise<CollaboratorError> {
    const body = await response.text().catch(() => '');
    const detail = body.length > 0 ? `: ${body.slice(0, 200)}` : '';
    return new CollaboratorError(
      this.name,
      `API error ${response.status} ${response.statusText}${detail}`,
      { retryable: isRetryableStatus(response.status), status: response.status }
    );
  }

  protected validateApiKey(apiKey: string | undefined, providerName: string): string {
    if (!apiKey || apiKey.trim().length === 0) {
      throw new Error(
        `${providerName} API key is required. Set it via environment variable or config.`
      );
    }
    return apiKey.trim();
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
