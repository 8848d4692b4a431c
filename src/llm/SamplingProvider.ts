/**
 * MCP Sampling Protocol Provider
 * Delegates generation to the connected client through sampling/createMessage
 */

import { BaseLLMProvider, LLMResponse, Message, LLMRequestOptions } from "./LLMProvider.js";
import { requestSamplingCompletion } from "./samplingClient.js";

export class SamplingProvider extends BaseLLMProvider {
  readonly name = 'Sampling';

  constructor(private readonly timeoutMs?: number) {
    super();
  }

  async generateMessage(
    messages: Message[],
    options: LLMRequestOptions = {}
  ): Promise<LLMResponse> {
    try {
      return await requestSamplingCompletion(messages, { ...options, timeoutMs: this.timeoutMs });
    } catch (error) {
      this.handleError(error, 'createMessage');
    }
  }
}
