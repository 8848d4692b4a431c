import type { LlmConfig } from "../config.js";
import { CollaboratorError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { LLMRequestOptions, LLMResponse, Message } from "../llm/LLMProvider.js";
import type { LlmInvocation, StageRequest } from "./types.js";

/** The slice of LLMProviderManager this service needs. */
export interface MessageGenerator {
  generateMessage(messages: Message[], options?: LLMRequestOptions): Promise<LLMResponse>;
}

const JSON_ONLY = "Respond with a single JSON object and nothing else. Do not wrap it in prose.";

/**
 * Extracts the first JSON document from a model response: fenced blocks
 * first, then the text from the first brace or bracket, then the whole
 * string. Returns undefined when nothing parses.
 */
export function parseJsonResponse(raw: string): unknown {
  const trimmed = raw.trim();
  if (!trimmed) {
    return undefined;
  }

  const attempts: string[] = [];

  const fenceRegex = /```(?:json)?\s*([\s\S]*?)```/gi;
  let fenceMatch: RegExpExecArray | null;
  while ((fenceMatch = fenceRegex.exec(trimmed)) !== null) {
    const candidate = fenceMatch[1]?.trim();
    if (candidate) {
      attempts.push(candidate);
    }
  }

  const starts = [trimmed.indexOf("{"), trimmed.indexOf("[")].filter((index) => index >= 0);
  if (starts.length > 0) {
    const start = Math.min(...starts);
    const end = Math.max(trimmed.lastIndexOf("}"), trimmed.lastIndexOf("]"));
    if (end > start) {
      attempts.push(trimmed.slice(start, end + 1));
    }
  }

  attempts.push(trimmed);

  for (const candidate of attempts) {
    try {
      return JSON.parse(candidate);
    } catch {
      continue;
    }
  }
  return undefined;
}

/**
 * LLM collaborator backed by the provider manager. Sends the stage's
 * instructions as the system prompt and its input as JSON, and returns the
 * parsed JSON document for the stage to validate.
 */
export class ProviderInvocationService implements LlmInvocation {
  constructor(
    private readonly generator: MessageGenerator,
    private readonly config: Pick<LlmConfig, "maxTokens">,
  ) {}

  async invoke(request: StageRequest): Promise<unknown> {
    const messages: Message[] = [
      { role: "system", content: `${request.instructions}\n\n${JSON_ONLY}` },
      { role: "user", content: JSON.stringify({ task: request.task, input: request.input }, null, 2) },
    ];

    let response: LLMResponse;
    try {
      response = await this.generator.generateMessage(messages, {
        temperature: request.temperature,
        maxTokens: request.maxTokens ?? this.config.maxTokens,
        responseFormat: "json",
      });
    } catch (error) {
      if (error instanceof CollaboratorError) {
        throw error;
      }
      throw new CollaboratorError("llm", `${request.task} request failed: ${errorMessage(error)}`, {
        retryable: false,
        cause: error,
      });
    }

    log({
      level: "debug",
      component: "llm",
      message: `Model responded to ${request.task}`,
      meta: { model: response.model, usage: response.usage },
    });

    const parsed = parseJsonResponse(response.content);
    if (parsed === undefined) {
      throw new CollaboratorError("llm", `${request.task} response was not valid JSON`, { retryable: true });
    }
    return parsed;
  }
}
