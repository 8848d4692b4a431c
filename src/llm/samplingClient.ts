import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { ErrorCode, McpError, type CreateMessageRequest } from "@modelcontextprotocol/sdk/types.js";
import { CollaboratorError } from "../errors.js";
import type { LLMRequestOptions, LLMResponse, Message } from "./LLMProvider.js";

let samplingServer: Server | undefined;

export function setSamplingServer(server: Server): void {
  samplingServer = server;
}

export function clearSamplingServer(): void {
  samplingServer = undefined;
}

function requireSamplingServer(): Server {
  if (!samplingServer) {
    throw new CollaboratorError("Sampling", "MCP sampling server connection is not configured", {
      retryable: false,
    });
  }
  return samplingServer;
}

export async function requestSamplingCompletion(
  messages: Message[],
  options: LLMRequestOptions & { timeoutMs?: number } = {}
): Promise<LLMResponse> {
  const server = requireSamplingServer();
  const systemMessages = messages.filter((message) => message.role === "system");
  const conversationalMessages = messages.flatMap((message) =>
    message.role === "user" || message.role === "assistant"
      ? [{ role: message.role, content: { type: "text" as const, text: message.content } }]
      : [],
  );

  if (conversationalMessages.length === 0) {
    throw new CollaboratorError("Sampling", "sampling/createMessage requires at least one user or assistant message", {
      retryable: false,
    });
  }

  const request: CreateMessageRequest["params"] = {
    messages: conversationalMessages,
    maxTokens: options.maxTokens ?? 1000,
  };

  if (systemMessages.length > 0) {
    request.systemPrompt = systemMessages.map((message) => message.content).join("\n\n");
  }

  if (typeof options.temperature === "number") {
    request.temperature = options.temperature;
  }

  if (Array.isArray(options.stop) && options.stop.length > 0) {
    request.stopSequences = options.stop;
  }

  if (typeof options.model === "string" && options.model.trim().length > 0) {
    request.modelPreferences = {
      hints: [{ name: options.model.trim() }],
    };
  }

  const result = await server.createMessage(request, { timeout: options.timeoutMs }).catch((error: unknown) => {
    if (error instanceof McpError) {
      throw new CollaboratorError("Sampling", error.message, {
        retryable: error.code === ErrorCode.RequestTimeout,
        cause: error,
      });
    }
    throw error;
  });

  const content = result.content;
  if (content.type !== "text") {
    throw new CollaboratorError("Sampling", "MCP sampling response did not include text content", {
      retryable: true,
    });
  }

  return {
    content: content.text,
    model: result.model,
    metadata: result.stopReason ? { stopReason: result.stopReason } : undefined,
  };
}
