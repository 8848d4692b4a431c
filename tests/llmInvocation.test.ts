import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ProviderInvocationService, parseJsonResponse, type MessageGenerator } from "../src/collaborators/llmInvocation.js";
import type { LlmConfig } from "../src/config.js";
import { CollaboratorError } from "../src/errors.js";
import type { LLMRequestOptions, LLMResponse, Message } from "../src/llm/LLMProvider.js";
import { LLMProviderManager } from "../src/llm/LLMProviderManager.js";
import { ClaudeProvider } from "../src/llm/ClaudeProvider.js";
import { OpenAIProvider } from "../src/llm/OpenAIProvider.js";
import { SamplingProvider } from "../src/llm/SamplingProvider.js";
import { clearSamplingServer, setSamplingServer } from "../src/llm/samplingClient.js";

class RecordingGenerator implements MessageGenerator {
  readonly calls: Array<{ messages: Message[]; options?: LLMRequestOptions }> = [];

  constructor(private readonly reply: string | Error) {}

  async generateMessage(messages: Message[], options?: LLMRequestOptions): Promise<LLMResponse> {
    this.calls.push({ messages, options });
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return { content: this.reply, model: "unit-llm" };
  }
}

const llmConfig: LlmConfig = {
  provider: "openai",
  openaiApiKey: "test-key",
  timeoutMs: 1000,
  maxTokens: 800,
};

afterEach(() => {
  vi.restoreAllMocks();
  clearSamplingServer();
});

describe("parseJsonResponse", () => {
  it("reads a fenced block", () => {
    expect(parseJsonResponse('Here you go:\n```json\n{"diagnoses": []}\n```')).toEqual({ diagnoses: [] });
  });

  it("reads an object surrounded by prose", () => {
    expect(parseJsonResponse('Result: {"riskLevel": "low"} hope that helps')).toEqual({ riskLevel: "low" });
  });

  it("returns undefined when nothing parses", () => {
    expect(parseJsonResponse("no structured output")).toBeUndefined();
    expect(parseJsonResponse("   ")).toBeUndefined();
  });
});

describe("ProviderInvocationService", () => {
  it("sends the instructions and input and returns the parsed document", async () => {
    const generator = new RecordingGenerator('{"evidenceLevel": "moderate"}');
    const service = new ProviderInvocationService(generator, llmConfig);

    const result = await service.invoke({
      task: "evidence_validation",
      instructions: "Assess the evidence.",
      input: { diagnoses: ["Influenza"] },
      temperature: 0.2,
    });

    expect(result).toEqual({ evidenceLevel: "moderate" });
    const call = generator.calls[0];
    expect(call?.messages[0]?.role).toBe("system");
    expect(call?.messages[0]?.content.startsWith("Assess the evidence.\n\n")).toBe(true);
    expect(JSON.parse(call?.messages[1]?.content ?? "")).toEqual({
      task: "evidence_validation",
      input: { diagnoses: ["Influenza"] },
    });
    expect(call?.options).toEqual({ temperature: 0.2, maxTokens: 800, responseFormat: "json" });
  });

  it("treats an unparseable reply as retryable", async () => {
    const service = new ProviderInvocationService(new RecordingGenerator("I cannot help with that"), llmConfig);

    const error = await service
      .invoke({ task: "safety_review", instructions: "Review.", input: {} })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CollaboratorError);
    expect(error instanceof CollaboratorError && error.retryable).toBe(true);
    expect(error instanceof Error && error.message).toBe("llm: safety_review response was not valid JSON");
  });

  it("keeps collaborator errors and wraps anything else as non-retryable", async () => {
    const rateLimited = new CollaboratorError("OpenAI", "API error 429", { retryable: true, status: 429 });
    const passthrough = new ProviderInvocationService(new RecordingGenerator(rateLimited), llmConfig);
    await expect(passthrough.invoke({ task: "symptom_analysis", instructions: "", input: {} })).rejects.toBe(
      rateLimited,
    );

    const wrapping = new ProviderInvocationService(new RecordingGenerator(new Error("bad key")), llmConfig);
    const error = await wrapping
      .invoke({ task: "symptom_analysis", instructions: "", input: {} })
      .catch((caught: unknown) => caught);
    expect(error instanceof CollaboratorError && [error.retryable, error.message]).toEqual([
      false,
      "llm: symptom_analysis request failed: bad key",
    ]);
  });
});

describe("OpenAIProvider", () => {
  it("requests a JSON object and maps the completion", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response(
        JSON.stringify({
          id: "chatcmpl-1",
          created: 1,
          model: "gpt-4o-mini",
          choices: [{ message: { content: '{"ok":true}' }, finish_reason: "stop" }],
          usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
        }),
        { status: 200, headers: { "Content-Type": "application/json" } },
      ),
    );
    const provider = new OpenAIProvider({ apiKey: "test-key" });

    const response = await provider.generateMessage([{ role: "user", content: "hi" }], { responseFormat: "json" });

    expect(response.content).toBe('{"ok":true}');
    expect(response.usage).toEqual({ inputTokens: 10, outputTokens: 5, totalTokens: 15 });
    const init = fetchSpy.mock.calls[0]?.[1];
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    expect(body).toMatchObject({ model: "gpt-4o-mini", response_format: { type: "json_object" } });
  });

  it("marks rate limiting as retryable", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response("slow down", { status: 429, statusText: "Too Many Requests" }),
    );
    const provider = new OpenAIProvider({ apiKey: "test-key" });

    const error = await provider.generateMessage([{ role: "user", content: "hi" }]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CollaboratorError);
    expect(error instanceof CollaboratorError && [error.retryable, error.status, error.message]).toEqual([
      true,
      429,
      "OpenAI: API error 429 Too Many Requests: slow down",
    ]);
  });

  it("marks a rejected credential as permanent and a dropped connection as transient", async () => {
    const provider = new OpenAIProvider({ apiKey: "test-key" });

    vi.spyOn(globalThis, "fetch").mockResolvedValueOnce(new Response("", { status: 401, statusText: "Unauthorized" }));
    const unauthorized = await provider.generateMessage([{ role: "user", content: "hi" }]).catch((caught: unknown) => caught);
    expect(unauthorized instanceof CollaboratorError && unauthorized.retryable).toBe(false);

    vi.spyOn(globalThis, "fetch").mockRejectedValueOnce(new TypeError("fetch failed"));
    const dropped = await provider.generateMessage([{ role: "user", content: "hi" }]).catch((caught: unknown) => caught);
    expect(dropped instanceof CollaboratorError && [dropped.retryable, dropped.message]).toEqual([
      true,
      "OpenAI: generateMessage failed: fetch failed",
    ]);
  });
});

describe("LLMProviderManager", () => {
  it("registers configured providers plus sampling", () => {
    const manager = new LLMProviderManager({ llm: llmConfig });
    expect(manager.getAvailableProviders()).toEqual(["openai", "sampling"]);
  });

  it("refuses a default provider without its key", () => {
    expect(() => new LLMProviderManager({ llm: { ...llmConfig, provider: "claude" } })).toThrow(
      "ANTHROPIC_API_KEY must be set when using the Anthropic provider.",
    );
  });

  it("rejects a request for an unregistered provider", async () => {
    const manager = new LLMProviderManager({ llm: llmConfig, enableSamplingFallback: false });

    await expect(
      manager.generateMessage([{ role: "user", content: "hi" }], { provider: "sampling" }),
    ).rejects.toThrow("llm: Provider 'sampling' not available. Available providers: openai");
  });

  it("applies the configured model", async () => {
    const spy = vi.spyOn(OpenAIProvider.prototype, "generateMessage").mockResolvedValue({ content: "{}", model: "m" });
    const manager = new LLMProviderManager({ llm: { ...llmConfig, model: "gpt-test" } });

    await manager.generateMessage([{ role: "user", content: "hi" }], { maxTokens: 50 });

    expect(spy).toHaveBeenCalledWith([{ role: "user", content: "hi" }], { model: "gpt-test", maxTokens: 50 });
  });
});

describe("ClaudeProvider", () => {
  it("sends system prompts separately and joins the text blocks", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response(
        JSON.stringify({
          id: "msg_1",
          type: "message",
          role: "assistant",
          model: "claude-test",
          content: [
            { type: "text", text: '{"risk' },
            { type: "text", text: 'Level":"low"}' },
          ],
          stop_reason: "end_turn",
          usage: { input_tokens: 12, output_tokens: 4 },
        }),
        { status: 200 },
      ),
    );
    const provider = new ClaudeProvider({ apiKey: "test-key", defaultModel: "claude-test" });

    const response = await provider.generateMessage([
      { role: "system", content: "Review safety." },
      { role: "user", content: "{}" },
    ]);

    expect(response.content).toBe('{"riskLevel":"low"}');
    expect(response.usage?.totalTokens).toBe(16);
    const init = fetchSpy.mock.calls[0]?.[1];
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    expect(body).toMatchObject({ system: "Review safety.", messages: [{ role: "user", content: "{}" }] });
  });

  it("treats server errors as retryable", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response("overloaded", { status: 529 }));

    const error = await new ClaudeProvider({ apiKey: "test-key" })
      .generateMessage([{ role: "user", content: "hi" }])
      .catch((caught: unknown) => caught);

    expect(error instanceof CollaboratorError && [error.retryable, error.status]).toEqual([true, 529]);
  });
});

describe("SamplingProvider", () => {
  function samplingServer(): Server {
    return new Server({ name: "test-server", version: "0.0.0" }, { capabilities: {} });
  }

  it("asks the connected client for a completion", async () => {
    const server = samplingServer();
    const createMessage = vi.spyOn(server, "createMessage").mockResolvedValue({
      model: "client-model",
      role: "assistant",
      content: { type: "text", text: '{"ok":true}' },
      stopReason: "endTurn",
    });
    setSamplingServer(server);

    const response = await new SamplingProvider(5000).generateMessage(
      [
        { role: "system", content: "Be brief." },
        { role: "user", content: "hi" },
      ],
      { temperature: 0.1, model: "preferred-model" },
    );

    expect(response).toEqual({ content: '{"ok":true}', model: "client-model", metadata: { stopReason: "endTurn" } });
    expect(createMessage).toHaveBeenCalledWith(
      {
        messages: [{ role: "user", content: { type: "text", text: "hi" } }],
        maxTokens: 1000,
        systemPrompt: "Be brief.",
        temperature: 0.1,
        modelPreferences: { hints: [{ name: "preferred-model" }] },
      },
      { timeout: 5000 },
    );
  });

  it("maps a client timeout to a retryable failure", async () => {
    const server = samplingServer();
    vi.spyOn(server, "createMessage").mockRejectedValue(new McpError(ErrorCode.RequestTimeout, "Request timed out"));
    setSamplingServer(server);

    const error = await new SamplingProvider()
      .generateMessage([{ role: "user", content: "hi" }])
      .catch((caught: unknown) => caught);

    expect(error instanceof CollaboratorError && error.retryable).toBe(true);
  });

  it("fails permanently when no client connection is configured", async () => {
    const error = await new SamplingProvider()
      .generateMessage([{ role: "user", content: "hi" }])
      .catch((caught: unknown) => caught);

    expect(error instanceof CollaboratorError && [error.retryable, error.message]).toEqual([
      false,
      "Sampling: MCP sampling server connection is not configured",
    ]);
  });
});
