import { randomUUID } from "node:crypto";
import { createRequire } from "node:module";
import type { z } from "zod";
import { loadConfig, type AppConfig } from "./config.js";
import {
  connectToTransport,
  createMcpServer,
  createTransport,
  type McpServer,
  type ServerRequestExtra,
  type TransportStreams,
} from "./framework/mcpServerKit.js";
import { log, setLogLevel } from "./logger.js";
import { setSamplingServer } from "./llm/samplingClient.js";
import { createOrchestrator, type ClinicalOrchestrator } from "./orchestrator.js";
import { createCaseExecuteTool } from "./tools/case_execute.js";
import { createCaseGetTool } from "./tools/case_get.js";
import { createCaseListTool } from "./tools/case_list.js";
import { createVitalsHistoryTool } from "./tools/vitals_history.js";
import { createVitalsMonitorTool } from "./tools/vitals_monitor.js";
import type { ToolContext, ToolDefinition, ToolProgress } from "./tools/types.js";

// Keep server version in sync with package.json
const require = createRequire(import.meta.url);
const { version: pkgVersion } = require("../package.json") as { version: string };
export const SERVER_VERSION = pkgVersion;

export const SERVER_NAME = "mcp-clinical-workflow";

const INSTRUCTIONS =
  "Use case_execute to run a patient case through the clinical workflow and vitals_monitor to classify vital signs. " +
  "Results are decision support for clinicians and are persisted for later lookup with case_get, case_list and vitals_history.";

export interface BuildServerOptions {
  config?: AppConfig;
  orchestrator?: ClinicalOrchestrator;
}

export async function buildServer(streams?: TransportStreams, options: BuildServerOptions = {}) {
  const config = options.config ?? loadConfig();
  setLogLevel(config.logLevel);

  log({
    level: "info",
    component: "server",
    message: "Building clinical workflow server",
    meta: {
      version: SERVER_VERSION,
      llmProvider: config.llm.provider,
      retryLimit: config.workflow.retryLimit,
      dataPath: config.storage.dataPath ?? "(default)",
    },
  });

  const orchestrator = options.orchestrator ?? createOrchestrator(config);

  const server = createMcpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    title: "Clinical Workflow",
    instructions: INSTRUCTIONS,
  });
  setSamplingServer(server.server);

  registerTool(server, createCaseExecuteTool(orchestrator));
  registerTool(server, createCaseGetTool(orchestrator));
  registerTool(server, createCaseListTool(orchestrator));
  registerTool(server, createVitalsMonitorTool(orchestrator));
  registerTool(server, createVitalsHistoryTool(orchestrator));

  const transport = createTransport(streams);
  return { server, transport, orchestrator };
}

export async function start(streams?: TransportStreams) {
  const { server, transport } = await buildServer(streams);

  await connectToTransport(server, transport);
}

function toStructuredContent(value: object): Record<string, unknown> {
  return { ...value };
}

function registerTool<InputShape extends z.ZodRawShape, Output extends object>(
  server: McpServer,
  tool: ToolDefinition<InputShape, Output>,
) {
  server.registerTool<z.ZodRawShape, z.ZodRawShape>(
    tool.name,
    {
      description: tool.description,
      inputSchema: tool.inputSchema.shape,
      outputSchema: tool.outputSchema.shape,
    },
    async (args, extra) => {
      const context = createToolContext(tool.name, extra);
      const input = tool.inputSchema.parse(args);
      const structuredContent = toStructuredContent(await tool.handler(input, context));

      return {
        content: [
          {
            type: "text" as const,
            text: JSON.stringify(structuredContent, null, 2),
          },
        ],
        structuredContent,
      };
    },
  );
}

function createToolContext(toolName: string, extra?: ServerRequestExtra): ToolContext {
  const requestId = extra?.requestId !== undefined ? String(extra.requestId) : randomUUID();

  const logger = {
    info: (message: string, meta?: unknown) => {
      log({
        level: "info",
        component: `tool:${toolName}`,
        requestId,
        message,
        meta,
      });
    },
    error: (message: string, meta?: unknown) => {
      log({
        level: "error",
        component: `tool:${toolName}`,
        requestId,
        message,
        meta,
      });
    },
  };

  const progressToken = extra?._meta?.progressToken;
  const reportProgress =
    extra && progressToken !== undefined
      ? (progress: ToolProgress) =>
          extra.sendNotification({
            method: "notifications/progress",
            params: { progressToken, ...progress },
          })
      : undefined;

  return {
    requestId,
    now: () => new Date(),
    signal: extra?.signal,
    reportProgress,
    logger,
  };
}
