import type { z } from "zod";

export interface ToolProgress {
  progress: number;
  total?: number;
  message?: string;
}

export interface ToolContext {
  requestId: string;
  now: () => Date;
  /** Aborted when the client cancels the request. */
  signal?: AbortSignal;
  /** Present only when the client asked for progress notifications. */
  reportProgress?: (progress: ToolProgress) => Promise<void>;
  logger?: {
    info: (message: string, meta?: unknown) => void;
    error: (message: string, meta?: unknown) => void;
  };
}

export interface ToolDefinition<InputShape extends z.ZodRawShape, Output extends object> {
  name: string;
  description: string;
  inputSchema: z.ZodObject<InputShape>;
  /** Advertised to clients; the structured result must satisfy it. */
  outputSchema: z.AnyZodObject;
  handler: (input: z.output<z.ZodObject<InputShape>>, context: ToolContext) => Promise<Output>;
}
