import { z } from "zod";
import type { LogLevel } from "./logger.js";

/**
 * Clinical thresholds for the vitals classifier. Each vital has a normal
 * band and a critical band beyond which the alert escalates to `critical`.
 */
export interface VitalsThresholds {
  heartRate: { low: number; high: number; criticalLow: number; criticalHigh: number };
  bloodPressure: {
    systolicHigh: number;
    diastolicHigh: number;
    systolicCrisis: number;
    diastolicCrisis: number;
    systolicLow: number;
  };
  oxygenSaturation: { low: number; criticalLow: number };
  temperature: { fever: number; hyperpyrexia: number; hypothermia: number };
  respiratoryRate: { low: number; high: number; criticalHigh: number };
}

export interface WorkflowConfig {
  /** Extra attempts allowed after a retryable stage failure. */
  retryLimit: number;
  /** Primary diagnosis confidence below which no medications are proposed. */
  diagnosisConfidenceThreshold: number;
  vitals: VitalsThresholds;
}

export type ProviderName = "openai" | "claude" | "sampling";

export interface LlmConfig {
  provider: ProviderName;
  model?: string;
  openaiApiKey?: string;
  anthropicApiKey?: string;
  timeoutMs: number;
  maxTokens: number;
}

export interface RetrievalConfig {
  apiKey?: string;
  email?: string;
  timeoutMs: number;
  maxResults: number;
}

export interface StorageConfig {
  dataPath?: string;
  interactionsPath?: string;
}

export interface AppConfig {
  workflow: WorkflowConfig;
  llm: LlmConfig;
  retrieval: RetrievalConfig;
  storage: StorageConfig;
  logLevel: LogLevel;
}

export const DEFAULT_VITALS_THRESHOLDS: VitalsThresholds = {
  heartRate: { low: 60, high: 100, criticalLow: 50, criticalHigh: 120 },
  bloodPressure: {
    systolicHigh: 140,
    diastolicHigh: 90,
    systolicCrisis: 180,
    diastolicCrisis: 120,
    systolicLow: 90,
  },
  oxygenSaturation: { low: 92, criticalLow: 88 },
  temperature: { fever: 38, hyperpyrexia: 39.5, hypothermia: 35 },
  respiratoryRate: { low: 12, high: 20, criticalHigh: 30 },
};

export const DEFAULT_WORKFLOW_CONFIG: WorkflowConfig = {
  retryLimit: 1,
  diagnosisConfidenceThreshold: 0.3,
  vitals: DEFAULT_VITALS_THRESHOLDS,
};

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

const envSchema = z.object({
  LLM_PROVIDER: z.enum(["openai", "claude", "anthropic", "sampling"]).optional(),
  LLM_MODEL: optionalString,
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  CLINICAL_RETRY_LIMIT: z.coerce.number().int().min(0).max(5).default(DEFAULT_WORKFLOW_CONFIG.retryLimit),
  CLINICAL_CONFIDENCE_THRESHOLD: z.coerce
    .number()
    .min(0)
    .max(1)
    .default(DEFAULT_WORKFLOW_CONFIG.diagnosisConfidenceThreshold),
  CLINICAL_DATA_PATH: optionalString,
  CLINICAL_INTERACTIONS_PATH: optionalString,
  PUBMED_API_KEY: optionalString,
  PUBMED_EMAIL: optionalString,
  RETRIEVAL_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  RETRIEVAL_MAX_RESULTS: z.coerce.number().int().min(1).max(50).default(5),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["debug", "info", "warn", "error"]))
    .default("info"),
});

function resolveProvider(env: z.infer<typeof envSchema>): ProviderName {
  switch (env.LLM_PROVIDER) {
    case "openai":
      return "openai";
    case "claude":
    case "anthropic":
      return "claude";
    case "sampling":
      return "sampling";
    default:
      // Fall back to whichever API key is present, then to MCP sampling.
      if (env.OPENAI_API_KEY) return "openai";
      if (env.ANTHROPIC_API_KEY) return "claude";
      return "sampling";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;

  return {
    workflow: {
      retryLimit: values.CLINICAL_RETRY_LIMIT,
      diagnosisConfidenceThreshold: values.CLINICAL_CONFIDENCE_THRESHOLD,
      vitals: DEFAULT_VITALS_THRESHOLDS,
    },
    llm: {
      provider: resolveProvider(values),
      model: values.LLM_MODEL,
      openaiApiKey: values.OPENAI_API_KEY,
      anthropicApiKey: values.ANTHROPIC_API_KEY,
      timeoutMs: values.LLM_TIMEOUT_MS,
      maxTokens: values.LLM_MAX_TOKENS,
    },
    retrieval: {
      apiKey: values.PUBMED_API_KEY,
      email: values.PUBMED_EMAIL,
      timeoutMs: values.RETRIEVAL_TIMEOUT_MS,
      maxResults: values.RETRIEVAL_MAX_RESULTS,
    },
    storage: {
      dataPath: values.CLINICAL_DATA_PATH,
      interactionsPath: values.CLINICAL_INTERACTIONS_PATH,
    },
    logLevel: values.LOG_LEVEL,
  };
}
