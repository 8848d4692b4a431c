#!/usr/bin/env node
/* eslint-disable no-console */
import process from "node:process";
import { SERVER_NAME, SERVER_VERSION, start } from "./server.js";
import { logger } from "./logger.js";

function parseArguments(args: string[]) {
  let showHelp = false;
  let showVersion = false;

  for (const arg of args) {
    if (arg === "--help" || arg === "-h") {
      showHelp = true;
    }

    if (arg === "--version" || arg === "-v") {
      showVersion = true;
    }
  }

  return { showHelp, showVersion };
}

function printHelp(): void {
  console.log(
    `${SERVER_NAME} v${SERVER_VERSION}\n\n` +
      `Usage: ${SERVER_NAME} [options]\n\n` +
      `Runs the clinical workflow MCP server over stdio.\n\n` +
      `Options:\n` +
      `  --help, -h     Show this help message\n` +
      `  --version, -v  Print the current version\n\n` +
      `Environment:\n` +
      `  LLM_PROVIDER                   openai | claude | sampling (default: first configured key, else sampling)\n` +
      `  OPENAI_API_KEY, ANTHROPIC_API_KEY\n` +
      `  LLM_MODEL, LLM_TIMEOUT_MS, LLM_MAX_TOKENS\n` +
      `  CLINICAL_RETRY_LIMIT           extra attempts after a retryable stage failure (default 1)\n` +
      `  CLINICAL_CONFIDENCE_THRESHOLD  diagnosis confidence required for medications (default 0.3)\n` +
      `  CLINICAL_DATA_PATH             JSON store location (default data/clinical.json)\n` +
      `  CLINICAL_INTERACTIONS_PATH     drug interaction table (default resources/drug-interactions.json)\n` +
      `  PUBMED_API_KEY, PUBMED_EMAIL, RETRIEVAL_TIMEOUT_MS, RETRIEVAL_MAX_RESULTS\n` +
      `  LOG_LEVEL                      debug | info | warn | error`,
  );
}

async function main(): Promise<void> {
  const cliOptions = parseArguments(process.argv.slice(2));

  if (cliOptions.showVersion) {
    console.log(`${SERVER_NAME} v${SERVER_VERSION}`);
    return;
  }

  if (cliOptions.showHelp) {
    printHelp();
    return;
  }

  try {
    await start();
  } catch (error) {
    logger.error(`Failed to start ${SERVER_NAME} server`, "cli", { error });
    process.exitCode = 1;
  }
}

void main();
