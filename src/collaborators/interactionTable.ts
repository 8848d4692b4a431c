import { readFile } from "node:fs/promises";
import { z } from "zod";
import { CollaboratorError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { resolveFromRoot } from "../paths.js";
import type { InteractionRecord } from "../schema/clinical.js";
import { namesMatch } from "../stages/common.js";
import type { InteractionTable } from "./types.js";

const interactionFileSchema = z.object({
  version: z.number().int().optional(),
  interactions: z.array(
    z.object({
      drug: z.string().min(1),
      interactsWith: z.string().min(1),
      severity: z.enum(["low", "medium", "high", "critical"]),
      description: z.string().default(""),
    }),
  ),
});

export function defaultInteractionsPath(): string {
  return resolveFromRoot("resources", "drug-interactions.json");
}

/**
 * Drug interaction table read from a JSON file on first lookup and cached.
 * A lookup returns every record naming the drug on either side.
 */
export class JsonInteractionTable implements InteractionTable {
  private records: InteractionRecord[] | undefined;

  constructor(private readonly filePath: string = defaultInteractionsPath()) {}

  async lookup(drug: string): Promise<InteractionRecord[]> {
    const records = await this.load();
    return records.filter((record) => namesMatch(record.drug, drug) || namesMatch(record.interactsWith, drug));
  }

  private async load(): Promise<InteractionRecord[]> {
    if (!this.records) {
      this.records = await this.read();
    }
    return this.records;
  }

  private async read(): Promise<InteractionRecord[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (error) {
      throw new CollaboratorError("interactions", `Unable to read ${this.filePath}: ${errorMessage(error)}`, {
        retryable: false,
        cause: error,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new CollaboratorError("interactions", `${this.filePath} is not valid JSON`, { retryable: false, cause: error });
    }

    const parsed = interactionFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new CollaboratorError("interactions", `${this.filePath} has an invalid layout: ${parsed.error.message}`, {
        retryable: false,
      });
    }

    logger.info("Loaded drug interaction table", "interactions", {
      path: this.filePath,
      records: parsed.data.interactions.length,
    });
    return parsed.data.interactions;
  }
}
