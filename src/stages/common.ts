import type { z } from "zod";
import { CollaboratorError, errorMessage } from "../errors.js";
import { failed, type FailedOutcome } from "../schema/outcome.js";
import type { UpstreamResult } from "./types.js";

/** Maps a thrown collaborator error onto a Failed outcome. */
export function failureFromError(error: unknown, action: string): FailedOutcome {
  if (error instanceof CollaboratorError) {
    return failed(`${action} failed: ${error.message}`, error.retryable);
  }
  return failed(`${action} failed: ${errorMessage(error)}`, false);
}

export type ModelOutput<T> = { success: true; value: T } | { success: false; outcome: FailedOutcome };

/**
 * Validates a structured model response. Malformed output is worth another
 * attempt, so the failure is retryable.
 */
export function parseModelOutput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  action: string,
): ModelOutput<T> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) {
    return { success: true, value: parsed.data };
  }
  const issues = parsed.error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  return { success: false, outcome: failed(`${action} returned an invalid response: ${issues}`, true) };
}

export function upstreamWarnings(...results: Array<UpstreamResult<unknown>>): string[] {
  return results.flatMap((result) => (result.kind === "degraded" ? [result.warning] : []));
}

export function normalizeName(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, " ");
}

/** Case-insensitive exact or substring match, in either direction. */
export function namesMatch(a: string, b: string): boolean {
  const left = normalizeName(a);
  const right = normalizeName(b);
  if (left.length === 0 || right.length === 0) {
    return false;
  }
  return left === right || left.includes(right) || right.includes(left);
}
