/**
 * Shared CLI output helpers. Results go to stdout as JSON; logs go to stderr.
 */

import { formatError } from "./errors.js";
import type { Outcome } from "./outcome.js";

/**
 * Print any value as formatted JSON to stdout.
 */
export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Print an error as JSON and exit with code 1.
 *
 * ControlPlaneError subclasses contribute code, details and a suggestion
 * so the operator knows what to try next.
 */
export function handleError(error: unknown): never {
  const { message, ...rest } = formatError(error);
  printJson({ error: message, ...rest });
  process.exit(1);
}

/**
 * Print a stage outcome. Fatal outcomes exit through handleError.
 */
export function printOutcome<T>(outcome: Outcome<T>): void {
  if (outcome.status === "fatal") {
    handleError(outcome.error);
  }
  printJson(
    outcome.status === "degraded"
      ? { success: true, status: outcome.status, warning: outcome.warning, result: outcome.value }
      : { success: true, status: outcome.status, result: outcome.value }
  );
}
