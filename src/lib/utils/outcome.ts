/**
 * Three-valued result for pipeline stages.
 *
 * A stage either succeeds cleanly (`ok`), succeeds in a way the operator
 * should know about but that need not stop the run (`degraded`), or cannot
 * continue (`fatal`). The caller decides what to do with each.
 *
 * Usage:
 *   const outcome = await manager.ensure("workload");
 *   if (isFatal(outcome)) {
 *     handleError(outcome.error);
 *   } else if (isDegraded(outcome)) {
 *     log.warn(outcome.warning);
 *   }
 */

import type { ControlPlaneError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export interface OkOutcome<T> {
  status: "ok";
  value: T;
}

/**
 * The stage produced a usable value, but not the preferred one.
 */
export interface DegradedOutcome<T> {
  status: "degraded";
  value: T;
  warning: string;
}

export interface FatalOutcome<E> {
  status: "fatal";
  error: E;
}

export type Outcome<T, E = ControlPlaneError> =
  | OkOutcome<T>
  | DegradedOutcome<T>
  | FatalOutcome<E>;

// ============================================================================
// Constructors
// ============================================================================

export function ok<T>(value: T): OkOutcome<T> {
  return { status: "ok", value };
}

export function degraded<T>(value: T, warning: string): DegradedOutcome<T> {
  return { status: "degraded", value, warning };
}

export function fatal<E = ControlPlaneError>(error: E): FatalOutcome<E> {
  return { status: "fatal", error };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isFatal<T, E>(outcome: Outcome<T, E>): outcome is FatalOutcome<E> {
  return outcome.status === "fatal";
}

export function isDegraded<T, E>(
  outcome: Outcome<T, E>
): outcome is DegradedOutcome<T> {
  return outcome.status === "degraded";
}

/**
 * True for `ok` and `degraded`: the run may continue.
 *
 * @example
 *   if (!succeeded(await manager.ensure("management"))) process.exit(1);
 */
export function succeeded<T, E>(
  outcome: Outcome<T, E>
): outcome is OkOutcome<T> | DegradedOutcome<T> {
  return outcome.status !== "fatal";
}
