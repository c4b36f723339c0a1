import { redactSensitive } from "./redact.js";

/**
 * Base error class for hosted control plane tooling
 */
export class ControlPlaneError extends Error {
  public readonly suggestion: string;

  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown,
    suggestion?: string
  ) {
    super(message);
    this.name = "ControlPlaneError";
    this.suggestion =
      suggestion ?? "Re-run with LOG_LEVEL=debug and inspect the command output";
  }
}

/**
 * Error for invalid or missing configuration
 */
export class ConfigError extends ControlPlaneError {
  constructor(message: string, details?: unknown) {
    super(
      message,
      "CONFIG_ERROR",
      details,
      "Export the missing environment variables and try again"
    );
    this.name = "ConfigError";
  }
}

/**
 * The credential source (gcloud login or secret read) produced nothing usable
 */
export class AcquisitionFailedError extends ControlPlaneError {
  constructor(message: string, details?: unknown) {
    super(
      message,
      "ACQUISITION_FAILED",
      details,
      "Check gcloud authentication and that the cluster exists"
    );
    this.name = "AcquisitionFailedError";
  }
}

/**
 * Kubeconfig content lacks the clusters/contexts/users sections
 */
export class StructureInvalidError extends ControlPlaneError {
  constructor(
    message: string,
    public readonly path?: string,
    details?: unknown
  ) {
    super(message, "STRUCTURE_INVALID", details);
    this.name = "StructureInvalidError";
  }
}

/**
 * Kubeconfig is well-formed but the cluster rejected it or could not be reached
 */
export class ConnectivityFailedError extends ControlPlaneError {
  constructor(public readonly path: string, details?: unknown) {
    super(
      `Cluster not reachable with kubeconfig ${path}`,
      "CONNECTIVITY_FAILED",
      details,
      "Confirm the API server is up and the credential has not expired"
    );
    this.name = "ConnectivityFailedError";
  }
}

/**
 * The kubeconfig's parent directory could not be created
 */
export class DirectoryUnavailableError extends ControlPlaneError {
  constructor(public readonly directory: string, details?: unknown) {
    super(
      `Cannot create directory ${directory}`,
      "DIRECTORY_UNAVAILABLE",
      details,
      "Point KUBECONFIG_GKE_PATH / KUBECONFIG_HOSTED_PATH at a writable location"
    );
    this.name = "DirectoryUnavailableError";
  }
}

/**
 * Retries were exhausted and no backup could be reinstated
 */
export class RecoveryExhaustedError extends ControlPlaneError {
  constructor(
    public readonly role: string,
    public readonly path: string,
    public readonly candidates: number
  ) {
    super(
      `Recovery failed for ${role} kubeconfig ${path} (${candidates} backup(s) tried)`,
      "RECOVERY_EXHAUSTED",
      { role, path, candidates },
      `Run: kubeconfig ensure --role ${role} --force once the cluster is reachable`
    );
    this.name = "RecoveryExhaustedError";
  }
}

/**
 * Format error for command output
 */
export function formatError(error: unknown): {
  message: string;
  code?: string;
  details?: unknown;
  suggestion?: string;
} {
  if (error instanceof ControlPlaneError) {
    return {
      message: redactSensitive(error.message),
      code: error.code,
      details: error.details,
      suggestion: error.suggestion,
    };
  }

  if (error instanceof Error) {
    return { message: redactSensitive(error.message) };
  }

  return { message: "Unknown error occurred" };
}

/**
 * Message of any thrown value, for log lines
 */
export function errorMessage(error: unknown): string {
  return redactSensitive(error instanceof Error ? error.message : String(error));
}
