/**
 * Types for the kubeconfig skill.
 * Two managed credentials: the GKE management cluster and the hosted cluster.
 */

export type CredentialRole = "management" | "workload";

export const CREDENTIAL_ROLES: readonly CredentialRole[] = ["management", "workload"];

/**
 * Audit record kept in memory after a successful acquisition.
 */
export interface CredentialRecord {
  path: string;
  role: CredentialRole;
  clusterName: string;
  /** ISO 8601 */
  createdAt: string;
  /** SHA-256 hex of the written file; bookkeeping only */
  checksum: string;
}

/**
 * A timestamped copy of a kubeconfig, named <path>.backup.<unix-seconds>
 */
export interface BackupArtifact {
  sourcePath: string;
  backupPath: string;
  /** ISO 8601, from the file's modification time */
  createdAt: string;
}

/**
 * Acquisition state machine. `attempt` and `validating` carry the 1-based
 * attempt number.
 */
export type AcquisitionState =
  | { kind: "attempt"; attempt: number }
  | { kind: "validating"; attempt: number }
  | { kind: "recovering" }
  | { kind: "success" }
  | { kind: "failed" };

/**
 * How a credential came to be valid.
 */
export type CredentialSource = "existing" | "acquired" | "recovered" | "dry-run";

export interface EnsureResult {
  role: CredentialRole;
  path: string;
  source: CredentialSource;
  /** Absent for dry runs and for recoveries, which record nothing. */
  record?: CredentialRecord;
  /** Backup reinstated by recovery */
  recoveredFrom?: string;
}

export interface EnsureOptions {
  /** Acquire a new credential even if the current one is valid. */
  force?: boolean;
}
