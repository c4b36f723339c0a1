import fs from "fs/promises";
import { errorMessage } from "../src/lib/utils/errors.js";
import { checksum, listBackups } from "./backup.js";
import type { KubeconfigManager } from "./manager.js";
import type { BackupArtifact, CredentialRecord, CredentialRole } from "./types.js";
import { currentServer, isGroupOrWorldAccessible, parseKubeconfig } from "./validator.js";

/**
 * Offline view of one managed kubeconfig. Nothing here contacts the cluster.
 */
export interface CredentialStatus {
  role: CredentialRole;
  path: string;
  exists: boolean;
  /** Octal permission bits, e.g. "600" */
  mode?: string;
  groupOrWorldAccessible?: boolean;
  checksum?: string;
  /** API server of the current context */
  server?: string;
  structureError?: string;
  backups: BackupArtifact[];
  /** Set when this process acquired the credential */
  record?: CredentialRecord;
}

export async function describeCredential(
  manager: KubeconfigManager,
  role: CredentialRole
): Promise<CredentialStatus> {
  const filePath = manager.pathFor(role);
  const backups = await listBackups(filePath);
  const record = manager.getRecord(role);

  const stats = await fs.stat(filePath).catch(() => undefined);
  if (!stats) {
    return { role, path: filePath, exists: false, backups, record };
  }

  const status: CredentialStatus = {
    role,
    path: filePath,
    exists: true,
    mode: (stats.mode & 0o777).toString(8),
    groupOrWorldAccessible: isGroupOrWorldAccessible(stats.mode),
    checksum: await checksum(filePath),
    backups,
    record,
  };

  try {
    const document = parseKubeconfig(await fs.readFile(filePath, "utf8"), filePath);
    status.server = currentServer(document);
  } catch (error) {
    status.structureError = errorMessage(error);
  }
  return status;
}
