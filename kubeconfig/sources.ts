/**
 * Credential sources: how each role's kubeconfig content is obtained.
 *
 * A source returns the document text or throws AcquisitionFailedError. It
 * never writes the managed kubeconfig path; the manager does that.
 */

import fs from "fs/promises";
import { load as parseYaml } from "js-yaml";
import {
  hostedControlPlaneNamespace,
  type ClusterConfig,
} from "../src/lib/config/cluster.js";
import { AcquisitionFailedError, errorMessage } from "../src/lib/utils/errors.js";
import type { CommandRunner } from "../src/lib/utils/exec.js";
import type { Logger } from "../src/lib/utils/logger.js";
import type { CredentialRole } from "./types.js";
import { isMapping } from "./validator.js";

export interface SourceContext {
  config: ClusterConfig;
  runner: CommandRunner;
  log: Logger;
  /** Managed path the content is destined for */
  targetPath: string;
}

export type KubeconfigSource = (context: SourceContext) => Promise<string>;

export const GCLOUD_TIMEOUT_MS = 120_000;
export const SECRET_READ_TIMEOUT_MS = 60_000;
export const ADMIN_KUBECONFIG_SECRET = "admin-kubeconfig";

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode base64, rejecting anything that is not canonical padded base64.
 * Buffer.from silently skips bad characters, so check first.
 */
export function decodeBase64Strict(encoded: string): string {
  const compact = encoded.replace(/\s+/g, "");
  if (!compact || compact.length % 4 !== 0 || !BASE64.test(compact)) {
    throw new AcquisitionFailedError("Secret data is not valid base64");
  }
  return Buffer.from(compact, "base64").toString("utf8");
}

/**
 * `gcloud container clusters get-credentials` into a scratch file beside the
 * target, then hand back what gcloud wrote.
 */
export const fetchManagementKubeconfig: KubeconfigSource = async ({
  config,
  runner,
  targetPath,
}) => {
  const scratchPath = `${targetPath}.acquire`;
  await fs.rm(scratchPath, { force: true });

  try {
    const result = await runner.run(
      "gcloud",
      [
        "container",
        "clusters",
        "get-credentials",
        config.gkeClusterName,
        `--zone=${config.zone}`,
        `--project=${config.projectId}`,
      ],
      { env: { KUBECONFIG: scratchPath }, timeoutMs: GCLOUD_TIMEOUT_MS }
    );
    if (!result.ok) {
      throw new AcquisitionFailedError(
        `gcloud get-credentials failed for ${config.gkeClusterName}`,
        { exitCode: result.exitCode, timedOut: result.timedOut, stderr: result.stderr.trim() }
      );
    }

    let content: string;
    try {
      content = await fs.readFile(scratchPath, "utf8");
    } catch (error) {
      throw new AcquisitionFailedError(
        `gcloud reported success but wrote no kubeconfig: ${errorMessage(error)}`
      );
    }
    if (!content.trim()) {
      throw new AcquisitionFailedError("gcloud wrote an empty kubeconfig");
    }
    return content;
  } finally {
    await fs.rm(scratchPath, { force: true });
  }
};

/**
 * Read the hosted cluster's admin kubeconfig secret from the management
 * cluster and decode it.
 */
export const extractWorkloadKubeconfig: KubeconfigSource = async ({ config, runner }) => {
  const namespace = hostedControlPlaneNamespace(config);
  const result = await runner.run(
    "kubectl",
    [
      "get",
      "secret",
      ADMIN_KUBECONFIG_SECRET,
      "-n",
      namespace,
      "-o",
      "jsonpath={.data.kubeconfig}",
    ],
    { env: { KUBECONFIG: config.gkeKubeconfigPath }, timeoutMs: SECRET_READ_TIMEOUT_MS }
  );

  if (!result.ok || !result.stdout.trim()) {
    throw new AcquisitionFailedError(
      `Could not retrieve secret ${namespace}/${ADMIN_KUBECONFIG_SECRET}`,
      { exitCode: result.exitCode, timedOut: result.timedOut }
    );
  }

  const content = decodeBase64Strict(result.stdout);

  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (error) {
    throw new AcquisitionFailedError(`Invalid kubeconfig data: ${errorMessage(error)}`);
  }
  if (!isMapping(document) || !("clusters" in document)) {
    throw new AcquisitionFailedError("Invalid kubeconfig data: no clusters section");
  }
  return content;
};

export const DEFAULT_SOURCES: Record<CredentialRole, KubeconfigSource> = {
  management: fetchManagementKubeconfig,
  workload: extractWorkloadKubeconfig,
};
