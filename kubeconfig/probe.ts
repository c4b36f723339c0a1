import type { CommandRunner } from "../src/lib/utils/exec.js";
import type { Logger } from "../src/lib/utils/logger.js";

export interface ProbeOptions {
  /** Passed to kubectl as --request-timeout. */
  requestTimeoutSeconds?: number;
  /** Hard limit on the kubectl process. */
  processTimeoutMs?: number;
}

export const DEFAULT_PROBE_REQUEST_TIMEOUT_SECONDS = 10;
export const DEFAULT_PROBE_PROCESS_TIMEOUT_MS = 15_000;

/**
 * Live check that the cluster accepts the kubeconfig at `kubeconfigPath`.
 * Any non-zero exit or timeout counts as failure. No retries.
 */
export async function probeConnectivity(
  runner: CommandRunner,
  kubeconfigPath: string,
  log: Logger,
  options: ProbeOptions = {}
): Promise<boolean> {
  const requestTimeout =
    options.requestTimeoutSeconds ?? DEFAULT_PROBE_REQUEST_TIMEOUT_SECONDS;

  const result = await runner.run(
    "kubectl",
    ["cluster-info", `--request-timeout=${requestTimeout}s`],
    {
      env: { KUBECONFIG: kubeconfigPath },
      timeoutMs: options.processTimeoutMs ?? DEFAULT_PROBE_PROCESS_TIMEOUT_MS,
    }
  );

  if (!result.ok) {
    log.warn(
      { path: kubeconfigPath, exitCode: result.exitCode, timedOut: result.timedOut },
      "kubeconfig failed connectivity test"
    );
    return false;
  }
  return true;
}
