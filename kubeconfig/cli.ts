#!/usr/bin/env node
/**
 * Kubeconfig skill CLI
 * Creates, validates, backs up and recovers the management (GKE) and hosted
 * cluster kubeconfigs.
 *
 * Configuration comes from the environment: PROJECT_ID, GKE_CLUSTER_NAME,
 * HOSTED_CLUSTER_NAME, plus optional REGION, ZONE, KUBECONFIG_GKE_PATH,
 * KUBECONFIG_HOSTED_PATH, DRY_RUN and LOG_LEVEL.
 *
 * Usage: kubeconfig <subcommand> [options]
 */

import { Command, InvalidArgumentError } from "commander";
import { loadConfig } from "../src/lib/config/cluster.js";
import { ConnectivityFailedError } from "../src/lib/utils/errors.js";
import { printJson, printOutcome, handleError } from "../src/lib/utils/cli.js";
import { ProcessRunner } from "../src/lib/utils/exec.js";
import { createLogger } from "../src/lib/utils/logger.js";
import { pollUntil } from "../src/lib/utils/poll.js";
import { listBackups } from "./backup.js";
import { KubeconfigManager } from "./manager.js";
import { describeCredential, type CredentialStatus } from "./status.js";
import { CREDENTIAL_ROLES, type CredentialRole } from "./types.js";

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

function parseRole(value: string): CredentialRole {
  const role = CREDENTIAL_ROLES.find((candidate) => candidate === value);
  if (!role) {
    throw new InvalidArgumentError(`Expected one of: ${CREDENTIAL_ROLES.join(", ")}`);
  }
  return role;
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError("Expected a positive number of seconds");
  }
  return seconds;
}

function createManager(): KubeconfigManager {
  const config = loadConfig();
  const log = createLogger({ level: config.logLevel });
  const runner = new ProcessRunner(log.child({ component: "exec" }), config.dryRun);
  return new KubeconfigManager({ config, runner, log });
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name("kubeconfig")
  .description(
    "Resilient kubeconfig management for a GKE management cluster and its hosted cluster"
  )
  .version("0.1.0");

// ---------------------------------------------------------------------------
// ensure
// ---------------------------------------------------------------------------

program
  .command("ensure")
  .description("Create the kubeconfig for a role unless a valid one already exists")
  .requiredOption("--role <role>", "management or workload", parseRole)
  .option("--force", "Acquire a fresh kubeconfig even if the current one works", false)
  .action(async (opts: { role: CredentialRole; force: boolean }) => {
    try {
      const manager = createManager();
      printOutcome(await manager.ensure(opts.role, { force: opts.force }));
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// refresh
// ---------------------------------------------------------------------------

program
  .command("refresh")
  .description("Re-acquire both kubeconfigs (management first) to pick up fresh tokens")
  .action(async () => {
    try {
      const manager = createManager();
      printOutcome(await manager.refreshAll());
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// validate
// ---------------------------------------------------------------------------

program
  .command("validate")
  .description("Check both kubeconfigs for structure and live connectivity")
  .action(async () => {
    try {
      const manager = createManager();
      const valid = await manager.validateAll();
      printJson({
        valid,
        management: manager.pathFor("management"),
        workload: manager.pathFor("workload"),
      });
      if (!valid) process.exitCode = 1;
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// status
// ---------------------------------------------------------------------------

program
  .command("status")
  .description("Show path, permissions, checksum, API server and backups for both kubeconfigs")
  .action(async () => {
    try {
      const manager = createManager();
      const statuses: CredentialStatus[] = [];
      for (const role of CREDENTIAL_ROLES) {
        statuses.push(await describeCredential(manager, role));
      }
      printJson({ credentials: statuses });
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// backups
// ---------------------------------------------------------------------------

program
  .command("backups")
  .description("List backups of a kubeconfig, newest first")
  .requiredOption("--role <role>", "management or workload", parseRole)
  .action(async (opts: { role: CredentialRole }) => {
    try {
      const manager = createManager();
      const backups = await listBackups(manager.pathFor(opts.role));
      printJson({ role: opts.role, count: backups.length, backups });
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// recover
// ---------------------------------------------------------------------------

program
  .command("recover")
  .description("Reinstate the newest backup that still validates (the backup is moved)")
  .requiredOption("--role <role>", "management or workload", parseRole)
  .action(async (opts: { role: CredentialRole }) => {
    try {
      const manager = createManager();
      printOutcome(await manager.recover(opts.role));
    } catch (error) {
      handleError(error);
    }
  });

// ---------------------------------------------------------------------------
// wait
// ---------------------------------------------------------------------------

program
  .command("wait")
  .description("Poll until a kubeconfig validates, e.g. while hosted cluster workers come up")
  .requiredOption("--role <role>", "management or workload", parseRole)
  .option("--timeout <seconds>", "Give up after this many seconds", parseSeconds, 600)
  .option("--interval <seconds>", "Seconds between checks", parseSeconds, 15)
  .action(
    async (opts: { role: CredentialRole; timeout: number; interval: number }) => {
      try {
        const manager = createManager();
        const filePath = manager.pathFor(opts.role);
        const result = await pollUntil(() => manager.isValid(filePath), {
          intervalMs: opts.interval * 1000,
          timeoutMs: opts.timeout * 1000,
        });
        if (!result.satisfied) {
          handleError(new ConnectivityFailedError(filePath, { role: opts.role, ...result }));
        }
        printJson({ role: opts.role, path: filePath, ...result });
      } catch (error) {
        handleError(error);
      }
    }
  );

// ---------------------------------------------------------------------------
// Parse
// ---------------------------------------------------------------------------

program.parseAsync(process.argv).catch(handleError);
