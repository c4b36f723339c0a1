/**
 * Resilient kubeconfig manager.
 *
 * Owns the two cluster credentials (management and workload). Acquisition is
 * retried a bounded number of times with a fixed delay; when every attempt
 * fails, the newest backup that still validates is moved back into place.
 * A credential counts as valid only if it is structurally sound AND the
 * cluster accepts it.
 */

import fs from "fs/promises";
import path from "path";
import type { ClusterConfig } from "../src/lib/config/cluster.js";
import {
  AcquisitionFailedError,
  DirectoryUnavailableError,
  RecoveryExhaustedError,
  errorMessage,
} from "../src/lib/utils/errors.js";
import type { CommandRunner } from "../src/lib/utils/exec.js";
import { silentLogger, type Logger } from "../src/lib/utils/logger.js";
import { degraded, fatal, ok, type Outcome } from "../src/lib/utils/outcome.js";
import { systemClock, type Clock } from "../src/lib/utils/poll.js";
import { checksum, createBackup, listBackups } from "./backup.js";
import { probeConnectivity, type ProbeOptions } from "./probe.js";
import { DEFAULT_SOURCES, type KubeconfigSource } from "./sources.js";
import type {
  AcquisitionState,
  CredentialRecord,
  CredentialRole,
  EnsureOptions,
  EnsureResult,
} from "./types.js";
import { isGroupOrWorldAccessible, validateStructure } from "./validator.js";

export const MAX_RETRIES = 3;
export const RETRY_DELAY_MS = 5_000;

const DIRECTORY_MODE = 0o700;
const FILE_MODE = 0o600;

export interface KubeconfigManagerOptions {
  config: ClusterConfig;
  runner: CommandRunner;
  log?: Logger;
  clock?: Clock;
  /** Replace the acquisition procedure for a role. */
  sources?: Partial<Record<CredentialRole, KubeconfigSource>>;
  maxRetries?: number;
  retryDelayMs?: number;
  probe?: ProbeOptions;
  /** Called on every state machine transition. */
  onTransition?: (role: CredentialRole, state: AcquisitionState) => void;
}

const DESCRIPTIONS: Record<CredentialRole, string> = {
  management: "GKE management cluster",
  workload: "hosted cluster",
};

export class KubeconfigManager {
  private readonly config: ClusterConfig;
  private readonly runner: CommandRunner;
  private readonly log: Logger;
  private readonly clock: Clock;
  private readonly sources: Record<CredentialRole, KubeconfigSource>;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly probeOptions: ProbeOptions;
  private readonly onTransition?: (role: CredentialRole, state: AcquisitionState) => void;
  private readonly records = new Map<CredentialRole, CredentialRecord>();

  constructor(options: KubeconfigManagerOptions) {
    this.config = options.config;
    this.runner = options.runner;
    this.log = (options.log ?? silentLogger()).child({ component: "kubeconfig" });
    this.clock = options.clock ?? systemClock;
    this.sources = { ...DEFAULT_SOURCES, ...options.sources };
    this.maxRetries = Math.max(1, options.maxRetries ?? MAX_RETRIES);
    this.retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
    this.probeOptions = options.probe ?? {};
    this.onTransition = options.onTransition;
  }

  pathFor(role: CredentialRole): string {
    return role === "management"
      ? this.config.gkeKubeconfigPath
      : this.config.hostedKubeconfigPath;
  }

  clusterNameFor(role: CredentialRole): string {
    return role === "management"
      ? this.config.gkeClusterName
      : this.config.hostedClusterName;
  }

  /** Audit record of the last successful acquisition for `role`, if any. */
  getRecord(role: CredentialRole): CredentialRecord | undefined {
    return this.records.get(role);
  }

  /**
   * Make sure the credential for `role` exists and works.
   *
   * Without `force`, an existing valid file is left untouched. Otherwise each
   * attempt backs up the current file, then acquires, writes (mode 0600) and
   * validates a new one. After `maxRetries` attempts the manager falls back
   * to recovery from backups.
   */
  async ensure(
    role: CredentialRole,
    options: EnsureOptions = {}
  ): Promise<Outcome<EnsureResult>> {
    const targetPath = this.pathFor(role);
    const log = this.log.child({ role, path: targetPath });
    log.info(`ensuring ${DESCRIPTIONS[role]} kubeconfig`);

    if (!options.force && (await this.isValid(targetPath, log))) {
      log.info("valid kubeconfig already exists");
      return ok({ role, path: targetPath, source: "existing" });
    }

    if (this.runner.dryRun) {
      log.info("dry run: would acquire a new kubeconfig");
      return ok({ role, path: targetPath, source: "dry-run" });
    }

    const acquire = this.sources[role];

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      this.transition(role, { kind: "attempt", attempt }, log);

      const directory = path.dirname(targetPath);
      try {
        await fs.mkdir(directory, { recursive: true, mode: DIRECTORY_MODE });
      } catch (error) {
        log.error({ directory, err: errorMessage(error) }, "cannot create kubeconfig directory");
        this.transition(role, { kind: "failed" }, log);
        return fatal(new DirectoryUnavailableError(directory, { cause: errorMessage(error) }));
      }

      // no-op when the target is missing; a failed backup is only logged
      await createBackup(targetPath, log, this.clock);

      try {
        const content = await acquire({
          config: this.config,
          runner: this.runner,
          log,
          targetPath,
        });
        await this.writeCredential(targetPath, content, log);
      } catch (error) {
        log.warn({ attempt, err: errorMessage(error) }, `attempt ${attempt} failed`);
        if (attempt < this.maxRetries) await this.pause(log);
        continue;
      }

      this.transition(role, { kind: "validating", attempt }, log);
      if (await this.checkCredential(targetPath, log)) {
        const record: CredentialRecord = {
          path: targetPath,
          role,
          clusterName: this.clusterNameFor(role),
          createdAt: new Date(this.clock.now()).toISOString(),
          checksum: await checksum(targetPath),
        };
        this.records.set(role, record);
        this.transition(role, { kind: "success" }, log);
        log.info({ checksum: record.checksum }, "kubeconfig created and validated");
        return ok({ role, path: targetPath, source: "acquired", record });
      }

      log.warn({ attempt }, `kubeconfig validation failed on attempt ${attempt}`);
      if (attempt < this.maxRetries) await this.pause(log);
    }

    log.error(`all ${this.maxRetries} attempts failed`);
    return this.recover(role);
  }

  /**
   * Reinstate the newest backup that passes structure and connectivity
   * checks. The chosen backup is moved, not copied.
   */
  async recover(role: CredentialRole): Promise<Outcome<EnsureResult>> {
    const targetPath = this.pathFor(role);
    const log = this.log.child({ role, path: targetPath });
    this.transition(role, { kind: "recovering" }, log);
    log.warn(`attempting recovery for ${role} kubeconfig`);

    const backups = await listBackups(targetPath).catch((error: unknown) => {
      log.warn({ err: errorMessage(error) }, "cannot list backups");
      return [];
    });

    for (const { backupPath } of backups) {
      log.info({ backupPath }, "trying backup");
      if (!(await this.checkCredential(backupPath, log))) continue;

      try {
        await fs.rename(backupPath, targetPath);
      } catch (error) {
        log.warn({ backupPath, err: errorMessage(error) }, "failed to restore from backup");
        continue;
      }

      this.transition(role, { kind: "success" }, log);
      log.info({ backupPath }, "recovered from backup");
      return degraded(
        { role, path: targetPath, source: "recovered", recoveredFrom: backupPath },
        `${role} kubeconfig reinstated from backup ${backupPath}`
      );
    }

    this.transition(role, { kind: "failed" }, log);
    const error = new RecoveryExhaustedError(role, targetPath, backups.length);
    log.error({ candidates: backups.length }, error.message);
    return fatal(error);
  }

  /**
   * True when the file exists, is structurally valid and the cluster accepts
   * it. Group/world-accessible files are reported but not rejected.
   */
  async isValid(filePath: string, log: Logger = this.log): Promise<boolean> {
    const stats = await fs.stat(filePath).catch(() => undefined);
    if (!stats) return false;

    if (isGroupOrWorldAccessible(stats.mode)) {
      log.warn(
        { path: filePath, mode: (stats.mode & 0o777).toString(8) },
        "kubeconfig has overly permissive permissions"
      );
    }
    return this.checkCredential(filePath, log);
  }

  /** Both credentials valid. */
  async validateAll(): Promise<boolean> {
    let allValid = true;
    for (const role of ["management", "workload"] as const) {
      const filePath = this.pathFor(role);
      if (!(await this.isValid(filePath))) {
        this.log.error({ role, path: filePath }, `${role} kubeconfig invalid`);
        allValid = false;
      }
    }
    if (allValid) this.log.info("all kubeconfig files are valid");
    return allValid;
  }

  /**
   * Force fresh credentials, management first since the workload credential
   * is read through it. Stops at the first fatal outcome.
   */
  async refreshAll(): Promise<Outcome<EnsureResult[]>> {
    const results: EnsureResult[] = [];
    const warnings: string[] = [];

    for (const role of ["management", "workload"] as const) {
      const outcome = await this.ensure(role, { force: true });
      if (outcome.status === "fatal") {
        this.log.error({ role }, `failed to refresh ${role} kubeconfig`);
        return outcome;
      }
      if (outcome.status === "degraded") warnings.push(outcome.warning);
      results.push(outcome.value);
    }

    this.log.info("all kubeconfig files refreshed");
    return warnings.length > 0 ? degraded(results, warnings.join("; ")) : ok(results);
  }

  private async checkCredential(filePath: string, log: Logger): Promise<boolean> {
    try {
      await validateStructure(filePath);
    } catch (error) {
      log.warn({ path: filePath, err: errorMessage(error) }, "kubeconfig structure invalid");
      return false;
    }
    return probeConnectivity(this.runner, filePath, log, this.probeOptions);
  }

  /**
   * Temp sibling, chmod 0600, then rename over the target.
   */
  private async writeCredential(
    targetPath: string,
    content: string,
    log: Logger
  ): Promise<void> {
    const tempPath = `${targetPath}.tmp`;
    try {
      await fs.writeFile(tempPath, content, { mode: FILE_MODE });
      await fs.chmod(tempPath, FILE_MODE);
      await fs.rename(tempPath, targetPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((rmError: unknown) => {
        log.warn({ tempPath, err: errorMessage(rmError) }, "cannot remove temporary kubeconfig");
      });
      throw new AcquisitionFailedError(`Failed to write kubeconfig: ${errorMessage(error)}`);
    }
  }

  private async pause(log: Logger): Promise<void> {
    log.info(`retrying in ${this.retryDelayMs / 1000} seconds`);
    await this.clock.sleep(this.retryDelayMs);
  }

  private transition(role: CredentialRole, state: AcquisitionState, log: Logger): void {
    log.debug({ state }, "state transition");
    this.onTransition?.(role, state);
  }
}
