/**
 * Timestamped kubeconfig backups and content checksums.
 *
 * Backups sit beside the credential as <path>.backup.<unix-seconds>. No index
 * is kept; recovery finds them by listing the directory.
 */

import crypto from "crypto";
import { constants as fsConstants } from "fs";
import fs from "fs/promises";
import path from "path";
import type { Logger } from "../src/lib/utils/logger.js";
import { errorMessage } from "../src/lib/utils/errors.js";
import { systemClock, type Clock } from "../src/lib/utils/poll.js";
import type { BackupArtifact } from "./types.js";

const MAX_SAME_SECOND_SUFFIX = 100;

export function backupPrefix(filePath: string): string {
  return `${path.basename(filePath)}.backup.`;
}

async function exists(filePath: string): Promise<boolean> {
  return fs.access(filePath).then(
    () => true,
    () => false
  );
}

/**
 * Copy `filePath` to <filePath>.backup.<unix-seconds> with the same mode bits.
 *
 * Returns the backup path, or undefined when there was nothing to back up or
 * the copy failed (logged as a warning). A backup taken in the same second
 * as an existing one gets a -1, -2, ... suffix instead of replacing it.
 */
export async function createBackup(
  filePath: string,
  log: Logger,
  clock: Clock = systemClock
): Promise<string | undefined> {
  if (!(await exists(filePath))) return undefined;

  const base = `${filePath}.backup.${Math.floor(clock.now() / 1000)}`;
  try {
    const { mode } = await fs.stat(filePath);
    for (let n = 0; n < MAX_SAME_SECOND_SUFFIX; n++) {
      const backupPath = n === 0 ? base : `${base}-${n}`;
      try {
        await fs.copyFile(filePath, backupPath, fsConstants.COPYFILE_EXCL);
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code === "EEXIST") continue;
        throw error;
      }
      await fs.chmod(backupPath, mode & 0o7777);
      log.info({ path: filePath, backupPath }, "backed up existing kubeconfig");
      return backupPath;
    }
    throw new Error(`too many backups named ${base}`);
  } catch (error) {
    log.warn({ path: filePath, err: errorMessage(error) }, "failed to back up kubeconfig");
    return undefined;
  }
}

/**
 * SHA-256 hex digest of the file's bytes, or "" if it cannot be read.
 */
export async function checksum(filePath: string): Promise<string> {
  try {
    const content = await fs.readFile(filePath);
    return crypto.createHash("sha256").update(content).digest("hex");
  } catch {
    return "";
  }
}

/**
 * Backups of `filePath`, most recently modified first.
 * A missing directory yields an empty list.
 */
export async function listBackups(filePath: string): Promise<BackupArtifact[]> {
  const directory = path.dirname(filePath);
  const prefix = backupPrefix(filePath);

  let names: string[];
  try {
    names = await fs.readdir(directory);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw error;
  }

  const candidates = await Promise.all(
    names
      .filter((name) => name.startsWith(prefix) && name.length > prefix.length)
      .map(async (name) => {
        const backupPath = path.join(directory, name);
        const stats = await fs.stat(backupPath).catch(() => undefined);
        return stats?.isFile() ? { backupPath, mtimeMs: stats.mtimeMs } : undefined;
      })
  );

  return candidates
    .flatMap((candidate) => (candidate ? [candidate] : []))
    .sort((a, b) => b.mtimeMs - a.mtimeMs || b.backupPath.localeCompare(a.backupPath))
    .map(({ backupPath, mtimeMs }) => ({
      sourcePath: filePath,
      backupPath,
      createdAt: new Date(mtimeMs).toISOString(),
    }));
}
