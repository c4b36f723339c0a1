/**
 * External command execution.
 *
 * Commands run without a shell. The environment for a call is the process
 * environment overlaid with `options.env`; the process environment itself is
 * never modified, so each call names its own KUBECONFIG.
 */

import { execFile } from "child_process";
import type { Logger } from "./logger.js";
import { redactSensitive } from "./redact.js";

export interface RunOptions {
  /** Variables added to (or overriding) the process environment for this call. */
  env?: Record<string, string>;
  timeoutMs?: number;
  cwd?: string;
}

export interface CommandResult {
  ok: boolean;
  /** null when the process was killed or never started */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandRunner {
  /** When true, commands are logged and reported as successful with no output. */
  readonly dryRun: boolean;
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

export const DEFAULT_COMMAND_TIMEOUT_MS = 300_000;
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

/**
 * Render a command line for logs. Arguments are quoted only when needed.
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/^[\w@%+=:,./{}-]+$/.test(part) ? part : `'${part.replace(/'/g, "'\\''")}'`))
    .join(" ");
}

export class ProcessRunner implements CommandRunner {
  constructor(
    private readonly log: Logger,
    public readonly dryRun: boolean = false
  ) {}

  run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const display = formatCommand(command, args);
    const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;

    if (this.dryRun) {
      this.log.info({ command: display }, "dry run: would execute");
      return Promise.resolve({
        ok: true,
        exitCode: 0,
        stdout: "",
        stderr: "",
        timedOut: false,
      });
    }

    this.log.debug({ command: display, timeoutMs }, "executing");

    return new Promise((resolve) => {
      execFile(
        command,
        args,
        {
          env: { ...process.env, ...options.env },
          cwd: options.cwd,
          timeout: timeoutMs,
          maxBuffer: MAX_OUTPUT_BYTES,
          encoding: "utf8",
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ ok: true, exitCode: 0, stdout, stderr, timedOut: false });
            return;
          }

          const timedOut = error.killed === true && error.signal === "SIGTERM";
          const exitCode = typeof error.code === "number" ? error.code : null;
          this.log.warn(
            {
              command: display,
              exitCode,
              timedOut,
              stderr: redactSensitive(stderr.trim()),
            },
            timedOut ? `command timed out after ${timeoutMs}ms` : "command failed"
          );
          resolve({
            ok: false,
            exitCode,
            stdout,
            stderr: stderr || error.message,
            timedOut,
          });
        }
      );
    });
  }
}
