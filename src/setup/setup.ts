import fs from "fs";
import path from "path";
import type { Shell, ShellEnvironment } from "../shells/shells.js";
import type { Logger } from "../log.js";
import { SetupError, type SetupStep } from "../errors.js";
import { writeCompletion, type CompletionGenerator } from "../completions/index.js";
import {
  buildRcBlock,
  isRcShell,
  rcPath,
  rcPayload,
  removeRcBlock,
  upsertRcBlock,
  type RcShell,
} from "../rc/index.js";

export type CompletionStatus = "written" | "skipped" | "failed";
export type RcStatus = "added" | "updated" | "skipped" | "removed" | "absent" | "failed";

export interface ShellStatus {
  shell: Shell;
  completion: CompletionStatus;
  completionPath: string | null;
  rc: RcStatus | null;
  rcPath: string | null;
  /** Why the RC step was skipped. */
  reason: string | null;
  errors: string[];
}

export interface SetupOptions {
  shells: readonly Shell[];
  overwrite: boolean;
  writeRc: boolean;
  removeRc: boolean;
  backup: boolean;
  env: ShellEnvironment;
  generator: CompletionGenerator;
  log: Logger;
}

function fail(status: ShellStatus, step: SetupStep, err: unknown, log: Logger): void {
  const error = new SetupError(status.shell, step, err);
  status.errors.push(error.message);
  log.error(error.message);
  if (err instanceof Error && err.stack) {
    log.debug(err.stack);
  }
}

function ensureRc(status: ShellStatus, shell: RcShell, opts: SetupOptions): void {
  const file = rcPath(shell, opts.env);
  status.rcPath = file;
  fs.mkdirSync(path.dirname(file), { recursive: true });

  const outcome = upsertRcBlock(file, buildRcBlock(rcPayload(shell, opts.env)), {
    overwrite: opts.overwrite,
    backup: opts.backup,
    log: opts.log,
  });
  status.rc = outcome;
  if (outcome === "skipped") {
    status.reason = opts.overwrite
      ? "RC block already up to date"
      : "RC block already present (use --force to update)";
  }
}

function removeRc(status: ShellStatus, shell: RcShell, opts: SetupOptions): void {
  const file = rcPath(shell, opts.env);
  status.rcPath = file;
  status.rc = removeRcBlock(file);
}

function setupShell(shell: Shell, opts: SetupOptions): ShellStatus {
  const status: ShellStatus = {
    shell,
    completion: "failed",
    completionPath: null,
    rc: null,
    rcPath: null,
    reason: null,
    errors: [],
  };

  try {
    const result = writeCompletion(shell, {
      overwrite: opts.overwrite,
      env: opts.env,
      generator: opts.generator,
    });
    status.completion = result.status;
    status.completionPath = result.path;
  } catch (err) {
    fail(status, "completion", err, opts.log);
  }

  // Fish and PowerShell load completions from their directories; no RC edits.
  if (!isRcShell(shell)) {
    return status;
  }

  if (opts.removeRc) {
    try {
      removeRc(status, shell, opts);
    } catch (err) {
      status.rc = "failed";
      fail(status, "remove RC", err, opts.log);
    }
  } else if (opts.writeRc) {
    try {
      ensureRc(status, shell, opts);
    } catch (err) {
      status.rc = "failed";
      fail(status, "RC", err, opts.log);
    }
  }

  return status;
}

/**
 * Process each shell in turn. A failure in one step is logged and recorded
 * on that shell's status; the remaining steps and shells still run.
 */
export function runShellSetup(opts: SetupOptions): ShellStatus[] {
  return opts.shells.map((shell) => setupShell(shell, opts));
}
