import fs from "fs";
import type { Logger } from "../log.js";
import { describeError } from "../errors.js";

export const RC_START = "# >>> arc-init >>>";
export const RC_END = "# <<< arc-init <<<";
export const BACKUP_SUFFIX = ".arc-init.bak";

export type UpsertOutcome = "added" | "updated" | "skipped";
export type RemoveOutcome = "removed" | "absent";

export interface UpsertOptions {
  /** Replace an existing block in place instead of leaving it alone. */
  overwrite: boolean;
  /** Copy the original file to `<path>.arc-init.bak` before the first append. */
  backup?: boolean;
  log?: Logger;
}

export function buildRcBlock(payload: readonly string[]): string {
  return [RC_START, ...payload, RC_END].join("\n") + "\n";
}

export function hasRcBlock(content: string): boolean {
  return content.includes(RC_START) && content.includes(RC_END);
}

interface Span {
  start: number;
  end: number;
}

/**
 * Locate the managed block: first start marker through first end marker,
 * inclusive. Null when either is missing or they are out of order.
 */
export function findRcBlock(content: string): Span | null {
  const start = content.indexOf(RC_START);
  const end = content.indexOf(RC_END);
  if (start === -1 || end === -1 || end < start) {
    return null;
  }
  return { start, end: end + RC_END.length };
}

function readIfExists(file: string): string | null {
  if (!fs.existsSync(file)) {
    return null;
  }
  return fs.readFileSync(file, "utf-8");
}

function backupOnce(file: string, content: string, log?: Logger): void {
  const dest = file + BACKUP_SUFFIX;
  if (fs.existsSync(dest)) {
    return;
  }
  try {
    fs.writeFileSync(dest, content);
    log?.debug(`Backed up ${file} to ${dest}`);
  } catch (err) {
    log?.debug(`Backup of ${file} failed: ${describeError(err)}`);
  }
}

/**
 * Append `block` to the RC file unless a marker pair is already present.
 * The parent directory must exist.
 */
export function upsertRcBlock(
  file: string,
  block: string,
  { overwrite, backup = true, log }: UpsertOptions,
): UpsertOutcome {
  const current = readIfExists(file);
  const text = block.endsWith("\n") ? block : block + "\n";

  if (current !== null && hasRcBlock(current)) {
    const span = findRcBlock(current);
    if (!overwrite || span === null) {
      return "skipped";
    }
    const next = current.slice(0, span.start) + text.trimEnd() + current.slice(span.end);
    if (next === current) {
      return "skipped";
    }
    fs.writeFileSync(file, next);
    return "updated";
  }

  if (current !== null && !overwrite && backup) {
    backupOnce(file, current, log);
  }

  const separator =
    current !== null && current.length > 0 && !current.endsWith("\n") ? "\n\n" : "\n";
  fs.appendFileSync(file, separator + text);
  return "added";
}

/**
 * Cut the managed block out of the RC file. A file without a well-formed
 * block is left byte-for-byte unchanged. Throws when the file can't be read.
 */
export function removeRcBlock(file: string): RemoveOutcome {
  const content = fs.readFileSync(file, "utf-8");
  const span = findRcBlock(content);
  if (span === null) {
    return "absent";
  }
  const rest = (content.slice(0, span.start) + content.slice(span.end)).trim();
  fs.writeFileSync(file, rest + "\n");
  return "removed";
}
