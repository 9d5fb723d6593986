import fs from "fs";
import path from "path";
import type { Shell, ShellEnvironment } from "../shells/shells.js";
import type { CompletionGenerator } from "./generator.js";
import { completionTarget } from "./paths.js";

export type CompletionOutcome = "written" | "skipped";

export interface CompletionWriteResult {
  status: CompletionOutcome;
  path: string;
}

export interface WriteCompletionOptions {
  overwrite: boolean;
  env: ShellEnvironment;
  generator: CompletionGenerator;
  name?: string;
}

/**
 * Write the completion script for `shell` to its conventional location.
 * An existing file is left untouched unless `overwrite` is set.
 */
export function writeCompletion(
  shell: Shell,
  { overwrite, env, generator, name }: WriteCompletionOptions,
): CompletionWriteResult {
  const { dir, file } = completionTarget(shell, env, name);
  fs.mkdirSync(dir, { recursive: true });

  const target = path.join(dir, file);
  if (!overwrite && fs.existsSync(target)) {
    return { status: "skipped", path: target };
  }

  const fd = fs.openSync(target, "w");
  try {
    generator.generate(shell, { write: (chunk) => fs.writeSync(fd, chunk) });
  } catch (err) {
    fs.closeSync(fd);
    // A partial script would make later runs report "skipped"
    fs.rmSync(target, { force: true });
    throw err;
  }
  fs.closeSync(fd);
  return { status: "written", path: target };
}
