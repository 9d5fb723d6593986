import path from "path";
import type { Shell, ShellEnvironment } from "../shells/shells.js";
import { PROGRAM_NAME } from "../version.js";

export interface CompletionTarget {
  dir: string;
  file: string;
}

type TargetResolver = (env: ShellEnvironment, name: string) => CompletionTarget;

const RESOLVERS: Record<Shell, TargetResolver> = {
  bash: (env, name) => ({
    dir: path.join(env.configHome, "bash", "completions"),
    file: `${name}.bash`,
  }),
  zsh: (env, name) => ({
    dir: path.join(env.homeDir, ".zsh", "completions"),
    file: `_${name}`,
  }),
  fish: (env, name) => ({
    dir: path.join(env.configHome, "fish", "completions"),
    file: `${name}.fish`,
  }),
  powershell: (env, name) => ({
    dir: path.join(env.configHome, "powershell"),
    file: `${name}.ps1`,
  }),
};

export function completionTarget(
  shell: Shell,
  env: ShellEnvironment,
  name: string = PROGRAM_NAME,
): CompletionTarget {
  return RESOLVERS[shell](env, name);
}

export function completionPath(
  shell: Shell,
  env: ShellEnvironment,
  name: string = PROGRAM_NAME,
): string {
  const { dir, file } = completionTarget(shell, env, name);
  return path.join(dir, file);
}
