import fs from "fs";
import path from "path";
import type { Shell, ShellEnvironment } from "../shells/shells.js";
import { completionPath } from "../completions/paths.js";
import { PROGRAM_NAME } from "../version.js";

export type RcShell = Extract<Shell, "bash" | "zsh">;

export function isRcShell(shell: Shell): shell is RcShell {
  return shell === "bash" || shell === "zsh";
}

/** ~/.bashrc, or ~/.bash_profile when there is no .bashrc. */
export function bashRcPath(homeDir: string): string {
  const rc = path.join(homeDir, ".bashrc");
  if (!fs.existsSync(rc)) {
    return path.join(homeDir, ".bash_profile");
  }
  return rc;
}

export function zshRcPath(homeDir: string): string {
  return path.join(homeDir, ".zshrc");
}

export function rcPath(shell: RcShell, env: ShellEnvironment): string {
  return shell === "bash" ? bashRcPath(env.homeDir) : zshRcPath(env.homeDir);
}

/** Render a path under the home directory as "$HOME/...". */
function homeRelative(file: string, homeDir: string): string {
  const rel = path.relative(homeDir, file);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    return file;
  }
  return `$HOME/${rel.split(path.sep).join("/")}`;
}

export function rcPayload(shell: RcShell, env: ShellEnvironment): string[] {
  if (shell === "bash") {
    const script = homeRelative(completionPath("bash", env), env.homeDir);
    return [
      `# ${PROGRAM_NAME} bash completions`,
      `if [ -f "${script}" ]; then`,
      `  . "${script}"`,
      "fi",
    ];
  }
  return [
    `# ${PROGRAM_NAME} zsh completions`,
    "fpath+=(~/.zsh/completions)",
    "autoload -Uz compinit",
    "compinit",
  ];
}
