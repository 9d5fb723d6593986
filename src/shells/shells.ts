import os from "os";
import path from "path";

export const SHELLS = ["bash", "zsh", "fish", "powershell"] as const;

export type Shell = (typeof SHELLS)[number];

/** Shells whose startup file can carry the managed RC block. */
export const RC_SHELLS: readonly Shell[] = ["bash", "zsh"];

export interface ShellEnvironment {
  homeDir: string;
  configHome: string;
  shell: string | null;
}

export function isShell(value: string): value is Shell {
  return (SHELLS as readonly string[]).includes(value);
}

export function resolveEnvironment(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir(),
): ShellEnvironment {
  const xdg = env.XDG_CONFIG_HOME;
  return {
    homeDir,
    configHome: xdg ? xdg : path.join(homeDir, ".config"),
    shell: env.SHELL ? env.SHELL : null,
  };
}

export function detectShell(shellVar: string | null): Shell | null {
  if (!shellVar) {
    return null;
  }
  if (shellVar.includes("zsh")) {
    return "zsh";
  }
  if (shellVar.includes("bash")) {
    return "bash";
  }
  if (shellVar.includes("fish")) {
    return "fish";
  }
  const lower = shellVar.toLowerCase();
  if (lower.includes("powershell") || lower.includes("pwsh")) {
    return "powershell";
  }
  return null;
}

export interface ShellFlags {
  bash?: boolean;
  zsh?: boolean;
  fish?: boolean;
  powershell?: boolean;
  all?: boolean;
}

/**
 * Pick the shells to process. Explicit flags win over `--all`, which wins
 * over detection; `fallback` is used when nothing could be detected.
 * The result always follows the order of SHELLS.
 */
export function selectShells(
  flags: ShellFlags,
  detected: Shell | null,
  fallback: readonly Shell[],
): Shell[] {
  const explicit = SHELLS.filter((s) => flags[s]);
  if (explicit.length > 0) {
    return explicit;
  }
  if (flags.all) {
    return [...SHELLS];
  }
  if (detected) {
    return [detected];
  }
  return SHELLS.filter((s) => fallback.includes(s));
}
