import fs from "fs";
import path from "path";
import { parse } from "smol-toml";
import { z } from "zod";
import { SHELLS, type Shell, type ShellEnvironment } from "../shells/shells.js";
import { PROGRAM_NAME } from "../version.js";

export interface Config {
  fallback_shells: Shell[];
  write_rc: boolean;
  backup_rc: boolean;
}

const DEFAULTS: Config = {
  fallback_shells: ["bash", "zsh"],
  write_rc: false,
  backup_rc: true,
};

// Invalid fields fall back to their defaults individually.
const ConfigSchema = z.object({
  fallback_shells: z
    .array(z.enum(SHELLS))
    .min(1)
    .catch(() => [...DEFAULTS.fallback_shells]),
  write_rc: z.boolean().catch(DEFAULTS.write_rc),
  backup_rc: z.boolean().catch(DEFAULTS.backup_rc),
});

export function getConfigPath(
  env: ShellEnvironment,
  vars: NodeJS.ProcessEnv = process.env,
): string {
  if (vars.ARC_INIT_CONFIG_DIR) {
    return path.join(vars.ARC_INIT_CONFIG_DIR, "config.toml");
  }
  return path.join(env.configHome, PROGRAM_NAME, "config.toml");
}

export const DEFAULT_CONFIG_TOML = `# ${PROGRAM_NAME} configuration

# Shells to set up when none is selected with flags and $SHELL is not recognised
# Options: "bash", "zsh", "fish", "powershell"
fallback_shells = ["bash", "zsh"]

# Add the RC block without passing --write-rc
write_rc = false

# Keep a one-time copy of an RC file (<file>.arc-init.bak) before first editing it
backup_rc = true
`;

export function loadConfig(configPath: string): Config {
  if (!fs.existsSync(configPath)) {
    return { ...DEFAULTS, fallback_shells: [...DEFAULTS.fallback_shells] };
  }

  const raw = fs.readFileSync(configPath, "utf-8");
  let parsed;
  try {
    parsed = parse(raw);
  } catch (err) {
    process.stderr.write(
      `Warning: Could not parse config file at ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.\n`,
    );
    return { ...DEFAULTS, fallback_shells: [...DEFAULTS.fallback_shells] };
  }

  return ConfigSchema.parse(parsed);
}
