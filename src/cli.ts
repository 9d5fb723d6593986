#!/usr/bin/env node
import { fileURLToPath } from "url";
import fs from "fs";
import path from "path";
import { Argument, Command, CommanderError } from "commander";
import {
  detectShell,
  resolveEnvironment,
  selectShells,
  SHELLS,
  type Shell,
  type ShellEnvironment,
} from "./shells/shells.js";
import { loadConfig, getConfigPath, DEFAULT_CONFIG_TOML, type Config } from "./config/config.js";
import { createCompletionGenerator, generateScript } from "./completions/index.js";
import { runShellSetup } from "./setup/setup.js";
import { formatStatusReport } from "./format/status.js";
import { createLogger, type Write } from "./log.js";
import { PROGRAM_NAME, VERSION } from "./version.js";

export interface ProgramOptions {
  env?: ShellEnvironment;
  config?: Config;
  writeErr?: Write;
  debug?: boolean;
}

interface ShellCommandOptions {
  bash?: boolean;
  zsh?: boolean;
  fish?: boolean;
  powershell?: boolean;
  all?: boolean;
  force?: boolean;
  writeRc?: boolean;
  uninstallRc?: boolean;
}

export function createProgram(
  write: Write = (t) => process.stdout.write(t + "\n"),
  options: ProgramOptions = {},
): Command {
  const env = options.env ?? resolveEnvironment();
  const writeErr = options.writeErr ?? ((t: string) => process.stderr.write(t + "\n"));
  const log = createLogger(write, writeErr, options.debug);
  const config = options.config ?? loadConfig(getConfigPath(env));

  const program = new Command(PROGRAM_NAME)
    .description(
      "Set up shell completions for arc-init\n\nInstalls completion scripts for bash, zsh, fish and PowerShell, and manages an idempotent block in your shell RC file.",
    )
    .version(VERSION);

  program.configureOutput({
    writeOut: (str) => write(str.trimEnd()),
    writeErr: (str) => writeErr(str.trimEnd()),
  });

  // Override exit to not actually exit during tests
  program.exitOverride();

  // shell
  program
    .command("shell")
    .description("Initialize shell completions")
    .option("--bash", "Install bash completion")
    .option("--zsh", "Install zsh completion")
    .option("--fish", "Install fish completion")
    .option("--powershell", "Install PowerShell completion")
    .option("--all", "Install completions for all supported shells")
    .option("--force", "Overwrite existing files")
    .option("--write-rc", "Append idempotent RC lines to enable completions")
    .option("--uninstall-rc", `Remove RC lines previously added by ${PROGRAM_NAME}`)
    .addHelpText(
      "after",
      `
Idempotent: running multiple times is safe. Existing files are not overwritten
unless --force is used. RC file blocks are added once and not duplicated.

Examples:
  ${PROGRAM_NAME} shell
  ${PROGRAM_NAME} shell --all
  ${PROGRAM_NAME} shell --bash --zsh
  ${PROGRAM_NAME} shell --write-rc
  ${PROGRAM_NAME} shell --uninstall-rc`,
    )
    .action((opts: ShellCommandOptions) => {
      const detected = detectShell(env.shell);
      const shells = selectShells(opts, detected, config.fallback_shells);
      log.debug(`Selected shells: ${shells.join(", ")} (detected: ${detected ?? "none"})`);

      const removeRc = !!opts.uninstallRc;
      const statuses = runShellSetup({
        shells,
        overwrite: !!opts.force,
        writeRc: !removeRc && !!(opts.writeRc || config.write_rc),
        removeRc,
        backup: config.backup_rc,
        env,
        generator: createCompletionGenerator(program),
        log,
      });

      log.info(formatStatusReport(statuses));
    });

  // completions
  program
    .command("completions")
    .description("Print a shell completion script to stdout")
    .addArgument(new Argument("<shell>", "Shell type").choices(SHELLS))
    // Commander rejects values outside SHELLS before the action runs
    .action((shell: Shell) => {
      write(generateScript(program, shell).trimEnd());
    });

  // config
  const configCmd = program.command("config").description("Manage configuration");

  configCmd
    .command("init")
    .description("Create a default config file with documented options")
    .action(() => {
      const configPath = getConfigPath(env);
      if (fs.existsSync(configPath)) {
        write(`Config file already exists at ${configPath}`);
        return;
      }
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, DEFAULT_CONFIG_TOML);
      write(`Created ${configPath}`);
    });

  configCmd
    .command("path")
    .description("Print the config file path")
    .action(() => {
      write(getConfigPath(env));
    });

  return program;
}

// Entry point when run directly
async function main() {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err: unknown) {
    // Commander throws on --help, --version and usage errors
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    throw err;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return fs.realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
