import type { Command } from "commander";
import type { Shell } from "../shells/shells.js";
import { buildCompletionTable, describeCommand } from "./model.js";
import { renderBash } from "./bash.js";
import { renderZsh } from "./zsh.js";
import { renderFish } from "./fish.js";
import { renderPowerShell } from "./powershell.js";

/** Anything the script body can be streamed into: a file, stdout, a buffer. */
export interface CompletionSink {
  write(chunk: string): void;
}

export interface CompletionGenerator {
  generate(shell: Shell, sink: CompletionSink): void;
}

export function generateScript(program: Command, shell: Shell): string {
  const spec = describeCommand(program);
  switch (shell) {
    case "bash":
      return renderBash(buildCompletionTable(spec));
    case "zsh":
      return renderZsh(buildCompletionTable(spec));
    case "fish":
      return renderFish(spec);
    case "powershell":
      return renderPowerShell(buildCompletionTable(spec));
  }
}

/**
 * The command tree is read at generation time, so commands registered after
 * the generator is created are still included.
 */
export function createCompletionGenerator(program: Command): CompletionGenerator {
  return {
    generate(shell, sink) {
      sink.write(generateScript(program, shell));
    },
  };
}
