import type { Command } from "commander";

export interface OptionSpec {
  /** Short form first when present, e.g. ["-f", "--force"]. */
  flags: string[];
  description: string;
  takesValue: boolean;
  choices: string[];
}

export interface CommandSpec {
  name: string;
  description: string;
  options: OptionSpec[];
  /** Allowed values of positional arguments, when they are restricted. */
  argChoices: string[];
  subcommands: CommandSpec[];
}

export interface Candidate {
  word: string;
  description: string;
}

export interface CompletionTable {
  program: string;
  /** Candidates keyed by the space-joined subcommand path; "" is the root. */
  paths: Map<string, Candidate[]>;
  /** Every flag that consumes the following word. */
  valueOptions: string[];
  /** Allowed values per value-taking flag. */
  choices: Map<string, string[]>;
}

const HELP_OPTION: OptionSpec = {
  flags: ["-h", "--help"],
  description: "display help for command",
  takesValue: false,
  choices: [],
};

export function describeCommand(command: Command): CommandSpec {
  const options: OptionSpec[] = command.options
    .filter((o) => !o.hidden)
    .map((o) => ({
      flags: [o.short, o.long].filter((f): f is string => typeof f === "string" && f.length > 0),
      description: o.description,
      takesValue: o.required || o.optional,
      choices: o.argChoices ? [...o.argChoices] : [],
    }));
  options.push(HELP_OPTION);

  return {
    name: command.name(),
    description: command.description(),
    options,
    argChoices: command.registeredArguments.flatMap((a) => a.argChoices ?? []),
    subcommands: command.commands.map(describeCommand),
  };
}

export function buildCompletionTable(root: CommandSpec): CompletionTable {
  const paths = new Map<string, Candidate[]>();
  const valueOptions = new Set<string>();
  const choices = new Map<string, string[]>();

  function visit(spec: CommandSpec, prefix: string[]): void {
    const candidates: Candidate[] = [];
    for (const sub of spec.subcommands) {
      candidates.push({ word: sub.name, description: sub.description });
    }
    for (const value of spec.argChoices) {
      candidates.push({ word: value, description: value });
    }
    for (const option of spec.options) {
      for (const flag of option.flags) {
        candidates.push({ word: flag, description: option.description });
        if (option.takesValue) {
          valueOptions.add(flag);
          if (option.choices.length > 0) {
            choices.set(flag, option.choices);
          }
        }
      }
    }
    paths.set(prefix.join(" "), candidates);
    for (const sub of spec.subcommands) {
      visit(sub, [...prefix, sub.name]);
    }
  }

  visit(root, []);
  return { program: root.name, paths, valueOptions: [...valueOptions], choices };
}

/** Name usable as a shell function identifier, e.g. "arc-init" -> "arc_init". */
export function functionName(program: string): string {
  return program.replace(/[^A-Za-z0-9_]/g, "_");
}
