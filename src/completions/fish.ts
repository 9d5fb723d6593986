import { functionName, type CommandSpec, type OptionSpec } from "./model.js";

function quote(text: string): string {
  return `'${text.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

function optionLine(program: string, condition: string, option: OptionSpec): string {
  const parts = [`complete -c ${program}`, `-n ${quote(condition)}`];
  for (const flag of option.flags) {
    if (flag.startsWith("--")) {
      parts.push(`-l ${flag.slice(2)}`);
    } else {
      parts.push(`-s ${flag.slice(1)}`);
    }
  }
  parts.push(`-d ${quote(option.description)}`);
  if (option.takesValue) {
    parts.push("-r");
  }
  if (option.choices.length > 0) {
    parts.push(`-a ${quote(option.choices.join(" "))}`);
  }
  return parts.join(" ");
}

export function renderFish(root: CommandSpec): string {
  const program = root.name;
  const helper = `__${functionName(program)}`;
  const valueFlags = new Set<string>();
  const lines: string[] = [];

  function visit(spec: CommandSpec, prefix: string[]): void {
    const condition = [`${helper}_at`, ...prefix].join(" ");
    lines.push("");
    lines.push(prefix.length === 0 ? "# Top level" : `# ${prefix.join(" ")}`);
    for (const sub of spec.subcommands) {
      lines.push(
        `complete -c ${program} -n ${quote(condition)} -a ${sub.name} -d ${quote(sub.description)}`,
      );
    }
    if (spec.argChoices.length > 0) {
      lines.push(
        `complete -c ${program} -n ${quote(condition)} -a ${quote(spec.argChoices.join(" "))}`,
      );
    }
    for (const option of spec.options) {
      if (option.takesValue) {
        option.flags.forEach((f) => valueFlags.add(f));
      }
      lines.push(optionLine(program, condition, option));
    }
    for (const sub of spec.subcommands) {
      visit(sub, [...prefix, sub.name]);
    }
  }

  visit(root, []);

  return `# ${program} shell completions for fish
# Install: ${program} shell --fish
# Print:   ${program} completions fish

function ${helper}_cmdpath
  set -l words (commandline -opc)
  set -e words[1]
  set -l result
  set -l skip 0
  for word in $words
    if test $skip -eq 1
      set skip 0
      continue
    end
    if contains -- $word ${[...valueFlags].join(" ")}
      set skip 1
      continue
    end
    if not string match -q -- '-*' $word
      set -a result $word
    end
  end
  string join ' ' $result
end

function ${helper}_at
  set -l current (${helper}_cmdpath)
  test "$current" = "$argv"
end

# Disable file completions by default
complete -c ${program} -f
${lines.join("\n")}
`;
}
