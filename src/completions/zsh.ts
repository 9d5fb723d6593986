import { functionName, type Candidate, type CompletionTable } from "./model.js";

function quote(text: string): string {
  return `'${text.replace(/'/g, "'\\''")}'`;
}

function describeEntry(candidate: Candidate): string {
  return quote(`${candidate.word.replace(/:/g, "\\:")}:${candidate.description}`);
}

export function renderZsh(table: CompletionTable): string {
  const fn = `_${functionName(table.program)}`;

  const choiceCases = [...table.choices]
    .map(
      ([flag, values]) => `    ${flag})
      candidates=(${values.map(quote).join(" ")})
      _describe -t values 'value' candidates
      return
      ;;`,
    )
    .join("\n");

  const pathCases = [...table.paths]
    .map(
      ([key, candidates]) => `    "${key}")
      candidates=(
${candidates.map((c) => `        ${describeEntry(c)}`).join("\n")}
      )
      ;;`,
    )
    .join("\n");

  const prevBlock =
    choiceCases.length > 0
      ? `
  case "\${words[CURRENT-1]}" in
${choiceCases}
  esac
`
      : "";

  return `#compdef ${table.program}
# ${table.program} shell completions for zsh
# Install: ${table.program} shell --zsh
# Print:   ${table.program} completions zsh

${fn}() {
  local -a candidates
  local value_opts=" ${table.valueOptions.join(" ")} "

  # Subcommand path typed so far, skipping flags and their values
  local cmdpath=""
  local i word
  for ((i = 2; i < CURRENT; i++)); do
    word="\${words[i]}"
    if [[ "$value_opts" == *" $word "* ]]; then
      ((i++))
      continue
    fi
    if [[ "$word" != -* ]]; then
      cmdpath="\${cmdpath:+$cmdpath }$word"
    fi
  done
${prevBlock}
  case "$cmdpath" in
${pathCases}
    *)
      return 1
      ;;
  esac

  _describe -t commands '${table.program}' candidates
}

${fn} "$@"
`;
}
