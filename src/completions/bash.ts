import { functionName, type CompletionTable } from "./model.js";

export function renderBash(table: CompletionTable): string {
  const fn = `_${functionName(table.program)}_completions`;

  const choiceCases = [...table.choices]
    .map(
      ([flag, values]) => `    ${flag})
      COMPREPLY=($(compgen -W "${values.join(" ")}" -- "$cur"))
      return
      ;;`,
    )
    .join("\n");

  const pathCases = [...table.paths]
    .map(
      ([key, candidates]) => `    "${key}")
      COMPREPLY=($(compgen -W "${candidates.map((c) => c.word).join(" ")}" -- "$cur"))
      ;;`,
    )
    .join("\n");

  const prevBlock =
    choiceCases.length > 0
      ? `
  case "$prev" in
${choiceCases}
  esac
`
      : "";

  return `# ${table.program} shell completions for bash
# Install: ${table.program} shell --bash
# Print:   ${table.program} completions bash

${fn}() {
  local cur="\${COMP_WORDS[COMP_CWORD]}"
  local prev="\${COMP_WORDS[COMP_CWORD-1]}"
  local value_opts=" ${table.valueOptions.join(" ")} "

  # Subcommand path typed so far, skipping flags and their values
  local cmdpath=""
  local i word
  for ((i = 1; i < COMP_CWORD; i++)); do
    word="\${COMP_WORDS[i]}"
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
  esac
}

complete -F ${fn} ${table.program}
`;
}
