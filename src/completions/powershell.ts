import type { CompletionTable } from "./model.js";

function quote(text: string): string {
  return `'${text.replace(/'/g, "''")}'`;
}

export function renderPowerShell(table: CompletionTable): string {
  const entries = [...table.paths]
    .map(([key, candidates]) => {
      const items = candidates
        .map(
          (c) =>
            `            @{ Word = ${quote(c.word)}; Description = ${quote(c.description || c.word)} }`,
        )
        .join("\n");
      return `        ${quote(key)} = @(\n${items}\n        )`;
    })
    .join("\n");

  const choices = [...table.choices]
    .map(([flag, values]) => `        ${quote(flag)} = @(${values.map(quote).join(", ")})`)
    .join("\n");

  const valueOptions = table.valueOptions.map(quote).join(", ");

  return `# ${table.program} shell completions for PowerShell
# Install: ${table.program} shell --powershell
# Print:   ${table.program} completions powershell

Register-ArgumentCompleter -Native -CommandName ${quote(table.program)} -ScriptBlock {
    param($wordToComplete, $commandAst, $cursorPosition)

    $valueOptions = @(${valueOptions})
    $choices = @{
${choices}
    }
    $candidates = @{
${entries}
    }

    $words = @($commandAst.CommandElements | Select-Object -Skip 1 | ForEach-Object { $_.ToString() })
    if ($wordToComplete -ne '' -and $words.Count -gt 0) {
        $words = @($words | Select-Object -First ($words.Count - 1))
    }

    if ($words.Count -gt 0 -and $choices.ContainsKey($words[-1])) {
        $choices[$words[-1]] | Where-Object { $_ -like "$wordToComplete*" } | ForEach-Object {
            [System.Management.Automation.CompletionResult]::new($_, $_, 'ParameterValue', $_)
        }
        return
    }

    $path = @()
    $skip = $false
    foreach ($word in $words) {
        if ($skip) { $skip = $false; continue }
        if ($valueOptions -contains $word) { $skip = $true; continue }
        if (-not $word.StartsWith('-')) { $path += $word }
    }

    $key = $path -join ' '
    if (-not $candidates.ContainsKey($key)) { return }

    $candidates[$key] | Where-Object { $_.Word -like "$wordToComplete*" } | ForEach-Object {
        $type = if ($_.Word.StartsWith('-')) { 'ParameterName' } else { 'ParameterValue' }
        [System.Management.Automation.CompletionResult]::new($_.Word, $_.Word, $type, $_.Description)
    }
}
`;
}
