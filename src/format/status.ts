import type { ShellStatus } from "../setup/setup.js";

function completionLine(s: ShellStatus): string {
  switch (s.completion) {
    case "written":
      return `  Completions: INSTALLED (${s.completionPath})`;
    case "skipped":
      return "  Completions: SKIPPED (already exists, use --force to overwrite)";
    case "failed":
      return "  Completions: FAILED";
  }
}

function rcLine(s: ShellStatus): string | null {
  switch (s.rc) {
    case null:
      return null;
    case "added":
      return `  RC block: ADDED (${s.rcPath})`;
    case "updated":
      return `  RC block: UPDATED (${s.rcPath})`;
    case "skipped":
      return `  RC block: SKIPPED (${s.reason ?? "already present"})`;
    case "removed":
      return `  RC block: REMOVED (${s.rcPath})`;
    case "absent":
      return `  RC block: NOT PRESENT (${s.rcPath})`;
    case "failed":
      return "  RC block: FAILED";
  }
}

export function formatStatusReport(statuses: readonly ShellStatus[]): string {
  if (statuses.length === 0) {
    return "";
  }

  const lines = ["", "=== Shell Completions Status ===", ""];
  for (const s of statuses) {
    lines.push(`${s.shell.toUpperCase()}:`);
    lines.push(completionLine(s));
    const rc = rcLine(s);
    if (rc) {
      lines.push(rc);
    }
    lines.push("");
  }

  lines.push("Next steps:");
  lines.push("  - If completions not working, restart your shell");
  lines.push("  - Use --force to overwrite existing files");
  lines.push("  - Use --write-rc to update shell RC files");
  return lines.join("\n");
}
