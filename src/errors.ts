import type { Shell } from "./shells/shells.js";

export type SetupStep = "completion" | "RC" | "remove RC";

export class SetupError extends Error {
  constructor(
    public readonly shell: Shell,
    public readonly step: SetupStep,
    cause: unknown,
  ) {
    super(`${shell} ${step}: ${describeError(cause)}`, { cause });
    this.name = "SetupError";
  }
}

function errnoCode(err: unknown): string | null {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return null;
}

function errnoPath(err: Error): string | null {
  return "path" in err && typeof err.path === "string" ? err.path : null;
}

export function describeError(err: unknown): string {
  if (!(err instanceof Error)) {
    return String(err);
  }
  const file = errnoPath(err);
  if (!file) {
    return err.message;
  }
  switch (errnoCode(err)) {
    case "ENOENT":
      return `no such file or directory: ${file}`;
    case "EACCES":
    case "EPERM":
      return `permission denied: ${file}`;
    case "ENOTDIR":
      return `not a directory: ${file}`;
    case "EISDIR":
      return `is a directory: ${file}`;
    default:
      return err.message;
  }
}
