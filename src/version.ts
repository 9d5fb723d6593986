import fs from "fs";

export const PROGRAM_NAME = "arc-init";

function readPackageVersion(): string {
  try {
    const raw = fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8");
    const pkg: unknown = JSON.parse(raw);
    if (typeof pkg === "object" && pkg !== null && "version" in pkg) {
      return typeof pkg.version === "string" ? pkg.version : "0.0.0-dev";
    }
  } catch {
    // Running from a bundle without package.json beside it.
  }
  return "0.0.0-dev";
}

export const VERSION = readPackageVersion();
