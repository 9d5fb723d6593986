import { describe, it, expect } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { SetupError, describeError } from "../src/errors.js";
import { createLogger } from "../src/log.js";

function captureError(fn: () => void): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}

describe("describeError", () => {
  it("describes missing files by path", () => {
    const missing = path.join(os.tmpdir(), "arc-init-definitely-missing", "rc");
    const err = captureError(() => fs.readFileSync(missing));
    expect(describeError(err)).toBe(`no such file or directory: ${missing}`);
  });

  it("uses the message of plain errors", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
  });

  it("stringifies non-errors", () => {
    expect(describeError("oops")).toBe("oops");
  });
});

describe("SetupError", () => {
  it("prefixes the shell and step and keeps the cause", () => {
    const cause = new Error("disk full");
    const err = new SetupError("zsh", "RC", cause);
    expect(err.message).toBe("zsh RC: disk full");
    expect(err.name).toBe("SetupError");
    expect(err.cause).toBe(cause);
    expect(err.shell).toBe("zsh");
  });
});

describe("createLogger", () => {
  it("routes info to stdout and errors to stderr", () => {
    const out: string[] = [];
    const err: string[] = [];
    const log = createLogger(
      (t) => out.push(t),
      (t) => err.push(t),
      false,
    );
    log.info("hello");
    log.error("bad");
    log.debug("hidden");
    expect(out).toEqual(["hello"]);
    expect(err).toEqual(["bad"]);
  });

  it("prints debug lines when enabled", () => {
    const err: string[] = [];
    const log = createLogger(
      () => {},
      (t) => err.push(t),
      true,
    );
    log.debug("details");
    expect(err).toEqual(["[debug] details"]);
  });
});
