import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { bashRcPath, isRcShell, rcPath, rcPayload, zshRcPath } from "../../src/rc/paths.js";

describe("RC paths", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "arc-init-rcpath-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("falls back to .bash_profile when .bashrc is absent", () => {
    expect(bashRcPath(tmpDir)).toBe(path.join(tmpDir, ".bash_profile"));
  });

  it("uses .bashrc when present", () => {
    fs.writeFileSync(path.join(tmpDir, ".bashrc"), "");
    expect(bashRcPath(tmpDir)).toBe(path.join(tmpDir, ".bashrc"));
  });

  it("uses .zshrc for zsh", () => {
    expect(zshRcPath("/home/user")).toBe("/home/user/.zshrc");
    const env = { homeDir: "/home/user", configHome: "/home/user/.config", shell: null };
    expect(rcPath("zsh", env)).toBe("/home/user/.zshrc");
  });
});

describe("isRcShell", () => {
  it("only bash and zsh manage RC files", () => {
    expect(isRcShell("bash")).toBe(true);
    expect(isRcShell("zsh")).toBe(true);
    expect(isRcShell("fish")).toBe(false);
    expect(isRcShell("powershell")).toBe(false);
  });
});

describe("rcPayload", () => {
  it("sources the bash completion file relative to $HOME", () => {
    const env = { homeDir: "/home/user", configHome: "/home/user/.config", shell: null };
    expect(rcPayload("bash", env)).toEqual([
      "# arc-init bash completions",
      'if [ -f "$HOME/.config/bash/completions/arc-init.bash" ]; then',
      '  . "$HOME/.config/bash/completions/arc-init.bash"',
      "fi",
    ]);
  });

  it("keeps an absolute path when the config root is outside home", () => {
    const env = { homeDir: "/home/user", configHome: "/xdg", shell: null };
    expect(rcPayload("bash", env)[1]).toBe('if [ -f "/xdg/bash/completions/arc-init.bash" ]; then');
  });

  it("adds the zsh completions directory to fpath", () => {
    const env = { homeDir: "/home/user", configHome: "/home/user/.config", shell: null };
    expect(rcPayload("zsh", env)).toEqual([
      "# arc-init zsh completions",
      "fpath+=(~/.zsh/completions)",
      "autoload -Uz compinit",
      "compinit",
    ]);
  });
});
