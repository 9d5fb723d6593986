import { describe, it, expect } from "vitest";
import { completionPath, completionTarget } from "../../src/completions/paths.js";
import type { ShellEnvironment } from "../../src/shells/shells.js";

const env: ShellEnvironment = {
  homeDir: "/home/user",
  configHome: "/home/user/.config",
  shell: null,
};

describe("completionTarget", () => {
  it("puts bash completions under the config root", () => {
    expect(completionTarget("bash", env)).toEqual({
      dir: "/home/user/.config/bash/completions",
      file: "arc-init.bash",
    });
  });

  it("puts zsh completions under ~/.zsh regardless of config root", () => {
    const xdg = { ...env, configHome: "/xdg" };
    expect(completionPath("zsh", xdg)).toBe("/home/user/.zsh/completions/_arc-init");
  });

  it("puts fish completions under the config root", () => {
    expect(completionPath("fish", env)).toBe("/home/user/.config/fish/completions/arc-init.fish");
  });

  it("puts PowerShell completions under the config root", () => {
    expect(completionPath("powershell", { ...env, configHome: "/xdg" })).toBe(
      "/xdg/powershell/arc-init.ps1",
    );
  });

  it("takes a custom program name", () => {
    expect(completionPath("bash", env, "tool")).toBe("/home/user/.config/bash/completions/tool.bash");
  });
});
