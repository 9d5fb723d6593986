import { describe, it, expect } from "vitest";
import {
  detectShell,
  isShell,
  resolveEnvironment,
  selectShells,
} from "../../src/shells/shells.js";

describe("resolveEnvironment", () => {
  it("defaults config home to ~/.config", () => {
    const env = resolveEnvironment({}, "/home/user");
    expect(env).toEqual({ homeDir: "/home/user", configHome: "/home/user/.config", shell: null });
  });

  it("uses XDG_CONFIG_HOME when set", () => {
    const env = resolveEnvironment({ XDG_CONFIG_HOME: "/xdg", SHELL: "/bin/zsh" }, "/home/user");
    expect(env.configHome).toBe("/xdg");
    expect(env.shell).toBe("/bin/zsh");
  });

  it("ignores an empty XDG_CONFIG_HOME", () => {
    const env = resolveEnvironment({ XDG_CONFIG_HOME: "" }, "/home/user");
    expect(env.configHome).toBe("/home/user/.config");
  });
});

describe("detectShell", () => {
  it("detects bash", () => {
    expect(detectShell("/bin/bash")).toBe("bash");
  });

  it("detects zsh", () => {
    expect(detectShell("/usr/bin/zsh")).toBe("zsh");
  });

  it("detects fish", () => {
    expect(detectShell("/usr/local/bin/fish")).toBe("fish");
  });

  it("detects PowerShell case-insensitively", () => {
    expect(detectShell("C:\\Program Files\\PowerShell\\7\\pwsh.exe")).toBe("powershell");
    expect(detectShell("/opt/microsoft/powershell/7/pwsh")).toBe("powershell");
  });

  it("returns null for unknown shell", () => {
    expect(detectShell("/bin/tcsh")).toBeNull();
  });

  it("returns null when $SHELL is unset", () => {
    expect(detectShell(null)).toBeNull();
  });
});

describe("isShell", () => {
  it("accepts supported shells only", () => {
    expect(isShell("fish")).toBe(true);
    expect(isShell("ksh")).toBe(false);
  });
});

describe("selectShells", () => {
  it("prefers explicit flags in fixed order", () => {
    expect(selectShells({ fish: true, bash: true, all: true }, "zsh", ["bash"])).toEqual([
      "bash",
      "fish",
    ]);
  });

  it("selects every shell with --all", () => {
    expect(selectShells({ all: true }, "zsh", ["bash"])).toEqual([
      "bash",
      "zsh",
      "fish",
      "powershell",
    ]);
  });

  it("falls back to the detected shell", () => {
    expect(selectShells({}, "fish", ["bash", "zsh"])).toEqual(["fish"]);
  });

  it("uses the fallback list when nothing is detected", () => {
    expect(selectShells({}, null, ["zsh", "bash"])).toEqual(["bash", "zsh"]);
  });
});
