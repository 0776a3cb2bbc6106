import { describe, expect, it } from "vitest";
import { VenvContext } from "../src/core/types";
import { buildInstallCommand, buildUninstallCommand } from "../src/installer/pip";

const VENV: VenvContext = {
  root: "/project/.venv",
  python: "/project/.venv/bin/python",
  pip: "/project/.venv/bin/pip",
  sitePackages: "/project/.venv/lib/python3.11/site-packages"
};

describe("pip command lines", () => {
  it("runs pip through the environment's interpreter", () => {
    expect(buildInstallCommand(VENV, "requests==2.31.0")).toEqual({
      command: "/project/.venv/bin/python",
      args: ["-m", "pip", "install", "requests==2.31.0"]
    });
  });

  it("passes --no-deps and -e before the spec", () => {
    expect(buildInstallCommand(VENV, "./libs/core", { editable: true, noDeps: true }).args).toEqual([
      "-m",
      "pip",
      "install",
      "--no-deps",
      "-e",
      "./libs/core"
    ]);
  });

  it("uninstalls without prompting", () => {
    expect(buildUninstallCommand(VENV, "six").args).toEqual(["-m", "pip", "uninstall", "-y", "six"]);
  });
});
