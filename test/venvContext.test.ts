import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { EnvironmentError } from "../src/core/errors";
import { inspectVenv, resolveVenvContext } from "../src/venv/context";
import { cleanupTempDirs, makeTempDir, makeVenv } from "./helpers";

afterEach(async () => {
  await cleanupTempDirs();
});

describe("inspectVenv", () => {
  it("picks the highest python3.N site-packages", async () => {
    const root = await makeTempDir();
    const { venvRoot } = await makeVenv(root, ".venv", "python3.9");
    const newer = path.join(venvRoot, "lib", "python3.12", "site-packages");
    await fs.mkdir(newer, { recursive: true });
    await fs.mkdir(path.join(venvRoot, "lib", "python3.13"), { recursive: true });

    const context = await inspectVenv(venvRoot, "linux");
    expect(context).toEqual({
      root: venvRoot,
      python: path.join(venvRoot, "bin", "python"),
      pip: path.join(venvRoot, "bin", "pip"),
      sitePackages: newer
    });
  });

  it("uses the Windows layout on win32", async () => {
    const root = await makeTempDir();
    const venvRoot = path.join(root, "venv");
    await fs.mkdir(path.join(venvRoot, "Scripts"), { recursive: true });
    await fs.writeFile(path.join(venvRoot, "Scripts", "python.exe"), "", "utf8");
    await fs.mkdir(path.join(venvRoot, "Lib", "site-packages"), { recursive: true });

    const context = await inspectVenv(venvRoot, "win32");
    expect(context?.sitePackages).toBe(path.join(venvRoot, "Lib", "site-packages"));
    expect(await inspectVenv(venvRoot, "linux")).toBeUndefined();
  });

  it("rejects a directory without an interpreter", async () => {
    const root = await makeTempDir();
    await fs.mkdir(path.join(root, "lib", "python3.11", "site-packages"), { recursive: true });
    expect(await inspectVenv(root, "linux")).toBeUndefined();
  });
});

describe("resolveVenvContext", () => {
  it("prefers an explicit path, then VIRTUAL_ENV, then the project directories", async () => {
    const root = await makeTempDir();
    const local = await makeVenv(root, "venv");
    const hidden = await makeVenv(root, ".venv");
    const other = await makeTempDir();
    const active = await makeVenv(other, "active");

    expect((await resolveVenvContext(root, { env: {}, platform: "linux" })).root).toBe(local.venvRoot);
    expect((await resolveVenvContext(root, { env: { VIRTUAL_ENV: active.venvRoot }, platform: "linux" })).root).toBe(
      active.venvRoot
    );
    expect(
      (await resolveVenvContext(root, { venvPath: ".venv", env: { VIRTUAL_ENV: active.venvRoot }, platform: "linux" }))
        .root
    ).toBe(hidden.venvRoot);
  });

  it("falls back to the project when VIRTUAL_ENV is not usable", async () => {
    const root = await makeTempDir();
    const local = await makeVenv(root, "env");
    const context = await resolveVenvContext(root, { env: { VIRTUAL_ENV: path.join(root, "missing") }, platform: "linux" });
    expect(context.root).toBe(local.venvRoot);
  });

  it("throws EnvironmentError when nothing is found", async () => {
    const root = await makeTempDir();
    await expect(resolveVenvContext(root, { env: {}, platform: "linux" })).rejects.toBeInstanceOf(EnvironmentError);
    await expect(resolveVenvContext(root, { venvPath: "nope", env: {}, platform: "linux" })).rejects.toThrow(
      "Not a usable virtual environment"
    );
  });
});
