import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { CliIO, runCli } from "../src/cli/program";
import { CatalogEntry, FakeIndex, FakeInstaller } from "./fakes";
import { cleanupTempDirs, makeTempDir, makeVenv, readText, writeDistInfo } from "./helpers";

afterEach(async () => {
  await cleanupTempDirs();
});

type Harness = {
  io: CliIO;
  out: () => string;
  err: () => string;
};

function harness(cwd: string, catalog: Record<string, CatalogEntry> = {}, answer = false): Harness {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    io: {
      cwd,
      env: {},
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
      confirm: vi.fn(async () => answer),
      createInstaller: (venv) => new FakeInstaller(venv.sitePackages, catalog),
      createIndex: () => new FakeIndex({})
    },
    out: () => stdout.join(""),
    err: () => stderr.join("")
  };
}

async function requestsProject(): Promise<string> {
  const root = await makeTempDir();
  const { sitePackages } = await makeVenv(root);
  await fs.writeFile(path.join(root, "requirements.txt"), "requests==2.31.0\n", "utf8");
  await writeDistInfo(sitePackages, "requests", "2.28.0", ["idna>=2.5"]);
  await writeDistInfo(sitePackages, "idna", "3.6");
  return root;
}

const REQUESTS_CATALOG: Record<string, CatalogEntry> = {
  requests: { versions: ["2.28.0", "2.31.0"], requires: { "2.31.0": ["idna>=2.5"] } },
  six: { versions: ["1.16.0"] }
};

describe("venvsync CLI", () => {
  it("lists top-level packages as a table", async () => {
    const root = await requestsProject();
    const h = harness(root);

    expect(await runCli(["list"], h.io)).toBe(0);
    expect(h.out()).toBe(
      [
        "Package   Required    Installed  Status",
        "requests  2.31.0 (r)  2.28.0     version_mismatch",
        "",
        "Total: 1",
        ""
      ].join("\n")
    );
  });

  it("lists every installed package as JSON", async () => {
    const root = await requestsProject();
    const h = harness(root);

    expect(await runCli(["--format", "json", "list", "--all"], h.io)).toBe(0);
    const parsed: Array<{ name: string; status: string }> = JSON.parse(h.out());
    expect(parsed.map((info) => [info.name, info.status])).toEqual([
      ["idna", "normal"],
      ["requests", "version_mismatch"]
    ]);
  });

  it("applies fixes with --yes", async () => {
    const root = await requestsProject();
    const h = harness(root, REQUESTS_CATALOG);

    expect(await runCli(["fix", "--yes"], h.io)).toBe(0);
    expect(h.out()).toBe("Results:\n  [ok] update requests 2.31.0\nFixed: 1, failed: 0\n");
    expect(h.io.confirm).not.toHaveBeenCalled();

    const after = harness(root);
    await runCli(["list"], after.io);
    expect(after.out()).toContain("requests  2.31.0 (r)  2.31.0     normal");
  });

  it("shows the plan and stops when the prompt is declined", async () => {
    const root = await requestsProject();
    const h = harness(root, REQUESTS_CATALOG, false);

    expect(await runCli(["fix"], h.io)).toBe(0);
    expect(h.io.confirm).toHaveBeenCalledWith("Apply these fixes? [y/N] ");
    expect(h.out()).toBe(
      "Version mismatches to update:\n  - requests: 2.28.0 -> ==2.31.0\nFix aborted; nothing was changed.\n"
    );
  });

  it("adds a package and records it", async () => {
    const root = await requestsProject();
    const h = harness(root, REQUESTS_CATALOG);

    expect(await runCli(["add", "six"], h.io)).toBe(0);
    expect(h.out()).toBe("+ six 1.16.0\n");
    expect(await readText(path.join(root, "requirements.txt"))).toBe("requests==2.31.0\nsix==1.16.0\n");
  });

  it("answers why and conflicts", async () => {
    const root = await makeTempDir();
    const { sitePackages } = await makeVenv(root);
    await writeDistInfo(sitePackages, "requests", "2.31.0", ["idna<3,>=2.5"]);
    await writeDistInfo(sitePackages, "idna", "3.6");

    const why = harness(root);
    expect(await runCli(["why", "IDNA"], why.io)).toBe(0);
    expect(why.out()).toBe("IDNA is required by: requests\n");

    const conflicts = harness(root);
    expect(await runCli(["conflicts"], conflicts.io)).toBe(1);
    expect(conflicts.out()).toBe("requests requires idna<3,>=2.5, but 3.6 is installed\n");
  });

  it("fails for an unknown package in tree", async () => {
    const root = await requestsProject();
    const h = harness(root);

    expect(await runCli(["tree", "ghost"], h.io)).toBe(1);
    expect(h.err()).toBe("Error: Package ghost is neither installed nor declared\n");
  });

  it("exits with 2 on configuration errors", async () => {
    const root = await makeTempDir();

    const noVenv = harness(root);
    expect(await runCli(["list"], noVenv.io)).toBe(2);
    expect(noVenv.err()).toBe(`Error: No virtual environment found in ${root} (looked for venv, .venv, env, .env)\n`);

    const badFormat = harness(root);
    expect(await runCli(["--format", "xml", "list"], badFormat.io)).toBe(2);
    expect(badFormat.err()).toBe('Error: Unsupported format "xml". Use text|json.\n');

    const unknown = harness(root);
    expect(await runCli(["frobnicate"], unknown.io)).toBe(2);
  });
});
