import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { InstalledInventory, isSystemPackage } from "../src/installed/inventory";
import { DistributionReader, DistributionScan, SitePackagesReader } from "../src/installed/reader";
import { cleanupTempDirs, makeTempDir, makeVenv, writeDistInfo } from "./helpers";

afterEach(async () => {
  await cleanupTempDirs();
});

class CountingReader implements DistributionReader {
  reads = 0;

  constructor(private readonly scan: DistributionScan) {}

  async readDistributions(): Promise<DistributionScan> {
    this.reads += 1;
    return this.scan;
  }
}

describe("isSystemPackage", () => {
  it("matches normalized names", () => {
    expect(isSystemPackage("pip")).toBe(true);
    expect(isSystemPackage("pkg_resources")).toBe(true);
    expect(isSystemPackage("requests")).toBe(false);
  });
});

describe("InstalledInventory", () => {
  it("reads dist-info metadata and filters dev extras, other platforms and system packages", async () => {
    const root = await makeTempDir();
    const { sitePackages } = await makeVenv(root);
    await writeDistInfo(sitePackages, "requests", "2.31.0", [
      "charset-normalizer<4,>=2",
      "idna (<4,>=2.5)",
      'PySocks!=1.5.7,>=1.5.6; extra == "socks"',
      'pytest>=7; extra == "test"',
      'colorama; sys_platform == "win32"',
      "setuptools>=40"
    ]);
    await writeDistInfo(sitePackages, "idna", "3.6");
    await writeDistInfo(sitePackages, "pip", "24.0");

    const inventory = new InstalledInventory(new SitePackagesReader(sitePackages), { platform: "linux" });
    const snapshot = await inventory.snapshot();

    expect([...snapshot.packages.keys()]).toEqual(["idna", "requests"]);
    const requests = snapshot.packages.get("requests");
    expect(requests?.dependencies).toEqual(["charset-normalizer", "idna", "pysocks"]);
    expect(requests?.requirements.map((entry) => entry.specifier)).toEqual(["<4,>=2", "<4,>=2.5", "!=1.5.7,>=1.5.6"]);
    expect(snapshot.diagnostics).toEqual([]);

    const withSystem = await inventory.snapshot(false);
    expect([...withSystem.packages.keys()]).toEqual(["idna", "pip", "requests"]);
    expect(withSystem.packages.get("requests")?.dependencies).toEqual([
      "charset-normalizer",
      "idna",
      "pysocks",
      "setuptools"
    ]);
  });

  it("reads egg-info directories and lets dist-info win for the same name", async () => {
    const root = await makeTempDir();
    const { sitePackages } = await makeVenv(root);
    const egg = path.join(sitePackages, "legacy_pkg.egg-info");
    await fs.mkdir(egg);
    await fs.writeFile(path.join(egg, "PKG-INFO"), "Metadata-Version: 1.1\nName: legacy-pkg\nVersion: 0.9\n", "utf8");
    await fs.writeFile(path.join(egg, "requires.txt"), "six\n\n[test]\nnose\n", "utf8");

    const stale = path.join(sitePackages, "six-1.15.0.egg-info");
    await fs.writeFile(stale, "Metadata-Version: 1.1\nName: six\nVersion: 1.15.0\n", "utf8");
    await writeDistInfo(sitePackages, "six", "1.16.0");

    const snapshot = await new InstalledInventory(new SitePackagesReader(sitePackages), { platform: "linux" }).snapshot();
    expect(snapshot.packages.get("legacy-pkg")?.dependencies).toEqual(["six"]);
    expect(snapshot.packages.get("six")?.version).toBe("1.16.0");
  });

  it("reports broken metadata as a diagnostic and keeps going", async () => {
    const root = await makeTempDir();
    const { sitePackages } = await makeVenv(root);
    await fs.mkdir(path.join(sitePackages, "broken-1.0.dist-info"));
    await fs.mkdir(path.join(sitePackages, "nameless-1.0.dist-info"));
    await fs.writeFile(path.join(sitePackages, "nameless-1.0.dist-info", "METADATA"), "Version: 1.0\n", "utf8");
    await writeDistInfo(sitePackages, "attrs", "23.2.0", ["bad>=???"]);

    const snapshot = await new InstalledInventory(new SitePackagesReader(sitePackages)).snapshot();
    expect([...snapshot.packages.keys()]).toEqual(["attrs"]);
    expect(snapshot.packages.get("attrs")?.dependencies).toEqual([]);
    expect(snapshot.diagnostics.map((diagnostic) => [diagnostic.kind, diagnostic.subject])).toEqual([
      ["DependencyError", "broken-1.0.dist-info"],
      ["DependencyError", "nameless-1.0.dist-info"],
      ["DependencyError", "attrs"]
    ]);
  });

  it("caches per system filter until invalidated", async () => {
    const reader = new CountingReader({
      distributions: [{ location: "/site/six", metadata: { name: "six", version: "1.16.0", requiresDist: [] } }],
      diagnostics: []
    });
    const inventory = new InstalledInventory(reader);

    await inventory.snapshot();
    await inventory.snapshot();
    expect(reader.reads).toBe(1);

    await inventory.snapshot(false);
    expect(reader.reads).toBe(2);

    inventory.invalidate();
    await inventory.snapshot();
    expect(reader.reads).toBe(3);
  });
});
