import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

const tempDirs: string[] = [];

export async function makeTempDir(prefix = "venvsync-test-"): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export async function cleanupTempDirs(): Promise<void> {
  const dirs = tempDirs.splice(0);
  await Promise.all(dirs.map((dir) => fs.rm(dir, { recursive: true, force: true })));
}

export type VenvLayout = {
  venvRoot: string;
  sitePackages: string;
};

/** Lays out a POSIX virtual environment with an empty interpreter file. */
export async function makeVenv(projectRoot: string, dirName = ".venv", pythonDir = "python3.11"): Promise<VenvLayout> {
  const venvRoot = path.join(projectRoot, dirName);
  const sitePackages = path.join(venvRoot, "lib", pythonDir, "site-packages");
  await fs.mkdir(path.join(venvRoot, "bin"), { recursive: true });
  await fs.writeFile(path.join(venvRoot, "bin", "python"), "", "utf8");
  await fs.mkdir(sitePackages, { recursive: true });
  return { venvRoot, sitePackages };
}

export function distInfoDirName(name: string, version: string): string {
  return `${name.replace(/[-.]/g, "_")}-${version}.dist-info`;
}

export async function writeDistInfo(
  sitePackages: string,
  name: string,
  version: string,
  requiresDist: string[] = []
): Promise<string> {
  const dir = path.join(sitePackages, distInfoDirName(name, version));
  await fs.mkdir(dir, { recursive: true });
  const lines = ["Metadata-Version: 2.1", `Name: ${name}`, `Version: ${version}`];
  for (const requirement of requiresDist) {
    lines.push(`Requires-Dist: ${requirement}`);
  }
  await fs.writeFile(path.join(dir, "METADATA"), `${lines.join("\n")}\n\nLong description.\n`, "utf8");
  return dir;
}

export async function removeDistInfo(sitePackages: string, name: string): Promise<boolean> {
  const normalized = name.toLowerCase().replace(/[-_.]+/g, "_");
  const entries = await fs.readdir(sitePackages).catch((): string[] => []);
  let removed = false;
  for (const entry of entries) {
    if (!entry.endsWith(".dist-info")) {
      continue;
    }
    const entryName = entry.slice(0, entry.indexOf("-")).toLowerCase();
    if (entryName === normalized) {
      await fs.rm(path.join(sitePackages, entry), { recursive: true, force: true });
      removed = true;
    }
  }
  return removed;
}

export async function readText(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf8");
}
