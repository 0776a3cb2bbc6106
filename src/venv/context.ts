import fs from "node:fs/promises";
import path from "node:path";
import { EnvironmentError } from "../core/errors";
import { VenvContext } from "../core/types";

export const VENV_DIRECTORY_CANDIDATES = ["venv", ".venv", "env", ".env"] as const;

export type ResolveVenvOptions = {
  venvPath?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
};

async function isFile(filePath: string): Promise<boolean> {
  const stat = await fs.stat(filePath).catch(() => undefined);
  return Boolean(stat?.isFile());
}

async function isDirectory(dirPath: string): Promise<boolean> {
  const stat = await fs.stat(dirPath).catch(() => undefined);
  return Boolean(stat?.isDirectory());
}

async function findPosixSitePackages(venvRoot: string): Promise<string | undefined> {
  const libDir = path.join(venvRoot, "lib");
  const entries = await fs.readdir(libDir).catch((): string[] => []);

  const candidates = entries
    .map((entry) => ({ entry, minor: /^python3\.(\d+)$/.exec(entry)?.[1] }))
    .filter((candidate): candidate is { entry: string; minor: string } => candidate.minor !== undefined)
    .sort((left, right) => Number(right.minor) - Number(left.minor));

  for (const candidate of candidates) {
    const sitePackages = path.join(libDir, candidate.entry, "site-packages");
    if (await isDirectory(sitePackages)) {
      return sitePackages;
    }
  }
  return undefined;
}

export async function inspectVenv(
  venvRoot: string,
  platform: NodeJS.Platform = process.platform
): Promise<VenvContext | undefined> {
  const root = path.resolve(venvRoot);

  if (platform === "win32") {
    const python = path.join(root, "Scripts", "python.exe");
    const sitePackages = path.join(root, "Lib", "site-packages");
    if ((await isFile(python)) && (await isDirectory(sitePackages))) {
      return { root, python, pip: path.join(root, "Scripts", "pip.exe"), sitePackages };
    }
    return undefined;
  }

  const python = path.join(root, "bin", "python");
  if (!(await isFile(python))) {
    return undefined;
  }
  const sitePackages = await findPosixSitePackages(root);
  if (!sitePackages) {
    return undefined;
  }
  return { root, python, pip: path.join(root, "bin", "pip"), sitePackages };
}

export async function resolveVenvContext(projectRoot: string, options: ResolveVenvOptions = {}): Promise<VenvContext> {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;

  if (options.venvPath) {
    const explicit = path.resolve(projectRoot, options.venvPath);
    const context = await inspectVenv(explicit, platform);
    if (!context) {
      throw new EnvironmentError(explicit, `Not a usable virtual environment: ${explicit}`);
    }
    return context;
  }

  const active = env.VIRTUAL_ENV;
  if (active) {
    const context = await inspectVenv(active, platform);
    if (context) {
      return context;
    }
  }

  for (const candidate of VENV_DIRECTORY_CANDIDATES) {
    const context = await inspectVenv(path.join(projectRoot, candidate), platform);
    if (context) {
      return context;
    }
  }

  throw new EnvironmentError(
    projectRoot,
    `No virtual environment found in ${projectRoot} (looked for ${VENV_DIRECTORY_CANDIDATES.join(", ")})`
  );
}
