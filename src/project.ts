import { VenvContext } from "./core/types";
import { DeclaredStore } from "./declared/store";
import { InstalledInventory } from "./installed/inventory";
import { SitePackagesReader } from "./installed/reader";
import { PipInstaller } from "./installer/pip";
import { PypiClient } from "./installer/pypi";
import { Installer, PackageIndex } from "./installer/types";
import { FixContext } from "./remediation/types";
import { resolveVenvContext } from "./venv/context";

export type ProjectContext = FixContext & {
  root: string;
  venv: VenvContext;
};

export type OpenProjectOptions = {
  venvPath?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  indexUrl?: string;
  createInstaller?: (venv: VenvContext) => Installer;
  createIndex?: () => PackageIndex;
};

/** Resolves the virtual environment and wires the store, inventory, installer and index around it. */
export async function openProject(root: string, options: OpenProjectOptions = {}): Promise<ProjectContext> {
  const venv = await resolveVenvContext(root, {
    ...(options.venvPath ? { venvPath: options.venvPath } : {}),
    ...(options.env ? { env: options.env } : {})
  });

  return {
    root,
    venv,
    store: new DeclaredStore(root),
    inventory: new InstalledInventory(new SitePackagesReader(venv.sitePackages)),
    installer: options.createInstaller ? options.createInstaller(venv) : new PipInstaller(venv, options.timeoutMs),
    index: options.createIndex ? options.createIndex() : new PypiClient(options.indexUrl)
  };
}
