import { Diagnostic } from "../core/errors";
import { AutoFixInfo, DeclarationSource } from "../core/types";
import { DeclaredStore } from "../declared/store";
import { InstalledInventory } from "../installed/inventory";
import { Installer, PackageIndex } from "../installer/types";

export type FixAction =
  | {
      id: string;
      kind: "update";
      package: string;
      displayName: string;
      installedVersion: string;
      spec: string;
      extras: string[];
    }
  | {
      id: string;
      kind: "install";
      package: string;
      displayName: string;
      spec: string;
      extras: string[];
    }
  | {
      id: string;
      kind: "deredundant";
      package: string;
      displayName: string;
      sources: DeclarationSource[];
      requiredBy: string[];
    }
  | {
      id: string;
      kind: "declare";
      package: string;
      displayName: string;
      version: string;
      source: DeclarationSource;
    };

export type FixActionKind = FixAction["kind"];

export type UnresolvedConflict = {
  package: string;
  displayName: string;
  requiredVersion: string;
  specs: Partial<Record<DeclarationSource, string>>;
};

export type FixPlan = {
  activeSource: DeclarationSource;
  toUpdate: Array<Extract<FixAction, { kind: "update" }>>;
  toInstall: Array<Extract<FixAction, { kind: "install" }>>;
  toDeredundant: Array<Extract<FixAction, { kind: "deredundant" }>>;
  toDeclare: Array<Extract<FixAction, { kind: "declare" }>>;
  unresolved: UnresolvedConflict[];
};

export type FixActionResult = {
  actionId: string;
  kind: FixActionKind;
  package: string;
  success: boolean;
  version?: string;
  message?: string;
  autoFix?: AutoFixInfo;
  availableVersions?: string[];
};

export type FixReport = {
  aborted: boolean;
  plan: FixPlan;
  results: FixActionResult[];
  fixed: number;
  failed: number;
  diagnostics: Diagnostic[];
};

export type FixContext = {
  store: DeclaredStore;
  inventory: InstalledInventory;
  installer: Installer;
  index?: PackageIndex;
};

export type RunFixOptions = {
  yes?: boolean;
  file?: DeclarationSource;
  confirm?: (plan: FixPlan) => Promise<boolean>;
};
