import type { Diagnostic } from "./errors";

export type VersionOperator = "===" | "==" | ">=" | "<=" | "!=" | "~=" | ">" | "<";
export type DeclarationSource = "requirements" | "pyproject";
export type OutputFormat = "text" | "json";

export type PackageStatus =
  | "normal"
  | "not_installed"
  | "not_in_requirements"
  | "redundant"
  | "version_mismatch"
  | "version_conflict";

export type VenvContext = {
  root: string;
  python: string;
  pip: string;
  sitePackages: string;
};

export type RequirementEntry = {
  name: string;
  displayName: string;
  extras: string[];
  specifier: string;
  marker?: string;
};

export type DeclaredDependency = {
  name: string;
  displayName: string;
  extras: string[];
  specs: Partial<Record<DeclarationSource, string>>;
};

export type InstalledPackage = {
  name: string;
  displayName: string;
  version: string;
  dependencies: string[];
  requirements: RequirementEntry[];
  location: string;
};

export type PackageInfo = {
  name: string;
  displayName: string;
  installedVersion?: string;
  requiredVersion?: string;
  requiredSpec?: string;
  dependencies: string[];
  status: PackageStatus;
};

export type DependencyNode = {
  name: string;
  displayName: string;
  installedVersion?: string;
  requiredVersion?: string;
  status: PackageStatus;
  dependencies: DependencyNode[];
  repeated: boolean;
};

export type DependencyConflict = {
  package: string;
  dependency: string;
  requirement: string;
  installedVersion: string;
};

export type ImpactAnalysis = {
  directDependents: string[];
  indirectDependents: string[];
  safeToRemove: boolean;
};

export type InstalledSnapshot = {
  packages: Map<string, InstalledPackage>;
  diagnostics: Diagnostic[];
};

export type DeclaredSnapshot = {
  dependencies: Map<string, DeclaredDependency>;
  diagnostics: Diagnostic[];
};

export type PackageResultStatus = "installed" | "removed" | "error" | "not_found";

export type AutoFixInfo = {
  originalVersion: string;
  installedVersion: string;
  reason: AutoFixReason;
};

export type AutoFixReason =
  | "Version not found"
  | "Dependency conflict"
  | "Python compatibility issue"
  | "Installation failed";

export type PackageResult = {
  status: PackageResultStatus;
  version?: string;
  message?: string;
  dependencies?: string[];
  autoFix?: AutoFixInfo;
  availableVersions?: string[];
  removedDependencies?: string[];
  keptDependencies?: Record<string, string[]>;
};
