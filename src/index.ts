export * from "./core/errors";
export * from "./core/types";
export * from "./version/pep440";
export * from "./version/utils";
export * from "./declared/dependency";
export { RequirementsFile, parseRequirementsText, formatRequirement } from "./declared/requirementsFile";
export { PyprojectFile, addPyprojectDependency, removePyprojectDependency } from "./declared/pyprojectFile";
export { DeclaredStore } from "./declared/store";
export { resolveVenvContext, inspectVenv } from "./venv/context";
export { InstalledInventory, SYSTEM_PACKAGES, isSystemPackage } from "./installed/inventory";
export { SitePackagesReader } from "./installed/reader";
export type { DistributionReader, DistributionScan, RawDistribution } from "./installed/reader";
export { classifyPackage, collectDependencyNames } from "./analysis/classify";
export { DependencyGraphAnalyzer } from "./analysis/graph";
export { PipInstaller } from "./installer/pip";
export { PypiClient, extractAvailableVersions } from "./installer/pypi";
export type { Installer, InstallOptions, InstallerResult, PackageIndex } from "./installer/types";
export { installWithAutoFix, rankCandidates, classifyFailureReason } from "./remediation/autoFix";
export { applyFixPlan, buildFixPlan, runFix } from "./remediation";
export type { FixAction, FixActionResult, FixContext, FixPlan, FixReport, RunFixOptions } from "./remediation/types";
export { addPackages } from "./packages/add";
export { removePackages } from "./packages/remove";
export { openProject } from "./project";
export type { ProjectContext } from "./project";
