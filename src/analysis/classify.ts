import { DeclaredDependency, InstalledPackage, PackageInfo, PackageStatus } from "../core/types";
import { effectiveVersionSpec, formatRequiredVersion, hasVersionConflict } from "../declared/dependency";
import { checkVersionCompatibility } from "../version/utils";

export function collectDependencyNames(installed: Map<string, InstalledPackage>): Set<string> {
  const names = new Set<string>();
  for (const pkg of installed.values()) {
    for (const dependency of pkg.dependencies) {
      names.add(dependency);
    }
  }
  return names;
}

function resolveStatus(
  name: string,
  pkg: InstalledPackage | undefined,
  declaration: DeclaredDependency | undefined,
  allDependencyNames: Set<string>
): PackageStatus {
  if (!pkg) {
    return declaration ? "not_installed" : "normal";
  }
  if (declaration && allDependencyNames.has(name)) {
    return "redundant";
  }
  if (!declaration) {
    return allDependencyNames.has(name) ? "normal" : "not_in_requirements";
  }
  if (hasVersionConflict(declaration)) {
    return "version_conflict";
  }
  if (!checkVersionCompatibility(pkg.version, effectiveVersionSpec(declaration))) {
    return "version_mismatch";
  }
  return "normal";
}

/**
 * Status precedence: not_installed, redundant, not_in_requirements,
 * version_conflict, version_mismatch, normal.
 */
export function classifyPackage(
  name: string,
  installed: Map<string, InstalledPackage>,
  declared: Map<string, DeclaredDependency>,
  allDependencyNames: Set<string>
): PackageInfo {
  const pkg = installed.get(name);
  const declaration = declared.get(name);

  return {
    name,
    displayName: pkg?.displayName ?? declaration?.displayName ?? name,
    ...(pkg ? { installedVersion: pkg.version } : {}),
    ...(declaration
      ? { requiredVersion: formatRequiredVersion(declaration), requiredSpec: effectiveVersionSpec(declaration) }
      : {}),
    dependencies: pkg ? [...pkg.dependencies] : [],
    status: resolveStatus(name, pkg, declaration, allDependencyNames)
  };
}
