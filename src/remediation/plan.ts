import { DependencyGraphAnalyzer } from "../analysis/graph";
import { DeclarationSource, DeclaredDependency, InstalledPackage } from "../core/types";
import { declarationSources, effectiveVersionSpec, isDeclaredIn } from "../declared/dependency";
import { FixAction, FixPlan } from "./types";

/** Operator written when a file declares an installed version. */
export const DECLARE_OPERATOR = {
  requirements: "==",
  pyproject: ">="
} as const satisfies Record<DeclarationSource, string>;

export function fixActions(plan: FixPlan): FixAction[] {
  return [...plan.toUpdate, ...plan.toInstall, ...plan.toDeredundant, ...plan.toDeclare];
}

export function isEmptyPlan(plan: FixPlan): boolean {
  return fixActions(plan).length === 0;
}

/**
 * Sorts every known package into one of four disjoint buckets. Packages whose
 * two declarations disagree are reported as unresolved and left alone.
 */
export function buildFixPlan(
  installed: Map<string, InstalledPackage>,
  declared: Map<string, DeclaredDependency>,
  activeSource: DeclarationSource
): FixPlan {
  const analyzer = new DependencyGraphAnalyzer(installed, declared);
  const topLevel = analyzer.topLevelPackages();
  const plan: FixPlan = {
    activeSource,
    toUpdate: [],
    toInstall: [],
    toDeredundant: [],
    toDeclare: [],
    unresolved: []
  };

  for (const info of analyzer.allPackages().values()) {
    const declaration = declared.get(info.name);
    const pkg = installed.get(info.name);

    switch (info.status) {
      case "not_installed":
        if (declaration) {
          plan.toInstall.push({
            id: `op-install-${plan.toInstall.length + 1}`,
            kind: "install",
            package: info.name,
            displayName: declaration.displayName,
            spec: effectiveVersionSpec(declaration),
            extras: [...declaration.extras]
          });
        }
        break;
      case "version_mismatch":
        if (declaration && pkg) {
          plan.toUpdate.push({
            id: `op-update-${plan.toUpdate.length + 1}`,
            kind: "update",
            package: info.name,
            displayName: declaration.displayName,
            installedVersion: pkg.version,
            spec: effectiveVersionSpec(declaration),
            extras: [...declaration.extras]
          });
        }
        break;
      case "redundant":
        if (declaration) {
          plan.toDeredundant.push({
            id: `op-deredundant-${plan.toDeredundant.length + 1}`,
            kind: "deredundant",
            package: info.name,
            displayName: declaration.displayName,
            sources: declarationSources(declaration),
            requiredBy: [...(analyzer.findReverseDependencies(info.name).get(info.name) ?? [])]
          });
        }
        break;
      case "version_conflict":
        if (declaration) {
          plan.unresolved.push({
            package: info.name,
            displayName: declaration.displayName,
            requiredVersion: info.requiredVersion ?? "",
            specs: { ...declaration.specs }
          });
        }
        break;
      case "not_in_requirements":
      case "normal": {
        const missingFromActive =
          info.status === "not_in_requirements" ||
          (declaration !== undefined && topLevel.has(info.name) && !isDeclaredIn(declaration, activeSource));
        if (pkg && missingFromActive) {
          plan.toDeclare.push({
            id: `op-declare-${plan.toDeclare.length + 1}`,
            kind: "declare",
            package: info.name,
            displayName: pkg.displayName,
            version: pkg.version,
            source: activeSource
          });
        }
        break;
      }
    }
  }

  return plan;
}
