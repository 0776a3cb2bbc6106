import { DeclarationSource, DeclaredDependency } from "../core/types";
import { stripOperator } from "../version/utils";

const SOURCE_TAGS: Record<DeclarationSource, string> = {
  requirements: "r",
  pyproject: "p"
};

export function declarationSources(dep: DeclaredDependency): DeclarationSource[] {
  const sources: DeclarationSource[] = [];
  if (dep.specs.requirements !== undefined) {
    sources.push("requirements");
  }
  if (dep.specs.pyproject !== undefined) {
    sources.push("pyproject");
  }
  return sources;
}

export function isDeclaredIn(dep: DeclaredDependency, source: DeclarationSource): boolean {
  return dep.specs[source] !== undefined;
}

export function hasVersionConflict(dep: DeclaredDependency): boolean {
  const fromRequirements = dep.specs.requirements;
  const fromPyproject = dep.specs.pyproject;
  if (!fromRequirements || !fromPyproject) {
    return false;
  }
  return stripOperator(fromRequirements) !== stripOperator(fromPyproject);
}

/**
 * requirements.txt wins over pyproject.toml whenever it pins a version. A bare
 * requirements entry defers to the pyproject constraint.
 */
export function effectiveVersionSpec(dep: DeclaredDependency): string {
  return dep.specs.requirements || dep.specs.pyproject || "";
}

function describeSpec(spec: string | undefined): string {
  const version = spec ? stripOperator(spec) : "";
  return version.length > 0 ? version : "*";
}

export function formatRequiredVersion(dep: DeclaredDependency): string {
  const sources = declarationSources(dep);
  if (sources.length === 2) {
    if (hasVersionConflict(dep)) {
      return `${describeSpec(dep.specs.requirements)} (r) / ${describeSpec(dep.specs.pyproject)} (p)`;
    }
    return `${describeSpec(effectiveVersionSpec(dep))} (r+p)`;
  }

  const [source] = sources;
  if (!source) {
    return describeSpec(undefined);
  }
  return `${describeSpec(dep.specs[source])} (${SOURCE_TAGS[source]})`;
}

export function recordDeclaration(
  declared: Map<string, DeclaredDependency>,
  entry: { name: string; displayName: string; extras: string[]; specifier: string },
  source: DeclarationSource
): void {
  const existing = declared.get(entry.name);
  if (existing) {
    existing.specs[source] = entry.specifier;
    existing.extras = Array.from(new Set([...existing.extras, ...entry.extras])).sort();
    return;
  }

  const specs: DeclaredDependency["specs"] = {};
  specs[source] = entry.specifier;
  declared.set(entry.name, {
    name: entry.name,
    displayName: entry.displayName,
    extras: [...entry.extras],
    specs
  });
}
