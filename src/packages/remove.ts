import { DependencyGraphAnalyzer } from "../analysis/graph";
import { errorMessage } from "../core/errors";
import { InstalledPackage, PackageResult } from "../core/types";
import { FixContext } from "../remediation/types";
import { compareNames, normalizePackageName } from "../version/utils";

/**
 * Uninstalls each package and the dependencies nothing else needs. Dependencies
 * that stay are reported with the top-level packages still using them.
 */
export async function removePackages(context: FixContext, names: string[]): Promise<Record<string, PackageResult>> {
  const snapshot = await context.inventory.snapshot();
  const declared = await context.store.parse();
  const analyzer = new DependencyGraphAnalyzer(snapshot.packages, declared.dependencies);
  const requested = new Set(names.map((name) => normalizePackageName(name)));
  const uninstalled = new Set<string>();
  const results: Record<string, PackageResult> = {};
  const removedPackages: Array<{ name: string; pkg: InstalledPackage }> = [];

  for (const name of names) {
    const normalized = normalizePackageName(name);
    const pkg = snapshot.packages.get(normalized);
    if (!pkg) {
      results[name] = { status: "not_found", message: `Package ${name} is not installed` };
      continue;
    }

    if (!uninstalled.has(normalized)) {
      const outcome = await context.installer.uninstall(pkg.displayName);
      context.inventory.invalidate();
      if (!outcome.success) {
        results[name] = { status: "error", message: outcome.stderr.trim() || `pip uninstall ${pkg.displayName} failed` };
        continue;
      }
      uninstalled.add(normalized);
    }
    removedPackages.push({ name, pkg });
  }

  // orphans are computed from what was actually uninstalled, so a package
  // that failed to uninstall keeps its dependencies
  const removal = analyzer.removalSet([...uninstalled]);

  for (const { name, pkg } of removedPackages) {
    const removedDependencies: string[] = [];
    const keptDependencies: Record<string, string[]> = {};
    const failures: string[] = [];

    const queue = [...pkg.dependencies];
    const seen = new Set<string>(queue);
    while (queue.length > 0) {
      const dependency = queue.shift();
      if (dependency === undefined || requested.has(dependency) || !snapshot.packages.has(dependency)) {
        continue;
      }

      if (!removal.has(dependency)) {
        if (pkg.dependencies.includes(dependency)) {
          keptDependencies[dependency] = analyzer.topLevelUsers(dependency, removal);
        }
        continue;
      }

      if (!uninstalled.has(dependency)) {
        const displayName = snapshot.packages.get(dependency)?.displayName ?? dependency;
        const outcome = await context.installer.uninstall(displayName);
        context.inventory.invalidate();
        if (!outcome.success) {
          failures.push(`${dependency}: ${outcome.stderr.trim() || "uninstall failed"}`);
          continue;
        }
        uninstalled.add(dependency);
      }
      removedDependencies.push(dependency);

      for (const next of snapshot.packages.get(dependency)?.dependencies ?? []) {
        if (!seen.has(next)) {
          seen.add(next);
          queue.push(next);
        }
      }
    }

    const result: PackageResult = {
      status: "removed",
      version: pkg.version,
      removedDependencies: removedDependencies.sort(compareNames),
      keptDependencies
    };

    try {
      await context.store.removeEverywhere(pkg.name);
    } catch (error) {
      failures.push(`declaration files were not updated: ${errorMessage(error)}`);
    }
    if (failures.length > 0) {
      result.message = failures.join("\n");
    }
    results[name] = result;
  }

  return results;
}
