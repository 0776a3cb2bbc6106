import { Diagnostic } from "../core/errors";
import { InstalledPackage, InstalledSnapshot, RequirementEntry } from "../core/types";
import { compareNames, normalizePackageName, parseRequirement } from "../version/utils";
import { isExcludedByMarker } from "./markers";
import { DistributionReader, RawDistribution } from "./reader";

export const SYSTEM_PACKAGES: ReadonlySet<string> = new Set([
  "pip",
  "setuptools",
  "wheel",
  "pkg-resources",
  "distribute",
  "easy-install"
]);

export function isSystemPackage(name: string): boolean {
  return SYSTEM_PACKAGES.has(normalizePackageName(name));
}

export type InventoryOptions = {
  platform?: string;
};

export class InstalledInventory {
  private readonly cache = new Map<boolean, InstalledSnapshot>();
  private readonly platform: string;

  constructor(
    private readonly reader: DistributionReader,
    options: InventoryOptions = {}
  ) {
    this.platform = options.platform ?? process.platform;
  }

  async snapshot(excludeSystem = true): Promise<InstalledSnapshot> {
    const cached = this.cache.get(excludeSystem);
    if (cached) {
      return cached;
    }

    const scan = await this.reader.readDistributions();
    const packages = new Map<string, InstalledPackage>();
    const diagnostics: Diagnostic[] = [...scan.diagnostics];

    for (const distribution of scan.distributions) {
      const name = normalizePackageName(distribution.metadata.name);
      if ((excludeSystem && SYSTEM_PACKAGES.has(name)) || packages.has(name)) {
        continue;
      }
      packages.set(name, this.toInstalledPackage(name, distribution, excludeSystem, diagnostics));
    }

    const snapshot: InstalledSnapshot = {
      packages: new Map([...packages.entries()].sort(([left], [right]) => compareNames(left, right))),
      diagnostics
    };
    this.cache.set(excludeSystem, snapshot);
    return snapshot;
  }

  invalidate(): void {
    this.cache.clear();
  }

  private toInstalledPackage(
    name: string,
    distribution: RawDistribution,
    excludeSystem: boolean,
    diagnostics: Diagnostic[]
  ): InstalledPackage {
    const requirements: RequirementEntry[] = [];
    const dependencies = new Set<string>();

    for (const requirement of distribution.metadata.requiresDist) {
      const parsed = parseRequirement(requirement);
      if (!parsed.ok) {
        diagnostics.push({
          kind: "DependencyError",
          subject: distribution.metadata.name,
          message: `cannot read requirement "${requirement}": ${parsed.error.message}`
        });
        continue;
      }

      const entry = parsed.value;
      if (isExcludedByMarker(entry.marker, this.platform)) {
        continue;
      }
      if (excludeSystem && SYSTEM_PACKAGES.has(entry.name)) {
        continue;
      }
      if (!dependencies.has(entry.name)) {
        requirements.push(entry);
      }
      dependencies.add(entry.name);
    }

    return {
      name,
      displayName: distribution.metadata.name,
      version: distribution.metadata.version,
      dependencies: [...dependencies].sort(),
      requirements,
      location: distribution.location
    };
  }
}
