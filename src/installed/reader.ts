import { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { DependencyError, Diagnostic, errorMessage } from "../core/errors";
import { DistributionMetadata, parseDistributionMetadata, parseEggRequires } from "./metadata";

export type RawDistribution = {
  location: string;
  metadata: DistributionMetadata;
};

export type DistributionScan = {
  distributions: RawDistribution[];
  diagnostics: Diagnostic[];
};

export interface DistributionReader {
  readDistributions(): Promise<DistributionScan>;
}

async function readOptional(filePath: string): Promise<string | undefined> {
  return fs.readFile(filePath, "utf8").catch(() => undefined);
}

export class SitePackagesReader implements DistributionReader {
  constructor(readonly sitePackages: string) {}

  async readDistributions(): Promise<DistributionScan> {
    const entries = await fs.readdir(this.sitePackages, { withFileTypes: true }).catch((): Dirent[] => []);
    const distributions: RawDistribution[] = [];
    const diagnostics: Diagnostic[] = [];

    const metadataEntries = entries
      .filter((entry) => entry.name.endsWith(".dist-info") || entry.name.endsWith(".egg-info"))
      .sort((left, right) => {
        // dist-info before egg-info, then by name
        const leftRank = left.name.endsWith(".dist-info") ? 0 : 1;
        const rightRank = right.name.endsWith(".dist-info") ? 0 : 1;
        return leftRank - rightRank || left.name.localeCompare(right.name);
      });

    for (const entry of metadataEntries) {
      const location = path.join(this.sitePackages, entry.name);
      try {
        const metadata = entry.name.endsWith(".dist-info")
          ? await this.readDistInfo(location)
          : await this.readEggInfo(location, entry.isDirectory());
        if (!metadata) {
          diagnostics.push(
            new DependencyError(entry.name, "missing Name or Version in package metadata").toDiagnostic()
          );
          continue;
        }
        distributions.push({ location, metadata });
      } catch (error) {
        diagnostics.push({ kind: "DependencyError", subject: entry.name, message: errorMessage(error) });
      }
    }

    return { distributions, diagnostics };
  }

  private async readDistInfo(location: string): Promise<DistributionMetadata | undefined> {
    const text = await fs.readFile(path.join(location, "METADATA"), "utf8");
    return parseDistributionMetadata(text);
  }

  private async readEggInfo(location: string, isDirectory: boolean): Promise<DistributionMetadata | undefined> {
    if (!isDirectory) {
      return parseDistributionMetadata(await fs.readFile(location, "utf8"));
    }

    const metadata = parseDistributionMetadata(await fs.readFile(path.join(location, "PKG-INFO"), "utf8"));
    if (!metadata) {
      return undefined;
    }

    const requires = await readOptional(path.join(location, "requires.txt"));
    return requires === undefined ? metadata : { ...metadata, requiresDist: parseEggRequires(requires) };
  }
}
