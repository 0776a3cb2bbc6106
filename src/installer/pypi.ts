import { InstallerError } from "../core/errors";
import { compareVersions, tryParseVersion } from "../version/pep440";
import { PackageIndex } from "./types";

export const DEFAULT_INDEX_URL = "https://pypi.org/pypi";

const AVAILABLE_VERSIONS_PATTERN = /\(from versions:\s*([^)]*)\)/;

/** Scrapes pip's `(from versions: 1.0, 1.1, 2.0)` hint; `none` gives an empty list. */
export function extractAvailableVersions(text: string): string[] | undefined {
  const match = AVAILABLE_VERSIONS_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  return match[1]
    .split(",")
    .map((version) => version.trim())
    .filter((version) => version.length > 0 && version.toLowerCase() !== "none");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class PypiClient implements PackageIndex {
  constructor(private readonly baseUrl = DEFAULT_INDEX_URL) {}

  async listVersions(name: string): Promise<string[]> {
    const response = await fetch(`${this.baseUrl.replace(/\/+$/, "")}/${encodeURIComponent(name)}/json`);
    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new InstallerError(name, `package index lookup failed for ${name} (${response.status}): ${body}`);
    }

    const payload: unknown = await response.json();
    const releases = isRecord(payload) ? payload.releases : undefined;
    if (!isRecord(releases)) {
      return [];
    }

    return Object.keys(releases)
      .filter((version) => tryParseVersion(version) !== undefined)
      .sort(compareVersions);
  }
}
