import { errorMessage } from "../core/errors";
import { AutoFixInfo, AutoFixReason } from "../core/types";
import { extractAvailableVersions } from "../installer/pypi";
import { InstallOptions, Installer, PackageIndex } from "../installer/types";
import { compareVersions, parseSpecifierSet, tryParseVersion } from "../version/pep440";
import { validateVersion, versionDistance } from "../version/utils";

const VERSION_NOT_FOUND_MARKERS = [
  "Version not found",
  "No matching distribution",
  "Could not find a version that satisfies the requirement"
];

export type AutoFixDeps = {
  installer: Installer;
  index?: PackageIndex;
};

export type AutoFixOptions = InstallOptions & {
  extras?: string[];
};

export type AutoFixOutcome = {
  success: boolean;
  version?: string;
  message?: string;
  autoFix?: AutoFixInfo;
  availableVersions?: string[];
};

export function isVersionNotFound(text: string): boolean {
  return VERSION_NOT_FOUND_MARKERS.some((marker) => text.includes(marker));
}

export function classifyFailureReason(text: string): AutoFixReason {
  if (text.includes("Python version") || text.includes("requires Python")) {
    return "Python compatibility issue";
  }
  if (text.includes("dependency conflict")) {
    return "Dependency conflict";
  }
  if (text.includes("not found") || text.includes("No matching distribution")) {
    return "Version not found";
  }
  return "Installation failed";
}

function withExtras(name: string, extras: string[]): string {
  return extras.length > 0 ? `${name}[${extras.join(",")}]` : name;
}

/** Bare versions are pinned with `==`; anything else is passed through as a specifier. */
export function toInstallSpec(name: string, spec: string, extras: string[] = []): string {
  const target = withExtras(name, extras);
  const trimmed = spec.trim();
  if (trimmed.length === 0) {
    return target;
  }
  return validateVersion(trimmed) ? `${target}==${trimmed}` : `${target}${trimmed}`;
}

/** The single version a spec asks for, used as the target of the nearest-version search. */
export function requestedVersion(spec: string): string | undefined {
  const trimmed = spec.trim();
  if (trimmed.length === 0) {
    return undefined;
  }
  if (validateVersion(trimmed)) {
    return trimmed;
  }

  try {
    const specifiers = parseSpecifierSet(trimmed);
    const [only] = specifiers;
    if (specifiers.length !== 1 || !only || only.wildcard) {
      return undefined;
    }
    return tryParseVersion(only.version) ? only.version : undefined;
  } catch {
    return undefined;
  }
}

/** Candidates ordered by distance to `target`; equal distances prefer the higher version. */
export function rankCandidates(target: string, versions: string[]): string[] {
  if (!tryParseVersion(target)) {
    return [];
  }

  return versions
    .filter((version) => tryParseVersion(version) !== undefined && compareVersions(version, target) !== 0)
    .map((version) => ({ version, distance: versionDistance(version, target) }))
    .sort((left, right) => left.distance - right.distance || compareVersions(right.version, left.version))
    .map((candidate) => candidate.version);
}

function failureText(stdout: string, stderr: string): string {
  return [stderr, stdout].filter((part) => part.trim().length > 0).join("\n");
}

function failureMessage(stderr: string, fallback: string): string {
  const message = stderr.trim();
  return message.length > 0 ? message : fallback;
}

async function lookupVersions(
  deps: AutoFixDeps,
  name: string,
  text: string
): Promise<{ versions: string[]; error?: string }> {
  const scraped = extractAvailableVersions(text);
  if (scraped) {
    return { versions: scraped };
  }
  if (!deps.index) {
    return { versions: [] };
  }

  try {
    return { versions: await deps.index.listVersions(name) };
  } catch (error) {
    return { versions: [], error: errorMessage(error) };
  }
}

/**
 * Installs `name` with `spec`. A "version not found" failure is retried once
 * with the available version nearest to the requested one.
 */
export async function installWithAutoFix(
  deps: AutoFixDeps,
  name: string,
  spec: string,
  options: AutoFixOptions = {}
): Promise<AutoFixOutcome> {
  const { extras = [], ...installOptions } = options;
  const installSpec = toInstallSpec(name, spec, extras);
  const first = await deps.installer.install(installSpec, installOptions);
  if (first.success) {
    return { success: true };
  }

  const text = failureText(first.stdout, first.stderr);
  const message = failureMessage(first.stderr, `pip install ${installSpec} failed`);
  const target = requestedVersion(spec);
  if (!isVersionNotFound(text) || !target) {
    return { success: false, message };
  }

  const lookup = await lookupVersions(deps, name, text);
  const [candidate] = rankCandidates(target, lookup.versions);
  if (!candidate) {
    return {
      success: false,
      message: lookup.error ? `${message}\n${lookup.error}` : message,
      availableVersions: lookup.versions
    };
  }

  const retrySpec = `${withExtras(name, extras)}==${candidate}`;
  const retry = await deps.installer.install(retrySpec, installOptions);
  if (!retry.success) {
    return {
      success: false,
      message: failureMessage(retry.stderr, `pip install ${retrySpec} failed`),
      availableVersions: lookup.versions
    };
  }

  return {
    success: true,
    version: candidate,
    autoFix: { originalVersion: target, installedVersion: candidate, reason: classifyFailureReason(text) },
    availableVersions: lookup.versions
  };
}
