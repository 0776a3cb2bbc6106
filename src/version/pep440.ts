import { InvalidFormatError } from "../core/errors";
import { VersionOperator } from "../core/types";

export type PreReleaseTag = "a" | "b" | "rc";

export type ParsedVersion = {
  epoch: number;
  release: number[];
  pre?: [PreReleaseTag, number];
  post?: number;
  dev?: number;
  local?: Array<string | number>;
};

export type Specifier = {
  operator: VersionOperator;
  version: string;
  wildcard: boolean;
};

const VERSION_PATTERN = new RegExp(
  "^\\s*v?" +
    "(?:(?<epoch>[0-9]+)!)?" +
    "(?<release>[0-9]+(?:\\.[0-9]+)*)" +
    "(?<pre>[-_.]?(?<preL>alpha|a|beta|b|preview|pre|c|rc)[-_.]?(?<preN>[0-9]+)?)?" +
    "(?<post>(?:-(?<postN1>[0-9]+))|(?:[-_.]?(?<postL>post|rev|r)[-_.]?(?<postN2>[0-9]+)?))?" +
    "(?<dev>[-_.]?(?<devL>dev)[-_.]?(?<devN>[0-9]+)?)?" +
    "(?:\\+(?<local>[a-z0-9]+(?:[-_.][a-z0-9]+)*))?" +
    "\\s*$",
  "i"
);

const SPECIFIER_PATTERN = /^(===|~=|==|!=|<=|>=|<|>)\s*(\S+)$/;

const PRE_TAG_ORDER: Record<PreReleaseTag, number> = { a: 0, b: 1, rc: 2 };

export const VERSION_OPERATORS: readonly VersionOperator[] = ["===", "~=", "==", "!=", "<=", ">=", "<", ">"];

const PRERELEASE_OPERATORS = new Set<VersionOperator>(["==", ">=", "<=", "~=", "==="]);

export function isVersionOperator(value: string): value is VersionOperator {
  return VERSION_OPERATORS.some((operator) => operator === value);
}

function normalizePreTag(label: string): PreReleaseTag {
  const lowered = label.toLowerCase();
  if (lowered === "a" || lowered === "alpha") {
    return "a";
  }
  if (lowered === "b" || lowered === "beta") {
    return "b";
  }
  return "rc";
}

export function tryParseVersion(text: string): ParsedVersion | undefined {
  const match = VERSION_PATTERN.exec(text);
  const groups = match?.groups;
  if (!groups) {
    return undefined;
  }

  const parsed: ParsedVersion = {
    epoch: groups.epoch ? Number(groups.epoch) : 0,
    release: groups.release.split(".").map((part) => Number(part))
  };

  if (groups.pre && groups.preL) {
    parsed.pre = [normalizePreTag(groups.preL), groups.preN ? Number(groups.preN) : 0];
  }
  if (groups.post) {
    const postNumber = groups.postN1 ?? groups.postN2;
    parsed.post = postNumber ? Number(postNumber) : 0;
  }
  if (groups.dev) {
    parsed.dev = groups.devN ? Number(groups.devN) : 0;
  }
  if (groups.local) {
    parsed.local = groups.local
      .toLowerCase()
      .split(/[-_.]/)
      .map((segment) => (/^[0-9]+$/.test(segment) ? Number(segment) : segment));
  }

  return parsed;
}

export function parseVersion(text: string): ParsedVersion {
  const parsed = tryParseVersion(text);
  if (!parsed) {
    throw new InvalidFormatError(text, `Invalid version: ${text}`);
  }
  return parsed;
}

export function isPrerelease(version: ParsedVersion): boolean {
  return version.pre !== undefined || version.dev !== undefined;
}

export function isPostrelease(version: ParsedVersion): boolean {
  return version.post !== undefined;
}

function publicVersion(version: ParsedVersion): ParsedVersion {
  return { ...version, local: undefined };
}

function baseVersion(version: ParsedVersion): ParsedVersion {
  return { epoch: version.epoch, release: version.release };
}

function compareNumbers(a: number, b: number): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function compareRelease(a: number[], b: number[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i += 1) {
    const diff = compareNumbers(a[i] ?? 0, b[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

function preKey(version: ParsedVersion): [number, number] {
  if (!version.pre) {
    // a bare .devN sorts before any pre-release of the same release
    if (version.post === undefined && version.dev !== undefined) {
      return [-Infinity, 0];
    }
    return [Infinity, 0];
  }
  return [PRE_TAG_ORDER[version.pre[0]], version.pre[1]];
}

function compareLocal(a: ParsedVersion["local"], b: ParsedVersion["local"]): number {
  if (!a && !b) {
    return 0;
  }
  if (!a) {
    return -1;
  }
  if (!b) {
    return 1;
  }

  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i += 1) {
    const left = a[i];
    const right = b[i];
    if (left === undefined) {
      return -1;
    }
    if (right === undefined) {
      return 1;
    }
    if (typeof left === "number" && typeof right === "number") {
      const diff = compareNumbers(left, right);
      if (diff !== 0) {
        return diff;
      }
      continue;
    }
    if (typeof left === "number") {
      return 1;
    }
    if (typeof right === "number") {
      return -1;
    }
    if (left !== right) {
      return left < right ? -1 : 1;
    }
  }
  return 0;
}

export function compareParsedVersions(a: ParsedVersion, b: ParsedVersion): number {
  const epoch = compareNumbers(a.epoch, b.epoch);
  if (epoch !== 0) {
    return epoch;
  }

  const release = compareRelease(a.release, b.release);
  if (release !== 0) {
    return release;
  }

  const [aPreTag, aPreNumber] = preKey(a);
  const [bPreTag, bPreNumber] = preKey(b);
  const preTag = compareNumbers(aPreTag, bPreTag);
  if (preTag !== 0) {
    return preTag;
  }
  const preNumber = compareNumbers(aPreNumber, bPreNumber);
  if (preNumber !== 0) {
    return preNumber;
  }

  const post = compareNumbers(a.post ?? -Infinity, b.post ?? -Infinity);
  if (post !== 0) {
    return post;
  }

  const dev = compareNumbers(a.dev ?? Infinity, b.dev ?? Infinity);
  if (dev !== 0) {
    return dev;
  }

  return compareLocal(a.local, b.local);
}

export function compareVersions(a: string, b: string): number {
  return compareParsedVersions(parseVersion(a), parseVersion(b));
}

export function parseSpecifier(text: string): Specifier {
  const match = SPECIFIER_PATTERN.exec(text.trim());
  const operator = match?.[1];
  if (!match || !operator || !isVersionOperator(operator)) {
    throw new InvalidFormatError(text, `Invalid specifier: ${text}`);
  }

  const raw = match[2];
  if (operator === "===") {
    return { operator, version: raw, wildcard: false };
  }

  const wildcard = raw.endsWith(".*");
  if (wildcard && operator !== "==" && operator !== "!=") {
    throw new InvalidFormatError(text, `Wildcard is only allowed with == and !=: ${text}`);
  }

  const version = wildcard ? raw.slice(0, -2) : raw;
  const parsed = tryParseVersion(version);
  if (!parsed) {
    throw new InvalidFormatError(text, `Invalid specifier: ${text}`);
  }
  if (operator === "~=" && parsed.release.length < 2) {
    throw new InvalidFormatError(text, `Compatible release needs at least two segments: ${text}`);
  }
  if (parsed.local && operator !== "==" && operator !== "!=") {
    throw new InvalidFormatError(text, `Local versions are only allowed with == and !=: ${text}`);
  }

  return { operator, version, wildcard };
}

export function parseSpecifierSet(text: string): Specifier[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return [];
  }
  return trimmed.split(",").map((part) => parseSpecifier(part));
}

function matchesPrefix(candidate: ParsedVersion, prefix: ParsedVersion): boolean {
  if (candidate.epoch !== prefix.epoch) {
    return false;
  }
  for (let i = 0; i < prefix.release.length; i += 1) {
    if ((candidate.release[i] ?? 0) !== prefix.release[i]) {
      return false;
    }
  }
  if (prefix.pre && (!candidate.pre || candidate.pre[0] !== prefix.pre[0] || candidate.pre[1] !== prefix.pre[1])) {
    return false;
  }
  if (prefix.post !== undefined && candidate.post !== prefix.post) {
    return false;
  }
  if (prefix.dev !== undefined && candidate.dev !== prefix.dev) {
    return false;
  }
  return true;
}

function matchesEqual(candidate: ParsedVersion, specifier: Specifier): boolean {
  const target = parseVersion(specifier.version);
  if (specifier.wildcard) {
    return matchesPrefix(publicVersion(candidate), target);
  }
  const subject = target.local ? candidate : publicVersion(candidate);
  return compareParsedVersions(subject, target) === 0;
}

export function specifierContains(specifier: Specifier, candidate: ParsedVersion): boolean {
  if (specifier.operator === "===") {
    return false;
  }

  const target = parseVersion(specifier.version);
  const subject = publicVersion(candidate);

  switch (specifier.operator) {
    case "==":
      return matchesEqual(candidate, specifier);
    case "!=":
      return !matchesEqual(candidate, specifier);
    case "<=":
      return compareParsedVersions(subject, target) <= 0;
    case ">=":
      return compareParsedVersions(subject, target) >= 0;
    case "<":
      if (compareParsedVersions(subject, target) >= 0) {
        return false;
      }
      if (!isPrerelease(target) && isPrerelease(candidate)) {
        return compareParsedVersions(baseVersion(candidate), baseVersion(target)) !== 0;
      }
      return true;
    case ">":
      if (compareParsedVersions(subject, target) <= 0) {
        return false;
      }
      if (!isPostrelease(target) && isPostrelease(candidate)) {
        return compareParsedVersions(baseVersion(candidate), baseVersion(target)) !== 0;
      }
      return true;
    case "~=": {
      const prefix: ParsedVersion = { epoch: target.epoch, release: target.release.slice(0, -1) };
      return compareParsedVersions(subject, target) >= 0 && matchesPrefix(subject, prefix);
    }
    default:
      return false;
  }
}

function allowsPrereleases(specifier: Specifier): boolean {
  if (!PRERELEASE_OPERATORS.has(specifier.operator)) {
    return false;
  }
  const parsed = tryParseVersion(specifier.version);
  return parsed !== undefined && isPrerelease(parsed);
}

export function satisfies(version: string, specifierSet: string): boolean {
  const specifiers = parseSpecifierSet(specifierSet);
  const identity = specifiers.find((specifier) => specifier.operator === "===");
  if (identity) {
    return specifiers.every(
      (specifier) => specifier.operator === "===" && specifier.version.toLowerCase() === version.trim().toLowerCase()
    );
  }

  const candidate = parseVersion(version);
  if (isPrerelease(candidate) && !specifiers.some((specifier) => allowsPrereleases(specifier))) {
    return false;
  }
  return specifiers.every((specifier) => specifierContains(specifier, candidate));
}
