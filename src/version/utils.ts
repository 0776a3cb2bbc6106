import { InvalidFormatError, Result, errorMessage, fail, ok } from "../core/errors";
import { RequirementEntry, VersionOperator } from "../core/types";
import { PreReleaseTag, isPrerelease, isVersionOperator, parseSpecifierSet, parseVersion, satisfies } from "./pep440";

export type RequirementString = {
  name?: string;
  extras: string[];
  operator?: VersionOperator;
  version?: string;
};

const RELEASE_VERSION_PATTERN =
  /^(\d+\.\d+|\d+\.\d+\.\d+)((a|b|rc|alpha|beta)\d+)?(\.dev\d+)?(\.post\d+)?(\+[a-zA-Z0-9]+(?:\.[a-zA-Z0-9]+)*)?$/;

const NAME_PATTERN = "[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?";
const OPERATOR_PATTERN = "===|~=|==|!=|<=|>=|<|>";

const FULL_SPEC = new RegExp(`^(${NAME_PATTERN})\\s*(?:\\[([^\\]]*)\\])?\\s*(${OPERATOR_PATTERN})\\s*(.+)$`);
const BARE_CONSTRAINT = new RegExp(`^(${OPERATOR_PATTERN})\\s*(.+)$`);
const BARE_NAME = new RegExp(`^(${NAME_PATTERN})\\s*(?:\\[([^\\]]*)\\])?$`);
const REQUIREMENT_HEAD = new RegExp(`^(${NAME_PATTERN})\\s*(?:\\[([^\\]]*)\\])?\\s*(.*)$`);

const PRE_TYPE_ORDINAL: Record<PreReleaseTag, number> = { a: 0, b: 1, rc: 2 };

export function normalizePackageName(name: string): string {
  return name.trim().toLowerCase().replace(/[_.]+/g, "-");
}

export function compareNames(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

export function validateVersion(version: string): boolean {
  return RELEASE_VERSION_PATTERN.test(version);
}

function parseExtras(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(",")
    .map((extra) => extra.trim())
    .filter(Boolean)
    .sort();
}

function toOperator(value: string, source: string): VersionOperator {
  if (!isVersionOperator(value)) {
    throw new InvalidFormatError(source, `Invalid version constraint "${value}" in ${source}`);
  }
  return value;
}

export function parseRequirementString(spec: string): RequirementString {
  const text = spec.trim();

  const full = FULL_SPEC.exec(text);
  if (full) {
    return {
      name: full[1],
      extras: parseExtras(full[2]),
      operator: toOperator(full[3], text),
      version: full[4].trim()
    };
  }

  const constraint = BARE_CONSTRAINT.exec(text);
  if (constraint) {
    return { extras: [], operator: toOperator(constraint[1], text), version: constraint[2].trim() };
  }

  if (validateVersion(text)) {
    return { extras: [], version: text };
  }

  const bare = BARE_NAME.exec(text);
  if (bare) {
    return { name: bare[1], extras: parseExtras(bare[2]) };
  }

  throw new InvalidFormatError(text, `Invalid dependency format: ${text}`);
}

function normalizeSpecifierText(raw: string): string {
  return raw
    .split(",")
    .map((part) => part.replace(/\s+/g, ""))
    .join(",");
}

/**
 * Parses a PEP 508 requirement such as `requests[socks] (>=2.0, <3) ; python_version >= "3.8"`.
 * Direct URL references (`name @ url`) keep an empty specifier.
 */
export function parseRequirement(line: string): Result<RequirementEntry> {
  const [head, ...markerParts] = line.split(";");
  const marker = markerParts.join(";").trim();

  const match = REQUIREMENT_HEAD.exec(head.trim());
  if (!match) {
    return fail("InvalidFormat", line.trim(), `Invalid requirement: ${line.trim()}`);
  }

  const displayName = match[1];
  let rest = match[3].trim();
  if (rest.startsWith("@")) {
    rest = "";
  }
  if (rest.startsWith("(") && rest.endsWith(")")) {
    rest = rest.slice(1, -1).trim();
  }

  const specifier = normalizeSpecifierText(rest);
  try {
    parseSpecifierSet(specifier);
  } catch (error) {
    return fail("InvalidFormat", displayName, errorMessage(error));
  }

  return ok({
    name: normalizePackageName(displayName),
    displayName,
    extras: parseExtras(match[2]),
    specifier,
    ...(marker ? { marker } : {})
  });
}

export function checkVersionCompatibility(installedVersion: string, requiredSpec: string): boolean {
  if (!requiredSpec || requiredSpec.trim().length === 0) {
    return true;
  }

  try {
    const spec = requiredSpec.trim();
    // a bare version means an exact pin
    return satisfies(installedVersion, validateVersion(spec) ? `==${spec}` : spec);
  } catch {
    return false;
  }
}

export function stripOperator(spec: string): string {
  const trimmed = spec.trim();
  const match = new RegExp(`^(${OPERATOR_PATTERN})`).exec(trimmed);
  return match ? trimmed.slice(match[1].length).trim() : trimmed;
}

export function splitVersionSpec(spec: string): { operator?: VersionOperator; version: string } {
  const trimmed = spec.trim();
  const match = BARE_CONSTRAINT.exec(trimmed);
  if (!match || !isVersionOperator(match[1])) {
    return { version: trimmed };
  }
  return { operator: match[1], version: match[2].trim() };
}

/**
 * Closeness of two versions, used to pick a fallback when the requested version
 * is not available. Release segments are weighted by position; pre-releases add
 * a small penalty so they rank just behind the matching final release.
 */
export function versionDistance(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);

  const length = Math.max(left.release.length, right.release.length);
  let distance = 0;
  for (let i = 0; i < length; i += 1) {
    const weight = 10 ** (length - i - 1);
    distance += Math.abs((left.release[i] ?? 0) - (right.release[i] ?? 0)) * weight;
  }

  const leftPre = isPrerelease(left);
  const rightPre = isPrerelease(right);
  let penalty = 0;
  if (leftPre && rightPre) {
    penalty = 0.25;
    if (left.pre && right.pre) {
      const typeDiff = Math.abs(PRE_TYPE_ORDINAL[left.pre[0]] - PRE_TYPE_ORDINAL[right.pre[0]]);
      const numberDiff = Math.abs(left.pre[1] - right.pre[1]);
      penalty += (typeDiff + numberDiff * 0.1) * 0.25;
    }
  } else if (leftPre || rightPre) {
    penalty = 0.5;
  }

  return distance + penalty;
}
