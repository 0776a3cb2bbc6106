import fs from "node:fs/promises";
import path from "node:path";
import { Diagnostic } from "../core/errors";
import { RequirementEntry, VersionOperator } from "../core/types";
import { normalizePackageName, parseRequirement } from "../version/utils";

export const REQUIREMENTS_FILE = "requirements.txt";

export type RequirementsReadResult = {
  entries: RequirementEntry[];
  diagnostics: Diagnostic[];
};

function stripInlineComment(line: string): string {
  const index = line.search(/\s#/);
  return index >= 0 ? line.slice(0, index) : line;
}

function isSkippable(line: string): boolean {
  return line.length === 0 || line.startsWith("#");
}

export function formatRequirement(entry: Pick<RequirementEntry, "displayName" | "extras" | "specifier" | "marker">): string {
  const extras = entry.extras.length > 0 ? `[${entry.extras.join(",")}]` : "";
  const marker = entry.marker ? `; ${entry.marker}` : "";
  return `${entry.displayName}${extras}${entry.specifier}${marker}`;
}

export function parseRequirementsText(text: string): RequirementsReadResult {
  const entries: RequirementEntry[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = stripInlineComment(rawLine).trim();
    if (isSkippable(line)) {
      continue;
    }

    if (line.startsWith("-")) {
      diagnostics.push({
        kind: "InvalidFormat",
        subject: line,
        message: `unsupported option line in ${REQUIREMENTS_FILE} skipped`
      });
      continue;
    }

    const parsed = parseRequirement(line);
    if (!parsed.ok) {
      diagnostics.push({ ...parsed.error, message: `${parsed.error.message} (${REQUIREMENTS_FILE})` });
      continue;
    }
    entries.push(parsed.value);
  }

  return { entries, diagnostics };
}

function lineEntry(line: string): RequirementEntry | undefined {
  const content = stripInlineComment(line).trim();
  if (isSkippable(content) || content.startsWith("-")) {
    return undefined;
  }
  const parsed = parseRequirement(content);
  return parsed.ok ? parsed.value : undefined;
}

function lineName(line: string): string | undefined {
  return lineEntry(line)?.name;
}

/** Extras are merged with the existing entry's; its environment marker is kept. */
export function mergedRequirementLine(
  existing: RequirementEntry | undefined,
  name: string,
  version: string | undefined,
  operator: VersionOperator,
  extras: string[]
): string {
  const merged = Array.from(new Set([...(existing?.extras ?? []), ...extras]));
  return formatRequirement({
    displayName: name,
    extras: merged,
    specifier: version ? `${operator}${version}` : "",
    ...(existing?.marker ? { marker: existing.marker } : {})
  });
}

export class RequirementsFile {
  readonly path: string;

  constructor(projectRoot: string) {
    this.path = path.join(projectRoot, REQUIREMENTS_FILE);
  }

  async exists(): Promise<boolean> {
    const stat = await fs.stat(this.path).catch(() => undefined);
    return Boolean(stat?.isFile());
  }

  private async readLines(): Promise<string[] | undefined> {
    const text = await fs.readFile(this.path, "utf8").catch(() => undefined);
    if (text === undefined) {
      return undefined;
    }
    return text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  private async writeLines(lines: string[]): Promise<void> {
    const sorted = [...lines].sort();
    await fs.writeFile(this.path, sorted.length > 0 ? `${sorted.join("\n")}\n` : "", "utf8");
  }

  async read(): Promise<RequirementsReadResult> {
    const text = await fs.readFile(this.path, "utf8").catch(() => undefined);
    if (text === undefined) {
      return { entries: [], diagnostics: [] };
    }
    return parseRequirementsText(text);
  }

  async write(entries: RequirementEntry[]): Promise<void> {
    await this.writeLines(entries.map((entry) => formatRequirement(entry)));
  }

  async addDependency(
    name: string,
    version?: string,
    operator: VersionOperator = "==",
    extras: string[] = []
  ): Promise<void> {
    const lines = (await this.readLines()) ?? [];
    const normalized = normalizePackageName(name);
    const current = lines.map((existing) => lineEntry(existing)).find((entry) => entry?.name === normalized);
    const line = mergedRequirementLine(current, name, version, operator, extras);

    const index = lines.findIndex((existing) => lineName(existing) === normalized);
    const kept = lines.filter((existing) => lineName(existing) !== normalized);
    if (index >= 0) {
      kept.splice(Math.min(index, kept.length), 0, line);
    } else {
      kept.push(line);
    }

    await this.writeLines(kept);
  }

  async removeDependency(name: string): Promise<boolean> {
    const lines = await this.readLines();
    if (!lines) {
      return false;
    }

    const normalized = normalizePackageName(name);
    const kept = lines.filter((line) => lineName(line) !== normalized);
    if (kept.length === lines.length) {
      return false;
    }

    await this.writeLines(kept);
    return true;
  }
}
