import fs from "node:fs/promises";
import path from "node:path";
import { parse } from "smol-toml";
import { Diagnostic, InvalidFormatError, errorMessage } from "../core/errors";
import { RequirementEntry, VersionOperator } from "../core/types";
import { normalizePackageName, parseRequirement } from "../version/utils";
import { mergedRequirementLine } from "./requirementsFile";

export const PYPROJECT_FILE = "pyproject.toml";

const ARRAY_INDENT = "    ";

export type PyprojectReadResult = {
  entries: RequirementEntry[];
  diagnostics: Diagnostic[];
  hasProjectTable: boolean;
};

type ArrayElement = {
  start: number;
  end: number;
  quote: string;
  value: string;
};

type DependencyArray = {
  open: number;
  close: number;
  elements: ArrayElement[];
};

type ProjectTable = {
  headerEnd: number;
  bodyEnd: number;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function lineEnd(text: string, index: number): number {
  const newline = text.indexOf("\n", index);
  return newline < 0 ? text.length : newline + 1;
}

function lineStart(text: string, index: number): number {
  return text.lastIndexOf("\n", index - 1) + 1;
}

function findProjectTable(text: string): ProjectTable | undefined {
  const header = /^[ \t]*\[project\][ \t]*(?:#.*)?$/m.exec(text);
  if (!header) {
    return undefined;
  }

  const headerEnd = lineEnd(text, header.index);
  const nextTable = /^[ \t]*\[/m.exec(text.slice(headerEnd));
  return { headerEnd, bodyEnd: nextTable ? headerEnd + nextTable.index : text.length };
}

function unescape(raw: string, quote: string): string {
  return quote === '"' ? raw.replace(/\\(["\\])/g, "$1") : raw;
}

function scanArray(text: string, open: number): DependencyArray {
  const elements: ArrayElement[] = [];
  let index = open + 1;

  while (index < text.length) {
    const char = text[index];
    if (char === "]") {
      return { open, close: index, elements };
    }
    if (char === "#") {
      index = lineEnd(text, index);
      continue;
    }
    if (char === '"' || char === "'") {
      if (text.startsWith(char.repeat(3), index)) {
        throw new InvalidFormatError(PYPROJECT_FILE, "multi-line strings in project.dependencies are not supported");
      }
      let end = index + 1;
      while (end < text.length && text[end] !== char && text[end] !== "\n") {
        end += char === '"' && text[end] === "\\" ? 2 : 1;
      }
      if (text[end] !== char) {
        throw new InvalidFormatError(PYPROJECT_FILE, "unterminated string in project.dependencies");
      }
      elements.push({ start: index, end: end + 1, quote: char, value: unescape(text.slice(index + 1, end), char) });
      index = end + 1;
      continue;
    }
    if (/[\s,]/.test(char)) {
      index += 1;
      continue;
    }
    throw new InvalidFormatError(PYPROJECT_FILE, `unexpected "${char}" in project.dependencies`);
  }

  throw new InvalidFormatError(PYPROJECT_FILE, "unterminated project.dependencies array");
}

function findDependencyArray(text: string, table: ProjectTable): DependencyArray | undefined {
  const body = text.slice(table.headerEnd, table.bodyEnd);
  const key = /^[ \t]*dependencies[ \t]*=[ \t]*\[/m.exec(body);
  if (!key) {
    return undefined;
  }
  return scanArray(text, table.headerEnd + key.index + key[0].length - 1);
}

function elementName(element: ArrayElement): string | undefined {
  const parsed = parseRequirement(element.value);
  return parsed.ok ? parsed.value.name : undefined;
}

function quoteLiteral(value: string, quote: string): string {
  return quote === '"' ? `"${value.replace(/["\\]/g, "\\$&")}"` : `'${value}'`;
}

function multiLineArray(literals: string[]): string {
  return `[\n${literals.map((literal) => `${ARRAY_INDENT}${literal},\n`).join("")}]`;
}

function nextNonSpace(text: string, from: number, to: number): number {
  let index = from;
  while (index < to && /\s/.test(text[index])) {
    index += 1;
  }
  return index;
}

/** Adds or replaces one entry of `[project].dependencies`, leaving other entries untouched. */
export function addPyprojectDependency(text: string, requirement: string): string {
  const table = findProjectTable(text);
  const parsed = parseRequirement(requirement);
  const name = parsed.ok ? parsed.value.name : normalizePackageName(requirement);

  if (!table) {
    const prefix = text.length === 0 ? "" : text.endsWith("\n") ? "\n" : "\n\n";
    return `${text}${prefix}[project]\ndependencies = ${multiLineArray([quoteLiteral(requirement, '"')])}\n`;
  }

  const array = findDependencyArray(text, table);
  if (!array) {
    const separator = text[table.headerEnd - 1] === "\n" ? "" : "\n";
    const insertion = `${separator}dependencies = ${multiLineArray([quoteLiteral(requirement, '"')])}\n`;
    return text.slice(0, table.headerEnd) + insertion + text.slice(table.headerEnd);
  }

  const existing = array.elements.find((element) => elementName(element) === name);
  if (existing) {
    return text.slice(0, existing.start) + quoteLiteral(requirement, existing.quote) + text.slice(existing.end);
  }

  const last = array.elements[array.elements.length - 1];
  const literal = quoteLiteral(requirement, last?.quote ?? '"');
  const isMultiLine = text.slice(array.open, array.close).includes("\n");

  if (!last || !isMultiLine) {
    const literals = array.elements.map((element) => text.slice(element.start, element.end));
    return text.slice(0, array.open) + multiLineArray([...literals, literal]) + text.slice(array.close + 1);
  }

  const indent = text.slice(lineStart(text, last.start), last.start);
  const afterLast = nextNonSpace(text, last.end, array.close);
  if (text[afterLast] === ",") {
    const end = lineEnd(text, afterLast);
    if (/^[ \t]*(?:#.*)?\r?\n$/.test(text.slice(afterLast + 1, end))) {
      return text.slice(0, end) + `${indent}${literal},\n` + text.slice(end);
    }
    return text.slice(0, afterLast + 1) + `\n${indent}${literal},` + text.slice(afterLast + 1);
  }
  return text.slice(0, last.end) + `,\n${indent}${literal}` + text.slice(last.end);
}

export function removePyprojectDependency(text: string, packageName: string): { text: string; removed: boolean } {
  const table = findProjectTable(text);
  const array = table ? findDependencyArray(text, table) : undefined;
  if (!array) {
    return { text, removed: false };
  }

  const name = normalizePackageName(packageName);
  const position = array.elements.findIndex((element) => elementName(element) === name);
  const element = array.elements[position];
  if (!element) {
    return { text, removed: false };
  }

  const start = lineStart(text, element.start);
  const end = lineEnd(text, element.end);
  const ownLine = text.slice(start, end);
  const literal = text.slice(element.start, element.end);
  if (start > array.open && end <= array.close && /^\s*,?\s*(?:#.*)?$/.test(ownLine.replace(literal, ""))) {
    return { text: text.slice(0, start) + text.slice(end), removed: true };
  }

  const afterElement = nextNonSpace(text, element.end, array.close);
  if (text[afterElement] === ",") {
    const next = nextNonSpace(text, afterElement + 1, array.close);
    return { text: text.slice(0, element.start) + text.slice(next), removed: true };
  }

  const previous = array.elements[position - 1];
  const cutFrom = previous ? previous.end : element.start;
  return { text: text.slice(0, cutFrom) + text.slice(element.end), removed: true };
}

export class PyprojectFile {
  readonly path: string;

  constructor(projectRoot: string) {
    this.path = path.join(projectRoot, PYPROJECT_FILE);
  }

  async exists(): Promise<boolean> {
    const stat = await fs.stat(this.path).catch(() => undefined);
    return Boolean(stat?.isFile());
  }

  private async readText(): Promise<string | undefined> {
    return fs.readFile(this.path, "utf8").catch(() => undefined);
  }

  async read(): Promise<PyprojectReadResult> {
    const text = await this.readText();
    if (text === undefined) {
      return { entries: [], diagnostics: [], hasProjectTable: false };
    }

    let document: unknown;
    try {
      document = parse(text);
    } catch (error) {
      return {
        entries: [],
        diagnostics: [{ kind: "InvalidFormat", subject: PYPROJECT_FILE, message: errorMessage(error) }],
        hasProjectTable: false
      };
    }

    const project = isRecord(document) ? document.project : undefined;
    if (!isRecord(project)) {
      return { entries: [], diagnostics: [], hasProjectTable: false };
    }

    const entries: RequirementEntry[] = [];
    const diagnostics: Diagnostic[] = [];
    const dependencies = project.dependencies ?? [];
    if (!Array.isArray(dependencies)) {
      diagnostics.push({
        kind: "InvalidFormat",
        subject: PYPROJECT_FILE,
        message: "project.dependencies must be an array of strings"
      });
      return { entries, diagnostics, hasProjectTable: true };
    }

    for (const item of dependencies) {
      if (typeof item !== "string") {
        diagnostics.push({
          kind: "InvalidFormat",
          subject: PYPROJECT_FILE,
          message: `non-string entry in project.dependencies skipped: ${String(item)}`
        });
        continue;
      }
      const parsed = parseRequirement(item);
      if (!parsed.ok) {
        diagnostics.push({ ...parsed.error, message: `${parsed.error.message} (${PYPROJECT_FILE})` });
        continue;
      }
      entries.push(parsed.value);
    }

    return { entries, diagnostics, hasProjectTable: true };
  }

  async hasProjectTable(): Promise<boolean> {
    return (await this.read()).hasProjectTable;
  }

  async addDependency(
    name: string,
    version?: string,
    operator: VersionOperator = ">=",
    extras: string[] = []
  ): Promise<void> {
    const text = (await this.readText()) ?? "";
    const normalized = normalizePackageName(name);
    const current = (await this.read()).entries.find((entry) => entry.name === normalized);
    const requirement = mergedRequirementLine(current, name, version, operator, extras);
    await fs.writeFile(this.path, addPyprojectDependency(text, requirement), "utf8");
  }

  async removeDependency(name: string): Promise<boolean> {
    const text = await this.readText();
    if (text === undefined) {
      return false;
    }

    const result = removePyprojectDependency(text, name);
    if (result.removed) {
      await fs.writeFile(this.path, result.text, "utf8");
    }
    return result.removed;
  }
}
