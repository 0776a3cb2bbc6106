import { DependencyConflict, DependencyNode, ImpactAnalysis, PackageInfo, PackageResult } from "../core/types";

const HEADERS = ["Package", "Required", "Installed", "Status"] as const;

function padRow(cells: string[], widths: number[]): string {
  return cells
    .map((cell, index) => (index === cells.length - 1 ? cell : cell.padEnd(widths[index])))
    .join("  ")
    .trimEnd();
}

export function renderPackageTable(packages: Iterable<PackageInfo>): string {
  const rows = [...packages].map((info) => [
    info.displayName,
    info.requiredVersion ?? "-",
    info.installedVersion ?? "-",
    info.status
  ]);

  if (rows.length === 0) {
    return "No packages found.\n";
  }

  const widths = HEADERS.map((header, index) => Math.max(header.length, ...rows.map((row) => row[index].length)));
  const lines = [padRow([...HEADERS], widths), ...rows.map((row) => padRow(row, widths))];
  lines.push("");
  lines.push(`Total: ${rows.length}`);
  return `${lines.join("\n")}\n`;
}

function describeNode(node: DependencyNode): string {
  let label = `${node.displayName} ${node.installedVersion ?? "(not installed)"}`;
  if (node.status !== "normal") {
    label += ` [${node.status}]`;
  }
  if (node.repeated) {
    label += " (cycle)";
  }
  return label;
}

function appendChildren(lines: string[], node: DependencyNode, prefix: string): void {
  node.dependencies.forEach((child, index) => {
    const last = index === node.dependencies.length - 1;
    lines.push(`${prefix}${last ? "└── " : "├── "}${describeNode(child)}`);
    appendChildren(lines, child, `${prefix}${last ? "    " : "│   "}`);
  });
}

export function renderTree(roots: DependencyNode[]): string {
  if (roots.length === 0) {
    return "No packages found.\n";
  }

  const lines: string[] = [];
  for (const root of roots) {
    lines.push(describeNode(root));
    appendChildren(lines, root, "");
  }
  return `${lines.join("\n")}\n`;
}

export function renderReverseDependencies(name: string, dependents: Set<string> | undefined): string {
  if (!dependents || dependents.size === 0) {
    return `${name} is not required by any installed package.\n`;
  }
  return `${name} is required by: ${[...dependents].join(", ")}\n`;
}

function listOrNone(values: string[]): string {
  return values.length > 0 ? values.join(", ") : "(none)";
}

export function renderImpact(name: string, impact: ImpactAnalysis): string {
  return [
    `Impact of removing ${name}:`,
    `  direct dependents: ${listOrNone(impact.directDependents)}`,
    `  indirect dependents: ${listOrNone(impact.indirectDependents)}`,
    `  safe to remove: ${impact.safeToRemove ? "yes" : "no"}`
  ].join("\n") + "\n";
}

export function renderCycles(cycles: string[][]): string {
  if (cycles.length === 0) {
    return "No dependency cycles found.\n";
  }
  return `${cycles.map((cycle) => [...cycle, cycle[0]].join(" -> ")).join("\n")}\n`;
}

export function renderConflicts(conflicts: DependencyConflict[]): string {
  if (conflicts.length === 0) {
    return "No dependency conflicts found.\n";
  }
  return `${conflicts
    .map(
      (conflict) =>
        `${conflict.package} requires ${conflict.dependency}${conflict.requirement}, but ${conflict.installedVersion} is installed`
    )
    .join("\n")}\n`;
}

function appendPackageResult(lines: string[], name: string, result: PackageResult): void {
  switch (result.status) {
    case "installed": {
      lines.push(`+ ${name}${result.version ? ` ${result.version}` : ""}`);
      if (result.autoFix) {
        lines.push(
          `  auto-fixed: ${result.autoFix.originalVersion} -> ${result.autoFix.installedVersion} (${result.autoFix.reason})`
        );
      }
      if (result.dependencies && result.dependencies.length > 0) {
        lines.push(`  dependencies: ${result.dependencies.join(", ")}`);
      }
      break;
    }
    case "removed": {
      lines.push(`- ${name}${result.version ? ` ${result.version}` : ""}`);
      if (result.removedDependencies && result.removedDependencies.length > 0) {
        lines.push(`  removed dependencies: ${result.removedDependencies.join(", ")}`);
      }
      for (const [dependency, users] of Object.entries(result.keptDependencies ?? {})) {
        lines.push(`  kept ${dependency}${users.length > 0 ? ` (needed by ${users.join(", ")})` : ""}`);
      }
      break;
    }
    case "not_found":
    case "error": {
      lines.push(`x ${name}: ${(result.message ?? result.status).split("\n")[0]}`);
      if (result.availableVersions && result.availableVersions.length > 0) {
        lines.push(`  available versions: ${result.availableVersions.slice(-10).join(", ")}`);
      }
      return;
    }
  }

  if (result.message) {
    lines.push(`  note: ${result.message}`);
  }
}

export function renderPackageResults(results: Record<string, PackageResult>): string {
  const lines: string[] = [];
  for (const [name, result] of Object.entries(results)) {
    appendPackageResult(lines, name, result);
  }
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}
