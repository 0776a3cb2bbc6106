import { toInstallSpec } from "./autoFix";
import { DECLARE_OPERATOR } from "./plan";
import { FixActionResult, FixPlan, FixReport } from "./types";

const SOURCE_FILES = {
  requirements: "requirements.txt",
  pyproject: "pyproject.toml"
} as const;

export function renderFixPlanText(plan: FixPlan): string {
  const lines: string[] = [];

  if (plan.toUpdate.length > 0) {
    lines.push("Version mismatches to update:");
    for (const action of plan.toUpdate) {
      lines.push(`  - ${action.displayName}: ${action.installedVersion} -> ${action.spec || "*"}`);
    }
  }

  if (plan.toInstall.length > 0) {
    lines.push("Missing packages to install:");
    for (const action of plan.toInstall) {
      lines.push(`  - ${toInstallSpec(action.displayName, action.spec, action.extras)}`);
    }
  }

  if (plan.toDeredundant.length > 0) {
    lines.push("Redundant declarations to remove:");
    for (const action of plan.toDeredundant) {
      lines.push(`  - ${action.displayName} (required by ${action.requiredBy.join(", ")})`);
    }
  }

  if (plan.toDeclare.length > 0) {
    lines.push(`Undeclared packages to add to ${SOURCE_FILES[plan.activeSource]}:`);
    for (const action of plan.toDeclare) {
      lines.push(`  - ${action.displayName}${DECLARE_OPERATOR[action.source]}${action.version}`);
    }
  }

  if (plan.unresolved.length > 0) {
    lines.push("Conflicting declarations (not changed):");
    for (const conflict of plan.unresolved) {
      lines.push(`  - ${conflict.displayName}: ${conflict.requiredVersion}`);
    }
  }

  if (lines.length === 0) {
    lines.push("No issues found.");
  }

  return `${lines.join("\n")}\n`;
}

function describeResult(result: FixActionResult): string {
  const status = result.success ? "ok" : "failed";
  const version = result.version ? ` ${result.version}` : "";
  let line = `  [${status}] ${result.kind} ${result.package}${version}`;
  if (result.autoFix) {
    line += ` (auto-fixed from ${result.autoFix.originalVersion}: ${result.autoFix.reason})`;
  }
  if (!result.success && result.message) {
    line += `: ${result.message.split("\n")[0]}`;
  }
  return line;
}

export function renderFixReportText(report: FixReport): string {
  if (report.aborted) {
    return "Fix aborted; nothing was changed.\n";
  }
  if (report.results.length === 0) {
    return renderFixPlanText(report.plan);
  }

  const lines = ["Results:"];
  for (const result of report.results) {
    lines.push(describeResult(result));
  }
  lines.push(`Fixed: ${report.fixed}, failed: ${report.failed}`);
  if (report.plan.unresolved.length > 0) {
    lines.push(`Unresolved conflicts: ${report.plan.unresolved.map((conflict) => conflict.displayName).join(", ")}`);
  }
  return `${lines.join("\n")}\n`;
}
