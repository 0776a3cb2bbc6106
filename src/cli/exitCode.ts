import { DependencyConflict, PackageResult } from "../core/types";
import { FixReport } from "../remediation/types";

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_ERROR = 2;

export function hasFailedResult(results: Record<string, PackageResult>): boolean {
  return Object.values(results).some((result) => result.status === "error" || result.status === "not_found");
}

export function exitCodeForPackageResults(results: Record<string, PackageResult>): number {
  return hasFailedResult(results) ? EXIT_FAILURES : EXIT_OK;
}

export function exitCodeForFixReport(report: FixReport): number {
  return report.failed > 0 ? EXIT_FAILURES : EXIT_OK;
}

export function exitCodeForConflicts(conflicts: DependencyConflict[]): number {
  return conflicts.length > 0 ? EXIT_FAILURES : EXIT_OK;
}
