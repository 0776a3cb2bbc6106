import { describe, expect, it } from "vitest";
import {
  EXIT_FAILURES,
  EXIT_OK,
  exitCodeForConflicts,
  exitCodeForFixReport,
  exitCodeForPackageResults
} from "../src/cli/exitCode";
import { FixPlan, FixReport } from "../src/remediation/types";

const EMPTY_PLAN: FixPlan = {
  activeSource: "requirements",
  toUpdate: [],
  toInstall: [],
  toDeredundant: [],
  toDeclare: [],
  unresolved: []
};

function report(failed: number, aborted = false): FixReport {
  return { aborted, plan: EMPTY_PLAN, results: [], fixed: 0, failed, diagnostics: [] };
}

describe("exit codes", () => {
  it("fails package commands when any package errored or was not found", () => {
    expect(exitCodeForPackageResults({ six: { status: "installed", version: "1.16.0" } })).toBe(EXIT_OK);
    expect(
      exitCodeForPackageResults({ six: { status: "removed" }, ghost: { status: "not_found" } })
    ).toBe(EXIT_FAILURES);
    expect(exitCodeForPackageResults({ bad: { status: "error", message: "boom" } })).toBe(EXIT_FAILURES);
  });

  it("treats an aborted fix as success and failed actions as failure", () => {
    expect(exitCodeForFixReport(report(0, true))).toBe(EXIT_OK);
    expect(exitCodeForFixReport(report(2))).toBe(EXIT_FAILURES);
  });

  it("fails when conflicts exist", () => {
    expect(exitCodeForConflicts([])).toBe(EXIT_OK);
    expect(
      exitCodeForConflicts([{ package: "a", dependency: "b", requirement: "<2", installedVersion: "2.0" }])
    ).toBe(EXIT_FAILURES);
  });
});
