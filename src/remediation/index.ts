import { Diagnostic, errorMessage } from "../core/errors";
import { DeclarationSource } from "../core/types";
import { DeclaredStore } from "../declared/store";
import { installWithAutoFix } from "./autoFix";
import { DECLARE_OPERATOR, buildFixPlan, fixActions, isEmptyPlan } from "./plan";
import { FixAction, FixActionResult, FixContext, FixPlan, FixReport, RunFixOptions } from "./types";

export { buildFixPlan, fixActions, isEmptyPlan } from "./plan";
export * from "./types";

async function declareIn(store: DeclaredStore, source: DeclarationSource, name: string, version: string): Promise<void> {
  if (source === "pyproject") {
    await store.pyproject.addDependency(name, version, DECLARE_OPERATOR.pyproject);
    return;
  }
  await store.requirements.addDependency(name, version, DECLARE_OPERATOR.requirements);
}

async function installAction(
  context: FixContext,
  action: Extract<FixAction, { kind: "install" | "update" }>
): Promise<FixActionResult> {
  const outcome = await installWithAutoFix(context, action.displayName, action.spec, { extras: action.extras });
  const base = { actionId: action.id, kind: action.kind, package: action.package };

  if (!outcome.success) {
    return {
      ...base,
      success: false,
      ...(outcome.message ? { message: outcome.message } : {}),
      ...(outcome.availableVersions ? { availableVersions: outcome.availableVersions } : {})
    };
  }

  context.inventory.invalidate();
  const snapshot = await context.inventory.snapshot();
  const version = snapshot.packages.get(action.package)?.version ?? outcome.version;

  if (outcome.autoFix) {
    // keep declarations in step with what was actually installed
    const declared = await context.store.parse();
    const declaration = declared.dependencies.get(action.package);
    for (const source of ["requirements", "pyproject"] as const) {
      if (declaration?.specs[source] !== undefined) {
        await declareIn(context.store, source, action.displayName, outcome.autoFix.installedVersion);
      }
    }
  }

  return {
    ...base,
    success: true,
    ...(version ? { version } : {}),
    ...(outcome.autoFix ? { autoFix: outcome.autoFix } : {}),
    ...(outcome.availableVersions ? { availableVersions: outcome.availableVersions } : {})
  };
}

async function applyAction(context: FixContext, action: FixAction): Promise<FixActionResult> {
  const base = { actionId: action.id, kind: action.kind, package: action.package };

  try {
    switch (action.kind) {
      case "update":
      case "install":
        return await installAction(context, action);
      case "deredundant": {
        const removedFrom = await context.store.removeEverywhere(action.package);
        return removedFrom.length > 0
          ? { ...base, success: true, message: `removed from ${removedFrom.join(", ")}` }
          : { ...base, success: false, message: `${action.displayName} was not found in any declaration file` };
      }
      case "declare":
        await declareIn(context.store, action.source, action.displayName, action.version);
        return { ...base, success: true, version: action.version };
    }
  } catch (error) {
    return { ...base, success: false, message: errorMessage(error) };
  }
}

/** Applies updates, then installs, then redundant-declaration removals, then new declarations. */
export async function applyFixPlan(context: FixContext, plan: FixPlan): Promise<FixActionResult[]> {
  const results: FixActionResult[] = [];
  for (const action of fixActions(plan)) {
    results.push(await applyAction(context, action));
  }
  return results;
}

export async function runFix(context: FixContext, options: RunFixOptions = {}): Promise<FixReport> {
  const installed = await context.inventory.snapshot();
  const declared = await context.store.parse();
  const activeSource = await context.store.activeSource(options.file);
  const plan = buildFixPlan(installed.packages, declared.dependencies, activeSource);
  const diagnostics: Diagnostic[] = [...installed.diagnostics, ...declared.diagnostics];

  if (isEmptyPlan(plan)) {
    return { aborted: false, plan, results: [], fixed: 0, failed: 0, diagnostics };
  }

  const approved = options.yes === true || (options.confirm ? await options.confirm(plan) : false);
  if (!approved) {
    return { aborted: true, plan, results: [], fixed: 0, failed: 0, diagnostics };
  }

  const results = await applyFixPlan(context, plan);
  return {
    aborted: false,
    plan,
    results,
    fixed: results.filter((result) => result.success).length,
    failed: results.filter((result) => !result.success).length,
    diagnostics
  };
}
