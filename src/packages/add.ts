import { errorMessage } from "../core/errors";
import { PackageResult } from "../core/types";
import { InstallOptions } from "../installer/types";
import { installWithAutoFix } from "../remediation/autoFix";
import { DECLARE_OPERATOR } from "../remediation/plan";
import { FixContext } from "../remediation/types";
import { normalizePackageName, parseRequirement } from "../version/utils";

export type AddPackagesOptions = InstallOptions;

async function recordDeclarations(
  context: FixContext,
  displayName: string,
  version: string | undefined,
  extras: string[]
): Promise<void> {
  await context.store.requirements.addDependency(displayName, version, DECLARE_OPERATOR.requirements, extras);
  if (await context.store.pyproject.exists()) {
    await context.store.pyproject.addDependency(displayName, version, DECLARE_OPERATOR.pyproject, extras);
  }
}

async function addEditable(context: FixContext, spec: string, options: AddPackagesOptions): Promise<PackageResult> {
  const result = await context.installer.install(spec, options);
  if (!result.success) {
    return { status: "error", message: result.stderr.trim() || `pip install -e ${spec} failed` };
  }
  context.inventory.invalidate();
  return { status: "installed" };
}

async function addOne(context: FixContext, spec: string, options: AddPackagesOptions): Promise<PackageResult> {
  const parsed = parseRequirement(spec);
  if (!parsed.ok) {
    return { status: "error", message: parsed.error.message };
  }

  const { displayName, specifier, extras } = parsed.value;
  const outcome = await installWithAutoFix(context, displayName, specifier, { ...options, extras });
  if (!outcome.success) {
    return {
      status: "error",
      ...(outcome.message ? { message: outcome.message } : {}),
      ...(outcome.availableVersions ? { availableVersions: outcome.availableVersions } : {})
    };
  }

  context.inventory.invalidate();
  const snapshot = await context.inventory.snapshot();
  const pkg = snapshot.packages.get(normalizePackageName(displayName));
  const version = pkg?.version ?? outcome.version;

  const result: PackageResult = {
    status: "installed",
    ...(version ? { version } : {}),
    dependencies: pkg ? [...pkg.dependencies] : [],
    ...(outcome.autoFix ? { autoFix: outcome.autoFix } : {})
  };

  try {
    await recordDeclarations(context, pkg?.displayName ?? displayName, version, extras);
  } catch (error) {
    result.message = `installed, but declaration files were not updated: ${errorMessage(error)}`;
  }
  return result;
}

/** Installs each spec in turn; keys of the result are the names as given. */
export async function addPackages(
  context: FixContext,
  specs: string[],
  options: AddPackagesOptions = {}
): Promise<Record<string, PackageResult>> {
  const results: Record<string, PackageResult> = {};

  for (const spec of specs) {
    if (options.editable) {
      results[spec] = await addEditable(context, spec, options);
      continue;
    }

    const parsed = parseRequirement(spec);
    const key = parsed.ok ? parsed.value.displayName : spec;
    results[key] = await addOne(context, spec, options);
  }

  return results;
}
