import { Command, CommanderError } from "commander";
import packageJson from "../../package.json";
import { DependencyGraphAnalyzer } from "../analysis/graph";
import { Diagnostic, errorMessage } from "../core/errors";
import { VenvContext } from "../core/types";
import { Installer, PackageIndex } from "../installer/types";
import { addPackages } from "../packages/add";
import { removePackages } from "../packages/remove";
import { ProjectContext, openProject } from "../project";
import { runFix } from "../remediation";
import { renderFixPlanText, renderFixReportText } from "../remediation/render";
import { renderJson } from "../report/json";
import {
  renderConflicts,
  renderCycles,
  renderImpact,
  renderPackageResults,
  renderPackageTable,
  renderReverseDependencies,
  renderTree
} from "../report/text";
import { normalizePackageName } from "../version/utils";
import { GlobalOptions, RawFixOptions, RawGlobalOptions, resolveFixOptions, resolveGlobalOptions } from "./args";
import {
  EXIT_ERROR,
  EXIT_FAILURES,
  EXIT_OK,
  exitCodeForConflicts,
  exitCodeForFixReport,
  exitCodeForPackageResults
} from "./exitCode";

export type CliIO = {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  confirm: (question: string) => Promise<boolean>;
  createInstaller?: (venv: VenvContext) => Installer;
  createIndex?: () => PackageIndex;
};

type ListOptions = { all?: boolean; tree?: boolean };
type AddOptions = { editable?: boolean; deps?: boolean };

export function buildProgram(io: CliIO, setExitCode: (code: number) => void): Command {
  const globals = (command: Command): GlobalOptions =>
    resolveGlobalOptions(command.optsWithGlobals<RawGlobalOptions>(), io.cwd, io.env);

  const warn = (diagnostics: Diagnostic[]): void => {
    for (const diagnostic of diagnostics) {
      io.stderr(`Warning: ${diagnostic.subject}: ${diagnostic.message}\n`);
    }
  };

  const open = (options: GlobalOptions): Promise<ProjectContext> =>
    openProject(options.root, {
      ...(options.venvPath ? { venvPath: options.venvPath } : {}),
      env: io.env,
      timeoutMs: options.timeoutMs,
      indexUrl: options.indexUrl,
      ...(io.createInstaller ? { createInstaller: io.createInstaller } : {}),
      ...(io.createIndex ? { createIndex: io.createIndex } : {})
    });

  const analyze = async (options: GlobalOptions): Promise<DependencyGraphAnalyzer> => {
    const project = await open(options);
    const installed = await project.inventory.snapshot();
    const declared = await project.store.parse();
    warn([...installed.diagnostics, ...declared.diagnostics]);
    return new DependencyGraphAnalyzer(installed.packages, declared.dependencies);
  };

  const program = new Command();
  program
    .name("venvsync")
    .description("Keep a Python virtual environment in sync with requirements.txt and pyproject.toml")
    .version(packageJson.version, "--version", "Show version")
    .option("--root <dir>", "project root", ".")
    .option("--venv <dir>", "virtual environment directory (default: $VIRTUAL_ENV, venv, .venv, env, .env)")
    .option("--format <format>", "output format: text|json", "text")
    .option("--timeout <seconds>", "timeout for each pip call", "300")
    .option("--index-url <url>", "package index JSON API base URL (default: $VENVSYNC_INDEX_URL or PyPI)")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text)
    });

  program
    .command("list")
    .description("list declared and top-level installed packages with their status")
    .option("--all", "include every installed package")
    .option("--tree", "show dependency trees")
    .action(async (options: ListOptions, command: Command) => {
      const global = globals(command);
      const analyzer = await analyze(global);

      if (options.tree) {
        const trees = analyzer.dependencyTree();
        io.stdout(global.format === "json" ? renderJson(trees) : renderTree(trees));
        return;
      }

      const packages = options.all ? analyzer.allPackages() : analyzer.topLevelPackages();
      io.stdout(global.format === "json" ? renderJson([...packages.values()]) : renderPackageTable(packages.values()));
    });

  program
    .command("tree")
    .description("show the dependency tree of one package or of every top-level package")
    .argument("[package]")
    .action(async (name: string | undefined, _options: unknown, command: Command) => {
      const global = globals(command);
      const analyzer = await analyze(global);

      if (name && !analyzer.isKnown(name)) {
        io.stderr(`Error: Package ${name} is neither installed nor declared\n`);
        setExitCode(EXIT_FAILURES);
        return;
      }

      const trees = name ? [analyzer.buildTree(name)] : analyzer.dependencyTree();
      io.stdout(global.format === "json" ? renderJson(trees) : renderTree(trees));
    });

  program
    .command("add")
    .description("install packages and record them in requirements.txt and pyproject.toml")
    .argument("<packages...>")
    .option("-e, --editable", "install in editable mode")
    .option("--no-deps", "do not install package dependencies")
    .action(async (specs: string[], options: AddOptions, command: Command) => {
      const global = globals(command);
      const project = await open(global);
      const results = await addPackages(project, specs, {
        editable: Boolean(options.editable),
        noDeps: options.deps === false
      });
      io.stdout(global.format === "json" ? renderJson(results) : renderPackageResults(results));
      setExitCode(exitCodeForPackageResults(results));
    });

  program
    .command("remove")
    .description("uninstall packages with their orphaned dependencies and drop their declarations")
    .argument("<packages...>")
    .action(async (names: string[], _options: unknown, command: Command) => {
      const global = globals(command);
      const project = await open(global);
      const results = await removePackages(project, names);
      io.stdout(global.format === "json" ? renderJson(results) : renderPackageResults(results));
      setExitCode(exitCodeForPackageResults(results));
    });

  program
    .command("fix")
    .description("reconcile the environment with the declared dependencies")
    .option("-y, --yes", "apply without asking")
    .option("--file <file>", "declaration file for new entries: requirements|pyproject")
    .action(async (options: RawFixOptions, command: Command) => {
      const global = globals(command);
      const fixOptions = resolveFixOptions(options);
      const project = await open(global);

      const report = await runFix(project, {
        yes: fixOptions.yes,
        ...(fixOptions.file ? { file: fixOptions.file } : {}),
        confirm: async (plan) => {
          io.stdout(renderFixPlanText(plan));
          return io.confirm("Apply these fixes? [y/N] ");
        }
      });

      warn(report.diagnostics);
      io.stdout(global.format === "json" ? renderJson(report) : renderFixReportText(report));
      setExitCode(exitCodeForFixReport(report));
    });

  program
    .command("why")
    .description("show which installed packages depend on a package")
    .argument("<package>")
    .action(async (name: string, _options: unknown, command: Command) => {
      const global = globals(command);
      const analyzer = await analyze(global);
      const reverse = analyzer.findReverseDependencies(name);
      io.stdout(
        global.format === "json"
          ? renderJson(reverse)
          : renderReverseDependencies(name, reverse.get(normalizePackageName(name)))
      );
    });

  program
    .command("impact")
    .description("show what would be affected by removing a package")
    .argument("<package>")
    .action(async (name: string, _options: unknown, command: Command) => {
      const global = globals(command);
      const analyzer = await analyze(global);
      const impact = analyzer.analyzeImpact(name);
      io.stdout(global.format === "json" ? renderJson(impact) : renderImpact(name, impact));
    });

  program
    .command("cycles")
    .description("list dependency cycles among installed packages")
    .action(async (_options: unknown, command: Command) => {
      const global = globals(command);
      const analyzer = await analyze(global);
      const cycles = analyzer.findCycles();
      io.stdout(global.format === "json" ? renderJson(cycles) : renderCycles(cycles));
    });

  program
    .command("conflicts")
    .description("list installed packages whose requirements are not met by installed versions")
    .action(async (_options: unknown, command: Command) => {
      const global = globals(command);
      const analyzer = await analyze(global);
      const conflicts = analyzer.checkConflicts();
      io.stdout(global.format === "json" ? renderJson(conflicts) : renderConflicts(conflicts));
      setExitCode(exitCodeForConflicts(conflicts));
    });

  return program;
}

/** Runs one invocation and resolves to its exit code. `argv` excludes the node binary and script. */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let exitCode = EXIT_OK;
  const program = buildProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: "user" });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_ERROR;
    }
    io.stderr(`Error: ${errorMessage(error)}\n`);
    return EXIT_ERROR;
  }
}
