import { spawn } from "node:child_process";
import { VenvContext } from "../core/types";
import { errorMessage } from "../core/errors";
import { InstallOptions, Installer, InstallerResult } from "./types";

export const DEFAULT_INSTALL_TIMEOUT_MS = 300_000;

export type PipCommand = {
  command: string;
  args: string[];
};

export function buildInstallCommand(venv: VenvContext, spec: string, options: InstallOptions = {}): PipCommand {
  const args = ["-m", "pip", "install"];
  if (options.noDeps) {
    args.push("--no-deps");
  }
  if (options.editable) {
    args.push("-e");
  }
  args.push(spec);
  return { command: venv.python, args };
}

export function buildUninstallCommand(venv: VenvContext, name: string): PipCommand {
  return { command: venv.python, args: ["-m", "pip", "uninstall", "-y", name] };
}

export class PipInstaller implements Installer {
  constructor(
    private readonly venv: VenvContext,
    private readonly timeoutMs = DEFAULT_INSTALL_TIMEOUT_MS
  ) {}

  install(spec: string, options: InstallOptions = {}): Promise<InstallerResult> {
    return this.run(buildInstallCommand(this.venv, spec, options));
  }

  uninstall(name: string): Promise<InstallerResult> {
    return this.run(buildUninstallCommand(this.venv, name));
  }

  private run(pip: PipCommand): Promise<InstallerResult> {
    return new Promise<InstallerResult>((resolve) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      const child = spawn(pip.command, pip.args, {
        cwd: this.venv.root,
        env: { ...process.env, VIRTUAL_ENV: this.venv.root, PIP_DISABLE_PIP_VERSION_CHECK: "1" },
        stdio: ["ignore", "pipe", "pipe"]
      });

      const finish = (result: InstallerResult): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      const timer = setTimeout(() => {
        child.kill();
        finish({
          success: false,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: `pip timed out after ${Math.round(this.timeoutMs / 1000)}s: ${pip.args.slice(2).join(" ")}`
        });
      }, this.timeoutMs);

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.on("error", (error) => {
        finish({ success: false, stdout: "", stderr: errorMessage(error) });
      });

      child.on("close", (code) => {
        finish({
          success: code === 0,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: Buffer.concat(stderr).toString("utf8")
        });
      });
    });
  }
}
