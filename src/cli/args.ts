import path from "node:path";
import { InvalidFormatError } from "../core/errors";
import { DeclarationSource, OutputFormat } from "../core/types";
import { DEFAULT_INSTALL_TIMEOUT_MS } from "../installer/pip";
import { DEFAULT_INDEX_URL } from "../installer/pypi";

export { DEFAULT_INDEX_URL };

export type RawGlobalOptions = {
  root?: string;
  venv?: string;
  format?: string;
  timeout?: string;
  indexUrl?: string;
};

export type GlobalOptions = {
  root: string;
  venvPath?: string;
  format: OutputFormat;
  timeoutMs: number;
  indexUrl: string;
};

export type RawFixOptions = {
  yes?: boolean;
  file?: string;
};

export type FixCommandOptions = {
  yes: boolean;
  file?: DeclarationSource;
};

function parseFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === "text") {
    return "text";
  }
  if (value === "json") {
    return "json";
  }
  throw new InvalidFormatError(value, `Unsupported format "${value}". Use text|json.`);
}

function parseTimeout(value: string | undefined): number {
  if (value === undefined) {
    return DEFAULT_INSTALL_TIMEOUT_MS;
  }
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidFormatError(value, `Invalid timeout "${value}". Expected a positive number of seconds.`);
  }
  return Math.round(seconds * 1000);
}

function parseDeclarationSource(value: string | undefined): DeclarationSource | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === "requirements" || value === "requirements.txt") {
    return "requirements";
  }
  if (value === "pyproject" || value === "pyproject.toml") {
    return "pyproject";
  }
  throw new InvalidFormatError(value, `Unsupported file "${value}". Use requirements|pyproject.`);
}

export function resolveGlobalOptions(raw: RawGlobalOptions, cwd: string, env: NodeJS.ProcessEnv): GlobalOptions {
  const root = path.resolve(cwd, raw.root ?? ".");
  return {
    root,
    ...(raw.venv ? { venvPath: path.resolve(root, raw.venv) } : {}),
    format: parseFormat(raw.format),
    timeoutMs: parseTimeout(raw.timeout),
    indexUrl: raw.indexUrl ?? env.VENVSYNC_INDEX_URL ?? DEFAULT_INDEX_URL
  };
}

export function resolveFixOptions(raw: RawFixOptions): FixCommandOptions {
  const file = parseDeclarationSource(raw.file);
  return {
    yes: Boolean(raw.yes),
    ...(file ? { file } : {})
  };
}
