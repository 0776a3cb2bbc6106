import path from "node:path";
import { describe, expect, it } from "vitest";
import { DEFAULT_INDEX_URL, resolveFixOptions, resolveGlobalOptions } from "../src/cli/args";
import { InvalidFormatError } from "../src/core/errors";

describe("resolveGlobalOptions", () => {
  it("defaults to text output, the working directory and a five minute timeout", () => {
    expect(resolveGlobalOptions({}, "/work/project", {})).toEqual({
      root: path.resolve("/work/project"),
      format: "text",
      timeoutMs: 300_000,
      indexUrl: DEFAULT_INDEX_URL
    });
  });

  it("resolves the venv against the project root", () => {
    const opts = resolveGlobalOptions({ root: "app", venv: "env", format: "json", timeout: "1.5" }, "/work", {});
    expect(opts.root).toBe(path.resolve("/work/app"));
    expect(opts.venvPath).toBe(path.resolve("/work/app/env"));
    expect(opts.format).toBe("json");
    expect(opts.timeoutMs).toBe(1500);
  });

  it("reads the index URL from the environment unless given", () => {
    const env = { VENVSYNC_INDEX_URL: "http://localhost:8080/pypi" };
    expect(resolveGlobalOptions({}, "/work", env).indexUrl).toBe("http://localhost:8080/pypi");
    expect(resolveGlobalOptions({ indexUrl: "http://mirror.test/pypi" }, "/work", env).indexUrl).toBe(
      "http://mirror.test/pypi"
    );
  });

  it("rejects unknown formats and bad timeouts", () => {
    expect(() => resolveGlobalOptions({ format: "sarif" }, "/work", {})).toThrow(InvalidFormatError);
    expect(() => resolveGlobalOptions({ timeout: "0" }, "/work", {})).toThrow('Invalid timeout "0"');
    expect(() => resolveGlobalOptions({ timeout: "soon" }, "/work", {})).toThrow(InvalidFormatError);
  });
});

describe("resolveFixOptions", () => {
  it("accepts short and file names for --file", () => {
    expect(resolveFixOptions({})).toEqual({ yes: false });
    expect(resolveFixOptions({ yes: true, file: "pyproject.toml" })).toEqual({ yes: true, file: "pyproject" });
    expect(resolveFixOptions({ file: "requirements" })).toEqual({ yes: false, file: "requirements" });
    expect(() => resolveFixOptions({ file: "setup.cfg" })).toThrow("Unsupported file");
  });
});
