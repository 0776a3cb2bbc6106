import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { DeclaredStore } from "../src/declared/store";
import { InstalledInventory } from "../src/installed/inventory";
import { SitePackagesReader } from "../src/installed/reader";
import { addPackages } from "../src/packages/add";
import { removePackages } from "../src/packages/remove";
import { CatalogEntry, FakeInstaller, FakeInstallerOptions } from "./fakes";
import { cleanupTempDirs, makeTempDir, makeVenv, readText, writeDistInfo } from "./helpers";

afterEach(async () => {
  await cleanupTempDirs();
});

async function makeProject(catalog: Record<string, CatalogEntry>, options: FakeInstallerOptions = {}) {
  const root = await makeTempDir();
  const { sitePackages } = await makeVenv(root);
  return {
    root,
    sitePackages,
    store: new DeclaredStore(root),
    inventory: new InstalledInventory(new SitePackagesReader(sitePackages), { platform: "linux" }),
    installer: new FakeInstaller(sitePackages, catalog, options)
  };
}

describe("addPackages", () => {
  it("installs and pins each package in requirements.txt", async () => {
    const project = await makeProject({
      requests: { versions: ["2.31.0"], requires: { "2.31.0": ["idna>=2.5"] } },
      flask: { displayName: "Flask", versions: ["2.3.3", "3.0.0"] }
    });

    const results = await addPackages(project, ["requests==2.31.0", "Flask"]);

    expect(results).toEqual({
      requests: { status: "installed", version: "2.31.0", dependencies: ["idna"] },
      Flask: { status: "installed", version: "3.0.0", dependencies: [] }
    });
    expect(await readText(project.store.requirements.path)).toBe("Flask==3.0.0\nrequests==2.31.0\n");
    expect(await project.store.pyproject.exists()).toBe(false);
  });

  it("also declares in an existing pyproject.toml with >=", async () => {
    const project = await makeProject({ six: { versions: ["1.16.0"] } });
    await fs.writeFile(path.join(project.root, "pyproject.toml"), '[project]\nname = "demo"\ndependencies = []\n', "utf8");

    await addPackages(project, ["six"]);

    expect(await readText(project.store.requirements.path)).toBe("six==1.16.0\n");
    expect(await readText(project.store.pyproject.path)).toBe(
      '[project]\nname = "demo"\ndependencies = [\n    "six>=1.16.0",\n]\n'
    );
  });

  it("reports a failed install and leaves the declarations alone", async () => {
    const project = await makeProject({});

    const results = await addPackages(project, ["ghost"]);

    expect(results).toEqual({
      ghost: {
        status: "error",
        message:
          "ERROR: Could not find a version that satisfies the requirement ghost (from versions: none)\n" +
          "ERROR: No matching distribution found for ghost"
      }
    });
    expect(await project.store.requirements.exists()).toBe(false);
  });

  it("installs editable specs as given without declaring them", async () => {
    const project = await makeProject({ mypkg: { versions: ["0.1.0"] } });

    const results = await addPackages(project, ["mypkg"], { editable: true });

    expect(results).toEqual({ mypkg: { status: "installed" } });
    expect(project.installer.calls).toEqual([{ kind: "install", spec: "mypkg", options: { editable: true } }]);
    expect(await project.store.requirements.exists()).toBe(false);
  });
});

describe("removePackages", () => {
  async function flaskProject(options: FakeInstallerOptions = {}) {
    const project = await makeProject({}, options);
    await writeDistInfo(project.sitePackages, "flask", "3.0.0", ["Werkzeug>=3.0", "click>=8.1"]);
    await writeDistInfo(project.sitePackages, "Werkzeug", "3.0.1", ["MarkupSafe>=2.1.1"]);
    await writeDistInfo(project.sitePackages, "MarkupSafe", "2.1.5");
    await writeDistInfo(project.sitePackages, "click", "8.1.7");
    await writeDistInfo(project.sitePackages, "black", "24.1.0", ["click>=8.0"]);
    await fs.writeFile(path.join(project.root, "requirements.txt"), "flask==3.0.0\nblack==24.1.0\n", "utf8");
    return project;
  }

  it("uninstalls orphaned dependencies and keeps shared ones", async () => {
    const project = await flaskProject();

    const results = await removePackages(project, ["flask", "nothing"]);

    expect(results).toEqual({
      flask: {
        status: "removed",
        version: "3.0.0",
        removedDependencies: ["markupsafe", "werkzeug"],
        keptDependencies: { click: ["black"] }
      },
      nothing: { status: "not_found", message: "Package nothing is not installed" }
    });
    expect(project.installer.uninstalledNames()).toEqual(["flask", "Werkzeug", "MarkupSafe"]);
    expect(await readText(project.store.requirements.path)).toBe("black==24.1.0\n");
    expect([...(await project.inventory.snapshot()).packages.keys()]).toEqual(["black", "click"]);
  });

  it("keeps a shared dependency when another requested package fails to uninstall", async () => {
    const project = await makeProject({}, { failUninstall: ["b"] });
    await writeDistInfo(project.sitePackages, "a", "1.0", ["shared>=1.0"]);
    await writeDistInfo(project.sitePackages, "b", "1.0", ["shared>=1.0"]);
    await writeDistInfo(project.sitePackages, "shared", "1.0");

    const results = await removePackages(project, ["a", "b"]);

    expect(results).toEqual({
      a: { status: "removed", version: "1.0", removedDependencies: [], keptDependencies: { shared: ["b"] } },
      b: { status: "error", message: "ERROR: cannot uninstall b" }
    });
    expect(project.installer.uninstalledNames()).toEqual(["a", "b"]);
    expect([...(await project.inventory.snapshot()).packages.keys()].sort()).toEqual(["b", "shared"]);
  });

  it("uninstalls a shared dependency once every package using it is gone", async () => {
    const project = await makeProject({});
    await writeDistInfo(project.sitePackages, "a", "1.0", ["shared>=1.0"]);
    await writeDistInfo(project.sitePackages, "b", "1.0", ["shared>=1.0"]);
    await writeDistInfo(project.sitePackages, "shared", "1.0");

    const results = await removePackages(project, ["a", "b"]);

    expect(results).toEqual({
      a: { status: "removed", version: "1.0", removedDependencies: ["shared"], keptDependencies: {} },
      b: { status: "removed", version: "1.0", removedDependencies: ["shared"], keptDependencies: {} }
    });
    expect(project.installer.uninstalledNames()).toEqual(["a", "b", "shared"]);
  });

  it("reports an uninstall failure and keeps the declaration", async () => {
    const project = await flaskProject({ failUninstall: ["flask"] });

    const results = await removePackages(project, ["flask"]);

    expect(results).toEqual({ flask: { status: "error", message: "ERROR: cannot uninstall flask" } });
    expect(await readText(project.store.requirements.path)).toBe("flask==3.0.0\nblack==24.1.0\n");
  });
});
