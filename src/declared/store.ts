import { DeclarationSource, DeclaredDependency, DeclaredSnapshot } from "../core/types";
import { recordDeclaration } from "./dependency";
import { PyprojectFile } from "./pyprojectFile";
import { RequirementsFile } from "./requirementsFile";

export class DeclaredStore {
  readonly requirements: RequirementsFile;
  readonly pyproject: PyprojectFile;

  constructor(readonly projectRoot: string) {
    this.requirements = new RequirementsFile(projectRoot);
    this.pyproject = new PyprojectFile(projectRoot);
  }

  async parse(): Promise<DeclaredSnapshot> {
    const dependencies = new Map<string, DeclaredDependency>();
    const requirements = await this.requirements.read();
    const pyproject = await this.pyproject.read();

    for (const entry of requirements.entries) {
      recordDeclaration(dependencies, entry, "requirements");
    }
    for (const entry of pyproject.entries) {
      recordDeclaration(dependencies, entry, "pyproject");
    }

    return {
      dependencies,
      diagnostics: [...requirements.diagnostics, ...pyproject.diagnostics]
    };
  }

  async activeSource(override?: DeclarationSource): Promise<DeclarationSource> {
    if (override) {
      return override;
    }
    return (await this.pyproject.hasProjectTable()) ? "pyproject" : "requirements";
  }

  async removeEverywhere(name: string): Promise<DeclarationSource[]> {
    const removedFrom: DeclarationSource[] = [];
    if (await this.requirements.removeDependency(name)) {
      removedFrom.push("requirements");
    }
    if (await this.pyproject.removeDependency(name)) {
      removedFrom.push("pyproject");
    }
    return removedFrom;
  }
}
