import {
  DeclaredDependency,
  DependencyConflict,
  DependencyNode,
  ImpactAnalysis,
  InstalledPackage,
  PackageInfo
} from "../core/types";
import { checkVersionCompatibility, compareNames, normalizePackageName } from "../version/utils";
import { classifyPackage, collectDependencyNames } from "./classify";

type TreeFrame = {
  node: DependencyNode;
  children: string[];
  next: number;
};

function sortedNames(names: Iterable<string>): string[] {
  return [...names].sort(compareNames);
}

export class DependencyGraphAnalyzer {
  private readonly dependencyNames: Set<string>;
  private readonly dependents = new Map<string, Set<string>>();

  constructor(
    private readonly installed: Map<string, InstalledPackage>,
    private readonly declared: Map<string, DeclaredDependency>
  ) {
    this.dependencyNames = collectDependencyNames(installed);
    for (const pkg of installed.values()) {
      for (const dependency of pkg.dependencies) {
        const users = this.dependents.get(dependency) ?? new Set<string>();
        users.add(pkg.name);
        this.dependents.set(dependency, users);
      }
    }
  }

  classify(name: string): PackageInfo {
    return classifyPackage(normalizePackageName(name), this.installed, this.declared, this.dependencyNames);
  }

  isKnown(name: string): boolean {
    const normalized = normalizePackageName(name);
    return this.installed.has(normalized) || this.declared.has(normalized);
  }

  allPackages(): Map<string, PackageInfo> {
    const names = sortedNames(new Set([...this.installed.keys(), ...this.declared.keys()]));
    return new Map(names.map((name) => [name, this.classify(name)]));
  }

  topLevelPackages(): Map<string, PackageInfo> {
    const names = new Set(this.declared.keys());
    for (const name of this.installed.keys()) {
      if (!this.dependencyNames.has(name)) {
        names.add(name);
      }
    }
    return new Map(sortedNames(names).map((name) => [name, this.classify(name)]));
  }

  private createNode(name: string, repeated: boolean): DependencyNode {
    const info = this.classify(name);
    return {
      name: info.name,
      displayName: info.displayName,
      ...(info.installedVersion !== undefined ? { installedVersion: info.installedVersion } : {}),
      ...(info.requiredVersion !== undefined ? { requiredVersion: info.requiredVersion } : {}),
      status: info.status,
      dependencies: [],
      repeated
    };
  }

  private childNames(name: string): string[] {
    const pkg = this.installed.get(name);
    if (!pkg) {
      return [];
    }
    return pkg.dependencies.filter((dependency) => this.isKnown(dependency));
  }

  /**
   * Depth-first expansion with an explicit stack. A child already on the
   * current root-to-node path is emitted as a `repeated` leaf.
   */
  buildTree(rootName: string): DependencyNode {
    const root = normalizePackageName(rootName);
    const rootNode = this.createNode(root, false);
    const path = new Set<string>([root]);
    const stack: TreeFrame[] = [{ node: rootNode, children: this.childNames(root), next: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.next >= frame.children.length) {
        stack.pop();
        path.delete(frame.node.name);
        continue;
      }

      const child = frame.children[frame.next];
      frame.next += 1;

      if (path.has(child)) {
        frame.node.dependencies.push(this.createNode(child, true));
        continue;
      }

      const childNode = this.createNode(child, false);
      frame.node.dependencies.push(childNode);
      path.add(child);
      stack.push({ node: childNode, children: this.childNames(child), next: 0 });
    }

    return rootNode;
  }

  dependencyTree(): DependencyNode[] {
    return [...this.topLevelPackages().keys()].map((name) => this.buildTree(name));
  }

  findReverseDependencies(name: string): Map<string, Set<string>> {
    const normalized = normalizePackageName(name);
    const users = this.dependents.get(normalized);
    const result = new Map<string, Set<string>>();
    if (users && users.size > 0) {
      result.set(normalized, new Set(sortedNames(users)));
    }
    return result;
  }

  checkConflicts(): DependencyConflict[] {
    const conflicts: DependencyConflict[] = [];
    for (const pkg of this.installed.values()) {
      for (const requirement of pkg.requirements) {
        const dependency = this.installed.get(requirement.name);
        if (!dependency || requirement.specifier.length === 0) {
          continue;
        }
        if (!checkVersionCompatibility(dependency.version, requirement.specifier)) {
          conflicts.push({
            package: pkg.name,
            dependency: dependency.name,
            requirement: requirement.specifier,
            installedVersion: dependency.version
          });
        }
      }
    }
    return conflicts.sort(
      (left, right) => compareNames(left.package, right.package) || compareNames(left.dependency, right.dependency)
    );
  }

  analyzeImpact(name: string): ImpactAnalysis {
    const normalized = normalizePackageName(name);
    const direct = this.dependents.get(normalized) ?? new Set<string>();
    const indirect = new Set<string>();

    for (const dependent of direct) {
      for (const user of this.dependents.get(dependent) ?? []) {
        if (user !== normalized && !direct.has(user)) {
          indirect.add(user);
        }
      }
    }

    return {
      directDependents: sortedNames(direct),
      indirectDependents: sortedNames(indirect),
      safeToRemove: direct.size === 0
    };
  }

  /**
   * Simple cycles of three or more installed packages. Each cycle is reported
   * once, rotated so that its smallest name comes first.
   */
  findCycles(): string[][] {
    const cycles = new Map<string, string[]>();

    for (const start of sortedNames(this.installed.keys())) {
      const path: string[] = [start];
      const onPath = new Set<string>([start]);
      const stack: Array<{ children: string[]; next: number }> = [
        { children: this.installedChildren(start, start), next: 0 }
      ];

      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        if (frame.next >= frame.children.length) {
          stack.pop();
          const finished = path.pop();
          if (finished !== undefined) {
            onPath.delete(finished);
          }
          continue;
        }

        const child = frame.children[frame.next];
        frame.next += 1;

        if (child === start) {
          if (path.length > 2) {
            cycles.set(path.join(" -> "), [...path]);
          }
          continue;
        }
        if (onPath.has(child)) {
          continue;
        }

        path.push(child);
        onPath.add(child);
        stack.push({ children: this.installedChildren(child, start), next: 0 });
      }
    }

    return [...cycles.entries()]
      .sort(([left], [right]) => compareNames(left, right))
      .map(([, cycle]) => cycle);
  }

  // only names >= start, so each cycle is found from its smallest member
  private installedChildren(name: string, start: string): string[] {
    const pkg = this.installed.get(name);
    if (!pkg) {
      return [];
    }
    return pkg.dependencies.filter((dependency) => this.installed.has(dependency) && dependency >= start);
  }

  /**
   * The requested installed packages plus every transitive dependency whose
   * dependents are all being removed. Declared packages are never pulled in.
   */
  removalSet(names: string[]): Set<string> {
    const removal = new Set(names.map((name) => normalizePackageName(name)).filter((name) => this.installed.has(name)));

    let changed = true;
    while (changed) {
      changed = false;
      for (const member of [...removal]) {
        for (const dependency of this.installed.get(member)?.dependencies ?? []) {
          if (removal.has(dependency) || !this.installed.has(dependency) || this.declared.has(dependency)) {
            continue;
          }
          const users = this.dependents.get(dependency) ?? new Set<string>();
          if ([...users].every((user) => removal.has(user))) {
            removal.add(dependency);
            changed = true;
          }
        }
      }
    }

    return removal;
  }

  /** Top-level packages outside `excluded` whose dependency closure reaches `name`. */
  topLevelUsers(name: string, excluded: Set<string>): string[] {
    const target = normalizePackageName(name);
    const users: string[] = [];

    for (const topLevel of this.topLevelPackages().keys()) {
      if (excluded.has(topLevel) || topLevel === target) {
        continue;
      }
      if (this.reaches(topLevel, target)) {
        users.push(topLevel);
      }
    }
    return users;
  }

  private reaches(from: string, target: string): boolean {
    const seen = new Set<string>([from]);
    const queue = [from];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) {
        break;
      }
      for (const dependency of this.installed.get(current)?.dependencies ?? []) {
        if (dependency === target) {
          return true;
        }
        if (!seen.has(dependency)) {
          seen.add(dependency);
          queue.push(dependency);
        }
      }
    }
    return false;
  }
}
