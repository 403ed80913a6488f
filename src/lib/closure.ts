import path from 'path';
import { packageNames, type PackageIndex } from './packages.js';
import type { AffectedSet, Package } from '../types.js';

/**
 * Map each package directory to the packages that depend on it. Dependency
 * paths are resolved through the ownership index, so a path into a
 * subdirectory of a package still points at that package. Paths owned by
 * nothing are skipped.
 */
export function reverseDependencies(index: PackageIndex): Map<string, Package[]> {
  const dependents = new Map<string, Package[]>();
  for (const pkg of index.values()) {
    for (const dep of pkg.dependencies) {
      const owner = index.lookupOwner(dep);
      if (!owner) continue;
      const list = dependents.get(owner.directory) ?? [];
      list.push(pkg);
      dependents.set(owner.directory, list);
    }
  }
  return dependents;
}

export function computeAffected(index: PackageIndex, changedFiles: string[], root: string): AffectedSet {
  const directories = new Set<string>();
  const names = new Set<string>();
  const queue: Package[] = [];

  const mark = (pkg: Package) => {
    if (directories.has(pkg.directory)) return;
    directories.add(pkg.directory);
    names.add(pkg.name);
    queue.push(pkg);
  };

  for (const file of changedFiles) {
    const owner = index.lookupOwner(path.resolve(root, file));
    if (owner) mark(owner);
  }

  const dependents = reverseDependencies(index);
  while (queue.length) {
    const current = queue.shift();
    if (!current) break;
    for (const dependent of dependents.get(current.directory) ?? []) {
      mark(dependent);
    }
  }

  return { directories, names: Array.from(names).sort() };
}

export function excludedNames(index: PackageIndex, affectedNames: Iterable<string>): string[] {
  const included = new Set(affectedNames);
  const excluded = new Set(packageNames(index).filter((name) => !included.has(name)));
  return Array.from(excluded).sort();
}
