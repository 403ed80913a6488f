import path from 'path';
import { OwnershipIndex } from './ownership.js';
import type { Package, PackageRecord } from '../types.js';

export type PackageIndex = OwnershipIndex<Package>;

export function isWithin(root: string, p: string): boolean {
  const rel = path.relative(path.resolve(root), path.resolve(p));
  return rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/**
 * Index workspace packages by their directory. Only dependencies that live
 * under `root` are kept; registry and out-of-tree path dependencies cannot
 * change as part of this workspace's diff.
 */
export function buildPackageIndex(root: string, records: PackageRecord[]): PackageIndex {
  const index: PackageIndex = new OwnershipIndex();
  for (const record of records) {
    const manifestPath = path.resolve(record.manifestPath);
    const directory = path.dirname(manifestPath);
    const dependencies = record.dependencyPaths
      .filter((dep) => isWithin(root, dep))
      .map((dep) => path.resolve(dep));
    index.insert(directory, { name: record.name, directory, manifestPath, dependencies });
  }
  return index;
}

export function packageNames(index: PackageIndex): string[] {
  return index.values().map((pkg) => pkg.name);
}
