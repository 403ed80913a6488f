import path from 'path';
import { readCargoMetadata } from './cargo.js';
import { computeAffected } from './closure.js';
import { loadConfig, type ResolvedConfig } from './config.js';
import { filterSourceFiles, getChangedFiles } from './git.js';
import { buildPackageIndex, type PackageIndex } from './packages.js';
import type { AffectedSet } from '../types.js';

export type WorkspaceOptions = {
  input?: string;
  since?: string;
  head?: string;
  files?: string[];
  verbose?: boolean;
};

export type Resolution = {
  root: string;
  cfg: ResolvedConfig;
  base?: string;
  head?: string;
  changedFiles: string[];
  index: PackageIndex;
  affected: AffectedSet;
};

export async function resolveAffected(opts: WorkspaceOptions): Promise<Resolution> {
  const root = path.resolve(opts.input ?? process.cwd());
  const cfg = await loadConfig(root);

  let base: string | undefined;
  let head: string | undefined;
  let changed: string[];
  if (opts.files?.length) {
    changed = opts.files;
  } else {
    base = opts.since || cfg.since;
    head = opts.head || cfg.head;
    changed = await getChangedFiles(root, base, head);
  }
  const changedFiles = filterSourceFiles(changed, cfg.extensions);

  if (opts.verbose) {
    console.log(base ? `Files changed between ${base} and ${head}:` : 'Files changed:');
    for (const f of changedFiles) console.log(`  - ${f}`);
  }

  const index = buildPackageIndex(root, await readCargoMetadata(root));
  const affected = computeAffected(index, changedFiles, root);
  return { root, cfg, base, head, changedFiles, index, affected };
}

export function formatPackageFlags(names: string[]): string {
  if (!names.length) return 'No packages affected';
  return names.map((name) => `-p ${name}`).join(' ');
}
