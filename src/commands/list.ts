import { formatPackageFlags, resolveAffected, type WorkspaceOptions } from '../lib/affected.js';
import { excludedNames } from '../lib/closure.js';
import type { AffectedPayload } from '../types.js';

export async function listCommand(opts: WorkspaceOptions & { json?: boolean }) {
  const res = await resolveAffected(opts);
  const payload: AffectedPayload = {
    root: res.root,
    base: res.base,
    head: res.head,
    changedFiles: res.changedFiles,
    affected: res.affected.names,
    excluded: excludedNames(res.index, res.affected.names),
  };
  if (opts.json) {
    console.log(JSON.stringify(payload, null, 2));
  } else {
    console.log(formatPackageFlags(payload.affected));
  }
}
