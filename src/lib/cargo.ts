import { execa, ExecaError } from 'execa';
import { z } from 'zod';
import { formatError, WorkspaceError } from './errors.js';
import { describeFailure } from './exec.js';
import type { PackageRecord } from '../types.js';

const DependencySchema = z.object({
  name: z.string(),
  path: z.string().nullish(),
});

const PackageSchema = z.object({
  id: z.string(),
  name: z.string(),
  manifest_path: z.string(),
  dependencies: z.array(DependencySchema),
});

const MetadataSchema = z.object({
  packages: z.array(PackageSchema),
  workspace_members: z.array(z.string()),
  workspace_root: z.string(),
});

export function parseCargoMetadata(json: string): PackageRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new WorkspaceError(`cargo metadata produced invalid JSON: ${formatError(error)}`);
  }
  const result = MetadataSchema.safeParse(raw);
  if (!result.success) {
    throw new WorkspaceError(`Unexpected cargo metadata shape: ${result.error.issues[0]?.message ?? 'unknown'}`, {
      issues: result.error.issues,
    });
  }
  const metadata = result.data;
  const members = new Set(metadata.workspace_members);
  return metadata.packages
    .filter((pkg) => members.has(pkg.id))
    .map((pkg) => ({
      name: pkg.name,
      manifestPath: pkg.manifest_path,
      dependencyPaths: pkg.dependencies
        .map((dep) => dep.path)
        .filter((p): p is string => typeof p === 'string'),
    }));
}

export async function readCargoMetadata(root: string): Promise<PackageRecord[]> {
  try {
    const { stdout } = await execa('cargo', ['metadata', '--format-version', '1', '--no-deps'], {
      cwd: root,
      stdio: 'pipe',
    });
    return parseCargoMetadata(stdout);
  } catch (error) {
    if (error instanceof ExecaError) {
      throw new WorkspaceError(`Unable to read workspace metadata in ${root}: ${describeFailure(error)}`, {
        root,
        stderr: error.stderr,
      });
    }
    throw error;
  }
}
