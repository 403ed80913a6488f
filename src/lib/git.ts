import { execa, ExecaError } from 'execa';
import path from 'path';
import { WorkspaceError } from './errors.js';
import { describeFailure } from './exec.js';

export function isConsidered(file: string, extensions: string[]): boolean {
  const ext = path.extname(file).slice(1).toLowerCase();
  if (!ext) return false;
  return extensions.includes(ext);
}

export function filterSourceFiles(files: string[], extensions: string[]): string[] {
  return files.filter((f) => isConsidered(f, extensions));
}

/**
 * Files that differ between `base` and `head`, relative to `root`. Files
 * outside `root` are left out by git itself.
 */
export async function getChangedFiles(root: string, base: string, head: string): Promise<string[]> {
  try {
    const { stdout } = await execa('git', ['diff', '--name-only', '--relative', base, head], {
      cwd: root,
      stdio: 'pipe',
    });
    return stdout.split('\n').filter(Boolean);
  } catch (error) {
    if (error instanceof ExecaError) {
      throw new WorkspaceError(`Unable to diff ${base}..${head} in ${root}: ${describeFailure(error)}`, {
        root,
        base,
        head,
        stderr: error.stderr,
      });
    }
    throw error;
  }
}
