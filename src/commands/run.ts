import { formatPackageFlags, resolveAffected, type WorkspaceOptions } from '../lib/affected.js';
import { ConfigError } from '../lib/errors.js';
import { formatCommandLine, runCommandLine } from '../lib/exec.js';
import { BUILTIN_TEMPLATES, renderCommand } from '../lib/template.js';

export type RunOptions = WorkspaceOptions & {
  command?: string;
  template?: string;
  run?: boolean;
  args?: string[];
};

function lookup(templates: Record<string, string>, name: string): string | undefined {
  return Object.hasOwn(templates, name) ? templates[name] : undefined;
}

function pickTemplate(opts: RunOptions, templates: Record<string, string>): string | undefined {
  if (opts.command) return opts.command;
  if (!opts.template) return undefined;
  const named = lookup(templates, opts.template) ?? lookup(BUILTIN_TEMPLATES, opts.template);
  if (named === undefined) {
    const known = [...new Set([...Object.keys(BUILTIN_TEMPLATES), ...Object.keys(templates)])].sort();
    throw new ConfigError(`Unknown template \`${opts.template}\`. Known templates: ${known.join(', ')}`);
  }
  return named;
}

/**
 * Resolve the affected packages and either print them or run the rendered
 * command. Resolves to the exit code the process should report.
 */
export async function runCommand(opts: RunOptions): Promise<number> {
  const res = await resolveAffected(opts);
  const template = pickTemplate(opts, res.cfg.templates);

  if (template === undefined) {
    console.log(formatPackageFlags(res.affected.names));
    return 0;
  }

  const cmd = renderCommand(template, res.index, res.affected.names, opts.args ?? []);
  if (opts.run === false) {
    console.log(formatCommandLine(cmd));
    return 0;
  }
  return runCommandLine(cmd, res.root);
}
