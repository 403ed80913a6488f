import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { listCommand } from './commands/list.js';
import { runCommand } from './commands/run.js';
import type { WorkspaceOptions } from './lib/affected.js';
import { BUILTIN_TEMPLATES } from './lib/template.js';

type SharedOpts = {
  input?: string;
  since?: string;
  head?: string;
  files?: string;
  run: boolean;
  verbose?: boolean;
};

function withWorkspaceOptions(cmd: Command): Command {
  return cmd
    .option('-i, --input <dir>', 'Workspace root (default: current directory)')
    .option('--since <rev>', 'Base revision (default from config, else HEAD~1)')
    .option('--head <rev>', 'Head revision (default from config, else HEAD)')
    .option('--files <list>', 'Comma-separated changed files; skips git')
    .option('-v, --verbose', 'Print the changed files considered', false);
}

function workspaceOptions(opts: SharedOpts): WorkspaceOptions {
  const files = opts.files
    ? opts.files
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean)
    : undefined;
  return { input: opts.input, since: opts.since, head: opts.head, files, verbose: Boolean(opts.verbose) };
}

export function createProgram(): Command {
  const program = new Command();
  program
    .name('cargo-affected')
    .description('Select the workspace packages affected by a change and run commands on them')
    .version('0.1.0');

  program
    .command('init')
    .description('Create a starter affected.config.json')
    .option('-i, --input <dir>', 'Workspace root (default: current directory)')
    .action(async (opts: { input?: string }) => {
      await initCommand(opts.input);
    });

  withWorkspaceOptions(program.command('list'))
    .description('Print the affected packages')
    .option('--json', 'Emit JSON payload', false)
    .action(async (opts: SharedOpts & { json?: boolean }) => {
      await listCommand({ ...workspaceOptions(opts), json: Boolean(opts.json) });
    });

  withWorkspaceOptions(program.command('run'))
    .description('Run a command template against the affected packages, or print them')
    .option('-c, --command <template>', 'Command template using `packages`, `excludes` and `args`')
    .option('-t, --template <name>', 'Named template from config or built-ins')
    .option('--no-run', 'Print the command instead of running it')
    .argument('[args...]', 'Extra arguments, bound to `args`')
    .action(async (args: string[], opts: SharedOpts & { command?: string; template?: string }) => {
      process.exitCode = await runCommand({
        ...workspaceOptions(opts),
        command: opts.command,
        template: opts.template,
        run: opts.run,
        args,
      });
    });

  for (const name of Object.keys(BUILTIN_TEMPLATES)) {
    withWorkspaceOptions(program.command(name))
      .description(`Run \`cargo ${name}\` on the affected packages`)
      .option('--no-run', 'Print the command instead of running it')
      .argument('[args...]', 'Extra arguments passed to cargo')
      .action(async (args: string[], opts: SharedOpts) => {
        process.exitCode = await runCommand({ ...workspaceOptions(opts), template: name, run: opts.run, args });
      });
  }

  return program;
}

/** `cargo affected <cmd>` invokes the binary as `cargo-affected affected <cmd>`. */
export function normalizeArgv(argv: string[]): string[] {
  if (argv[2] === 'affected') return [...argv.slice(0, 2), ...argv.slice(3)];
  return argv;
}
