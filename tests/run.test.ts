import fs from 'fs-extra';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test, vi, type MockInstance } from 'vitest';

const { execaMock, FakeExecaError } = vi.hoisted(() => {
  class FakeExecaError extends Error {
    shortMessage: string;
    exitCode?: number;
    signal?: string;
    code?: string;
    constructor(shortMessage: string, fields: { exitCode?: number; signal?: string; code?: string } = {}) {
      super(shortMessage);
      this.shortMessage = shortMessage;
      this.exitCode = fields.exitCode;
      this.signal = fields.signal;
      this.code = fields.code;
    }
  }
  return {
    execaMock: vi.fn<(file: string, args: string[], options?: object) => Promise<{ stdout?: string; exitCode?: number }>>(),
    FakeExecaError,
  };
});

vi.mock('execa', () => ({ execa: execaMock, ExecaError: FakeExecaError }));

import { createProgram, normalizeArgv } from '../src/cli.js';
import { listCommand } from '../src/commands/list.js';
import { runCommand } from '../src/commands/run.js';
import { CONFIG_FILE } from '../src/lib/config.js';
import { ConfigError, SpawnError, UnsupportedVariableError } from '../src/lib/errors.js';
import { cargoMetadataJson } from './helpers/workspace.js';

let root: string;
let log: MockInstance<typeof console.log>;

// app -> core, tools depends on something outside the workspace
const metadata = () =>
  cargoMetadataJson(root, [
    { name: 'app', deps: [{ name: 'core', path: join(root, 'core') }, { name: 'anyhow' }] },
    { name: 'core' },
    { name: 'tools', deps: [{ name: 'patched', path: '/opt/vendor/patched' }] },
  ]);

function respond(diff = '') {
  execaMock.mockImplementation(async (file, args) => {
    if (file === 'cargo' && args[0] === 'metadata') return { stdout: metadata() };
    if (file === 'git') return { stdout: diff };
    return { exitCode: 0 };
  });
}

function childCalls() {
  return execaMock.mock.calls.filter(([file, args]) => file !== 'git' && args[0] !== 'metadata');
}

beforeAll(async () => {
  root = await mkdtemp(join(tmpdir(), 'cargo-affected-run-'));
});

afterAll(async () => {
  await fs.remove(root);
});

beforeEach(() => {
  execaMock.mockReset();
  log = vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe('runCommand', () => {
  test('prints -p flags when no template is given', async () => {
    respond();

    await expect(runCommand({ input: root, files: ['core/src/lib.rs'] })).resolves.toBe(0);
    expect(log).toHaveBeenCalledWith('-p app -p core');
    expect(childCalls()).toEqual([]);
  });

  test('reports when nothing is affected', async () => {
    respond();

    await runCommand({ input: root, files: ['README.md', 'docs/notes.txt'] });
    expect(log).toHaveBeenCalledWith('No packages affected');
  });

  test('diffs the last commit by default', async () => {
    respond('tools/src/main.rs\nREADME.md\n');

    await runCommand({ input: root });
    expect(execaMock).toHaveBeenCalledWith('git', ['diff', '--name-only', '--relative', 'HEAD~1', 'HEAD'], {
      cwd: root,
      stdio: 'pipe',
    });
    expect(log).toHaveBeenCalledWith('-p tools');
  });

  test('runs the rendered built-in template with inherited stdio', async () => {
    respond();

    const code = await runCommand({ input: root, files: ['core/src/lib.rs'], template: 'test', args: ['--', '--nocapture'] });

    expect(code).toBe(0);
    expect(childCalls()).toEqual([
      ['cargo', ['test', '-p', 'app', '-p', 'core', '--', '--nocapture'], { cwd: root, stdio: 'inherit' }],
    ]);
  });

  test('prints the command instead of running it with run disabled', async () => {
    respond();

    await runCommand({
      input: root,
      files: ['core/src/lib.rs'],
      command: 'cargo test --workspace {% for pkg in excludes %} --exclude {{ pkg }} {% endfor %}',
      run: false,
    });

    expect(log).toHaveBeenCalledWith('cargo test --workspace --exclude tools');
    expect(childCalls()).toEqual([]);
  });

  test("propagates the child's exit status", async () => {
    respond();
    execaMock.mockImplementation(async (file, args) => {
      if (args[0] === 'metadata') return { stdout: metadata() };
      throw new FakeExecaError('Command failed with exit code 101', { exitCode: 101 });
    });

    await expect(runCommand({ input: root, files: ['core/src/lib.rs'], template: 'build' })).resolves.toBe(101);
  });

  test('reports a program that cannot be started', async () => {
    execaMock.mockImplementation(async (file, args) => {
      if (args[0] === 'metadata') return { stdout: metadata() };
      throw new FakeExecaError('Command failed with ENOENT', { code: 'ENOENT' });
    });

    const result = runCommand({ input: root, files: ['core/src/lib.rs'], command: 'nope {{ packages | join: " " }}' });
    await expect(result).rejects.toThrow(SpawnError);
    await expect(result).rejects.toThrow('Failed to start `nope`: ENOENT');
  });

  test('unsupported variables fail before anything is spawned', async () => {
    respond();

    await expect(
      runCommand({ input: root, files: ['core/src/lib.rs'], command: 'cargo test {{ unknown }}' }),
    ).rejects.toThrow(UnsupportedVariableError);
    expect(childCalls()).toEqual([]);
  });

  test('named templates come from the config file', async () => {
    respond();
    await fs.writeJSON(join(root, CONFIG_FILE), {
      templates: { check: 'cargo check {% for pkg in packages %} -p {{ pkg }} {% endfor %}' },
    });

    try {
      await runCommand({ input: root, files: ['app/src/main.rs'], template: 'check', run: false });
      expect(log).toHaveBeenCalledWith('cargo check -p app');
      await expect(runCommand({ input: root, files: [], template: 'lint' })).rejects.toThrow(ConfigError);
    } finally {
      await fs.remove(join(root, CONFIG_FILE));
    }
  });
});

describe('listCommand', () => {
  test('emits a JSON payload', async () => {
    respond();

    await listCommand({ input: root, files: ['core/src/lib.rs', 'core/README.md'], json: true });

    expect(log).toHaveBeenCalledTimes(1);
    const printed: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(printed).toEqual({
      root,
      changedFiles: ['core/src/lib.rs'],
      affected: ['app', 'core'],
      excluded: ['tools'],
    });
  });
});

describe('createProgram', () => {
  test('renders a custom command with --no-run', async () => {
    respond();

    await createProgram().parseAsync([
      'node',
      'cargo-affected',
      'run',
      '-i',
      root,
      '--files',
      'core/src/lib.rs',
      '-c',
      'echo {% for pkg in packages %}{{ pkg }} {% endfor %}',
      '--no-run',
    ]);

    expect(log).toHaveBeenCalledWith('echo app core');
    expect(process.exitCode).toBe(0);
  });

  test('forwards arguments after -- to built-in templates', async () => {
    respond();

    await createProgram().parseAsync(
      normalizeArgv(['node', 'cargo-affected', 'affected', 'test', '-i', root, '--files', 'app/src/main.rs', '--no-run', '--', '--nocapture']),
    );

    expect(log).toHaveBeenCalledWith('cargo test -p app --nocapture');
  });

  test('sets the exit code from the child', async () => {
    execaMock.mockImplementation(async (file, args) => {
      if (args[0] === 'metadata') return { stdout: metadata() };
      throw new FakeExecaError('Command failed with exit code 3', { exitCode: 3 });
    });

    await createProgram().parseAsync(['node', 'cargo-affected', 'nextest', '-i', root, '--files', 'core/src/lib.rs']);

    expect(process.exitCode).toBe(3);
  });
});

describe('normalizeArgv', () => {
  test('drops the cargo subcommand name', () => {
    expect(normalizeArgv(['node', 'bin', 'affected', 'list'])).toEqual(['node', 'bin', 'list']);
    expect(normalizeArgv(['node', 'bin', 'list'])).toEqual(['node', 'bin', 'list']);
  });
});
