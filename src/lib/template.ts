import { Liquid, LiquidError, type Template } from 'liquidjs';
import { quote, split } from 'shlex';
import { excludedNames } from './closure.js';
import { EmptyCommandError, formatError, TemplateError, UnsupportedVariableError } from './errors.js';
import type { PackageIndex } from './packages.js';
import type { CommandLine } from '../types.js';

const PACKAGE_FLAGS = '{% for pkg in packages %} -p {{ pkg }} {% endfor %}';
const EXTRA_ARGS = '{% for arg in args %} {{ arg }} {% endfor %}';

export const BUILTIN_TEMPLATES: Record<string, string> = {
  test: `cargo test ${PACKAGE_FLAGS} ${EXTRA_ARGS}`,
  nextest: `cargo nextest run ${PACKAGE_FLAGS} ${EXTRA_ARGS}`,
  build: `cargo build ${PACKAGE_FLAGS} ${EXTRA_ARGS}`,
  bench: `cargo bench ${PACKAGE_FLAGS} ${EXTRA_ARGS}`,
};

export const TEMPLATE_VARIABLES = ['packages', 'excludes', 'args'] as const;
export type TemplateVariable = (typeof TEMPLATE_VARIABLES)[number];

const ALLOWED: ReadonlySet<string> = new Set(TEMPLATE_VARIABLES);

function isTemplateVariable(name: string): name is TemplateVariable {
  return ALLOWED.has(name);
}

const engine = new Liquid({ strictVariables: true, strictFilters: true });
engine.registerFilter('quote', (value: unknown) =>
  Array.isArray(value) ? value.map((v) => quote(String(v))).join(' ') : quote(String(value)),
);

// A template is a single command line; it never loads other files.
for (const tag of ['include', 'render', 'layout']) {
  engine.registerTag(tag, {
    parse() {
      throw new Error(`\`{% ${tag} %}\` is not supported in command templates`);
    },
    render() {
      return '';
    },
  });
}

function parseTemplate(template: string): Template[] {
  try {
    return engine.parse(template);
  } catch (error) {
    if (error instanceof LiquidError) {
      throw new TemplateError(`Invalid command template: ${error.message}`, { template });
    }
    throw error;
  }
}

export function templateVariables(template: string | Template[]): string[] {
  return engine.globalVariablesSync(typeof template === 'string' ? parseTemplate(template) : template);
}

/**
 * Render `template` with the three recognized bindings. Only variables the
 * template references are bound; anything outside the allow-list fails
 * before rendering.
 */
export function renderTemplate(
  template: string,
  index: PackageIndex,
  affectedNames: string[],
  args: string[],
): string {
  const parsed = parseTemplate(template);
  const scope: Partial<Record<TemplateVariable, string[]>> = {};
  for (const name of templateVariables(parsed)) {
    if (!isTemplateVariable(name)) throw new UnsupportedVariableError(name);
    switch (name) {
      case 'packages':
        scope.packages = [...affectedNames].sort();
        break;
      case 'excludes':
        scope.excludes = excludedNames(index, affectedNames);
        break;
      case 'args':
        scope.args = args;
        break;
    }
  }
  try {
    return String(engine.renderSync(parsed, scope));
  } catch (error) {
    if (error instanceof LiquidError) {
      throw new TemplateError(`Failed to render command template: ${error.message}`, { template });
    }
    throw error;
  }
}

/**
 * Split a rendered command into words. Only whitespace, quotes and
 * backslashes are special; `(`, `|`, `$` and friends stay literal because no
 * shell ever sees the command.
 */
export function splitCommand(rendered: string): CommandLine {
  let words: string[];
  try {
    words = split(rendered);
  } catch (error) {
    throw new TemplateError(`Unable to split rendered command: ${formatError(error)}`, { command: rendered });
  }
  const [program, ...rest] = words;
  if (program === undefined) throw new EmptyCommandError();
  return { program, args: rest };
}

export function renderCommand(
  template: string,
  index: PackageIndex,
  affectedNames: string[],
  args: string[],
): CommandLine {
  return splitCommand(renderTemplate(template, index, affectedNames, args));
}
