import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ConfigError, formatError } from './errors.js';
import type { AffectedConfig } from '../types.js';

export const CONFIG_FILE = 'affected.config.json';
export const DEFAULT_SINCE = 'HEAD~1';
export const DEFAULT_HEAD = 'HEAD';
export const DEFAULT_EXTENSIONS = ['rs', 'c', 'cpp', 'h', 'hpp', 'cc', 'cxx', 'toml'];

const Schema = z
  .object({
    since: z.string().min(1).optional(),
    head: z.string().min(1).optional(),
    extensions: z.array(z.string().min(1)).optional(),
    templates: z.record(z.string()).optional(),
  })
  .strict();

export type ResolvedConfig = Required<AffectedConfig>;

export function resolveConfig(cfg: AffectedConfig = {}): ResolvedConfig {
  return {
    since: cfg.since ?? DEFAULT_SINCE,
    head: cfg.head ?? DEFAULT_HEAD,
    extensions: (cfg.extensions ?? DEFAULT_EXTENSIONS).map((ext) => ext.replace(/^\./, '').toLowerCase()),
    templates: cfg.templates ?? {},
  };
}

export async function loadConfig(root = process.cwd()): Promise<ResolvedConfig> {
  const p = path.join(root, CONFIG_FILE);
  const exists = await fs.pathExists(p);
  if (!exists) return resolveConfig();
  const json = await fs.readFile(p, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new ConfigError(`${CONFIG_FILE} is not valid JSON: ${formatError(error)}`, { path: p });
  }
  const result = Schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '<root>';
      return `${where}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid ${CONFIG_FILE}: ${issues.join('; ')}`, { path: p });
  }
  return resolveConfig(result.data);
}
