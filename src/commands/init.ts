import fs from 'fs-extra';
import path from 'path';
import { CONFIG_FILE, DEFAULT_EXTENSIONS, DEFAULT_HEAD, DEFAULT_SINCE } from '../lib/config.js';
import type { AffectedConfig } from '../types.js';

export async function initCommand(root = process.cwd()) {
  const p = path.join(root, CONFIG_FILE);
  const exists = await fs.pathExists(p);
  if (exists) {
    console.log(`${CONFIG_FILE} already exists.`);
    return;
  }
  const cfg: AffectedConfig = {
    since: DEFAULT_SINCE,
    head: DEFAULT_HEAD,
    extensions: DEFAULT_EXTENSIONS,
    templates: {
      clippy: 'cargo clippy {% for pkg in packages %} -p {{ pkg }} {% endfor %} {% for arg in args %} {{ arg }} {% endfor %}',
    },
  };
  await fs.writeFile(p, JSON.stringify(cfg, null, 2) + '\n', 'utf8');
  console.log(`Created ${CONFIG_FILE}`);
}
