import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.webqa.yaml` (or JSON) config file.
 * Throws a descriptive error if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  const raw = await readFile(configPath, 'utf-8');
  return parseConfig(raw, configPath.endsWith('.json') ? 'json' : 'yaml');
}

export function parseConfig(raw: string, format: 'json' | 'yaml'): FileConfig {
  const parsed: unknown = format === 'json' ? JSON.parse(raw) : parseYaml(raw);
  return fileConfigSchema.parse(parsed);
}

// ── Cookie parsing ───────────────────────────────────────────

export interface SeedCookie {
  name: string;
  value: string;
  url: string;
}

/** Split a `name=value; other=value` header-style string into cookies for `url`. */
export function parseCookies(raw: string, url: string): SeedCookie[] {
  return raw
    .split(';')
    .map((pair) => {
      const eqIndex = pair.indexOf('=');
      if (eqIndex === -1) return null;
      const name = pair.slice(0, eqIndex).trim();
      const value = pair.slice(eqIndex + 1).trim();
      if (name.length === 0) return null;
      return { name, value, url };
    })
    .filter((c): c is SeedCookie => c !== null);
}
