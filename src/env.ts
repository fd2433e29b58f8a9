import { readFileSync, existsSync } from 'node:fs';
import path from 'node:path';

/**
 * Minimal .env loader (no external deps).
 *
 * - Reads KEY=VALUE lines, with an optional leading `export `
 * - Ignores comments, empty lines and empty values
 * - Never overrides keys already present in the target env
 */
export function loadEnvFiles(
  filenames: string[] = ['.env', '.env.local'],
  cwd: string = process.cwd(),
  target: NodeJS.ProcessEnv = process.env,
): { loaded: string[]; keys: string[] } {
  const loaded: string[] = [];
  const keys: string[] = [];

  for (const name of filenames) {
    const filePath = path.join(cwd, name);
    if (!existsSync(filePath)) continue;

    for (const [key, value] of parseEnv(readFileSync(filePath, 'utf8'))) {
      if (target[key] !== undefined) continue;
      target[key] = value;
      keys.push(key);
    }

    loaded.push(name);
  }

  return { loaded, keys };
}

export function parseEnv(raw: string): Array<[string, string]> {
  const out: Array<[string, string]> = [];

  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim().replace(/^export\s+/, '');
    if (!trimmed || trimmed.startsWith('#')) continue;

    const eq = trimmed.indexOf('=');
    if (eq === -1) continue;
    const key = trimmed.slice(0, eq).trim();
    let value = trimmed.slice(eq + 1).trim();

    const quoted =
      (value.startsWith('"') && value.endsWith('"') && value.length > 1) ||
      (value.startsWith("'") && value.endsWith("'") && value.length > 1);
    if (quoted) {
      value = value.slice(1, -1);
    } else {
      // unquoted values may carry a trailing ` # comment`
      const hash = value.indexOf(' #');
      if (hash !== -1) value = value.slice(0, hash).trim();
    }

    if (!key || !value) continue;
    out.push([key, value]);
  }

  return out;
}
