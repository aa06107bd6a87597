import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

export const DEFAULT_ENV_FILE_PATHS = [resolve(process.cwd(), '.env')];

export function parseEnvLine(line: string): { key: string; value: string } | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#')) return null;
  const body = trimmed.startsWith('export ') ? trimmed.slice('export '.length) : trimmed;
  const idx = body.indexOf('=');
  if (idx <= 0) return null;
  const key = body.slice(0, idx).trim();
  if (!key) return null;
  let value = body.slice(idx + 1).trim();
  if (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'")))
  ) {
    value = value.slice(1, -1);
  }
  return { key, value };
}

/**
 * Seed process.env from the first env file found. Variables already set win.
 * Returns the path that was loaded, or null.
 */
export function loadEnvFile(
  paths: string[] = DEFAULT_ENV_FILE_PATHS,
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  const envPath = paths.find((path) => existsSync(path));
  if (!envPath) return null;

  const contents = readFileSync(envPath, 'utf-8');
  for (const line of contents.split(/\r?\n/)) {
    const parsed = parseEnvLine(line);
    if (!parsed) continue;
    if (env[parsed.key] !== undefined) continue;
    env[parsed.key] = parsed.value;
  }

  return envPath;
}
