import fs from 'fs/promises';
import path from 'path';

export function parseDotEnv(content: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    const idx = trimmed.indexOf('=');
    if (idx <= 0) {
      continue;
    }
    const key = trimmed.slice(0, idx).replace(/^export\s+/, '').trim();
    let value = trimmed.slice(idx + 1).trim();
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    values[key] = value;
  }
  return values;
}

/**
 * Copies `.env` entries into `env` without overriding what is already set.
 * Returns the keys it applied.
 */
export async function loadDotEnv(
  envPath: string = path.join(process.cwd(), '.env'),
  env: NodeJS.ProcessEnv = process.env
): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(envPath, 'utf-8');
  } catch {
    return [];
  }

  const applied: string[] = [];
  for (const [key, value] of Object.entries(parseDotEnv(content))) {
    if (!env[key]) {
      env[key] = value;
      applied.push(key);
    }
  }
  return applied;
}
