import fs from 'fs/promises';
import path from 'path';

// Only the variables the prompts take defaults from; `export` prefixes are allowed.
const IMMICH_ASSIGNMENT = /^\s*(?:export\s+)?(IMMICH_[A-Z0-9_]+)\s*=\s*(.*?)\s*$/;

function unquote(raw: string): string {
  const quote = raw.charAt(0);
  if ((quote === '"' || quote === "'") && raw.length >= 2 && raw.endsWith(quote)) {
    return raw.slice(1, -1);
  }
  return raw;
}

export function parseDotEnv(content: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const match = IMMICH_ASSIGNMENT.exec(line);
    if (match) {
      values[match[1]] = unquote(match[2]);
    }
  }
  return values;
}

/**
 * Reads the `IMMICH_*` assignments of `<cwd>/.env`. A missing file yields no
 * values; `process.env` is left untouched.
 */
export async function readDotEnv(cwd: string = process.cwd()): Promise<Record<string, string>> {
  try {
    return parseDotEnv(await fs.readFile(path.join(cwd, '.env'), 'utf-8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }
}
