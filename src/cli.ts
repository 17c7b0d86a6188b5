export interface CliOptions {
  dryRun: boolean;
  help: boolean;
  unknown: string[];
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { dryRun: false, help: false, unknown: [] };
  for (const raw of argv) {
    const arg = raw.toLowerCase();
    if (arg === '--dry-run' || arg === '-n') {
      options.dryRun = true;
    } else if (arg === '-h' || arg === '--help' || arg === 'help') {
      options.help = true;
    } else {
      options.unknown.push(raw);
    }
  }
  return options;
}

export const HELP_TEXT = `
Usage:
  folder-albums [options]

Builds an Immich album from a folder of the external library: every asset the
server indexed under the folder (and its subfolders) is added to a new or an
existing album.

Options:
  -n, --dry-run    Simulate only; report what would be created or added
  -h, --help       Show this help menu

Environment (optional prompt defaults, also read from .env):
  IMMICH_HOST          Server address, e.g. 127.0.0.1:2283
  IMMICH_API_KEY       API key
  IMMICH_LIBRARY_ROOT  Local path of the library root
  IMMICH_TIMEOUT_MS    Request timeout in milliseconds (default 30000)
`.trim();
