import inquirer from 'inquirer';
import chalk from 'chalk';
import { hostHasPort } from './config.js';
import { isDirectory, pathExists, resolveLibraryRoot, resolveTargetPath } from './libraryPaths.js';
import type { Album, AlbumSelection } from './types.js';

const CREATE_NEW_ALBUM = -1;

/**
 * Ctrl-C inside a prompt surfaces as a rejected promise on newer inquirer
 * releases; callers treat it as a clean abort.
 */
export function isPromptCancelled(error: unknown): boolean {
  return error instanceof Error && (error.name === 'ExitPromptError' || error.name === 'AbortPromptError');
}

export async function confirm(message: string, defaultValue = false): Promise<boolean> {
  const { answer } = await inquirer.prompt<{ answer: boolean }>([
    {
      type: 'confirm',
      name: 'answer',
      message: chalk.bold(message),
      default: defaultValue
    }
  ]);
  return answer;
}

export async function promptHost(defaultHost: string): Promise<string> {
  let host = '';
  let accepted = false;
  while (!accepted) {
    const answers = await inquirer.prompt<{ host: string }>([
      {
        type: 'input',
        name: 'host',
        message: chalk.bold('Immich server address:'),
        default: defaultHost,
        prefix: '🌐',
        filter: (input: string) => input.trim()
      }
    ]);
    host = answers.host || defaultHost;
    accepted = hostHasPort(host);
    if (!accepted) {
      console.log(chalk.yellow(`Warning: the address may be malformed, expected IP:port (e.g. ${defaultHost})`));
      accepted = await confirm('Continue with this address?');
    }
  }
  return host;
}

export async function promptApiKey(fallbackKey?: string): Promise<string> {
  const { apiKey } = await inquirer.prompt<{ apiKey: string }>([
    {
      type: 'password',
      name: 'apiKey',
      mask: '*',
      message: chalk.bold(
        fallbackKey ? 'Immich API key (leave blank to use IMMICH_API_KEY):' : 'Immich API key:'
      ),
      prefix: '🔑',
      validate: (input: string) => Boolean(input.trim() || fallbackKey) || 'API key cannot be empty'
    }
  ]);
  return apiKey.trim() || fallbackKey || '';
}

export async function validateLibraryRoot(input: string): Promise<true | string> {
  if (!input.trim()) {
    return 'Path cannot be empty';
  }
  const fullPath = resolveLibraryRoot(input);
  if (!(await pathExists(fullPath))) {
    return `Path does not exist: ${fullPath}`;
  }
  if (!(await isDirectory(fullPath))) {
    return `Path is not a directory: ${fullPath}`;
  }
  return true;
}

export async function promptLibraryRoot(defaultRoot?: string): Promise<string> {
  const { libraryRoot } = await inquirer.prompt<{ libraryRoot: string }>([
    {
      type: 'input',
      name: 'libraryRoot',
      message: chalk.bold('Library root (the folder Immich imports from):'),
      default: defaultRoot,
      prefix: '📁',
      validate: validateLibraryRoot
    }
  ]);
  return resolveLibraryRoot(libraryRoot);
}

export function validateNewAlbumName(input: string, existingNames: ReadonlySet<string>): true | string {
  const name = input.trim();
  if (!name) {
    return 'Album name cannot be empty';
  }
  if (existingNames.has(name)) {
    return `Album '${name}' already exists, choose another name`;
  }
  return true;
}

export async function promptNewAlbumName(existingNames: ReadonlySet<string>): Promise<string> {
  const { albumName } = await inquirer.prompt<{ albumName: string }>([
    {
      type: 'input',
      name: 'albumName',
      message: chalk.bold('New album name:'),
      prefix: '🆕',
      validate: (input: string) => validateNewAlbumName(input, existingNames)
    }
  ]);
  return albumName.trim();
}

export function formatAlbumChoice(album: Album): string {
  return `${album.albumName || 'Untitled album'} ${chalk.dim(`(${album.assetCount} assets)`)}`;
}

export async function selectAlbum(albums: Album[]): Promise<AlbumSelection> {
  const { choice } = await inquirer.prompt<{ choice: number }>([
    {
      type: 'list',
      name: 'choice',
      message: chalk.bold(`Select an album (${albums.length} found):`),
      prefix: '🖼️',
      pageSize: 15,
      choices: [
        { name: chalk.green('➕  Create new album'), value: CREATE_NEW_ALBUM },
        new inquirer.Separator(),
        ...albums.map((album, idx) => ({ name: formatAlbumChoice(album), value: idx }))
      ]
    }
  ]);

  const album = albums[choice];
  if (choice === CREATE_NEW_ALBUM || !album) {
    const albumName = await promptNewAlbumName(new Set(albums.map(a => a.albumName)));
    return { kind: 'create', albumName };
  }
  return { kind: 'existing', album };
}

export async function promptTargetPath(libraryRoot: string): Promise<string> {
  const { target } = await inquirer.prompt<{ target: string }>([
    {
      type: 'input',
      name: 'target',
      message: chalk.bold(`Path to add, relative to the library root:\n${chalk.dim(`${libraryRoot}/`)}`),
      prefix: '📂',
      validate: async (input: string) => {
        if (!input.trim()) {
          return 'Path cannot be empty';
        }
        const fullPath = resolveTargetPath(libraryRoot, input);
        return (await pathExists(fullPath)) || `Path does not exist: ${fullPath}`;
      }
    }
  ]);
  return resolveTargetPath(libraryRoot, target);
}
