import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Dirent } from 'fs';

export interface WalkOptions {
  onError?: (dir: string, error: unknown) => void;
}

interface ChildDirectory {
  fullPath: string;
  isLink: boolean;
}

/**
 * Converts an absolute path to the library-relative path the server indexes
 * folders by. Paths outside the library root are returned unchanged.
 */
export function convertToServerPath(absPath: string, libraryRoot: string): string {
  if (!libraryRoot || !absPath.startsWith(libraryRoot)) {
    return absPath;
  }
  let relative = absPath.slice(libraryRoot.length);
  while (relative.startsWith(path.sep)) {
    relative = relative.slice(path.sep.length);
  }
  return relative;
}

export function expandHome(input: string): string {
  if (input === '~') {
    return os.homedir();
  }
  if (input.startsWith(`~${path.sep}`) || input.startsWith('~/')) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function resolveLibraryRoot(input: string): string {
  return path.resolve(expandHome(input.trim()));
}

export function resolveTargetPath(libraryRoot: string, input: string): string {
  return path.resolve(libraryRoot, expandHome(input.trim()));
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

async function readChildDirectories(dir: string, options: WalkOptions): Promise<ChildDirectory[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    options.onError?.(dir, error);
    return [];
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const children: ChildDirectory[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      children.push({ fullPath, isLink: false });
    } else if (entry.isSymbolicLink() && (await isDirectory(fullPath))) {
      children.push({ fullPath, isLink: true });
    }
  }
  return children;
}

async function walk(dir: string, out: string[], options: WalkOptions): Promise<void> {
  const children = await readChildDirectories(dir, options);
  for (const child of children) {
    out.push(child.fullPath);
  }
  for (const child of children) {
    // Linked directories are reported but not entered, which keeps link loops finite.
    if (!child.isLink) {
      await walk(child.fullPath, out, options);
    }
  }
}

/**
 * Lists every directory below `rootDir`, top-down: a directory's children
 * (sorted by name) come before any of their own descendants.
 */
export async function listSubdirectories(rootDir: string, options: WalkOptions = {}): Promise<string[]> {
  const subdirs: string[] = [];
  await walk(rootDir, subdirs, options);
  return subdirs;
}

export function describeFsError(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return error instanceof Error ? error.message : String(error);
}
