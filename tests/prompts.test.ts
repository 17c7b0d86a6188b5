import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isPromptCancelled, validateLibraryRoot, validateNewAlbumName } from '../src/prompts.js';

describe('prompt validation', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'folder-albums-prompts-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('accepts an existing directory as library root', async () => {
    expect(await validateLibraryRoot(tempDir)).toBe(true);
  });

  it('rejects empty, missing and non-directory library roots', async () => {
    const missing = path.join(tempDir, 'missing');
    const file = path.join(tempDir, 'notes.txt');
    await fs.writeFile(file, 'hello');

    expect(await validateLibraryRoot('   ')).toBe('Path cannot be empty');
    expect(await validateLibraryRoot(missing)).toBe(`Path does not exist: ${missing}`);
    expect(await validateLibraryRoot(file)).toBe(`Path is not a directory: ${file}`);
  });

  it('requires a new album name that is not taken', () => {
    const existing = new Set(['Trip', 'Family']);
    expect(validateNewAlbumName('  ', existing)).toBe('Album name cannot be empty');
    expect(validateNewAlbumName(' Trip ', existing)).toBe("Album 'Trip' already exists, choose another name");
    expect(validateNewAlbumName('Summer', existing)).toBe(true);
  });
});

describe('isPromptCancelled', () => {
  it('recognises a force-closed prompt', () => {
    const error = new Error('User force closed the prompt with SIGINT');
    error.name = 'ExitPromptError';
    expect(isPromptCancelled(error)).toBe(true);
    expect(isPromptCancelled(new Error('boom'))).toBe(false);
    expect(isPromptCancelled('ExitPromptError')).toBe(false);
  });
});
