import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { afterEach, describe, expect, it } from 'vitest';
import { parseArgs } from '../src/cli.js';
import { buildApiBaseUrl, buildHeaders, hostHasPort, maskApiKey, readEnvDefaults } from '../src/config.js';
import { parseDotEnv, readDotEnv } from '../src/env.js';

describe('config', () => {
  it('builds the API base URL from what the user typed', () => {
    expect(buildApiBaseUrl('127.0.0.1:2283')).toBe('http://127.0.0.1:2283/api');
    expect(buildApiBaseUrl(' https://photos.test/ ')).toBe('https://photos.test/api');
    expect(buildApiBaseUrl('http://nas.local:2283/api')).toBe('http://nas.local:2283/api');
  });

  it('builds request headers', () => {
    expect(buildHeaders('test-key')).toEqual({ 'x-api-key': 'test-key', 'Content-Type': 'application/json' });
  });

  it('masks all but the last four characters of the key', () => {
    expect(maskApiKey('test-secret')).toBe('*******cret');
    expect(maskApiKey('abc')).toBe('***');
  });

  it('checks for a port separator', () => {
    expect(hostHasPort('127.0.0.1:2283')).toBe(true);
    expect(hostHasPort('http://nas.local')).toBe(false);
    expect(hostHasPort('nas.local')).toBe(false);
  });

  it('reads prompt defaults from the environment', () => {
    expect(readEnvDefaults({})).toEqual({
      host: '127.0.0.1:2283',
      apiKey: undefined,
      libraryRoot: undefined,
      timeoutMs: 30000
    });
    expect(
      readEnvDefaults({
        IMMICH_HOST: 'nas.local:2283',
        IMMICH_API_KEY: 'test-key',
        IMMICH_LIBRARY_ROOT: '/mnt/photos',
        IMMICH_TIMEOUT_MS: '5000'
      })
    ).toEqual({ host: 'nas.local:2283', apiKey: 'test-key', libraryRoot: '/mnt/photos', timeoutMs: 5000 });
    expect(readEnvDefaults({ IMMICH_TIMEOUT_MS: 'soon' }).timeoutMs).toBe(30000);
  });
});

describe('env', () => {
  let tempDir: string | undefined;

  afterEach(async () => {
    if (tempDir) {
      await fs.rm(tempDir, { recursive: true, force: true });
      tempDir = undefined;
    }
  });

  it('keeps only IMMICH_ assignments and strips quotes', () => {
    const content = [
      '# IMMICH_LIBRARY_ROOT=/commented/out',
      '',
      'IMMICH_HOST="nas.local:2283"',
      "IMMICH_API_KEY = 'test-key'",
      'export IMMICH_TIMEOUT_MS=5000  ',
      'OTHER_SETTING=1',
      'IMMICH_BROKEN'
    ].join('\n');
    expect(parseDotEnv(content)).toEqual({
      IMMICH_HOST: 'nas.local:2283',
      IMMICH_API_KEY: 'test-key',
      IMMICH_TIMEOUT_MS: '5000'
    });
  });

  it('reads .env without touching process.env', async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'folder-albums-env-'));
    await fs.writeFile(path.join(tempDir, '.env'), 'IMMICH_LIBRARY_ROOT=/mnt/folder-albums-test\n', 'utf8');
    const before = process.env.IMMICH_LIBRARY_ROOT;

    expect(await readDotEnv(tempDir)).toEqual({ IMMICH_LIBRARY_ROOT: '/mnt/folder-albums-test' });
    expect(process.env.IMMICH_LIBRARY_ROOT).toBe(before);
  });

  it('lets shell variables override .env values', () => {
    const fileEnv = parseDotEnv('IMMICH_HOST=file.local:2283\nIMMICH_API_KEY=test-key\n');
    const defaults = readEnvDefaults({ ...fileEnv, IMMICH_HOST: 'shell.local:2283' });
    expect(defaults.host).toBe('shell.local:2283');
    expect(defaults.apiKey).toBe('test-key');
  });

  it('returns nothing when there is no .env file', async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'folder-albums-env-'));
    expect(await readDotEnv(tempDir)).toEqual({});
  });
});

describe('parseArgs', () => {
  it('recognises the dry-run and help flags', () => {
    expect(parseArgs([])).toEqual({ dryRun: false, help: false, unknown: [] });
    expect(parseArgs(['--dry-run'])).toEqual({ dryRun: true, help: false, unknown: [] });
    expect(parseArgs(['-n', '--HELP'])).toEqual({ dryRun: true, help: true, unknown: [] });
  });

  it('collects unknown arguments', () => {
    expect(parseArgs(['--force', 'x'])).toEqual({ dryRun: false, help: false, unknown: ['--force', 'x'] });
  });
});
