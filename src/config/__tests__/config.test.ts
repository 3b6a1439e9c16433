import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  getAuthToken,
  getConfigPath,
  getTokenFromEnv,
  readConfig,
  resolveSettings
} from '../config';
import { ConfigError } from '../../lib/errors';
import { createCapturedLogger } from '../../test/helpers/fakes';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gh-graft-config-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeFile(name: string, body: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, body, 'utf8');
  return file;
}

describe('getConfigPath', () => {
  it('should point at config.json', () => {
    expect(path.basename(getConfigPath())).toBe('config.json');
  });
});

describe('readConfig', () => {
  it('should read and validate the config file', () => {
    const file = writeFile('config.json', JSON.stringify({
      token: 'test-secret',
      sourceBranch: 'trunk',
      newBranch: 'develop',
      logLevel: 'warn',
      unknownKey: 1
    }));

    expect(readConfig(file)).toEqual({
      token: 'test-secret',
      sourceBranch: 'trunk',
      newBranch: 'develop',
      logLevel: 'warn'
    });
  });

  it('should return empty config when the file does not exist', () => {
    const { logger, lines } = createCapturedLogger();

    expect(readConfig(path.join(dir, 'missing.json'), logger)).toEqual({});
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('DEBUG test: Failed to read config file');
  });

  it('should return empty config for invalid JSON', () => {
    const file = writeFile('broken.json', '{ not json');

    expect(readConfig(file)).toEqual({});
  });

  it('should return empty config when the shape is wrong', () => {
    const { logger, lines } = createCapturedLogger();
    const file = writeFile('wrong.json', JSON.stringify({ logLevel: 'chatty' }));

    expect(readConfig(file, logger)).toEqual({});
    expect(lines[0]).toContain('DEBUG test: Ignoring invalid config file');
  });
});

describe('getTokenFromEnv', () => {
  it('should prefer GH_ACCESS_TOKEN, then GITHUB_TOKEN, then GH_TOKEN', () => {
    expect(getTokenFromEnv({ GH_ACCESS_TOKEN: 'a', GITHUB_TOKEN: 'b', GH_TOKEN: 'c' })).toBe('a');
    expect(getTokenFromEnv({ GITHUB_TOKEN: 'b', GH_TOKEN: 'c' })).toBe('b');
    expect(getTokenFromEnv({ GH_TOKEN: 'c' })).toBe('c');
    expect(getTokenFromEnv({ GH_ACCESS_TOKEN: '' })).toBeUndefined();
  });
});

describe('getAuthToken', () => {
  it('should fall back to the config file token', () => {
    expect(getAuthToken({}, { token: 'from-file' })).toBe('from-file');
    expect(getAuthToken({ GH_TOKEN: 'from-env' }, { token: 'from-file' })).toBe('from-env');
  });

  it('should fail fast when no token is available', () => {
    expect(() => getAuthToken({}, {})).toThrow(ConfigError);
    expect(() => getAuthToken({}, {})).toThrow(/GH_ACCESS_TOKEN/);
  });
});

describe('resolveSettings', () => {
  it('should use defaults when nothing is configured', () => {
    expect(resolveSettings({}, {})).toEqual({
      sourceBranch: 'master',
      newBranch: 'main',
      logLevel: 'info'
    });
  });

  it('should take branches from the config file', () => {
    expect(resolveSettings({}, { sourceBranch: 'trunk', newBranch: 'develop' })).toEqual({
      sourceBranch: 'trunk',
      newBranch: 'develop',
      logLevel: 'info'
    });
  });

  it('should let the environment override the log level', () => {
    expect(resolveSettings({ GH_GRAFT_LOG_LEVEL: 'DEBUG' }, { logLevel: 'error' }).logLevel).toBe('debug');
    expect(resolveSettings({ GH_GRAFT_LOG_LEVEL: 'loud' }, { logLevel: 'error' }).logLevel).toBe('error');
  });
});
