import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  VALID_THEMES,
  abbreviateHomePath,
  getConfigPath,
  isValidPageSize,
  isValidTheme,
  loadConfig,
} from './config.js';

describe('isValidTheme', () => {
  it('returns true for all themes in VALID_THEMES', () => {
    for (const theme of VALID_THEMES) {
      expect(isValidTheme(theme)).toBe(true);
    }
  });

  it('returns false for invalid theme strings', () => {
    expect(isValidTheme('invalid')).toBe(false);
    expect(isValidTheme('Dark')).toBe(false); // case sensitive
    expect(isValidTheme('')).toBe(false);
    expect(isValidTheme('dark ')).toBe(false);
  });

  it('returns false for non-string inputs', () => {
    expect(isValidTheme(null)).toBe(false);
    expect(isValidTheme(undefined)).toBe(false);
    expect(isValidTheme(123)).toBe(false);
    expect(isValidTheme({})).toBe(false);
  });
});

describe('isValidPageSize', () => {
  it('accepts integers within bounds', () => {
    expect(isValidPageSize(1)).toBe(true);
    expect(isValidPageSize(20)).toBe(true);
    expect(isValidPageSize(200)).toBe(true);
  });

  it('rejects everything else', () => {
    expect(isValidPageSize(0)).toBe(false);
    expect(isValidPageSize(201)).toBe(false);
    expect(isValidPageSize(2.5)).toBe(false);
    expect(isValidPageSize('20')).toBe(false);
    expect(isValidPageSize(Number.NaN)).toBe(false);
  });
});

describe('getConfigPath', () => {
  it('prefers STASHDECK_CONFIG', () => {
    expect(getConfigPath({ STASHDECK_CONFIG: '/tmp/custom.json' })).toBe('/tmp/custom.json');
  });

  it('defaults to the user config directory', () => {
    expect(getConfigPath({})).toBe(
      path.join(os.homedir(), '.config', 'stashdeck', 'config.json')
    );
  });
});

describe('loadConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stashdeck-config-'));
    configPath = path.join(dir, 'config.json');
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults when the file does not exist', () => {
    expect(loadConfig({ STASHDECK_CONFIG: configPath })).toEqual({
      theme: 'dark',
      pageSize: 20,
      debug: false,
    });
  });

  it('reads values from the file', () => {
    fs.writeFileSync(configPath, JSON.stringify({ theme: 'light', pageSize: 40, debug: true }));

    expect(loadConfig({ STASHDECK_CONFIG: configPath })).toEqual({
      theme: 'light',
      pageSize: 40,
      debug: true,
    });
  });

  it('ignores invalid values', () => {
    fs.writeFileSync(configPath, JSON.stringify({ theme: 'neon', pageSize: -3, debug: 'yes' }));

    expect(loadConfig({ STASHDECK_CONFIG: configPath })).toEqual({
      theme: 'dark',
      pageSize: 20,
      debug: false,
    });
  });

  it('warns about malformed JSON and falls back to defaults', () => {
    fs.writeFileSync(configPath, '{ not json');

    const config = loadConfig({ STASHDECK_CONFIG: configPath });

    expect(config.theme).toBe('dark');
    expect(process.stderr.write).toHaveBeenCalledTimes(1);
  });

  it('warns when the file is not an object', () => {
    fs.writeFileSync(configPath, '[1, 2]');

    loadConfig({ STASHDECK_CONFIG: configPath });

    expect(process.stderr.write).toHaveBeenCalledWith(
      `[stashdeck warn] Ignoring ${configPath}: expected a JSON object\n`
    );
  });

  it('lets the environment override the file', () => {
    fs.writeFileSync(configPath, JSON.stringify({ theme: 'light', pageSize: 40 }));

    const config = loadConfig({
      STASHDECK_CONFIG: configPath,
      STASHDECK_THEME: 'dark-ansi',
      STASHDECK_PAGE_SIZE: '10',
    });

    expect(config.theme).toBe('dark-ansi');
    expect(config.pageSize).toBe(10);
  });

  it('ignores invalid environment values', () => {
    const config = loadConfig({
      STASHDECK_CONFIG: configPath,
      STASHDECK_THEME: 'neon',
      STASHDECK_PAGE_SIZE: 'many',
    });

    expect(config.theme).toBe('dark');
    expect(config.pageSize).toBe(20);
  });
});

describe('abbreviateHomePath', () => {
  it('replaces the home directory with ~', () => {
    expect(abbreviateHomePath(path.join(os.homedir(), 'src', 'repo'))).toBe(
      `~${path.sep}src${path.sep}repo`
    );
  });

  it('leaves other paths alone', () => {
    expect(abbreviateHomePath('/nonexistent-root/repo')).toBe('/nonexistent-root/repo');
  });
});
