import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ThemeName } from './themes.js';
import { DEFAULT_PAGE_SIZE } from './state/AppState.js';
import * as logger from './utils/logger.js';

export interface Config {
  theme: ThemeName;
  pageSize: number;
  debug: boolean;
}

const defaultConfig: Config = {
  theme: 'dark',
  pageSize: DEFAULT_PAGE_SIZE,
  debug: false,
};

export const MIN_PAGE_SIZE = 1;
export const MAX_PAGE_SIZE = 200;

export const VALID_THEMES: ThemeName[] = [
  'dark',
  'light',
  'dark-colorblind',
  'light-colorblind',
  'dark-ansi',
  'light-ansi',
];

export function isValidTheme(theme: unknown): theme is ThemeName {
  return typeof theme === 'string' && VALID_THEMES.some((t) => t === theme);
}

export function isValidPageSize(value: unknown): value is number {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= MIN_PAGE_SIZE &&
    value <= MAX_PAGE_SIZE
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.STASHDECK_CONFIG || path.join(os.homedir(), '.config', 'stashdeck', 'config.json');
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) return {};
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    if (isRecord(parsed)) return parsed;
    logger.warn(`Ignoring ${configPath}: expected a JSON object`);
  } catch (err) {
    logger.warn(`Ignoring ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return {};
}

/**
 * Defaults, overridden by the config file, overridden by the environment.
 * Invalid values are ignored.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const config = { ...defaultConfig };

  const fileConfig = readConfigFile(getConfigPath(env));
  if (isValidTheme(fileConfig.theme)) config.theme = fileConfig.theme;
  if (isValidPageSize(fileConfig.pageSize)) config.pageSize = fileConfig.pageSize;
  if (typeof fileConfig.debug === 'boolean') config.debug = fileConfig.debug;

  // Override from environment
  if (isValidTheme(env.STASHDECK_THEME)) {
    config.theme = env.STASHDECK_THEME;
  }
  if (env.STASHDECK_PAGE_SIZE) {
    const pageSize = Number(env.STASHDECK_PAGE_SIZE);
    if (isValidPageSize(pageSize)) config.pageSize = pageSize;
  }

  return config;
}

export function abbreviateHomePath(fullPath: string): string {
  const home = os.homedir();
  if (fullPath.startsWith(home)) {
    return '~' + fullPath.slice(home.length);
  }
  return fullPath;
}
