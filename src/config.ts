import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { isSortKey, type SortKey } from './utils/entryOrdering.js';
import { DEFAULT_MAX_TEXT_FILE_SIZE } from './core/ViewerState.js';
import * as logger from './utils/logger.js';

export interface Config {
  debug: boolean;
  sortBy: SortKey;
  maxTextFileSize: number;
  showImages: boolean;
}

const defaultConfig: Config = {
  debug: false,
  sortBy: 'name',
  maxTextFileSize: DEFAULT_MAX_TEXT_FILE_SIZE,
  showImages: true,
};

export const CONFIG_PATH = path.join(os.homedir(), '.config', 'duopane', 'config.json');

export const MIN_TEXT_FILE_SIZE = 1024;
export const MAX_TEXT_FILE_SIZE = 64 * 1024 * 1024;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load settings from the config file, falling back to defaults for anything
 * missing or invalid. The file is never written.
 */
export function loadConfig(
  configPath: string = CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const config = { ...defaultConfig };

  if (fs.existsSync(configPath)) {
    try {
      const fileConfig: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      if (isRecord(fileConfig)) {
        if (isSortKey(fileConfig.sortBy)) config.sortBy = fileConfig.sortBy;
        if (
          typeof fileConfig.maxTextFileSize === 'number' &&
          Number.isInteger(fileConfig.maxTextFileSize) &&
          fileConfig.maxTextFileSize >= MIN_TEXT_FILE_SIZE &&
          fileConfig.maxTextFileSize <= MAX_TEXT_FILE_SIZE
        ) {
          config.maxTextFileSize = fileConfig.maxTextFileSize;
        }
        if (typeof fileConfig.debug === 'boolean') config.debug = fileConfig.debug;
        if (typeof fileConfig.showImages === 'boolean') config.showImages = fileConfig.showImages;
      } else {
        logger.warn(`Ignoring ${configPath}: expected a JSON object`);
      }
    } catch (err) {
      logger.warn(`Ignoring ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  // Override from environment
  if (env.DUOPANE_DEBUG === '1') {
    config.debug = true;
  }

  return config;
}

export function abbreviateHomePath(fullPath: string): string {
  const home = os.homedir();
  if (fullPath === home || fullPath.startsWith(home + path.sep)) {
    return '~' + fullPath.slice(home.length);
  }
  return fullPath;
}
