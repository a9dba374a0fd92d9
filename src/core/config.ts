/**
 * Configuration loading and management
 */

import * as path from 'path';
import { fileExists, readJSON } from './fileio.js';
import { ConfigError, errorMessage } from './errors.js';

export interface LinestatConfig {
  /** Extension allow-list; every supported extension when empty. */
  extensions: string[];
  /** Directory names skipped on top of the built-in list. */
  ignore: string[];
  quiet: boolean;
}

export const CONFIG_FILE_NAMES = ['.linestatrc.json', 'linestat.config.json'];

const DEFAULT_CONFIG: LinestatConfig = {
  extensions: [],
  ignore: [],
  quiet: false,
};

export function defaultConfig(): LinestatConfig {
  return {
    extensions: [...DEFAULT_CONFIG.extensions],
    ignore: [...DEFAULT_CONFIG.ignore],
    quiet: DEFAULT_CONFIG.quiet,
  };
}

function readStringList(raw: Record<string, unknown>, key: string, source: string): string[] {
  const value = raw[key];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`Invalid config file: ${source} ("${key}" must be an array of strings)`);
  }
  return value;
}

export function parseConfig(raw: unknown, source: string): LinestatConfig {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(`Invalid config file: ${source} (expected a JSON object)`);
  }
  const record: Record<string, unknown> = { ...raw };

  const quiet = record.quiet;
  if (quiet !== undefined && typeof quiet !== 'boolean') {
    throw new ConfigError(`Invalid config file: ${source} ("quiet" must be a boolean)`);
  }

  return {
    extensions: readStringList(record, 'extensions', source),
    ignore: readStringList(record, 'ignore', source),
    quiet: quiet ?? DEFAULT_CONFIG.quiet,
  };
}

/**
 * Load the first config file found: an explicit path, otherwise one of
 * CONFIG_FILE_NAMES in the scanned root. Defaults when there is none.
 */
export async function loadConfig(rootPath: string, configPath?: string): Promise<LinestatConfig> {
  if (configPath && !(await fileExists(configPath))) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  const candidates = configPath
    ? [configPath]
    : CONFIG_FILE_NAMES.map((name) => path.join(rootPath, name));

  for (const candidate of candidates) {
    if (!(await fileExists(candidate))) continue;
    let raw: unknown;
    try {
      raw = await readJSON(candidate);
    } catch (error) {
      throw new ConfigError(`Invalid config file: ${candidate} (${errorMessage(error)})`);
    }
    return parseConfig(raw, candidate);
  }

  return defaultConfig();
}
