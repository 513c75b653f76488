import * as path from 'path';
import { cosmiconfigSync } from 'cosmiconfig';

export interface Igs036Config {
  /** Title used when none is given on the command line. */
  title?: string;
  /** Extra titles, mapped to key files. Relative paths resolve against the config file. */
  keys?: Record<string, string>;
  entropyThreshold?: number;
  suppressedRules?: string[];
}

export const defaultConfig: Igs036Config = {
  keys: {},
  entropyThreshold: 7.9,
  suppressedRules: [],
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function normalizeConfig(raw: unknown, baseDir: string): Igs036Config {
  if (!isRecord(raw)) {
    throw new Error('configuration must be an object');
  }
  const config: Igs036Config = { ...defaultConfig };
  if (typeof raw.title === 'string') {
    config.title = raw.title;
  }
  if (isRecord(raw.keys)) {
    const keys: Record<string, string> = {};
    for (const [title, file] of Object.entries(raw.keys)) {
      if (typeof file !== 'string') {
        throw new Error(`keys.${title} must be a file path`);
      }
      keys[title] = path.resolve(baseDir, file);
    }
    config.keys = keys;
  }
  if (typeof raw.entropyThreshold === 'number') {
    config.entropyThreshold = raw.entropyThreshold;
  }
  if (Array.isArray(raw.suppressedRules)) {
    config.suppressedRules = raw.suppressedRules.filter((r): r is string => typeof r === 'string');
  }
  return config;
}

/**
 * Looks for an `igs036` configuration (`.igs036rc`, `igs036.config.js`,
 * `package.json#igs036`, ...) in `searchFrom`, or loads `configPath` directly.
 */
export function loadConfig(searchFrom: string = process.cwd(), configPath?: string): Igs036Config {
  const explorer = cosmiconfigSync('igs036');
  if (configPath) {
    // An explicit file must load.
    const result = explorer.load(path.resolve(configPath));
    return result && !result.isEmpty ? normalizeConfig(result.config, path.dirname(result.filepath)) : defaultConfig;
  }
  try {
    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      return normalizeConfig(result.config, path.dirname(result.filepath));
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    console.warn(`Warning: Failed to load configuration file: ${msg}`);
  }
  return defaultConfig;
}
