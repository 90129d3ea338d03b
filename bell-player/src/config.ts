/**
 * Configuration loader
 *
 * Reads the JSON config file, validates it against BellConfigSchema and
 * resolves relative paths against the directory holding the file.
 */

import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { BellConfigSchema, type BellConfig } from './schemas/index.js';
import { ConfigError } from './errors.js';

export const DEFAULT_CONFIG_FILE = 'bell.config.json';

const PATH_KEYS = ['linksFile', 'mediaDir', 'logFile', 'stateFile'] as const;

export function loadConfig(configPath: string): BellConfig {
  const fullPath = resolve(configPath);

  let content: string;
  try {
    content = readFileSync(fullPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${fullPath}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config file ${fullPath} is not valid JSON: ${reason}`, { cause: err });
  }

  return parseConfig(raw, fullPath);
}

/**
 * Validate already-parsed config data. `source` names the file in errors
 * and anchors relative paths.
 */
export function parseConfig(raw: unknown, source: string): BellConfig {
  const result = BellConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `  ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid config file ${source}:\n${problems}`);
  }

  const baseDir = dirname(source);
  const config = { ...result.data };
  for (const key of PATH_KEYS) {
    config[key] = resolve(baseDir, config[key]);
  }
  return config;
}
