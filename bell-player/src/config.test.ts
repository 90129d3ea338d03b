import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, parseConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'bell-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const file = join(dir, 'bell.config.json');
    writeFileSync(file, content);
    return file;
  }

  it('resolves relative paths against the config directory', () => {
    const file = writeConfig(JSON.stringify({
      schedule: ['09:15', '15:40'],
      linksFile: 'sheets/links.csv',
      logFile: '/var/log/bell.log',
    }));

    const config = loadConfig(file);

    expect(config.linksFile).toBe(join(dir, 'sheets', 'links.csv'));
    expect(config.logFile).toBe('/var/log/bell.log');
    expect(config.mediaDir).toBe(join(dir, 'media'));
    expect(config.stateFile).toBe(join(dir, 'bell-state.json'));
    expect(config.schedule).toEqual(['09:15', '15:40']);
  });

  it('raises ConfigError for a missing file', () => {
    const missing = join(dir, 'nope.json');
    expect(() => loadConfig(missing)).toThrow(ConfigError);
    expect(() => loadConfig(missing)).toThrow(`Cannot read config file ${missing}`);
  });

  it('raises ConfigError for malformed JSON', () => {
    const file = writeConfig('{ "schedule": [');
    expect(() => loadConfig(file)).toThrow(/is not valid JSON/);
  });

  it('lists every failing path', () => {
    const file = writeConfig(JSON.stringify({ schedule: [], pollIntervalMs: 0 }));

    let caught: unknown;
    try {
      loadConfig(file);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof Error ? caught.message : '').toBe(
      `Invalid config file ${file}:\n` +
      '  schedule: At least one bell time is required\n' +
      '  pollIntervalMs: Number must be greater than 0'
    );
  });
});

describe('parseConfig', () => {
  it('names the root when the document is not an object', () => {
    expect(() => parseConfig([], '/etc/bell/bell.config.json')).toThrow(
      'Invalid config file /etc/bell/bell.config.json:\n  (root): Expected object, received array'
    );
  });
});
