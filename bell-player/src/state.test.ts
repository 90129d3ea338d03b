import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { StateStore, freshState } from './state.js';
import { logger } from './lib/logger.js';

describe('StateStore', () => {
  let dir: string;
  let statePath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'bell-state-'));
    statePath = join(dir, 'nested', 'bell-state.json');
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('starts fresh when no state file exists', () => {
    expect(new StateStore(statePath).load()).toEqual(freshState());
  });

  it('round-trips a recorded ring', () => {
    const store = new StateStore(statePath);
    store.recordRing(4, 'https://media.example/b', new Date('2026-03-02T09:15:00.000Z'));

    expect(JSON.parse(readFileSync(statePath, 'utf-8'))).toEqual({
      nextIndex: 4,
      lastRungAt: '2026-03-02T09:15:00.000Z',
      lastUrl: 'https://media.example/b',
    });
    expect(new StateStore(statePath).load().nextIndex).toBe(4);
  });

  it('starts fresh and warns on a corrupt file', () => {
    const file = join(dir, 'bell-state.json');
    writeFileSync(file, '{ not json');

    expect(new StateStore(file).load()).toEqual(freshState());
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('starts fresh on a file with the wrong shape', () => {
    const file = join(dir, 'bell-state.json');
    writeFileSync(file, JSON.stringify({ nextIndex: 'two' }));

    expect(new StateStore(file).load()).toEqual(freshState());
    expect(logger.warn).toHaveBeenCalledWith('State file has an unexpected shape, starting fresh', { path: file });
  });
});
