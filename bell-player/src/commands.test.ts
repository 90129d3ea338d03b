import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fetchAll, parseCount, playOnce, showLinks, showSchedule } from './commands.js';
import type { Playback, PrefetchResult } from './media.js';
import { StateStore } from './state.js';
import { BellConfigSchema, type BellConfig } from './schemas/index.js';
import { logger } from './lib/logger.js';

const A = 'https://media.example/a';
const B = 'https://media.example/b';
const C = 'https://media.example/c';
const GONE = 'https://media.example/gone';

function createFakePlayer() {
  return {
    ensureClip: vi.fn(async (index: number, _url: string, _reuse: boolean) => `/media/bell_${index}.mp3`),
    play: vi.fn((file: string): Playback => ({
      file,
      done: Promise.resolve({ file, stopped: false }),
      stop: vi.fn(),
    })),
    prefetchAll: vi.fn(async (links: string[]): Promise<PrefetchResult[]> =>
      links.map((url, index) => {
        const result: PrefetchResult = { index, url, file: `/media/bell_${index}.mp3` };
        if (url === GONE) result.error = 'ERROR: Private video';
        return result;
      })
    ),
  };
}

describe('commands', () => {
  let dir: string;
  let config: BellConfig;
  let lines: string[];
  const print = (line: string) => lines.push(line);

  const writeLinks = (...links: string[]) => writeFileSync(config.linksFile, `${links.join('\n')}\n`);

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'bell-commands-'));
    config = BellConfigSchema.parse({
      schedule: ['09:15', '15:40'],
      days: [1, 2, 3, 4, 5],
      linksFile: join(dir, 'links.txt'),
      stateFile: join(dir, 'state.json'),
      mediaDir: join(dir, 'media'),
    });
    lines = [];
    vi.spyOn(logger, 'info').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('parseCount', () => {
    it('accepts a positive integer', () => {
      expect(parseCount('3')).toBe(3);
    });

    it.each(['0', '-2', '1.5', 'ten'])('rejects %s', (value) => {
      expect(() => parseCount(value)).toThrow(`--count must be a positive integer, got '${value}'`);
    });
  });

  describe('showSchedule', () => {
    it('lists the next bells in order', () => {
      // 2026-03-02 is a Monday
      showSchedule(config, 3, print, new Date(2026, 2, 2, 8, 0));

      expect(lines).toHaveLength(5);
      expect(lines[0]).toBe('\nUpcoming bells:\n');
      expect(lines[1].startsWith('  Mon ')).toBe(true);
      expect(lines[1].endsWith('  09:15')).toBe(true);
      expect(lines[2].startsWith('  Mon ')).toBe(true);
      expect(lines[2].endsWith('  15:40')).toBe(true);
      expect(lines[3].startsWith('  Tue ')).toBe(true);
      expect(lines[3].endsWith('  09:15')).toBe(true);
    });
  });

  describe('showLinks', () => {
    it('marks the next link, wrapping the saved cursor', () => {
      writeLinks(A, B, C);
      const state = new StateStore(config.stateFile);
      state.save({ nextIndex: 4, lastRungAt: null, lastUrl: null });

      showLinks(config, state, print);

      expect(lines).toEqual([
        '\n3 links (sequential order):\n',
        `    0  ${A}`,
        `>   1  ${B}`,
        `    2  ${C}`,
        '',
      ]);
    });

    it('marks nothing in random order', () => {
      writeLinks(A, B);

      showLinks({ ...config, linkOrder: 'random' }, new StateStore(config.stateFile), print);

      expect(lines.filter(line => line.startsWith('>'))).toEqual([]);
      expect(lines[0]).toBe('\n2 links (random order):\n');
    });
  });

  describe('playOnce', () => {
    it('plays the next link in rotation and saves the cursor', async () => {
      writeLinks(A, B, C);
      const state = new StateStore(config.stateFile);
      state.save({ nextIndex: 2, lastRungAt: null, lastUrl: null });
      const player = createFakePlayer();

      const result = await playOnce(config, undefined, { player, state });

      expect(result).toEqual({ file: '/media/bell_2.mp3', stopped: false });
      expect(player.ensureClip).toHaveBeenCalledWith(2, C, true);
      expect(state.load()).toMatchObject({ nextIndex: 0, lastUrl: C });

      await playOnce(config, undefined, { player, state });
      expect(player.ensureClip).toHaveBeenLastCalledWith(0, A, true);
      expect(state.load()).toMatchObject({ nextIndex: 1, lastUrl: A });
    });

    it('plays a chosen index without moving the rotation', async () => {
      writeLinks(A, B, C);
      const player = createFakePlayer();
      const onPlayback = vi.fn();

      await playOnce(config, '1', { player, state: new StateStore(config.stateFile), onPlayback });

      expect(player.ensureClip).toHaveBeenCalledWith(1, B, true);
      expect(player.play).toHaveBeenCalledWith('/media/bell_1.mp3');
      expect(onPlayback).toHaveBeenCalledWith(expect.objectContaining({ file: '/media/bell_1.mp3' }));
      expect(existsSync(config.stateFile)).toBe(false);
    });

    it.each(['3', '-1', '1.5', 'first'])('rejects index %s', async (index) => {
      writeLinks(A, B, C);
      const player = createFakePlayer();

      await expect(playOnce(config, index, { player, state: new StateStore(config.stateFile) })).rejects.toThrow(
        `Index must be between 0 and 2, got '${index}'`
      );
      expect(player.ensureClip).not.toHaveBeenCalled();
    });
  });

  describe('fetchAll', () => {
    it('returns 0 when every clip is fetched', async () => {
      writeLinks(A, B);

      await expect(fetchAll(config, createFakePlayer(), print)).resolves.toBe(0);
      expect(lines).toEqual([`\nFetched 2/2 clips into ${config.mediaDir}`]);
    });

    it('returns 1 and lists the failures', async () => {
      writeLinks(A, GONE);

      await expect(fetchAll(config, createFakePlayer(), print)).resolves.toBe(1);
      expect(lines).toEqual([
        `\nFetched 1/2 clips into ${config.mediaDir}`,
        `  #1 ${GONE}: ERROR: Private video`,
      ]);
    });
  });
});
