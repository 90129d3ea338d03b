/**
 * Command bodies behind the CLI
 *
 * Each takes the loaded config and the collaborators it drives, and prints
 * through `print`, so the commands run the same under test as from index.ts.
 */

import { readLinkSheet, LinkSelector } from './links.js';
import { upcomingBells, formatClock } from './schedule.js';
import type { MediaPlayer, Playback, PlaybackResult } from './media.js';
import type { StateStore } from './state.js';
import type { BellConfig } from './schemas/index.js';
import { logger } from './lib/logger.js';

export type Print = (line: string) => void;

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

export function parseCount(value: string): number {
  const count = Number(value);
  if (!/^\d+$/.test(value.trim()) || count < 1) {
    throw new Error(`--count must be a positive integer, got '${value}'`);
  }
  return count;
}

export function showSchedule(config: BellConfig, count: number, print: Print, now = new Date()): void {
  print('\nUpcoming bells:\n');
  for (const bell of upcomingBells(now, config, count)) {
    print(`  ${WEEKDAYS[bell.getDay()]} ${bell.toLocaleDateString()}  ${formatClock(bell)}`);
  }
  print('');
}

/**
 * List the sheet; in sequential order the link the next bell will use is
 * marked with `>`
 */
export function showLinks(config: BellConfig, state: Pick<StateStore, 'load'>, print: Print): void {
  const links = readLinkSheet(config.linksFile);
  const next = state.load().nextIndex % links.length;

  print(`\n${links.length} links (${config.linkOrder} order):\n`);
  links.forEach((url, index) => {
    const marker = config.linkOrder === 'sequential' && index === next ? '>' : ' ';
    print(`${marker} ${String(index).padStart(3)}  ${url}`);
  });
  print('');
}

export interface PlayOnceDeps {
  player: Pick<MediaPlayer, 'ensureClip' | 'play'>;
  state: Pick<StateStore, 'load' | 'recordRing'>;
  /** Called once playback has started, e.g. to bind Ctrl+C to `stop()` */
  onPlayback?: (playback: Playback) => void;
  random?: () => number;
}

/**
 * Ring one bell now. Without an index the next link in rotation is used and
 * the cursor is saved; an explicit index leaves the rotation untouched.
 */
export async function playOnce(
  config: BellConfig,
  indexArg: string | undefined,
  deps: PlayOnceDeps
): Promise<PlaybackResult> {
  const links = readLinkSheet(config.linksFile);

  let index: number;
  let url: string;
  if (indexArg === undefined) {
    const selector = new LinkSelector(links, config.linkOrder, deps.state.load().nextIndex, deps.random);
    ({ index, url } = selector.next());
    deps.state.recordRing(selector.cursor, url, new Date());
  } else {
    index = Number(indexArg);
    if (!/^\d+$/.test(indexArg.trim()) || index >= links.length) {
      throw new Error(`Index must be between 0 and ${links.length - 1}, got '${indexArg}'`);
    }
    url = links[index];
  }

  logger.info(`Playing link #${index}`, { url });
  const clip = await deps.player.ensureClip(index, url, config.prefetch);
  const playback = deps.player.play(clip);
  deps.onPlayback?.(playback);

  const result = await playback.done;
  logger.info(result.stopped ? 'Bell stopped early' : 'Bell finished', { index, file: result.file });
  return result;
}

/**
 * Fetch every link's clip. Returns the process exit code: 1 when any fetch
 * failed.
 */
export async function fetchAll(
  config: BellConfig,
  player: Pick<MediaPlayer, 'prefetchAll'>,
  print: Print
): Promise<number> {
  const links = readLinkSheet(config.linksFile);
  const results = await player.prefetchAll(links);
  const failed = results.filter(r => r.error !== undefined);

  print(`\nFetched ${results.length - failed.length}/${results.length} clips into ${config.mediaDir}`);
  for (const result of failed) {
    print(`  #${result.index} ${result.url}: ${result.error}`);
  }
  return failed.length > 0 ? 1 : 0;
}
