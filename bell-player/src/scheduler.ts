/**
 * Bell scheduler - the time-driven loop
 *
 * Wakes every `pollIntervalMs`, compares the wall clock with the next bell
 * time and rings when it is reached: pick a link, make sure its clip is on
 * disk, play it. A keyboard interrupt rings the upcoming bell early while
 * waiting, or cuts a playing bell short. Two interrupts in quick succession
 * stop the loop.
 *
 * States: waiting -> playing -> waiting, until stopped.
 */

import { EventEmitter } from 'events';
import type { BellConfig } from './schemas/index.js';
import type { MediaPlayer, Playback, PlaybackResult } from './media.js';
import type { StateStore } from './state.js';
import { LinkSelector, type SelectedLink } from './links.js';
import { nextBellAfter, dayKey, formatClock, formatDelay } from './schedule.js';
import { logger } from './lib/logger.js';

export type SchedulerStatus = 'idle' | 'waiting' | 'playing' | 'stopped';

export type RingReason = 'schedule' | 'manual';

export type InterruptAction = 'ring' | 'stop' | 'exit' | 'ignored';

export type SchedulerSettings = Pick<BellConfig, 'schedule' | 'days' | 'linkOrder' | 'pollIntervalMs' | 'prefetch'>;

export interface RingEvent extends SelectedLink {
  reason: RingReason;
  at: Date;
}

export interface PlayedEvent extends RingEvent {
  result: PlaybackResult;
}

export interface SchedulerDeps {
  player: Pick<MediaPlayer, 'ensureClip' | 'play' | 'prefetchAll' | 'cancel'>;
  state: Pick<StateStore, 'load' | 'recordRing'>;
  readLinks: () => string[];
  random?: () => number;
  exitWindowMs?: number;
}

const DEFAULT_EXIT_WINDOW_MS = 1500;

export class BellScheduler extends EventEmitter {
  private status: SchedulerStatus = 'idle';
  private target: Date | null = null;
  private timer: NodeJS.Timeout | null = null;
  private selector: LinkSelector | null = null;
  private loadedDay: string | null = null;
  private playback: Playback | null = null;
  private current: Promise<void> | null = null;
  private cancelPending = false;
  private lastInterruptAt: number | null = null;
  private finished: Promise<void> | null = null;
  private resolveFinished: (() => void) | null = null;
  private readonly exitWindowMs: number;

  constructor(
    private readonly settings: SchedulerSettings,
    private readonly deps: SchedulerDeps
  ) {
    super();
    this.exitWindowMs = deps.exitWindowMs ?? DEFAULT_EXIT_WINDOW_MS;
  }

  getStatus(): SchedulerStatus {
    return this.status;
  }

  getNextBell(): Date | null {
    return this.target;
  }

  /**
   * Load the link sheet and start waiting for the next bell. The returned
   * promise settles once the scheduler is stopped.
   */
  start(): Promise<void> {
    if (this.finished) {
      return this.finished;
    }

    this.finished = new Promise<void>(resolve => {
      this.resolveFinished = resolve;
    });

    const now = new Date();
    const links = this.deps.readLinks();
    const saved = this.deps.state.load();
    this.selector = new LinkSelector(links, this.settings.linkOrder, saved.nextIndex, this.deps.random);
    this.loadedDay = dayKey(now);
    logger.info('Link sheet loaded', { links: links.length, nextIndex: this.selector.cursor });
    this.startPrefetch(links);

    this.aimAfter(now);
    this.timer = setInterval(() => this.tick(), this.settings.pollIntervalMs);

    return this.finished;
  }

  /**
   * Handle a keyboard interrupt
   */
  interrupt(): InterruptAction {
    if (this.status === 'idle' || this.status === 'stopped') {
      return 'ignored';
    }

    const nowMs = Date.now();
    if (this.lastInterruptAt !== null && nowMs - this.lastInterruptAt <= this.exitWindowMs) {
      this.lastInterruptAt = null;
      logger.info('Interrupted twice, shutting down');
      this.stop().catch(err => logger.error('Shutdown failed', { error: err }));
      return 'exit';
    }
    this.lastInterruptAt = nowMs;

    if (this.status === 'playing') {
      logger.info('Stopping bell early');
      if (this.playback) {
        this.playback.stop();
      } else {
        // Clip still being fetched; skip playing it
        this.cancelPending = true;
      }
      return 'stop';
    }

    logger.info('Ringing bell early');
    this.current = this.ring('manual');
    return 'ring';
  }

  /**
   * Stop the loop, cutting any playing bell short and killing clip fetches
   * still in progress
   */
  async stop(): Promise<void> {
    if (this.status === 'stopped') {
      return;
    }
    this.status = 'stopped';
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.cancelPending = true;
    this.playback?.stop();
    this.deps.player.cancel();

    await this.current;

    logger.info('Scheduler stopped');
    this.resolveFinished?.();
  }

  private tick(): void {
    if (this.status !== 'waiting' || !this.target) return;
    if (Date.now() >= this.target.getTime()) {
      this.current = this.ring('schedule');
    }
  }

  private aimAfter(from: Date): void {
    this.target = nextBellAfter(from, this.settings);
    this.status = 'waiting';
    const delay = this.target.getTime() - Date.now();
    logger.info(`Next bell at ${formatClock(this.target)} (in ${formatDelay(delay)})`, {
      at: this.target.toISOString(),
    });
    this.emit('waiting', this.target);
  }

  private startPrefetch(links: string[]): void {
    if (!this.settings.prefetch) return;
    this.deps.player.prefetchAll(links).then(results => {
      const failed = results.filter(r => r.error !== undefined).length;
      logger.info('Clips ready', { fetched: results.length - failed, failed });
    }).catch(err => {
      logger.warn('Clip prefetch failed', { error: err });
    });
  }

  /**
   * Re-read the sheet on the first bell of a new day. A sheet that fails to
   * load keeps yesterday's links in rotation.
   */
  private refreshLinksForDay(now: Date): void {
    const today = dayKey(now);
    if (today === this.loadedDay || !this.selector) return;
    this.loadedDay = today;

    try {
      const links = this.deps.readLinks();
      this.selector.replaceLinks(links);
      logger.info('Link sheet reloaded', { links: links.length });
      this.startPrefetch(links);
    } catch (err) {
      logger.warn('Could not reload link sheet, keeping previous links', { error: err });
    }
  }

  private async ring(reason: RingReason): Promise<void> {
    if (!this.selector) return;

    const at = new Date();
    const pendingTarget = this.target ?? at;
    this.status = 'playing';
    this.cancelPending = false;

    try {
      this.refreshLinksForDay(at);
      const link = this.selector.next();
      this.deps.state.recordRing(this.selector.cursor, link.url, at);

      const event: RingEvent = { ...link, reason, at };
      logger.info(`Ringing bell with link #${link.index}`, { url: link.url, reason });
      this.emit('ring', event);

      const clip = await this.deps.player.ensureClip(link.index, link.url, this.settings.prefetch);
      if (this.cancelPending) {
        logger.info('Bell cancelled before playback', { index: link.index });
        return;
      }

      this.playback = this.deps.player.play(clip);
      const result = await this.playback.done;
      logger.info(result.stopped ? 'Bell stopped early' : 'Bell finished', { index: link.index, file: result.file });
      const played: PlayedEvent = { ...event, result };
      this.emit('played', played);
    } catch (err) {
      if (this.getStatus() === 'stopped') {
        logger.info('Bell cancelled by shutdown', { reason });
        return;
      }
      logger.error('Bell failed', { reason, error: err });
      this.emit('failed', err);
    } finally {
      this.playback = null;
      if (this.getStatus() !== 'stopped') {
        // A bell rung early consumes the scheduled time it stood in for
        const from = new Date(Math.max(Date.now(), pendingTarget.getTime()));
        this.aimAfter(from);
      }
    }
  }
}
