/**
 * Media player - shells out to yt-dlp, ffmpeg and ffplay
 *
 * yt-dlp resolves a page link to a direct audio stream URL, ffmpeg cuts the
 * configured clip out of that stream into the media directory, and ffplay
 * plays the clip without opening a window.
 */

import { spawn, type SpawnOptions } from 'child_process';
import { createHash } from 'crypto';
import { existsSync, mkdirSync, renameSync, rmSync } from 'fs';
import { join } from 'path';
import type { BellConfig } from './schemas/index.js';
import { MediaError } from './errors.js';
import { logger } from './lib/logger.js';

export type MediaSettings = Pick<BellConfig, 'mediaDir' | 'clip' | 'format' | 'tools'>;

interface OutputStream {
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
}

/**
 * The parts of a child process the player relies on
 */
export interface ToolProcess {
  stdout: OutputStream | null;
  stderr: OutputStream | null;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export interface ToolSpawnRequest {
  /** Pipe stdout back to the player; otherwise it is discarded */
  captureStdout: boolean;
}

export type SpawnTool = (command: string, args: string[], request: ToolSpawnRequest) => ToolProcess;

export interface ToolOutput {
  stdout: string;
  stderr: string;
}

export interface PlaybackResult {
  file: string;
  stopped: boolean;
}

export interface Playback {
  file: string;
  done: Promise<PlaybackResult>;
  stop: () => void;
}

export interface PrefetchResult {
  index: number;
  url: string;
  file: string;
  error?: string;
}

/**
 * Tools run in their own process group so a terminal Ctrl+C reaches only
 * the player, which then decides what to stop.
 */
export function toolSpawnOptions(request: ToolSpawnRequest): SpawnOptions {
  return {
    detached: true,
    stdio: ['ignore', request.captureStdout ? 'pipe' : 'ignore', 'pipe'],
  };
}

const spawnTool: SpawnTool = (command, args, request) =>
  spawn(command, args, toolSpawnOptions(request));

function linkTag(link: string): string {
  return createHash('sha1').update(link).digest('hex').slice(0, 10);
}

export class MediaPlayer {
  private pending = new Map<string, Promise<string>>();
  private running = new Set<ToolProcess>();

  constructor(
    private readonly settings: MediaSettings,
    private readonly spawnProcess: SpawnTool = spawnTool
  ) {}

  /**
   * Where the clip for link `index` lives in the media directory. The name
   * carries a hash of the link, so a sheet edit never plays the old clip.
   */
  clipPath(index: number, link: string): string {
    return join(this.settings.mediaDir, `bell_${index}_${linkTag(link)}.${this.settings.format.codec}`);
  }

  /**
   * Kill every fetch still in progress. Their promises reject.
   */
  cancel(): void {
    if (this.running.size > 0) {
      logger.info('Cancelling clip fetches', { running: this.running.size });
    }
    for (const child of this.running) {
      child.kill('SIGTERM');
    }
  }

  /**
   * Run a tool to completion, collecting its output
   */
  runTool(command: string, args: string[]): Promise<ToolOutput> {
    logger.debug('Running tool', { command, args });

    return new Promise((resolve, reject) => {
      const child = this.spawnProcess(command, args, { captureStdout: true });
      this.running.add(child);

      let stdout = '';
      let stderr = '';

      child.stdout?.on('data', (data) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data) => {
        stderr += data.toString();
      });

      child.on('close', (code, signal) => {
        this.running.delete(child);
        if (code === 0) {
          resolve({ stdout, stderr });
        } else if (signal) {
          reject(new MediaError(`${command} was stopped by ${signal}`, command, code));
        } else {
          reject(new MediaError(stderr.trim() || `${command} exited with code ${code}`, command, code));
        }
      });

      child.on('error', (err) => {
        this.running.delete(child);
        reject(new MediaError(`Could not start ${command}: ${err.message}`, command, null, { cause: err }));
      });
    });
  }

  /**
   * Resolve a page link to a direct stream URL with yt-dlp
   */
  async resolveStreamUrl(link: string): Promise<string> {
    const { ytdlp } = this.settings.tools;
    const { stdout } = await this.runTool(ytdlp, [
      '-f', this.settings.format.ytdlpFormat,
      '-g',
      '--no-playlist',
      link,
    ]);

    const streamUrl = stdout.split(/\r?\n/).map(line => line.trim()).find(line => line.length > 0);
    if (!streamUrl) {
      throw new MediaError(`${ytdlp} returned no stream URL for ${link}`, ytdlp, 0);
    }
    return streamUrl;
  }

  /**
   * Cut the configured clip out of `link` into `outFile`
   */
  async fetchClip(link: string, outFile: string): Promise<string> {
    const inFlight = this.pending.get(outFile);
    if (inFlight) {
      return inFlight;
    }

    const job = this.downloadClip(link, outFile);
    this.pending.set(outFile, job);
    try {
      return await job;
    } finally {
      this.pending.delete(outFile);
    }
  }

  /**
   * ffmpeg writes to `<outFile>.part`; only a finished cut is renamed into
   * place.
   */
  private async downloadClip(link: string, outFile: string): Promise<string> {
    mkdirSync(this.settings.mediaDir, { recursive: true });
    const streamUrl = await this.resolveStreamUrl(link);
    const { clip, format, tools } = this.settings;
    const partFile = `${outFile}.part`;

    try {
      await this.runTool(tools.ffmpeg, [
        '-hide_banner',
        '-loglevel', 'error',
        '-y',
        '-ss', String(clip.startSeconds),
        '-t', String(clip.durationSeconds),
        '-i', streamUrl,
        '-vn',
        '-ar', String(format.sampleRate),
        '-ac', String(format.channels),
        '-ab', format.bitrate,
        '-f', format.codec,
        partFile,
      ]);
      renameSync(partFile, outFile);
    } catch (err) {
      rmSync(partFile, { force: true });
      throw err;
    }

    logger.debug('Clip fetched', { link, file: outFile });
    return outFile;
  }

  /**
   * Clip file for a selected link. With `reuse`, a clip already in the
   * media directory (or one still being prefetched) is used as-is.
   */
  async ensureClip(index: number, link: string, reuse: boolean): Promise<string> {
    const file = this.clipPath(index, link);
    const inFlight = this.pending.get(file);
    if (inFlight) {
      return inFlight;
    }
    if (reuse && existsSync(file)) {
      return file;
    }
    return this.fetchClip(link, file);
  }

  /**
   * Fetch every link's clip at once. Failures are reported per link, not
   * thrown.
   */
  async prefetchAll(links: string[]): Promise<PrefetchResult[]> {
    logger.info('Fetching clips', { count: links.length, mediaDir: this.settings.mediaDir });

    const settled = await Promise.allSettled(
      links.map((url, index) => this.fetchClip(url, this.clipPath(index, url)))
    );

    return settled.map((outcome, index) => {
      const result: PrefetchResult = { index, url: links[index], file: this.clipPath(index, links[index]) };
      if (outcome.status === 'rejected') {
        result.error = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        logger.warn('Clip fetch failed', { index, url: result.url, error: result.error });
      }
      return result;
    });
  }

  /**
   * Start playing a clip. `done` settles when ffplay exits; `stop()` ends
   * playback early and resolves `done` with `stopped: true`.
   */
  play(file: string): Playback {
    const { tools, clip } = this.settings;
    const args = ['-nodisp', '-autoexit', '-loglevel', 'error', '-t', String(clip.durationSeconds), file];
    logger.debug('Running tool', { command: tools.ffplay, args });

    const child = this.spawnProcess(tools.ffplay, args, { captureStdout: false });
    let stopped = false;
    let finished = false;

    const done = new Promise<PlaybackResult>((resolve, reject) => {
      let stderr = '';
      child.stderr?.on('data', (data) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        finished = true;
        if (stopped || code === 0) {
          resolve({ file, stopped });
        } else {
          reject(new MediaError(stderr.trim() || `${tools.ffplay} exited with code ${code}`, tools.ffplay, code));
        }
      });

      child.on('error', (err) => {
        finished = true;
        reject(new MediaError(`Could not start ${tools.ffplay}: ${err.message}`, tools.ffplay, null, { cause: err }));
      });
    });

    return {
      file,
      done,
      stop: () => {
        if (finished || stopped) return;
        stopped = true;
        child.kill('SIGTERM');
      },
    };
  }
}
