/**
 * Rotation state persisted between runs
 *
 * Keeps the sequential link cursor so a restart continues the rotation
 * instead of replaying the first link.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { RotationStateSchema, type RotationState } from './schemas/index.js';
import { logger } from './lib/logger.js';

export function freshState(): RotationState {
  return {
    nextIndex: 0,
    lastRungAt: null,
    lastUrl: null,
  };
}

export class StateStore {
  constructor(private readonly statePath: string) {}

  load(): RotationState {
    if (!existsSync(this.statePath)) {
      return freshState();
    }

    try {
      const parsed = RotationStateSchema.safeParse(JSON.parse(readFileSync(this.statePath, 'utf-8')));
      if (parsed.success) {
        return parsed.data;
      }
      logger.warn('State file has an unexpected shape, starting fresh', { path: this.statePath });
    } catch (err) {
      // If corrupted, start fresh
      logger.warn('State file is unreadable, starting fresh', { path: this.statePath, error: err });
    }
    return freshState();
  }

  save(state: RotationState): void {
    mkdirSync(dirname(this.statePath), { recursive: true });
    writeFileSync(this.statePath, JSON.stringify(state, null, 2));
  }

  /**
   * Record a rung bell and the cursor to resume from
   */
  recordRing(nextIndex: number, url: string, at: Date): RotationState {
    const state: RotationState = {
      nextIndex,
      lastRungAt: at.toISOString(),
      lastUrl: url,
    };
    this.save(state);
    return state;
  }
}
