/**
 * Bell schedule math: configured times of day to concrete Dates
 */

import type { BellConfig } from './schemas/index.js';

export type ScheduleSettings = Pick<BellConfig, 'schedule' | 'days'>;

export interface TimeOfDay {
  hours: number;
  minutes: number;
}

// How far ahead nextBellAfter looks before giving up (one full week)
const MAX_LOOKAHEAD_DAYS = 7;

export function parseTimeOfDay(value: string): TimeOfDay {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value);
  if (!match) {
    throw new Error(`Invalid time of day '${value}'`);
  }
  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  if (hours > 23 || minutes > 59) {
    throw new Error(`Invalid time of day '${value}'`);
  }
  return { hours, minutes };
}

/**
 * `day` at the given local time, seconds and milliseconds zeroed
 */
export function atTimeOfDay(day: Date, time: TimeOfDay): Date {
  const result = new Date(day);
  result.setHours(time.hours, time.minutes, 0, 0);
  return result;
}

/**
 * All bell times on the calendar day of `day`, ascending. Empty on weekdays
 * the schedule does not run.
 */
export function buildDaySchedule(day: Date, settings: ScheduleSettings): Date[] {
  if (!settings.days.includes(day.getDay())) {
    return [];
  }
  return settings.schedule
    .map(value => atTimeOfDay(day, parseTimeOfDay(value)))
    .sort((a, b) => a.getTime() - b.getTime());
}

/**
 * First bell strictly after `now`, rolling into following days when today
 * has none left
 */
export function nextBellAfter(now: Date, settings: ScheduleSettings): Date {
  for (let offset = 0; offset <= MAX_LOOKAHEAD_DAYS; offset++) {
    const day = new Date(now);
    day.setDate(day.getDate() + offset);
    const upcoming = buildDaySchedule(day, settings).find(bell => bell.getTime() > now.getTime());
    if (upcoming) {
      return upcoming;
    }
  }
  throw new Error('Schedule has no bell times on any configured weekday');
}

/**
 * Local calendar day key, used to notice the day rolling over
 */
export function dayKey(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

export function formatClock(date: Date): string {
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  return `${hours}:${minutes}`;
}

export function formatDelay(ms: number): string {
  const totalSeconds = Math.max(0, Math.round(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) {
    return `${hours}h ${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${String(seconds).padStart(2, '0')}s`;
  }
  return `${seconds}s`;
}

/**
 * The next `count` bells after `now`, in order
 */
export function upcomingBells(now: Date, settings: ScheduleSettings, count: number): Date[] {
  const bells: Date[] = [];
  let cursor = now;
  for (let i = 0; i < count; i++) {
    cursor = nextBellAfter(cursor, settings);
    bells.push(cursor);
  }
  return bells;
}
