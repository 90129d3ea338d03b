/**
 * Bell configuration Zod schemas
 *
 * Validates the JSON configuration file read at startup.
 */

import { z } from 'zod';

const TIME_OF_DAY = /^([01]?\d|2[0-3]):([0-5]\d)$/;

/**
 * Zero-pad a `H:MM` / `HH:MM` time so times sort lexically
 */
export function normalizeTimeOfDay(value: string): string {
  const [hours, minutes] = value.split(':');
  return `${hours.padStart(2, '0')}:${minutes}`;
}

export const TimeOfDaySchema = z
  .string()
  .regex(TIME_OF_DAY, 'Expected a 24-hour time like "09:15"')
  .transform(normalizeTimeOfDay);

/**
 * Bell times, deduplicated and sorted ascending
 */
export const ScheduleSchema = z
  .array(TimeOfDaySchema)
  .min(1, 'At least one bell time is required')
  .transform(times => [...new Set(times)].sort());

export const LinkOrderSchema = z.enum(['sequential', 'random']);

export type LinkOrder = z.infer<typeof LinkOrderSchema>;

export const ClipSchema = z.object({
  startSeconds: z.number().min(0).default(0),
  durationSeconds: z.number().positive().default(60),
});

export type ClipSettings = z.infer<typeof ClipSchema>;

/**
 * Audio format handed to yt-dlp (selection) and ffmpeg (encoding)
 */
export const FormatSchema = z.object({
  ytdlpFormat: z.string().min(1).default('mp3/bestaudio/best'),
  codec: z.string().regex(/^[a-z0-9]+$/, 'Codec must be a bare ffmpeg format name').default('mp3'),
  sampleRate: z.number().int().positive().default(44100),
  channels: z.number().int().min(1).max(8).default(2),
  bitrate: z.string().regex(/^\d+k$/, 'Bitrate must look like "192k"').default('192k'),
});

export type FormatSettings = z.infer<typeof FormatSchema>;

export const ToolsSchema = z.object({
  ytdlp: z.string().min(1).default('yt-dlp'),
  ffmpeg: z.string().min(1).default('ffmpeg'),
  ffplay: z.string().min(1).default('ffplay'),
});

export type ToolSettings = z.infer<typeof ToolsSchema>;

/**
 * Weekday numbers, Sunday = 0 (like Date.getDay())
 */
export const DaysSchema = z
  .array(z.number().int().min(0).max(6))
  .min(1, 'At least one weekday is required')
  .transform(days => [...new Set(days)].sort((a, b) => a - b));

export const BellConfigSchema = z.object({
  linksFile: z.string().min(1).default('links.txt'),
  mediaDir: z.string().min(1).default('media'),
  logFile: z.string().min(1).default('bell.log'),
  stateFile: z.string().min(1).default('bell-state.json'),
  schedule: ScheduleSchema,
  days: DaysSchema.default([0, 1, 2, 3, 4, 5, 6]),
  linkOrder: LinkOrderSchema.default('sequential'),
  clip: ClipSchema.default({}),
  format: FormatSchema.default({}),
  tools: ToolsSchema.default({}),
  pollIntervalMs: z.number().int().positive().default(1000),
  prefetch: z.boolean().default(true),
});

export type BellConfig = z.infer<typeof BellConfigSchema>;
