/**
 * Zod schemas for the files bell-player reads
 *
 * Usage:
 *   import { BellConfigSchema } from './schemas/index.js';
 *
 *   const result = BellConfigSchema.safeParse(jsonData);
 *   if (result.success) {
 *     const config = result.data; // Typed as BellConfig, defaults applied
 *   }
 */

// Configuration file
export {
  TimeOfDaySchema,
  ScheduleSchema,
  LinkOrderSchema,
  ClipSchema,
  FormatSchema,
  ToolsSchema,
  DaysSchema,
  BellConfigSchema,
  normalizeTimeOfDay,
  type LinkOrder,
  type ClipSettings,
  type FormatSettings,
  type ToolSettings,
  type BellConfig,
} from './config.js';

// Rotation state file
export { RotationStateSchema, type RotationState } from './state.js';
