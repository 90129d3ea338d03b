/**
 * Rotation state Zod schema
 *
 * Validates the state file that carries the link cursor across restarts.
 */

import { z } from 'zod';

export const RotationStateSchema = z.object({
  nextIndex: z.number().int().min(0),
  lastRungAt: z.string().datetime().nullable(),
  lastUrl: z.string().nullable(),
});

export type RotationState = z.infer<typeof RotationStateSchema>;
