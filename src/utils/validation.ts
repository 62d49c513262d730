/**
 * Zod validation schemas for API requests
 */

import { z } from 'zod';
import { COLORS, SPEEDS } from '../types/index.js';

const colorSchema = z.enum(COLORS);

const scoreSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('cp'), value: z.number().int() }),
  z.object({ type: z.literal('mate'), value: z.number().int() }),
]);

export const observationSchema = z.object({
  gameId: z.string().min(1, 'gameId is required').max(64),
  userId: z.string().min(1, 'userId is required').max(64),
  color: colorSchema,
  speed: z.enum(SPEEDS),
  clock: z
    .object({
      initialSeconds: z.number().int().min(0),
      incrementSeconds: z.number().int().min(0),
    })
    .optional(),
  turns: z.number().int().min(0),
  isSimul: z.boolean().default(false),
  winner: colorSchema.optional(),
  moveTimes: z.array(z.number().int().min(0)).max(2000),
  blurs: z.array(z.boolean()).max(2000),
  evaluations: z.array(scoreSchema.nullable()).max(4000),
  holdAlert: z.object({ suspicious: z.boolean() }).nullable().default(null),
});

export type ObservationInput = z.infer<typeof observationSchema>;

export function validateRequest<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): { success: true; data: T } | { success: false; errors: z.ZodError } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: result.error };
}
