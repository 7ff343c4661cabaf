import { z } from 'zod';

import { positiveIdSchema } from './appointment.common';

export const checkConflictQuerySchema = z.object({
  providerId: positiveIdSchema,
  start: z.string().trim().min(1),
  durationMinutes: z.coerce.number().int().optional(),
  excludeId: z.string().uuid().optional()
});

export const conflictWindowSchema = z.object({
  id: z.string().uuid(),
  start: z.string().datetime(),
  end: z.string().datetime()
});

export const checkConflictResponseSchema = z.discriminatedUnion('conflict', [
  z.object({ conflict: z.literal(false) }),
  z.object({ conflict: z.literal(true), with: conflictWindowSchema })
]);

export type CheckConflictQuery = z.infer<typeof checkConflictQuerySchema>;
export type ConflictWindow = z.infer<typeof conflictWindowSchema>;
export type CheckConflictResponse = z.infer<typeof checkConflictResponseSchema>;
