import { z } from 'zod';

import {
  appointmentStatusSchema,
  bookingChannelSchema,
  positiveIdSchema
} from './appointment.common';

export const calendarQuerySchema = z.object({
  from: z.string().trim().min(1),
  to: z.string().trim().min(1),
  providerId: positiveIdSchema.optional()
});

export const calendarEntrySchema = z.object({
  id: z.string().uuid(),
  title: z.string(),
  start: z.string().datetime(),
  end: z.string().datetime(),
  providerId: z.number().int().positive(),
  provider: z.string(),
  customerRef: z.number().int().positive(),
  serviceRef: z.number().int().positive().nullable(),
  status: appointmentStatusSchema,
  bookingChannel: bookingChannelSchema,
  notes: z.string().nullable()
});

export const calendarResponseSchema = z.array(calendarEntrySchema);

export type CalendarQuery = z.infer<typeof calendarQuerySchema>;
export type CalendarEntry = z.infer<typeof calendarEntrySchema>;
export type CalendarResponse = z.infer<typeof calendarResponseSchema>;
