import { z } from 'zod';

import {
  appointmentStatusSchema,
  bookingChannelSchema,
  bodyIdSchema
} from './appointment.common';

export const updateAppointmentParamsSchema = z.object({
  id: z.string().uuid()
});

export const updateAppointmentBodySchema = z.object({
  providerId: bodyIdSchema.optional(),
  customerRef: bodyIdSchema.optional(),
  serviceRef: bodyIdSchema.nullable().optional(),
  start: z.string().trim().min(1).optional(),
  durationMinutes: z.number().int().optional(),
  status: appointmentStatusSchema.optional(),
  bookingChannel: bookingChannelSchema.optional(),
  price: z.number().nullable().optional(),
  notes: z.string().max(500).nullable().optional()
});

export type UpdateAppointmentParams = z.infer<typeof updateAppointmentParamsSchema>;
export type UpdateAppointmentBody = z.infer<typeof updateAppointmentBodySchema>;
