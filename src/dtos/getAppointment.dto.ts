import { z } from 'zod';

import { appointmentResourceSchema } from './createAppointment.dto';
import { appointmentStatusSchema, positiveIdSchema } from './appointment.common';

export const getAppointmentParamsSchema = z.object({
  id: z.string().uuid()
});

export const listAppointmentsQuerySchema = z.object({
  from: z.string().trim().min(1).optional(),
  to: z.string().trim().min(1).optional(),
  providerId: positiveIdSchema.optional(),
  status: appointmentStatusSchema.optional()
});

export const listAppointmentsResponseSchema = z.object({
  items: z.array(appointmentResourceSchema),
  total: z.number().int().nonnegative()
});

export const deleteAppointmentResponseSchema = z.object({
  ok: z.literal(true),
  deletedId: z.string().uuid()
});

export type GetAppointmentParams = z.infer<typeof getAppointmentParamsSchema>;
export type ListAppointmentsQuery = z.infer<typeof listAppointmentsQuerySchema>;
export type ListAppointmentsResponse = z.infer<typeof listAppointmentsResponseSchema>;
export type DeleteAppointmentResponse = z.infer<typeof deleteAppointmentResponseSchema>;
