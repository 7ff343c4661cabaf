import { z } from 'zod';

import {
  appointmentStatusSchema,
  bookingChannelSchema,
  bodyIdSchema
} from './appointment.common';

const isoDateTimeSchema = z.string().datetime();

export const appointmentResourceSchema = z.object({
  id: z.string().uuid(),
  providerId: z.number().int().positive(),
  customerRef: z.number().int().positive(),
  serviceRef: z.number().int().positive().nullable(),
  start: isoDateTimeSchema,
  end: isoDateTimeSchema,
  durationMinutes: z.number().int().positive(),
  status: appointmentStatusSchema,
  bookingChannel: bookingChannelSchema,
  price: z.number().nullable(),
  notes: z.string().nullable(),
  createdAt: isoDateTimeSchema,
  updatedAt: isoDateTimeSchema
});

export const createAppointmentRequestSchema = z.object({
  providerId: bodyIdSchema.optional(),
  customerRef: bodyIdSchema,
  serviceRef: bodyIdSchema.nullish(),
  start: z.string().trim().min(1),
  durationMinutes: z.number().int().nullish(),
  status: appointmentStatusSchema.optional(),
  bookingChannel: bookingChannelSchema.optional(),
  price: z.number().nullish(),
  notes: z.string().max(500).nullish()
});

export const createAppointmentResponseSchema = appointmentResourceSchema;

export type AppointmentResource = z.infer<typeof appointmentResourceSchema>;
export type CreateAppointmentRequest = z.infer<typeof createAppointmentRequestSchema>;
export type CreateAppointmentResponse = z.infer<typeof createAppointmentResponseSchema>;
