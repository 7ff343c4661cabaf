import { z } from 'zod';

export const appointmentStatusSchema = z.enum([
  'scheduled',
  'confirmed',
  'completed',
  'cancelled',
  'no_show'
]);

export const bookingChannelSchema = z.enum(['online', 'phone', 'walk_in']);

/** Ids read from query strings, path params and headers, which arrive as text. */
export const positiveIdSchema = z.coerce.number().int().positive();

/** Ids inside JSON bodies must already be numbers. */
export const bodyIdSchema = z.number().int().positive();

export type AppointmentStatus = z.infer<typeof appointmentStatusSchema>;
export type BookingChannel = z.infer<typeof bookingChannelSchema>;

/** Statuses that no longer hold a place in the provider's day. */
export const INERT_STATUSES: readonly AppointmentStatus[] = ['cancelled', 'no_show'];

export function isActiveStatus(status: AppointmentStatus): boolean {
  return !INERT_STATUSES.includes(status);
}
