import { z } from 'zod';

import { appointmentStatusSchema } from './appointment.common';

export const updateAppointmentStatusParamsSchema = z.object({
  id: z.string().uuid()
});

export const updateAppointmentStatusBodySchema = z.object({
  status: appointmentStatusSchema
});

export type UpdateAppointmentStatusParams = z.infer<typeof updateAppointmentStatusParamsSchema>;
export type UpdateAppointmentStatusBody = z.infer<typeof updateAppointmentStatusBodySchema>;
