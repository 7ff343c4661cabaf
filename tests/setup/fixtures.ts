import { Appointment, type CreateAppointmentProperties } from '../../src/domain/appointment';

/** Instant on 2025-03-10 (UTC) at the given wall-clock time. */
export function at(time: string, date = '2025-03-10'): Date {
  return new Date(`${date}T${time}:00.000Z`);
}

export function bookedAppointment(
  overrides: Partial<CreateAppointmentProperties> & { start: Date }
): Appointment {
  return Appointment.schedule({
    providerId: 1,
    customerRef: 7,
    durationMinutes: 30,
    ...overrides
  });
}

export const PROVIDER_HOURS = {
  default: [{ open: '09:00', close: '19:00' }],
  providers: {
    '1': [
      { open: '08:00', close: '12:00' },
      { open: '14:00', close: '19:00' }
    ],
    '2': [
      { open: '09:00', close: '13:00' },
      { open: '15:00', close: '20:00' }
    ]
  }
};
