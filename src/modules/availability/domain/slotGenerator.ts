import { ValidationError } from '@agenda/shared';

import type { Appointment } from '../../../domain/appointment';
import { addMinutes, dayWindowForDate } from '../../../domain/time';
import { resolveBaseIntervals, type BusinessHoursTemplate } from './businessHours';
import { mergeIntervals, subtractIntervals, type TimeInterval } from './intervals';

export interface SlotRequest {
  providerId: number;
  /** Calendar date, YYYY-MM-DD, in `timezone`. */
  date: string;
  timezone: string;
  durationMinutes: number;
  stepMinutes: number;
  /** Idle time kept after every booked appointment. */
  bufferMinutes: number;
  businessHours: BusinessHoursTemplate;
  appointments: readonly Appointment[];
}

export type Slot = TimeInterval;

function assertSlotParameters({ durationMinutes, stepMinutes, bufferMinutes }: SlotRequest): void {
  if (!Number.isInteger(durationMinutes) || durationMinutes <= 0) {
    throw new ValidationError('durationMinutes must be a positive integer', { durationMinutes });
  }

  if (!Number.isInteger(stepMinutes) || stepMinutes <= 0) {
    throw new ValidationError('stepMinutes must be a positive integer', { stepMinutes });
  }

  if (!Number.isInteger(bufferMinutes) || bufferMinutes < 0) {
    throw new ValidationError('bufferMinutes must be a non-negative integer', { bufferMinutes });
  }
}

/**
 * Busy time of the provider on the requested day: every active appointment
 * starting that day, extended by the buffer, merged.
 */
export function buildBusyIntervals(request: SlotRequest): TimeInterval[] {
  const day = dayWindowForDate(request.date, request.timezone);

  return mergeIntervals(
    request.appointments
      .filter(
        (appointment) =>
          appointment.providerId === request.providerId &&
          appointment.isActive &&
          appointment.start >= day.start &&
          appointment.start < day.end
      )
      .map((appointment) => ({
        start: appointment.start,
        end: addMinutes(appointment.end, request.bufferMinutes)
      }))
  );
}

export function freeIntervals(request: SlotRequest): TimeInterval[] {
  const base = resolveBaseIntervals(request.businessHours, request.date, request.timezone);
  return subtractIntervals(base, buildBusyIntervals(request));
}

function* slideWindow(
  free: readonly TimeInterval[],
  durationMinutes: number,
  stepMinutes: number
): Generator<Slot> {
  for (const interval of free) {
    let cursor = interval.start;
    while (addMinutes(cursor, durationMinutes) <= interval.end) {
      yield { start: cursor, end: addMinutes(cursor, durationMinutes) };
      cursor = addMinutes(cursor, stepMinutes);
    }
  }
}

/**
 * Start/end pairs at which a booking of `durationMinutes` fits entirely inside
 * open time. Parameters are checked eagerly; slots are computed lazily, afresh
 * on every iteration.
 */
export function generateSlots(request: SlotRequest): Iterable<Slot> {
  assertSlotParameters(request);

  return {
    [Symbol.iterator]: () =>
      slideWindow(freeIntervals(request), request.durationMinutes, request.stepMinutes)
  };
}
