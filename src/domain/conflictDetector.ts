import type { Appointment } from './appointment';
import { addMinutes, dayWindowOf } from './time';

export interface ConflictCandidate {
  providerId: number;
  start: Date;
  durationMinutes: number;
  /** Id of the appointment being edited, which must not collide with itself. */
  excludeId?: string;
}

export interface ConflictDetectionOptions {
  /** Zone whose calendar day buckets appointments. */
  timezone: string;
}

/**
 * First active appointment of the same provider and calendar day whose
 * `[start, end)` overlaps the candidate, in the order given; `null` when the
 * window is free.
 */
export function findConflict(
  candidate: ConflictCandidate,
  existing: readonly Appointment[],
  { timezone }: ConflictDetectionOptions
): Appointment | null {
  const candidateEnd = addMinutes(candidate.start, candidate.durationMinutes);
  const day = dayWindowOf(candidate.start, timezone);

  return (
    existing.find(
      (appointment) =>
        appointment.providerId === candidate.providerId &&
        appointment.start >= day.start &&
        appointment.start < day.end &&
        appointment.isActive &&
        appointment.id !== candidate.excludeId &&
        candidate.start < appointment.end &&
        candidateEnd > appointment.start
    ) ?? null
  );
}
