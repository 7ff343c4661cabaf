import type { Appointment } from '../domain/appointment';
import type { DayWindow } from '../domain/time';
import type { AppointmentStatus } from '../dtos';

/** One provider's calendar day; the unit that bookings serialize on. */
export interface ProviderDayKey {
  providerId: number;
  day: string;
}

export interface AppointmentListFilter {
  from?: Date;
  to?: Date;
  providerId?: number;
  status?: AppointmentStatus;
}

/** Reads and writes that share one transaction and the locks it holds. */
export interface AppointmentUnitOfWork {
  findByIdForUpdate(id: string): Promise<Appointment | null>;
  listForProviderDay(providerId: number, day: DayWindow): Promise<Appointment[]>;
  create(appointment: Appointment): Promise<Appointment>;
  update(appointment: Appointment): Promise<Appointment>;
  delete(id: string): Promise<boolean>;
}

export interface AppointmentRepository {
  /**
   * Runs `work` atomically while holding an exclusive lock on every key. Writes
   * made through the unit of work are discarded if `work` throws.
   */
  runExclusive<T>(
    keys: readonly ProviderDayKey[],
    work: (unit: AppointmentUnitOfWork) => Promise<T>
  ): Promise<T>;
  findById(id: string): Promise<Appointment | null>;
  listForProviderDay(providerId: number, day: DayWindow): Promise<Appointment[]>;
  list(filter: AppointmentListFilter): Promise<Appointment[]>;
}

export function lockName({ providerId, day }: ProviderDayKey): string {
  return `appointments:${providerId}:${day}`;
}

/** Distinct lock names in a stable order, so two callers never wait on each other crosswise. */
export function orderedLockNames(keys: readonly ProviderDayKey[]): string[] {
  return [...new Set(keys.map(lockName))].sort();
}
