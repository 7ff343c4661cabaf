import { NotFoundError } from '@agenda/shared';

import type { Appointment } from '../domain/appointment';
import type { DayWindow } from '../domain/time';
import {
  orderedLockNames,
  type AppointmentListFilter,
  type AppointmentRepository,
  type AppointmentUnitOfWork,
  type ProviderDayKey
} from './IAppointmentRepository';
import { KeyedMutex } from './keyedMutex';

function byStart(a: Appointment, b: Appointment): number {
  return (
    a.start.getTime() - b.start.getTime() ||
    a.createdAt.getTime() - b.createdAt.getTime() ||
    a.id.localeCompare(b.id)
  );
}

function onProviderDay(appointment: Appointment, providerId: number, day: DayWindow): boolean {
  return (
    appointment.providerId === providerId &&
    appointment.start >= day.start &&
    appointment.start < day.end
  );
}

/** Staged writes over a snapshot of the committed rows; `null` marks a deletion. */
class InMemoryUnitOfWork implements AppointmentUnitOfWork {
  private readonly staged = new Map<string, Appointment | null>();

  constructor(private readonly committed: Map<string, Appointment>) {}

  private current(): Appointment[] {
    const rows = new Map(this.committed);
    for (const [id, appointment] of this.staged) {
      if (appointment) rows.set(id, appointment);
      else rows.delete(id);
    }
    return [...rows.values()];
  }

  async findByIdForUpdate(id: string): Promise<Appointment | null> {
    if (this.staged.has(id)) return this.staged.get(id) ?? null;
    return this.committed.get(id) ?? null;
  }

  async listForProviderDay(providerId: number, day: DayWindow): Promise<Appointment[]> {
    return this.current()
      .filter((appointment) => onProviderDay(appointment, providerId, day))
      .sort(byStart);
  }

  async create(appointment: Appointment): Promise<Appointment> {
    if (await this.findByIdForUpdate(appointment.id)) {
      throw new Error(`Duplicate appointment id ${appointment.id}`);
    }
    this.staged.set(appointment.id, appointment);
    return appointment;
  }

  async update(appointment: Appointment): Promise<Appointment> {
    if (!(await this.findByIdForUpdate(appointment.id))) {
      throw new NotFoundError('Appointment not found', { appointmentId: appointment.id });
    }
    this.staged.set(appointment.id, appointment);
    return appointment;
  }

  async delete(id: string): Promise<boolean> {
    const existed = (await this.findByIdForUpdate(id)) !== null;
    this.staged.set(id, null);
    return existed;
  }

  commit(): void {
    for (const [id, appointment] of this.staged) {
      if (appointment) this.committed.set(id, appointment);
      else this.committed.delete(id);
    }
    this.staged.clear();
  }
}

/**
 * Process-local store for development and tests. Locks are only as wide as
 * this instance; use the Postgres repository when several processes book.
 */
export class InMemoryAppointmentRepository implements AppointmentRepository {
  private readonly rows = new Map<string, Appointment>();
  private readonly locks = new KeyedMutex();

  async runExclusive<T>(
    keys: readonly ProviderDayKey[],
    work: (unit: AppointmentUnitOfWork) => Promise<T>
  ): Promise<T> {
    const release = await this.locks.acquireAll(orderedLockNames(keys));

    try {
      const unit = new InMemoryUnitOfWork(this.rows);
      const result = await work(unit);
      unit.commit();
      return result;
    } finally {
      release();
    }
  }

  async findById(id: string): Promise<Appointment | null> {
    return this.rows.get(id) ?? null;
  }

  async listForProviderDay(providerId: number, day: DayWindow): Promise<Appointment[]> {
    return [...this.rows.values()]
      .filter((appointment) => onProviderDay(appointment, providerId, day))
      .sort(byStart);
  }

  async list(filter: AppointmentListFilter): Promise<Appointment[]> {
    return [...this.rows.values()]
      .filter(
        (appointment) =>
          (!filter.from || appointment.start >= filter.from) &&
          (!filter.to || appointment.start <= filter.to) &&
          (filter.providerId === undefined || appointment.providerId === filter.providerId) &&
          (!filter.status || appointment.status === filter.status)
      )
      .sort(byStart);
  }

  clear(): void {
    this.rows.clear();
  }
}
