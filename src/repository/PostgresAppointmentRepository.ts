import { NotFoundError, getDb, withTransaction } from '@agenda/shared';
import type { PoolClient } from 'pg';

import { Appointment, type AppointmentDatabaseRow } from '../domain/appointment';
import type { DayWindow } from '../domain/time';
import {
  orderedLockNames,
  type AppointmentListFilter,
  type AppointmentRepository,
  type AppointmentUnitOfWork,
  type ProviderDayKey
} from './IAppointmentRepository';

const APPOINTMENT_COLUMNS = `
  id,
  provider_id,
  customer_ref,
  service_ref,
  start_ts,
  duration_minutes,
  status,
  booking_channel,
  price,
  notes,
  created_at,
  updated_at
`;

const SELECT_PROVIDER_DAY = `
  SELECT ${APPOINTMENT_COLUMNS}
    FROM appointments
   WHERE provider_id = $1
     AND start_ts >= $2
     AND start_ts < $3
   ORDER BY start_ts ASC, created_at ASC, id ASC`;

function mapAppointmentRow(row: AppointmentDatabaseRow): Appointment {
  return Appointment.fromPersistence(row);
}

function providerDayParams(providerId: number, day: DayWindow): unknown[] {
  return [providerId, day.start.toISOString(), day.end.toISOString()];
}

class PostgresUnitOfWork implements AppointmentUnitOfWork {
  constructor(private readonly client: PoolClient) {}

  async findByIdForUpdate(id: string): Promise<Appointment | null> {
    const result = await this.client.query<AppointmentDatabaseRow>(
      `SELECT ${APPOINTMENT_COLUMNS}
         FROM appointments
        WHERE id = $1
        FOR UPDATE`,
      [id]
    );

    if (result.rows.length === 0) return null;
    return mapAppointmentRow(result.rows[0]);
  }

  async listForProviderDay(providerId: number, day: DayWindow): Promise<Appointment[]> {
    const result = await this.client.query<AppointmentDatabaseRow>(
      SELECT_PROVIDER_DAY,
      providerDayParams(providerId, day)
    );
    return result.rows.map(mapAppointmentRow);
  }

  async create(appointment: Appointment): Promise<Appointment> {
    const row = appointment.toPersistence();
    const result = await this.client.query<AppointmentDatabaseRow>(
      `INSERT INTO appointments (
        id,
        provider_id,
        customer_ref,
        service_ref,
        start_ts,
        duration_minutes,
        status,
        booking_channel,
        price,
        notes,
        created_at,
        updated_at
      ) VALUES (
        $1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12
      ) RETURNING ${APPOINTMENT_COLUMNS}`,
      [
        row.id,
        row.provider_id,
        row.customer_ref,
        row.service_ref,
        row.start_ts,
        row.duration_minutes,
        row.status,
        row.booking_channel,
        row.price,
        row.notes,
        row.created_at,
        row.updated_at
      ]
    );

    return mapAppointmentRow(result.rows[0]);
  }

  async update(appointment: Appointment): Promise<Appointment> {
    const row = appointment.toPersistence();
    const result = await this.client.query<AppointmentDatabaseRow>(
      `UPDATE appointments
          SET provider_id = $2,
              customer_ref = $3,
              service_ref = $4,
              start_ts = $5,
              duration_minutes = $6,
              status = $7,
              booking_channel = $8,
              price = $9,
              notes = $10,
              updated_at = $11
        WHERE id = $1
        RETURNING ${APPOINTMENT_COLUMNS}`,
      [
        row.id,
        row.provider_id,
        row.customer_ref,
        row.service_ref,
        row.start_ts,
        row.duration_minutes,
        row.status,
        row.booking_channel,
        row.price,
        row.notes,
        row.updated_at
      ]
    );

    if (result.rows.length === 0) {
      throw new NotFoundError('Appointment not found', { appointmentId: appointment.id });
    }

    return mapAppointmentRow(result.rows[0]);
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.client.query('DELETE FROM appointments WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}

export class PostgresAppointmentRepository implements AppointmentRepository {
  /**
   * One transaction guarded by transaction-scoped advisory locks, so the
   * guarantee holds across every process sharing the database.
   */
  async runExclusive<T>(
    keys: readonly ProviderDayKey[],
    work: (unit: AppointmentUnitOfWork) => Promise<T>
  ): Promise<T> {
    return withTransaction(async (client) => {
      for (const name of orderedLockNames(keys)) {
        await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [name]);
      }

      return work(new PostgresUnitOfWork(client));
    });
  }

  async findById(id: string): Promise<Appointment | null> {
    const result = await getDb().query<AppointmentDatabaseRow>(
      `SELECT ${APPOINTMENT_COLUMNS} FROM appointments WHERE id = $1`,
      [id]
    );

    if (result.rows.length === 0) return null;
    return mapAppointmentRow(result.rows[0]);
  }

  async listForProviderDay(providerId: number, day: DayWindow): Promise<Appointment[]> {
    const result = await getDb().query<AppointmentDatabaseRow>(
      SELECT_PROVIDER_DAY,
      providerDayParams(providerId, day)
    );
    return result.rows.map(mapAppointmentRow);
  }

  async list(filter: AppointmentListFilter): Promise<Appointment[]> {
    const filters: string[] = [];
    const params: unknown[] = [];

    if (filter.from) {
      params.push(filter.from.toISOString());
      filters.push(`start_ts >= $${params.length}`);
    }

    if (filter.to) {
      params.push(filter.to.toISOString());
      filters.push(`start_ts <= $${params.length}`);
    }

    if (filter.providerId !== undefined) {
      params.push(filter.providerId);
      filters.push(`provider_id = $${params.length}`);
    }

    if (filter.status) {
      params.push(filter.status);
      filters.push(`status = $${params.length}`);
    }

    const whereClause = filters.length ? `WHERE ${filters.join(' AND ')}` : '';
    const result = await getDb().query<AppointmentDatabaseRow>(
      `SELECT ${APPOINTMENT_COLUMNS}
         FROM appointments
         ${whereClause}
        ORDER BY start_ts ASC, created_at ASC, id ASC`,
      params
    );

    return result.rows.map(mapAppointmentRow);
  }
}
