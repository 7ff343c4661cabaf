import { randomUUID } from 'node:crypto';

import { ValidationError } from '@agenda/shared';

import {
  isActiveStatus,
  type AppointmentResource,
  type AppointmentStatus,
  type BookingChannel
} from '../dtos';
import { addMinutes } from './time';

export interface AppointmentProps {
  id: string;
  providerId: number;
  customerRef: number;
  serviceRef: number | null;
  start: Date;
  durationMinutes: number;
  status: AppointmentStatus;
  bookingChannel: BookingChannel;
  price: number | null;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type CreateAppointmentProperties = Pick<
  AppointmentProps,
  'providerId' | 'customerRef' | 'start' | 'durationMinutes'
> & {
  id?: string;
  serviceRef?: number | null;
  status?: AppointmentStatus;
  bookingChannel?: BookingChannel;
  price?: number | null;
  notes?: string | null;
  createdAt?: Date;
  updatedAt?: Date;
};

export type AppointmentChanges = Partial<
  Pick<
    AppointmentProps,
    | 'providerId'
    | 'customerRef'
    | 'serviceRef'
    | 'start'
    | 'durationMinutes'
    | 'status'
    | 'bookingChannel'
    | 'price'
    | 'notes'
  >
>;

function assertInvariants(props: AppointmentProps): void {
  if (Number.isNaN(props.start.valueOf())) {
    throw new ValidationError('Invalid start date for appointment');
  }

  if (!Number.isInteger(props.durationMinutes) || props.durationMinutes <= 0) {
    throw new ValidationError('durationMinutes must be a positive integer', {
      durationMinutes: props.durationMinutes
    });
  }

  if (!Number.isInteger(props.customerRef) || props.customerRef <= 0) {
    throw new ValidationError('customerRef is required');
  }

  if (!Number.isInteger(props.providerId) || props.providerId <= 0) {
    throw new ValidationError('providerId must be a positive integer', {
      providerId: props.providerId
    });
  }

  if (props.price !== null && !Number.isFinite(props.price)) {
    throw new ValidationError('price must be a number', { price: props.price });
  }
}

export class Appointment {
  private constructor(private readonly props: AppointmentProps) {}

  static schedule(properties: CreateAppointmentProperties): Appointment {
    const now = new Date();
    const props: AppointmentProps = {
      id: properties.id ?? randomUUID(),
      providerId: properties.providerId,
      customerRef: properties.customerRef,
      serviceRef: properties.serviceRef ?? null,
      start: new Date(properties.start),
      durationMinutes: properties.durationMinutes,
      status: properties.status ?? 'scheduled',
      bookingChannel: properties.bookingChannel ?? 'online',
      price: properties.price ?? null,
      notes: properties.notes ?? null,
      createdAt: properties.createdAt ?? now,
      updatedAt: properties.updatedAt ?? now
    };

    assertInvariants(props);
    return new Appointment(props);
  }

  static fromPersistence(row: AppointmentDatabaseRow): Appointment {
    return new Appointment({
      id: row.id,
      providerId: row.provider_id,
      customerRef: row.customer_ref,
      serviceRef: row.service_ref,
      start: new Date(row.start_ts),
      durationMinutes: row.duration_minutes,
      status: row.status,
      bookingChannel: row.booking_channel,
      price: row.price === null ? null : Number(row.price),
      notes: row.notes,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at)
    });
  }

  get id(): string {
    return this.props.id;
  }

  get providerId(): number {
    return this.props.providerId;
  }

  get customerRef(): number {
    return this.props.customerRef;
  }

  get serviceRef(): number | null {
    return this.props.serviceRef;
  }

  get start(): Date {
    return this.props.start;
  }

  get end(): Date {
    return addMinutes(this.props.start, this.props.durationMinutes);
  }

  get durationMinutes(): number {
    return this.props.durationMinutes;
  }

  get status(): AppointmentStatus {
    return this.props.status;
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get isActive(): boolean {
    return isActiveStatus(this.props.status);
  }

  /** A validated copy with `changes` applied; this instance is left untouched. */
  revise(changes: AppointmentChanges): Appointment {
    const current = this.props;
    const next: AppointmentProps = {
      ...current,
      providerId: changes.providerId ?? current.providerId,
      customerRef: changes.customerRef ?? current.customerRef,
      serviceRef: changes.serviceRef === undefined ? current.serviceRef : changes.serviceRef,
      start: changes.start ? new Date(changes.start) : current.start,
      durationMinutes: changes.durationMinutes ?? current.durationMinutes,
      status: changes.status ?? current.status,
      bookingChannel: changes.bookingChannel ?? current.bookingChannel,
      price: changes.price === undefined ? current.price : changes.price,
      notes: changes.notes === undefined ? current.notes : changes.notes,
      updatedAt: new Date()
    };

    assertInvariants(next);
    return new Appointment(next);
  }

  /** True when start, duration or provider differ from `other`. */
  occupiesDifferentWindowThan(other: Appointment): boolean {
    return (
      this.props.providerId !== other.props.providerId ||
      this.props.start.getTime() !== other.props.start.getTime() ||
      this.props.durationMinutes !== other.props.durationMinutes
    );
  }

  toPersistence(): AppointmentDatabaseRow {
    return {
      id: this.props.id,
      provider_id: this.props.providerId,
      customer_ref: this.props.customerRef,
      service_ref: this.props.serviceRef,
      start_ts: this.props.start.toISOString(),
      duration_minutes: this.props.durationMinutes,
      status: this.props.status,
      booking_channel: this.props.bookingChannel,
      price: this.props.price,
      notes: this.props.notes,
      created_at: this.props.createdAt.toISOString(),
      updated_at: this.props.updatedAt.toISOString()
    };
  }

  toDTO(): AppointmentResource {
    return {
      id: this.props.id,
      providerId: this.props.providerId,
      customerRef: this.props.customerRef,
      serviceRef: this.props.serviceRef,
      start: this.props.start.toISOString(),
      end: this.end.toISOString(),
      durationMinutes: this.props.durationMinutes,
      status: this.props.status,
      bookingChannel: this.props.bookingChannel,
      price: this.props.price,
      notes: this.props.notes,
      createdAt: this.props.createdAt.toISOString(),
      updatedAt: this.props.updatedAt.toISOString()
    };
  }

  get propsSnapshot(): AppointmentProps {
    return { ...this.props };
  }
}

export type AppointmentDatabaseRow = {
  id: string;
  provider_id: number;
  customer_ref: number;
  service_ref: number | null;
  start_ts: string | Date;
  duration_minutes: number;
  status: AppointmentStatus;
  booking_channel: BookingChannel;
  /** NUMERIC comes back from pg as a string. */
  price: string | number | null;
  notes: string | null;
  created_at: string | Date;
  updated_at: string | Date;
};
