import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
  appointmentMetrics,
  config,
  getEventBus,
  logger,
  runWithSpan,
  APPOINTMENT_CREATED_EVENT,
  APPOINTMENT_DELETED_EVENT,
  APPOINTMENT_STATUS_CHANGED_EVENT,
  APPOINTMENT_UPDATED_EVENT,
  type AppointmentCreatedEvent,
  type AppointmentDeletedEvent,
  type AppointmentEventName,
  type AppointmentStatusChangedEvent,
  type AppointmentUpdatedEvent,
  type IEventBus
} from '@agenda/shared';

import { Appointment, type AppointmentChanges } from '../../domain/appointment';
import { findConflict } from '../../domain/conflictDetector';
import { resolveStatusPolicy, type StatusTransitionPolicy } from '../../domain/statusPolicy';
import { dayWindowOf, parseTimestamp } from '../../domain/time';
import type {
  AppointmentResource,
  AppointmentStatus,
  CalendarEntry,
  CalendarQuery,
  CalendarResponse,
  CheckConflictQuery,
  CheckConflictResponse,
  CreateAppointmentRequest,
  CreateAppointmentResponse,
  DeleteAppointmentResponse,
  ListAppointmentsQuery,
  ListAppointmentsResponse,
  UpdateAppointmentBody
} from '../../dtos';
import {
  lockName,
  type AppointmentRepository,
  type AppointmentUnitOfWork,
  type ProviderDayKey
} from '../../repository/IAppointmentRepository';
import { InMemoryNameDirectory, type NameDirectory } from '../../repository/NameDirectory';
import type { ServiceCatalog } from '../../repository/ServiceCatalog';

/**
 * Pre-authorized restriction handed down by the caller's auth layer. When
 * `providerId` is set, only that provider's appointments are visible.
 */
export interface AppointmentScope {
  providerId?: number;
}

export interface AppointmentService {
  createAppointment(
    data: CreateAppointmentRequest,
    scope?: AppointmentScope
  ): Promise<CreateAppointmentResponse>;
  getAppointmentById(id: string, scope?: AppointmentScope): Promise<AppointmentResource | null>;
  listAppointments(
    query: ListAppointmentsQuery,
    scope?: AppointmentScope
  ): Promise<ListAppointmentsResponse>;
  listCalendar(query: CalendarQuery, scope?: AppointmentScope): Promise<CalendarResponse>;
  updateAppointment(
    id: string,
    changes: UpdateAppointmentBody,
    scope?: AppointmentScope
  ): Promise<AppointmentResource>;
  changeStatus(
    id: string,
    status: AppointmentStatus,
    scope?: AppointmentScope
  ): Promise<AppointmentResource>;
  deleteAppointment(id: string, scope?: AppointmentScope): Promise<DeleteAppointmentResponse>;
  checkConflict(query: CheckConflictQuery): Promise<CheckConflictResponse>;
}

export interface AppointmentServiceOptions {
  timezone: string;
  defaultDurationMinutes: number;
  statusPolicy: StatusTransitionPolicy;
  eventBus: IEventBus;
  directory: NameDirectory;
}

function inScope(appointment: Appointment, scope: AppointmentScope): boolean {
  return scope.providerId === undefined || appointment.providerId === scope.providerId;
}

function uniqueIds(ids: Iterable<number | null>): number[] {
  const unique = new Set<number>();
  for (const id of ids) {
    if (id !== null) unique.add(id);
  }
  return [...unique].sort((a, b) => a - b);
}

function listChangedFields(changes: UpdateAppointmentBody): string[] {
  return Object.entries(changes)
    .filter(([, value]) => value !== undefined)
    .map(([field]) => field);
}

export class SchedulingAppointmentService implements AppointmentService {
  private readonly options: AppointmentServiceOptions;

  constructor(
    private readonly repository: AppointmentRepository,
    private readonly catalog: ServiceCatalog,
    options: Partial<AppointmentServiceOptions> = {}
  ) {
    this.options = {
      timezone: options.timezone ?? config.BUSINESS_TIMEZONE,
      defaultDurationMinutes: options.defaultDurationMinutes ?? config.DEFAULT_DURATION_MINUTES,
      statusPolicy: options.statusPolicy ?? resolveStatusPolicy(config.STATUS_TRANSITION_POLICY),
      eventBus: options.eventBus ?? getEventBus(),
      directory: options.directory ?? new InMemoryNameDirectory()
    };
  }

  async createAppointment(
    data: CreateAppointmentRequest,
    scope: AppointmentScope = {}
  ): Promise<CreateAppointmentResponse> {
    return runWithSpan(
      'SchedulingAppointmentService.createAppointment',
      async () => {
        const providerId = data.providerId ?? scope.providerId;
        if (providerId === undefined) {
          throw new ValidationError('providerId is required');
        }
        this.assertProviderInScope(providerId, scope);

        const appointment = Appointment.schedule({
          providerId,
          customerRef: data.customerRef,
          serviceRef: data.serviceRef ?? null,
          start: parseTimestamp(data.start, this.options.timezone),
          durationMinutes: await this.resolveDuration(data.durationMinutes, data.serviceRef),
          status: data.status,
          bookingChannel: data.bookingChannel,
          price: data.price ?? null,
          notes: data.notes ?? null
        });

        const persisted = await this.repository.runExclusive(
          [this.keyOf(appointment)],
          async (unit) => {
            if (appointment.isActive) {
              await this.assertWindowIsFree(unit, appointment);
            }
            return unit.create(appointment);
          }
        );

        appointmentMetrics.created.inc();
        logger
          .withContext({ appointmentId: persisted.id, providerId: persisted.providerId })
          .info({ start: persisted.start.toISOString() }, 'Appointment booked');

        await this.publish<AppointmentCreatedEvent>(APPOINTMENT_CREATED_EVENT, {
          appointmentId: persisted.id,
          providerId: persisted.providerId,
          customerRef: persisted.customerRef,
          serviceRef: persisted.serviceRef,
          start: persisted.start.toISOString(),
          end: persisted.end.toISOString(),
          status: persisted.status
        });

        return persisted.toDTO();
      },
      { 'provider.id': data.providerId ?? scope.providerId }
    );
  }

  async getAppointmentById(
    id: string,
    scope: AppointmentScope = {}
  ): Promise<AppointmentResource | null> {
    const appointment = await this.repository.findById(id);
    return appointment && inScope(appointment, scope) ? appointment.toDTO() : null;
  }

  async listAppointments(
    query: ListAppointmentsQuery,
    scope: AppointmentScope = {}
  ): Promise<ListAppointmentsResponse> {
    if (query.providerId !== undefined) {
      this.assertProviderInScope(query.providerId, scope);
    }

    const { timezone } = this.options;
    const appointments = await this.repository.list({
      from: query.from ? parseTimestamp(query.from, timezone) : undefined,
      to: query.to ? parseTimestamp(query.to, timezone) : undefined,
      providerId: query.providerId ?? scope.providerId,
      status: query.status
    });

    return {
      items: appointments.map((appointment) => appointment.toDTO()),
      total: appointments.length
    };
  }

  /** Range view for calendar clients: each entry carries display names resolved in bulk. */
  async listCalendar(
    query: CalendarQuery,
    scope: AppointmentScope = {}
  ): Promise<CalendarResponse> {
    return runWithSpan(
      'SchedulingAppointmentService.listCalendar',
      async () => {
        if (query.providerId !== undefined) {
          this.assertProviderInScope(query.providerId, scope);
        }

        const { timezone, directory } = this.options;
        const from = parseTimestamp(query.from, timezone);
        const to = parseTimestamp(query.to, timezone);
        if (to < from) {
          throw new ValidationError('to must not be before from', {
            from: query.from,
            to: query.to
          });
        }

        const appointments = await this.repository.list({
          from,
          to,
          providerId: query.providerId ?? scope.providerId
        });

        const [customers, services, providers] = await Promise.all([
          directory.customerNames(uniqueIds(appointments.map((a) => a.customerRef))),
          directory.serviceNames(uniqueIds(appointments.map((a) => a.serviceRef))),
          directory.providerNames(uniqueIds(appointments.map((a) => a.providerId)))
        ]);

        return appointments.map((appointment): CalendarEntry => {
          const dto = appointment.toDTO();
          const customer = customers.get(dto.customerRef) ?? `Customer #${dto.customerRef}`;
          const service = dto.serviceRef === null ? undefined : services.get(dto.serviceRef);

          return {
            id: dto.id,
            title: service ? `${customer} · ${service}` : customer,
            start: dto.start,
            end: dto.end,
            providerId: dto.providerId,
            provider: providers.get(dto.providerId) ?? `Provider #${dto.providerId}`,
            customerRef: dto.customerRef,
            serviceRef: dto.serviceRef,
            status: dto.status,
            bookingChannel: dto.bookingChannel,
            notes: dto.notes
          };
        });
      },
      { 'provider.id': query.providerId ?? scope.providerId }
    );
  }

  async updateAppointment(
    id: string,
    changes: UpdateAppointmentBody,
    scope: AppointmentScope = {}
  ): Promise<AppointmentResource> {
    return runWithSpan(
      'SchedulingAppointmentService.updateAppointment',
      async () => {
        if (changes.providerId !== undefined) {
          this.assertProviderInScope(changes.providerId, scope);
        }

        const revision: AppointmentChanges = {
          providerId: changes.providerId,
          customerRef: changes.customerRef,
          serviceRef: changes.serviceRef,
          start:
            changes.start === undefined
              ? undefined
              : parseTimestamp(changes.start, this.options.timezone),
          durationMinutes: changes.durationMinutes,
          status: changes.status,
          bookingChannel: changes.bookingChannel,
          price: changes.price,
          notes: changes.notes
        };

        const existing = await this.loadInScope(id, scope);
        const target = existing.revise(revision);

        const keys = [this.keyOf(existing), this.keyOf(target)];
        const updated = await this.repository.runExclusive(keys, async (unit) => {
          const current = await this.lockInScope(unit, id, scope);
          this.assertSameKey(current, existing);
          if (revision.status !== undefined) {
            this.assertTransition(current.status, revision.status);
          }

          const next = current.revise(revision);
          this.assertSameKey(next, target);

          const reactivated = next.isActive && !current.isActive;
          if (next.isActive && (reactivated || next.occupiesDifferentWindowThan(current))) {
            await this.assertWindowIsFree(unit, next);
          }

          return unit.update(next);
        });

        appointmentMetrics.updated.inc();
        logger
          .withContext({ appointmentId: updated.id, providerId: updated.providerId })
          .info({ changedFields: listChangedFields(changes) }, 'Appointment updated');

        await this.publish<AppointmentUpdatedEvent>(APPOINTMENT_UPDATED_EVENT, {
          appointmentId: updated.id,
          providerId: updated.providerId,
          start: updated.start.toISOString(),
          end: updated.end.toISOString(),
          changedFields: listChangedFields(changes)
        });

        return updated.toDTO();
      },
      { 'appointment.id': id }
    );
  }

  async changeStatus(
    id: string,
    status: AppointmentStatus,
    scope: AppointmentScope = {}
  ): Promise<AppointmentResource> {
    return runWithSpan(
      'SchedulingAppointmentService.changeStatus',
      async () => {
        const existing = await this.loadInScope(id, scope);
        let previousStatus: AppointmentStatus = existing.status;

        const updated = await this.repository.runExclusive([this.keyOf(existing)], async (unit) => {
          const current = await this.lockInScope(unit, id, scope);
          this.assertSameKey(current, existing);
          this.assertTransition(current.status, status);
          previousStatus = current.status;

          const next = current.revise({ status });
          if (next.isActive && !current.isActive) {
            await this.assertWindowIsFree(unit, next);
          }

          return unit.update(next);
        });

        appointmentMetrics.statusChanges.labels(status).inc();
        logger
          .withContext({ appointmentId: updated.id, providerId: updated.providerId })
          .info({ previousStatus, status }, 'Appointment status changed');

        await this.publish<AppointmentStatusChangedEvent>(APPOINTMENT_STATUS_CHANGED_EVENT, {
          appointmentId: updated.id,
          providerId: updated.providerId,
          previousStatus,
          status: updated.status,
          occurredAt: updated.propsSnapshot.updatedAt.toISOString()
        });

        return updated.toDTO();
      },
      { 'appointment.id': id, status }
    );
  }

  async deleteAppointment(
    id: string,
    scope: AppointmentScope = {}
  ): Promise<DeleteAppointmentResponse> {
    return runWithSpan(
      'SchedulingAppointmentService.deleteAppointment',
      async () => {
        const existing = await this.loadInScope(id, scope);
        const removed = await this.repository.runExclusive([this.keyOf(existing)], async (unit) => {
          const current = await this.lockInScope(unit, id, scope);
          this.assertSameKey(current, existing);
          await unit.delete(id);
          return current;
        });

        appointmentMetrics.deleted.inc();
        logger
          .withContext({ appointmentId: id, providerId: removed.providerId })
          .info('Appointment deleted');

        await this.publish<AppointmentDeletedEvent>(APPOINTMENT_DELETED_EVENT, {
          appointmentId: id,
          providerId: removed.providerId,
          deletedAt: new Date().toISOString()
        });

        return { ok: true, deletedId: id };
      },
      { 'appointment.id': id }
    );
  }

  async checkConflict(query: CheckConflictQuery): Promise<CheckConflictResponse> {
    const { timezone } = this.options;
    const start = parseTimestamp(query.start, timezone);
    const durationMinutes = query.durationMinutes ?? this.options.defaultDurationMinutes;

    if (durationMinutes <= 0) {
      throw new ValidationError('durationMinutes must be a positive integer', { durationMinutes });
    }

    const sameDay = await this.repository.listForProviderDay(
      query.providerId,
      dayWindowOf(start, timezone)
    );
    const conflict = findConflict(
      { providerId: query.providerId, start, durationMinutes, excludeId: query.excludeId },
      sameDay,
      { timezone }
    );

    if (!conflict) {
      return { conflict: false };
    }

    return {
      conflict: true,
      with: {
        id: conflict.id,
        start: conflict.start.toISOString(),
        end: conflict.end.toISOString()
      }
    };
  }

  private keyOf(appointment: Appointment): ProviderDayKey {
    return {
      providerId: appointment.providerId,
      day: dayWindowOf(appointment.start, this.options.timezone).day
    };
  }

  private async resolveDuration(
    explicit: number | null | undefined,
    serviceRef: number | null | undefined
  ): Promise<number> {
    if (explicit !== undefined && explicit !== null) {
      return explicit;
    }

    if (serviceRef) {
      const catalogDuration = await this.catalog.findDefaultDuration(serviceRef);
      if (catalogDuration !== null) {
        return catalogDuration;
      }
    }

    return this.options.defaultDurationMinutes;
  }

  private assertProviderInScope(providerId: number, scope: AppointmentScope): void {
    if (scope.providerId !== undefined && scope.providerId !== providerId) {
      throw new ForbiddenError('Only appointments of your own provider are allowed', {
        providerId,
        scopeProviderId: scope.providerId
      });
    }
  }

  private assertTransition(from: AppointmentStatus, to: AppointmentStatus): void {
    if (!this.options.statusPolicy(from, to)) {
      throw new ValidationError(`Status transition from ${from} to ${to} is not allowed`, {
        from,
        to
      });
    }
  }

  /** The locked key was derived from a pre-read; a concurrent move makes it stale. */
  private assertSameKey(locked: Appointment, expected: Appointment): void {
    if (lockName(this.keyOf(locked)) !== lockName(this.keyOf(expected))) {
      throw new ConflictError('Appointment was modified concurrently, retry the request', {
        appointmentId: locked.id
      });
    }
  }

  private async assertWindowIsFree(
    unit: AppointmentUnitOfWork,
    candidate: Appointment
  ): Promise<void> {
    const { timezone } = this.options;
    const sameDay = await unit.listForProviderDay(
      candidate.providerId,
      dayWindowOf(candidate.start, timezone)
    );
    const conflict = findConflict(
      {
        providerId: candidate.providerId,
        start: candidate.start,
        durationMinutes: candidate.durationMinutes,
        excludeId: candidate.id
      },
      sameDay,
      { timezone }
    );

    if (conflict) {
      appointmentMetrics.conflicts.inc();
      throw new ConflictError(
        `Conflicts with appointment ${conflict.id} from ${conflict.start.toISOString()} to ${conflict.end.toISOString()}`,
        {
          conflictingAppointment: {
            id: conflict.id,
            start: conflict.start.toISOString(),
            end: conflict.end.toISOString()
          }
        }
      );
    }
  }

  private async loadInScope(id: string, scope: AppointmentScope): Promise<Appointment> {
    const appointment = await this.repository.findById(id);
    if (!appointment || !inScope(appointment, scope)) {
      throw new NotFoundError('Appointment not found', { appointmentId: id });
    }
    return appointment;
  }

  private async lockInScope(
    unit: AppointmentUnitOfWork,
    id: string,
    scope: AppointmentScope
  ): Promise<Appointment> {
    const appointment = await unit.findByIdForUpdate(id);
    if (!appointment || !inScope(appointment, scope)) {
      throw new NotFoundError('Appointment not found', { appointmentId: id });
    }
    return appointment;
  }

  private async publish<T>(eventName: AppointmentEventName, payload: T): Promise<void> {
    try {
      await this.options.eventBus.publish(eventName, payload);
    } catch (error) {
      logger.warn({ err: error, event: eventName }, `Failed to publish ${eventName} event`);
    }
  }
}
