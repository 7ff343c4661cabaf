export const APPOINTMENT_CREATED_EVENT = 'appointment.created';
export const APPOINTMENT_UPDATED_EVENT = 'appointment.updated';
export const APPOINTMENT_STATUS_CHANGED_EVENT = 'appointment.status_changed';
export const APPOINTMENT_DELETED_EVENT = 'appointment.deleted';

export type AppointmentEventName =
  | typeof APPOINTMENT_CREATED_EVENT
  | typeof APPOINTMENT_UPDATED_EVENT
  | typeof APPOINTMENT_STATUS_CHANGED_EVENT
  | typeof APPOINTMENT_DELETED_EVENT;

export interface AppointmentCreatedEvent {
  appointmentId: string;
  providerId: number;
  customerRef: number;
  serviceRef: number | null;
  start: string;
  end: string;
  status: string;
}

export interface AppointmentUpdatedEvent {
  appointmentId: string;
  providerId: number;
  start: string;
  end: string;
  changedFields: string[];
}

export interface AppointmentStatusChangedEvent {
  appointmentId: string;
  providerId: number;
  previousStatus: string;
  status: string;
  occurredAt: string;
}

export interface AppointmentDeletedEvent {
  appointmentId: string;
  providerId: number;
  deletedAt: string;
}
