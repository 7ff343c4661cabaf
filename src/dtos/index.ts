export * from './appointment.common';
export * from './createAppointment.dto';
export * from './updateAppointment.dto';
export * from './updateAppointmentStatus.dto';
export * from './getAppointment.dto';
export * from './checkConflict.dto';
export * from './calendar.dto';
