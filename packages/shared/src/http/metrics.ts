import type { Request, Response, NextFunction } from 'express';
import { Router } from 'express';
import client from 'prom-client';

const register = new client.Registry();
client.collectDefaultMetrics({ register });

export const httpRequestDuration = new client.Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status'],
  registers: [register]
});

const availabilityQueryDuration = new client.Histogram({
  name: 'availability_query_duration_seconds',
  help: 'Time spent computing the open slots of one provider day',
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
  registers: [register]
});

const appointmentsCreated = new client.Counter({
  name: 'appointments_created_total',
  help: 'Appointments booked',
  registers: [register]
});

const appointmentsUpdated = new client.Counter({
  name: 'appointments_updated_total',
  help: 'Appointments edited',
  registers: [register]
});

const appointmentStatusChanges = new client.Counter({
  name: 'appointment_status_changes_total',
  help: 'Appointment status changes by target status',
  labelNames: ['status'],
  registers: [register]
});

const appointmentsDeleted = new client.Counter({
  name: 'appointments_deleted_total',
  help: 'Appointments removed permanently',
  registers: [register]
});

const appointmentConflicts = new client.Counter({
  name: 'appointment_conflicts_total',
  help: 'Bookings or edits rejected because the window overlapped an active appointment',
  registers: [register]
});

export const metricsRouter = Router();

metricsRouter.get('/metrics', async (_req: Request, res: Response) => {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
});

export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationSeconds = Number(process.hrtime.bigint() - start) / 1_000_000_000;

    httpRequestDuration
      .labels(req.method, req.route?.path ?? req.path, String(res.statusCode))
      .observe(durationSeconds);
  });

  next();
}

export const metrics = {
  register,
  httpRequestDuration
};

export const appointmentMetrics = {
  created: appointmentsCreated,
  updated: appointmentsUpdated,
  statusChanges: appointmentStatusChanges,
  deleted: appointmentsDeleted,
  conflicts: appointmentConflicts
};

export const availabilityMetrics = {
  queryDuration: availabilityQueryDuration
};

export function resetAllMetrics(): void {
  register.resetMetrics();
}
