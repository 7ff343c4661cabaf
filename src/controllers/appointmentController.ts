import type { Response } from 'express';
import { Router } from 'express';

import {
  ForbiddenError,
  getCurrentTraceId,
  logger,
  runWithSpan,
  type SharedLogger
} from '@agenda/shared';

import type { CreateAppointmentRequest, ListAppointmentsQuery, UpdateAppointmentBody } from '../dtos';
import {
  calendarQuerySchema,
  checkConflictQuerySchema,
  createAppointmentRequestSchema,
  getAppointmentParamsSchema,
  listAppointmentsQuerySchema,
  updateAppointmentBodySchema,
  updateAppointmentParamsSchema,
  updateAppointmentStatusBodySchema,
  updateAppointmentStatusParamsSchema
} from '../dtos';
import type {
  AppointmentScope,
  AppointmentService
} from '../application/services/appointmentService';
import { providerScope } from '../infrastructure/http/scopeMiddleware';

export interface AppointmentControllerDependencies {
  service: AppointmentService;
}

function requestLogger(res: Response): SharedLogger {
  return res.locals.logger ?? logger.withContext({ traceId: getCurrentTraceId() });
}

function scopeOf(res: Response): AppointmentScope {
  return res.locals.scope ?? {};
}

export function createAppointmentController({ service }: AppointmentControllerDependencies): Router {
  const router = Router();

  router.use('/appointments', providerScope);

  router.post('/appointments', async (req, res, next) => {
    try {
      await runWithSpan('Controller:POST /appointments', async () => {
        const payload = createAppointmentRequestSchema.parse(req.body) satisfies CreateAppointmentRequest;

        requestLogger(res).info({ route: '/appointments', payload }, 'Creating appointment');

        const appointment = await service.createAppointment(payload, scopeOf(res));
        res.status(201).json(appointment);
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/appointments/conflicts', async (req, res, next) => {
    try {
      await runWithSpan('Controller:GET /appointments/conflicts', async () => {
        const query = checkConflictQuerySchema.parse(req.query);
        const scope = scopeOf(res);

        requestLogger(res).debug({ route: '/appointments/conflicts', query }, 'Checking conflict');

        if (scope.providerId !== undefined && scope.providerId !== query.providerId) {
          throw new ForbiddenError('Only appointments of your own provider are allowed', {
            providerId: query.providerId,
            scopeProviderId: scope.providerId
          });
        }

        const result = await service.checkConflict(query);
        res.status(200).json(result);
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/appointments/calendar', async (req, res, next) => {
    try {
      await runWithSpan('Controller:GET /appointments/calendar', async () => {
        const query = calendarQuerySchema.parse(req.query);

        requestLogger(res).info({ route: '/appointments/calendar', query }, 'Listing calendar');

        const entries = await service.listCalendar(query, scopeOf(res));
        res.status(200).json(entries);
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/appointments/:id', async (req, res, next) => {
    try {
      await runWithSpan('Controller:GET /appointments/:id', async () => {
        const params = getAppointmentParamsSchema.parse(req.params);

        requestLogger(res).info({ route: '/appointments/:id', params }, 'Fetching appointment by id');

        const appointment = await service.getAppointmentById(params.id, scopeOf(res));
        if (!appointment) {
          return res
            .status(404)
            .json({ error: 'NotFoundError', message: 'Appointment not found' });
        }

        res.status(200).json(appointment);
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/appointments', async (req, res, next) => {
    try {
      await runWithSpan('Controller:GET /appointments', async () => {
        const query = listAppointmentsQuerySchema.parse(req.query) satisfies ListAppointmentsQuery;

        requestLogger(res).info({ route: '/appointments', query }, 'Listing appointments');

        const appointments = await service.listAppointments(query, scopeOf(res));
        res.status(200).json(appointments);
      });
    } catch (error) {
      next(error);
    }
  });

  router.put('/appointments/:id', async (req, res, next) => {
    try {
      await runWithSpan('Controller:PUT /appointments/:id', async () => {
        const params = updateAppointmentParamsSchema.parse(req.params);
        const body = updateAppointmentBodySchema.parse(req.body) satisfies UpdateAppointmentBody;

        requestLogger(res).info({ route: '/appointments/:id', params, body }, 'Updating appointment');

        const appointment = await service.updateAppointment(params.id, body, scopeOf(res));
        res.status(200).json(appointment);
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/appointments/:id/status', async (req, res, next) => {
    try {
      await runWithSpan('Controller:POST /appointments/:id/status', async () => {
        const params = updateAppointmentStatusParamsSchema.parse(req.params);
        const body = updateAppointmentStatusBodySchema.parse(req.body);

        requestLogger(res).info(
          { route: '/appointments/:id/status', params, body },
          'Changing appointment status'
        );

        const appointment = await service.changeStatus(params.id, body.status, scopeOf(res));
        res.status(200).json(appointment);
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/appointments/:id', async (req, res, next) => {
    try {
      await runWithSpan('Controller:DELETE /appointments/:id', async () => {
        const params = getAppointmentParamsSchema.parse(req.params);

        requestLogger(res).info({ route: '/appointments/:id', params }, 'Deleting appointment');

        const result = await service.deleteAppointment(params.id, scopeOf(res));
        res.status(200).json(result);
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
