import path from 'node:path';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Level } from 'pino';
import type { Request, Response } from 'express';
import express from 'express';
import pinoHttp from 'pino-http';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';

import {
  config,
  logger,
  metricsRouter,
  metricsMiddleware,
  traceMiddleware,
  getCurrentTraceId,
  type IEventBus
} from '@agenda/shared';

import { createAppointmentController } from './controllers/appointmentController';
import { SchedulingAppointmentService } from './application/services/appointmentService';
import { resolveStatusPolicy, type StatusTransitionPolicy } from './domain/statusPolicy';
import { errorMapper } from './infrastructure/http/errorMapper';
import { AvailabilityService } from './modules/availability/application/availabilityService';
import type { BusinessHoursProvider } from './modules/availability/domain/businessHours';
import { createAvailabilityRouter } from './modules/availability/http/availabilityController';
import type { AppointmentRepository } from './repository/IAppointmentRepository';
import { InMemoryAppointmentRepository } from './repository/InMemoryAppointmentRepository';
import { PostgresAppointmentRepository } from './repository/PostgresAppointmentRepository';
import {
  InMemoryNameDirectory,
  PostgresNameDirectory,
  type NameDirectory
} from './repository/NameDirectory';
import {
  InMemoryServiceCatalog,
  PostgresServiceCatalog,
  type ServiceCatalog
} from './repository/ServiceCatalog';

const openApiPath = path.resolve(process.cwd(), 'docs/openapi.yaml');
let openApiDocument: Record<string, unknown> | undefined;

try {
  openApiDocument = YAML.load(openApiPath);
} catch (error) {
  logger.warn({ error, openApiPath }, 'Failed to load OpenAPI document');
}

export interface AppDependencies {
  businessHours: BusinessHoursProvider;
  repository?: AppointmentRepository;
  catalog?: ServiceCatalog;
  directory?: NameDirectory;
  statusPolicy?: StatusTransitionPolicy;
  eventBus?: IEventBus;
  timezone?: string;
}

function defaultRepository(): AppointmentRepository {
  return config.STORE_DRIVER === 'in-memory'
    ? new InMemoryAppointmentRepository()
    : new PostgresAppointmentRepository();
}

function defaultDirectory(): NameDirectory {
  return config.STORE_DRIVER === 'in-memory'
    ? new InMemoryNameDirectory()
    : new PostgresNameDirectory();
}

function defaultCatalog(): ServiceCatalog {
  return config.STORE_DRIVER === 'in-memory'
    ? new InMemoryServiceCatalog()
    : new PostgresServiceCatalog();
}

export function createApp(deps: AppDependencies) {
  const app = express();
  const repository = deps.repository ?? defaultRepository();
  const catalog = deps.catalog ?? defaultCatalog();
  const timezone = deps.timezone ?? config.BUSINESS_TIMEZONE;

  const appointmentService = new SchedulingAppointmentService(
    repository,
    catalog,
    {
      timezone,
      statusPolicy: deps.statusPolicy ?? resolveStatusPolicy(config.STATUS_TRANSITION_POLICY),
      eventBus: deps.eventBus,
      directory: deps.directory ?? defaultDirectory()
    }
  );
  const availabilityService = new AvailabilityService(repository, deps.businessHours, {
    timezone
  });

  app.use(traceMiddleware);
  app.disable('x-powered-by');
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use(
    pinoHttp({
      logger,
      customLogLevel: (
        _req: IncomingMessage,
        res: ServerResponse,
        err: Error | undefined
      ): Level => {
        if (err || res.statusCode >= 500) return 'error';
        if (res.statusCode >= 400) return 'warn';
        return 'info';
      }
    })
  );

  app.use((req, res, next) => {
    const contextFields = { traceId: getCurrentTraceId() };
    res.locals.logContext = contextFields;
    res.locals.logger = logger.withContext(contextFields);
    res.locals.logger.debug({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  if (config.METRICS_ENABLED) {
    app.use(metricsMiddleware);
    app.use(metricsRouter);
  }

  if (openApiDocument) {
    app.use('/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  }

  app.use(createAvailabilityRouter(availabilityService));
  app.use(createAppointmentController({ service: appointmentService }));

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      service: config.SERVICE_NAME,
      version: config.NODE_ENV
    });
  });

  app.use(errorMapper);

  return app;
}
