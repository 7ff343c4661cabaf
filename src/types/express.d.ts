import type { ContextFields, SharedLogger } from '@agenda/shared';

import type { AppointmentScope } from '../application/services/appointmentService';

declare global {
  namespace Express {
    // eslint-disable-next-line @typescript-eslint/consistent-type-definitions
    interface Locals {
      scope?: AppointmentScope;
      logger?: SharedLogger;
      logContext?: ContextFields;
    }
  }
}

export {};
