import { Router } from 'express';
import { z } from 'zod';

import { ForbiddenError, runWithSpan } from '@agenda/shared';

import { positiveIdSchema } from '../../../dtos';
import { providerScope } from '../../../infrastructure/http/scopeMiddleware';
import type { AvailabilityService } from '../application/availabilityService';

const querySchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD'),
  durationMinutes: z.coerce.number().int().optional(),
  stepMinutes: z.coerce.number().int().optional(),
  bufferMinutes: z.coerce.number().int().optional()
});

export function createAvailabilityRouter(service: AvailabilityService): Router {
  const router = Router();

  router.get('/providers/:providerId/availability', providerScope, async (req, res, next) => {
    try {
      const params = querySchema.parse(req.query);
      const providerId = positiveIdSchema.parse(req.params.providerId);
      const scope = res.locals.scope ?? {};

      if (scope.providerId !== undefined && scope.providerId !== providerId) {
        throw new ForbiddenError('Only the availability of your own provider is visible', {
          providerId,
          scopeProviderId: scope.providerId
        });
      }

      const payload = await runWithSpan('HTTPGET /providers/:providerId/availability', () =>
        service.listAvailability({ providerId, ...params })
      );
      res.status(200).json(payload);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
