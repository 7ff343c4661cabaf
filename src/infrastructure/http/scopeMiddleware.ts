import type { RequestHandler, Response } from 'express';

import { ValidationError, logger, type ContextFields } from '@agenda/shared';

import { positiveIdSchema } from '../../dtos';

export const PROVIDER_SCOPE_HEADER = 'x-provider-scope';

/**
 * Reads the provider restriction a trusted upstream layer has already
 * authorized. No header means an unrestricted caller.
 */
export const providerScope: RequestHandler = (req, res, next) => {
  const raw = req.header(PROVIDER_SCOPE_HEADER);
  if (raw === undefined) {
    res.locals.scope = {};
    next();
    return;
  }

  const parsed = positiveIdSchema.safeParse(raw);
  if (!parsed.success) {
    next(
      new ValidationError(`${PROVIDER_SCOPE_HEADER} must be a positive integer`, {
        issues: parsed.error.issues
      })
    );
    return;
  }

  res.locals.scope = { providerId: parsed.data };
  updateLoggerContext(res, { scopeProviderId: parsed.data });
  next();
};

function updateLoggerContext(res: Response, extra: ContextFields): void {
  const merged = {
    ...(res.locals.logContext ?? {}),
    ...extra
  };
  res.locals.logContext = merged;
  res.locals.logger = logger.withContext(merged);
}
