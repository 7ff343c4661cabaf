import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

import { config } from '../config';
import { logger } from '../logger';

type SpanStatus = 'ok' | 'error';

interface Span {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name: string;
  attributes: Record<string, unknown>;
  startedAt: bigint;
}

const spanStore = new AsyncLocalStorage<Span>();

function elapsedMs(span: Span): number {
  return Number(process.hrtime.bigint() - span.startedAt) / 1_000_000;
}

function openSpan(
  name: string,
  attributes: Record<string, unknown> = {},
  inherited?: { traceId?: string; parentSpanId?: string }
): Span {
  const parent = spanStore.getStore();

  return {
    traceId: inherited?.traceId ?? parent?.traceId ?? randomBytes(16).toString('hex'),
    spanId: randomBytes(8).toString('hex'),
    parentSpanId: inherited?.parentSpanId ?? parent?.spanId,
    name,
    attributes,
    startedAt: process.hrtime.bigint()
  };
}

function closeSpan(span: Span, status: SpanStatus): void {
  const payload = {
    traceId: span.traceId,
    spanId: span.spanId,
    parentSpanId: span.parentSpanId,
    name: span.name,
    status,
    durationMs: elapsedMs(span),
    attributes: span.attributes
  };

  if (config.TRACING_EXPORT_JSON) {
    logger.info(payload, 'trace.span');
  } else {
    logger.debug(payload, 'trace.span');
  }
}

export async function runWithSpan<T>(
  name: string,
  handler: () => Promise<T>,
  attributes: Record<string, unknown> = {}
): Promise<T> {
  const span = openSpan(name, attributes);

  return spanStore.run(span, async () => {
    try {
      const result = await handler();
      closeSpan(span, 'ok');
      return result;
    } catch (error) {
      closeSpan(span, 'error');
      throw error;
    }
  });
}

export function getCurrentTraceId(): string | undefined {
  return spanStore.getStore()?.traceId;
}

/**
 * Opens the root span of a request. Honors `x-trace-id` / `x-span-parent` from
 * upstream and echoes the ids back on the response.
 */
export function traceMiddleware(req: Request, res: Response, next: NextFunction): void {
  const span = openSpan(
    `HTTP ${req.method} ${req.path}`,
    {
      'http.method': req.method,
      'http.target': req.originalUrl
    },
    {
      traceId: req.header('x-trace-id') ?? undefined,
      parentSpanId: req.header('x-span-parent') ?? undefined
    }
  );

  spanStore.run(span, () => {
    res.setHeader('x-trace-id', span.traceId);
    res.setHeader('x-span-parent', span.spanId);

    res.on('finish', () => {
      span.attributes['http.status_code'] = res.statusCode;
      closeSpan(span, res.statusCode >= 500 ? 'error' : 'ok');
    });

    next();
  });
}
