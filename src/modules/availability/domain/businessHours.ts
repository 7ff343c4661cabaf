import { promises as fs } from 'node:fs';

import { z } from 'zod';

import { ValidationError, logger } from '@agenda/shared';

import { atWallClock, isWallClockTime } from '../../../domain/time';
import { mergeIntervals, type TimeInterval } from './intervals';

const wallClockSchema = z.string().refine(isWallClockTime, 'expected HH:MM');

const businessHoursWindowSchema = z
  .object({
    open: wallClockSchema,
    close: wallClockSchema
  })
  .refine((window) => window.open < window.close, 'open must be before close');

const businessHoursTemplateSchema = z.array(businessHoursWindowSchema);

export const businessHoursConfigSchema = z.object({
  default: businessHoursTemplateSchema.min(1),
  providers: z
    .record(z.string().regex(/^\d+$/, 'provider keys must be numeric ids'), businessHoursTemplateSchema)
    .default({})
});

export type BusinessHoursWindow = z.infer<typeof businessHoursWindowSchema>;
export type BusinessHoursTemplate = readonly BusinessHoursWindow[];
export type BusinessHoursConfig = z.infer<typeof businessHoursConfigSchema>;

export interface BusinessHoursProvider {
  /** The provider's own windows, or the system default when it has none. */
  getTemplate(providerId: number): BusinessHoursTemplate;
}

export function parseBusinessHours(raw: unknown): BusinessHoursConfig {
  const result = businessHoursConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError('Invalid business hours configuration', {
      issues: result.error.issues
    });
  }

  return result.data;
}

function templateFor(hours: BusinessHoursConfig, providerId: number): BusinessHoursTemplate {
  return hours.providers[String(providerId)] ?? hours.default;
}

export class StaticBusinessHoursProvider implements BusinessHoursProvider {
  private readonly hours: BusinessHoursConfig;

  constructor(hours: unknown) {
    this.hours = parseBusinessHours(hours);
  }

  getTemplate(providerId: number): BusinessHoursTemplate {
    return templateFor(this.hours, providerId);
  }
}

/**
 * Business hours read from a JSON file. `load()` must resolve before the first
 * lookup; `reload()` swaps in the new file only if it parses.
 */
export class FileBusinessHoursProvider implements BusinessHoursProvider {
  private hours: BusinessHoursConfig | null = null;

  constructor(private readonly filePath: string) {}

  async load(): Promise<void> {
    const contents = await fs.readFile(this.filePath, 'utf-8');
    this.hours = parseBusinessHours(JSON.parse(contents));
    logger.info(
      {
        filePath: this.filePath,
        providers: Object.keys(this.hours.providers).length
      },
      'Business hours loaded'
    );
  }

  async reload(): Promise<void> {
    await this.load();
  }

  getTemplate(providerId: number): BusinessHoursTemplate {
    if (!this.hours) {
      throw new Error(`Business hours not loaded from ${this.filePath}`);
    }

    return templateFor(this.hours, providerId);
  }
}

/** Places each window of `template` on `date` in `timezone` as sorted, disjoint intervals. */
export function resolveBaseIntervals(
  template: BusinessHoursTemplate,
  date: string,
  timezone: string
): TimeInterval[] {
  return mergeIntervals(
    template.map((window) => ({
      start: atWallClock(date, window.open, timezone),
      end: atWallClock(date, window.close, timezone)
    }))
  );
}
