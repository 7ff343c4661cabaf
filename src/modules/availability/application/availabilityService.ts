import { availabilityMetrics, config, runWithSpan } from '@agenda/shared';

import { dayWindowForDate } from '../../../domain/time';
import type { AppointmentRepository } from '../../../repository/IAppointmentRepository';
import type { BusinessHoursProvider } from '../domain/businessHours';
import type { AvailabilityResponse } from '../domain/models';
import { generateSlots } from '../domain/slotGenerator';

export interface ListAvailabilityParams {
  providerId: number;
  date: string; // YYYY-MM-DD
  durationMinutes?: number;
  stepMinutes?: number;
  bufferMinutes?: number;
}

export interface AvailabilityServiceOptions {
  timezone: string;
  defaultDurationMinutes: number;
  defaultStepMinutes: number;
  defaultBufferMinutes: number;
}

export class AvailabilityService {
  private readonly options: AvailabilityServiceOptions;

  constructor(
    private readonly repository: AppointmentRepository,
    private readonly businessHours: BusinessHoursProvider,
    options: Partial<AvailabilityServiceOptions> = {}
  ) {
    this.options = {
      timezone: options.timezone ?? config.BUSINESS_TIMEZONE,
      defaultDurationMinutes: options.defaultDurationMinutes ?? config.DEFAULT_DURATION_MINUTES,
      defaultStepMinutes: options.defaultStepMinutes ?? config.DEFAULT_STEP_MINUTES,
      defaultBufferMinutes: options.defaultBufferMinutes ?? config.DEFAULT_BUFFER_MINUTES
    };
  }

  async listAvailability(params: ListAvailabilityParams): Promise<AvailabilityResponse> {
    return runWithSpan(
      'AvailabilityService.listAvailability',
      async () => {
        const endTimer = availabilityMetrics.queryDuration.startTimer();

        try {
          const { timezone } = this.options;
          const { providerId, date } = params;
          const durationMinutes = params.durationMinutes ?? this.options.defaultDurationMinutes;
          const stepMinutes = params.stepMinutes ?? this.options.defaultStepMinutes;
          const bufferMinutes = params.bufferMinutes ?? this.options.defaultBufferMinutes;

          const slots = generateSlots({
            providerId,
            date,
            timezone,
            durationMinutes,
            stepMinutes,
            bufferMinutes,
            businessHours: this.businessHours.getTemplate(providerId),
            appointments: await this.repository.listForProviderDay(
              providerId,
              dayWindowForDate(date, timezone)
            )
          });

          return {
            providerId,
            date,
            timezone,
            durationMinutes,
            stepMinutes,
            bufferMinutes,
            slots: Array.from(slots, (slot) => ({
              start: slot.start.toISOString(),
              end: slot.end.toISOString()
            }))
          };
        } finally {
          endTimer();
        }
      },
      { 'provider.id': params.providerId, date: params.date }
    );
  }
}
