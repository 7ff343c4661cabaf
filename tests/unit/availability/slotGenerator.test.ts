import { describe, expect, it } from 'vitest';

import { ValidationError } from '@agenda/shared';

import {
  buildBusyIntervals,
  freeIntervals,
  generateSlots,
  type SlotRequest
} from '../../../src/modules/availability/domain/slotGenerator';
import { at, bookedAppointment } from '../../setup/fixtures';

const MORNING = [{ open: '08:00', close: '12:00' }];

function request(overrides: Partial<SlotRequest> = {}): SlotRequest {
  return {
    providerId: 1,
    date: '2025-03-10',
    timezone: 'UTC',
    durationMinutes: 30,
    stepMinutes: 15,
    bufferMinutes: 0,
    businessHours: MORNING,
    appointments: [],
    ...overrides
  };
}

const startsOf = (slots: Iterable<{ start: Date }>) =>
  Array.from(slots, (slot) => slot.start.toISOString().slice(11, 16));

describe('generateSlots', () => {
  it('excludes starts that overlap an existing booking and keeps the one right after it', () => {
    const existing = bookedAppointment({ start: at('08:00') });
    const starts = startsOf(generateSlots(request({ appointments: [existing] })));

    expect(starts).not.toContain('08:00');
    expect(starts).not.toContain('08:15');
    expect(starts[0]).toBe('08:30');
    expect(starts.at(-1)).toBe('11:30');
    expect(starts).toHaveLength(13);
  });

  it('frees the window again once the booking is cancelled', () => {
    const cancelled = bookedAppointment({ start: at('08:00'), status: 'cancelled' });
    const starts = startsOf(generateSlots(request({ appointments: [cancelled] })));

    expect(starts[0]).toBe('08:00');
    expect(starts).toHaveLength(15);
  });

  it('emits slots of exactly the requested duration inside open hours', () => {
    const slots = Array.from(generateSlots(request({ durationMinutes: 45, stepMinutes: 30 })));

    expect(slots.map((slot) => slot.start.toISOString().slice(11, 16))).toEqual([
      '08:00',
      '08:30',
      '09:00',
      '09:30',
      '10:00',
      '10:30',
      '11:00'
    ]);
    for (const slot of slots) {
      expect(slot.end.getTime() - slot.start.getTime()).toBe(45 * 60_000);
      expect(slot.end.getTime()).toBeLessThanOrEqual(at('12:00').getTime());
    }
  });

  it('yields nothing for a free gap shorter than the duration', () => {
    const appointments = [
      bookedAppointment({ start: at('08:00'), durationMinutes: 100 }),
      bookedAppointment({ start: at('10:00'), durationMinutes: 120 })
    ];

    expect(startsOf(generateSlots(request({ appointments })))).toEqual([]);
  });

  it('keeps the buffer free after every booking', () => {
    const existing = bookedAppointment({ start: at('08:00') });
    const starts = startsOf(
      generateSlots(request({ appointments: [existing], bufferMinutes: 10, stepMinutes: 10 }))
    );

    expect(starts[0]).toBe('08:40');
  });

  it('covers every business-hours window of the provider', () => {
    const starts = startsOf(
      generateSlots(
        request({
          durationMinutes: 60,
          stepMinutes: 60,
          businessHours: [
            { open: '14:00', close: '16:00' },
            { open: '08:00', close: '10:00' }
          ]
        })
      )
    );

    expect(starts).toEqual(['08:00', '09:00', '14:00', '15:00']);
  });

  it('is restartable and yields the same slots on every pass', () => {
    const slots = generateSlots(request());

    expect(startsOf(slots)).toEqual(startsOf(slots));
    expect(startsOf(slots)).toHaveLength(15);
  });

  it('rejects non-positive step and duration and a negative buffer eagerly', () => {
    expect(() => generateSlots(request({ stepMinutes: 0 }))).toThrow(ValidationError);
    expect(() => generateSlots(request({ durationMinutes: -30 }))).toThrow(
      'durationMinutes must be a positive integer'
    );
    expect(() => generateSlots(request({ bufferMinutes: -5 }))).toThrow(
      'bufferMinutes must be a non-negative integer'
    );
  });
});

describe('busy and free intervals', () => {
  it('ignores other providers, other days and inert appointments', () => {
    const busy = buildBusyIntervals(
      request({
        appointments: [
          bookedAppointment({ start: at('09:00'), providerId: 2 }),
          bookedAppointment({ start: at('09:00', '2025-03-11') }),
          bookedAppointment({ start: at('09:00'), status: 'no_show' }),
          bookedAppointment({ start: at('10:00') })
        ]
      })
    );

    expect(busy.map(({ start }) => start.toISOString())).toEqual(['2025-03-10T10:00:00.000Z']);
  });

  it('merges back-to-back bookings into one busy block', () => {
    const free = freeIntervals(
      request({
        appointments: [
          bookedAppointment({ start: at('09:00') }),
          bookedAppointment({ start: at('09:30') })
        ]
      })
    );

    expect(free.map(({ start, end }) => [start.toISOString(), end.toISOString()])).toEqual([
      ['2025-03-10T08:00:00.000Z', '2025-03-10T09:00:00.000Z'],
      ['2025-03-10T10:00:00.000Z', '2025-03-10T12:00:00.000Z']
    ]);
  });
});
