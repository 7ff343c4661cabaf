import { describe, expect, it } from 'vitest';

import { ValidationError } from '@agenda/shared';

import { Appointment } from '../../../src/domain/appointment';
import { isActiveStatus } from '../../../src/dtos';
import { at, bookedAppointment } from '../../setup/fixtures';

describe('Appointment', () => {
  it('derives end from start and duration', () => {
    const appointment = bookedAppointment({ start: at('08:00'), durationMinutes: 45 });

    expect(appointment.end.toISOString()).toBe('2025-03-10T08:45:00.000Z');
    expect(appointment.status).toBe('scheduled');
    expect(appointment.isActive).toBe(true);
  });

  it('rejects a non-positive duration', () => {
    expect(() => bookedAppointment({ start: at('08:00'), durationMinutes: 0 })).toThrow(
      'durationMinutes must be a positive integer'
    );
    expect(() => bookedAppointment({ start: at('08:00'), durationMinutes: -15 })).toThrow(
      ValidationError
    );
  });

  it('requires a customer', () => {
    expect(() => bookedAppointment({ start: at('08:00'), customerRef: 0 })).toThrow(
      'customerRef is required'
    );
  });

  it('rejects a non-positive provider', () => {
    expect(() => bookedAppointment({ start: at('08:00'), providerId: -1 })).toThrow(
      'providerId must be a positive integer'
    );
  });

  it('revises into a new instance and leaves the original untouched', () => {
    const original = bookedAppointment({ start: at('08:00') });
    const moved = original.revise({ start: at('09:00'), notes: 'moved' });

    expect(original.start.toISOString()).toBe('2025-03-10T08:00:00.000Z');
    expect(moved.start.toISOString()).toBe('2025-03-10T09:00:00.000Z');
    expect(moved.toDTO().notes).toBe('moved');
    expect(moved.id).toBe(original.id);
    expect(moved.occupiesDifferentWindowThan(original)).toBe(true);
  });

  it('validates revisions', () => {
    const original = bookedAppointment({ start: at('08:00') });

    expect(() => original.revise({ durationMinutes: 0 })).toThrow(ValidationError);
  });

  it('clears nullable fields on revision', () => {
    const original = bookedAppointment({ start: at('08:00'), price: 40, serviceRef: 3 });
    const revised = original.revise({ price: null, serviceRef: null });

    expect(revised.toDTO().price).toBeNull();
    expect(revised.serviceRef).toBeNull();
    expect(revised.occupiesDifferentWindowThan(original)).toBe(false);
  });

  it('round-trips through its database row', () => {
    const original = bookedAppointment({ start: at('08:00'), price: 35.5, notes: 'first visit' });
    const row = { ...original.toPersistence(), price: '35.50' };

    expect(Appointment.fromPersistence(row).toDTO()).toEqual(original.toDTO());
  });

  it('keeps completed appointments active; only cancelled and no_show are inert', () => {
    expect(isActiveStatus('scheduled')).toBe(true);
    expect(isActiveStatus('confirmed')).toBe(true);
    expect(isActiveStatus('completed')).toBe(true);
    expect(isActiveStatus('cancelled')).toBe(false);
    expect(isActiveStatus('no_show')).toBe(false);
  });
});
