import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';

import { InMemoryEventBus } from '@agenda/shared';

import { createApp } from '../../src/app';
import { StaticBusinessHoursProvider } from '../../src/modules/availability/domain/businessHours';
import { InMemoryAppointmentRepository } from '../../src/repository/InMemoryAppointmentRepository';
import { InMemoryServiceCatalog } from '../../src/repository/ServiceCatalog';
import { PROVIDER_HOURS } from '../setup/fixtures';

let app: ReturnType<typeof createApp>;

const UNKNOWN_ID = '00000000-0000-4000-8000-000000000000';

describe('AppointmentController', () => {
  beforeEach(() => {
    app = createApp({
      businessHours: new StaticBusinessHoursProvider(PROVIDER_HOURS),
      repository: new InMemoryAppointmentRepository(),
      catalog: new InMemoryServiceCatalog([[3, 45]]),
      eventBus: new InMemoryEventBus(),
      timezone: 'UTC'
    });
  });

  const create = (body: Record<string, unknown>, scope?: string) => {
    const pending = request(app).post('/appointments');
    if (scope) pending.set('x-provider-scope', scope);
    return pending.send(body);
  };

  it('returns 201 with the stored appointment', async () => {
    const response = await create({
      providerId: 1,
      customerRef: 7,
      serviceRef: 3,
      start: '2025-03-10T08:00',
      bookingChannel: 'phone',
      price: 30
    });

    expect(response.status).toBe(201);
    expect(response.body).toMatchObject({
      providerId: 1,
      start: '2025-03-10T08:00:00.000Z',
      end: '2025-03-10T08:45:00.000Z',
      durationMinutes: 45,
      bookingChannel: 'phone',
      price: 30,
      status: 'scheduled'
    });
  });

  it('returns 422 for an invalid payload', async () => {
    const response = await create({});

    expect(response.status).toBe(422);
    expect(response.body.error).toBe('ValidationError');
    expect(response.body.message).toBe('Request validation failed');
  });

  it('returns 422 for a truncated JSON body', async () => {
    const response = await request(app)
      .post('/appointments')
      .set('Content-Type', 'application/json')
      .send('{"providerId": 1, "customerRef":');

    expect(response.status).toBe(422);
    expect(response.body).toEqual({
      error: 'ValidationError',
      message: 'Request body is not valid JSON'
    });
  });

  it('returns 422 when body ids are not numbers', async () => {
    const response = await create({
      providerId: [1],
      customerRef: true,
      start: '2025-03-10T08:00'
    });

    expect(response.status).toBe(422);
    expect(response.body.error).toBe('ValidationError');

    const listed = await request(app).get('/appointments');
    expect(listed.body.total).toBe(0);
  });

  it('returns 422 for a non-positive duration', async () => {
    const response = await create({
      providerId: 1,
      customerRef: 7,
      start: '2025-03-10T08:00',
      durationMinutes: 0
    });

    expect(response.status).toBe(422);
    expect(response.body.message).toBe('durationMinutes must be a positive integer');
  });

  it('returns 409 with the conflicting window', async () => {
    const first = await create({ providerId: 1, customerRef: 7, start: '2025-03-10T08:00' });
    const second = await create({ providerId: 1, customerRef: 8, start: '2025-03-10T08:15' });

    expect(second.status).toBe(409);
    expect(second.body.error).toBe('ConflictError');
    expect(second.body.details).toEqual({
      conflictingAppointment: {
        id: first.body.id,
        start: '2025-03-10T08:00:00.000Z',
        end: '2025-03-10T08:30:00.000Z'
      }
    });
  });

  it('returns 404 when the appointment does not exist', async () => {
    const response = await request(app).get(`/appointments/${UNKNOWN_ID}`);

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'NotFoundError', message: 'Appointment not found' });
  });

  it('returns 422 for a malformed id', async () => {
    const response = await request(app).get('/appointments/not-an-id');

    expect(response.status).toBe(422);
  });

  it('updates, changes status, lists and deletes', async () => {
    const created = await create({ providerId: 1, customerRef: 7, start: '2025-03-10T08:00' });
    const id: string = created.body.id;

    const updated = await request(app)
      .put(`/appointments/${id}`)
      .send({ start: '2025-03-10T09:00', notes: 'prefers mornings' });
    expect(updated.status).toBe(200);
    expect(updated.body.start).toBe('2025-03-10T09:00:00.000Z');

    const confirmed = await request(app)
      .post(`/appointments/${id}/status`)
      .send({ status: 'confirmed' });
    expect(confirmed.status).toBe(200);
    expect(confirmed.body.status).toBe('confirmed');

    const listed = await request(app).get('/appointments').query({ status: 'confirmed' });
    expect(listed.status).toBe(200);
    expect(listed.body.total).toBe(1);
    expect(listed.body.items[0].id).toBe(id);

    const deleted = await request(app).delete(`/appointments/${id}`);
    expect(deleted.status).toBe(200);
    expect(deleted.body).toEqual({ ok: true, deletedId: id });

    const missing = await request(app).delete(`/appointments/${id}`);
    expect(missing.status).toBe(404);
  });

  it('rejects an unknown status', async () => {
    const created = await create({ providerId: 1, customerRef: 7, start: '2025-03-10T08:00' });

    const response = await request(app)
      .post(`/appointments/${created.body.id}/status`)
      .send({ status: 'archived' });

    expect(response.status).toBe(422);
  });

  it('answers conflict checks', async () => {
    const created = await create({ providerId: 1, customerRef: 7, start: '2025-03-10T08:00' });

    const busy = await request(app)
      .get('/appointments/conflicts')
      .query({ providerId: 1, start: '2025-03-10T08:20', durationMinutes: 15 });
    const free = await request(app)
      .get('/appointments/conflicts')
      .query({ providerId: 1, start: '2025-03-10T08:30' });

    expect(busy.status).toBe(200);
    expect(busy.body).toEqual({
      conflict: true,
      with: {
        id: created.body.id,
        start: '2025-03-10T08:00:00.000Z',
        end: '2025-03-10T08:30:00.000Z'
      }
    });
    expect(free.body).toEqual({ conflict: false });
  });

  it('serves the calendar view of a range', async () => {
    const booked = await create({
      providerId: 1,
      customerRef: 7,
      serviceRef: 3,
      start: '2025-03-10T08:00'
    });
    await create({ providerId: 2, customerRef: 8, start: '2025-03-10T09:00' });

    const response = await request(app)
      .get('/appointments/calendar')
      .query({ from: '2025-03-10T00:00', to: '2025-03-10T23:59', providerId: 1 });

    expect(response.status).toBe(200);
    expect(response.body).toEqual([
      {
        id: booked.body.id,
        title: 'Customer #7',
        start: '2025-03-10T08:00:00.000Z',
        end: '2025-03-10T08:45:00.000Z',
        providerId: 1,
        provider: 'Provider #1',
        customerRef: 7,
        serviceRef: 3,
        status: 'scheduled',
        bookingChannel: 'online',
        notes: null
      }
    ]);
  });

  it('requires both ends of the calendar range', async () => {
    const response = await request(app)
      .get('/appointments/calendar')
      .query({ from: '2025-03-10T00:00' });

    expect(response.status).toBe(422);
    expect(response.body.message).toBe('Request validation failed');
  });

  describe('provider scope', () => {
    it('books for the scoped provider and forbids others', async () => {
      const own = await create({ customerRef: 7, start: '2025-03-10T08:00' }, '2');
      const foreign = await create(
        { providerId: 1, customerRef: 7, start: '2025-03-10T08:00' },
        '2'
      );

      expect(own.status).toBe(201);
      expect(own.body.providerId).toBe(2);
      expect(foreign.status).toBe(403);
      expect(foreign.body.error).toBe('ForbiddenError');
    });

    it('hides appointments of other providers', async () => {
      const created = await create({ providerId: 1, customerRef: 7, start: '2025-03-10T08:00' });

      const response = await request(app)
        .get(`/appointments/${created.body.id}`)
        .set('x-provider-scope', '2');

      expect(response.status).toBe(404);
    });

    it('rejects a malformed scope header', async () => {
      const response = await request(app).get('/appointments').set('x-provider-scope', 'abc');

      expect(response.status).toBe(422);
      expect(response.body.message).toBe('x-provider-scope must be a positive integer');
    });
  });
});
