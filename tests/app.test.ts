import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { appWith } from './helpers/test-app';

describe('App', () => {
  it('should answer 404 for unknown routes', async () => {
    const { app } = await appWith({});

    const response = await request(app).get('/api/unknown');

    expect(response.status).toBe(404);
    expect(response.body.error.code).toBe('NOT_FOUND');
  });

  it('should echo the caller request id', async () => {
    const { app } = await appWith({});

    const response = await request(app).get('/api/health').set('x-request-id', 'req-123');

    expect(response.headers['x-request-id']).toBe('req-123');
  });

  it('should generate a request id when none is sent', async () => {
    const { app } = await appWith({});

    const response = await request(app).get('/api/health');

    expect(response.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should answer 400 for a malformed JSON body', async () => {
    const { app } = await appWith({});

    const response = await request(app)
      .post('/api/reservations')
      .set('Content-Type', 'application/json')
      .send('{"orderId": ');

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe('INVALID_JSON');
  });

  describe('metrics', () => {
    it('should count reservation outcomes', async () => {
      const { app } = await appWith({ A: 1 });
      await request(app).post('/api/reservations').send({ orderId: 'o1', lines: [{ productId: 'A', quantity: 1 }] });
      await request(app).post('/api/reservations').send({ orderId: 'o2', lines: [{ productId: 'A', quantity: 1 }] });

      const response = await request(app).get('/api/metrics');

      expect(response.status).toBe(200);
      expect(response.body.data).toMatchObject({
        reservationAttempts: 2,
        reservationsReserved: 1,
        reservationsInsufficientStock: 1,
      });
    });

    it('should reset the counters', async () => {
      const { app } = await appWith({ A: 1 });
      await request(app).post('/api/reservations').send({ orderId: 'o1', lines: [{ productId: 'A', quantity: 1 }] });

      const reset = await request(app).post('/api/metrics/reset');
      const response = await request(app).get('/api/metrics');

      expect(reset.body.message).toBe('Metrics reset successfully');
      expect(response.body.data.reservationsReserved).toBe(0);
    });
  });
});
