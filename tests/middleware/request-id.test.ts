import { describe, it, expect } from 'vitest';
import express, { type Express } from 'express';
import request from 'supertest';
import { requestIdMiddleware } from '../../src/middleware/request-id';

function idApp(): Express {
  const app = express();
  app.use(requestIdMiddleware);
  app.get('/', (req, res) => {
    res.json({ id: req.id });
  });
  return app;
}

describe('Request ID Middleware', () => {
  it('should keep the id the caller sent', async () => {
    const response = await request(idApp()).get('/').set('x-request-id', 'caller-id');

    expect(response.body.id).toBe('caller-id');
    expect(response.headers['x-request-id']).toBe('caller-id');
  });

  it('should generate a fresh uuid otherwise', async () => {
    const first = await request(idApp()).get('/');
    const second = await request(idApp()).get('/');

    expect(first.body.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(first.headers['x-request-id']).toBe(first.body.id);
    expect(second.body.id).not.toBe(first.body.id);
  });
});
