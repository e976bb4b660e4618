import { describe, it, expect } from 'vitest';
import express, { type Express } from 'express';
import request from 'supertest';
import { z } from 'zod';
import { validateBody, validateParams, validateQuery } from '../../src/middleware/validate';
import { errorHandler } from '../../src/middleware/error-handler';

const BodySchema = z.object({ name: z.string(), age: z.number() });
const ParamsSchema = z.object({ id: z.string().min(3) });
const QuerySchema = z.object({ limit: z.coerce.number().int().positive() });

function echoApp(): Express {
  const app = express();
  app.use(express.json());
  app.post('/body', (req, res) => {
    res.json(validateBody(BodySchema, req));
  });
  app.get('/params/:id', (req, res) => {
    res.json(validateParams(ParamsSchema, req));
  });
  app.get('/query', (req, res) => {
    res.json(validateQuery(QuerySchema, req));
  });
  app.use(errorHandler);
  return app;
}

describe('Validation helpers', () => {
  describe('validateBody', () => {
    it('should return the parsed body', async () => {
      const response = await request(echoApp()).post('/body').send({ name: 'Ada', age: 36, extra: true });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ name: 'Ada', age: 36 });
    });

    it('should throw ValidationError with field errors', async () => {
      const response = await request(echoApp()).post('/body').send({ name: 'Ada' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.message).toBe('Body validation failed: age: Required');
      expect(response.body.error.details.fieldErrors).toEqual([{ field: 'age', message: 'Required' }]);
    });
  });

  describe('validateParams', () => {
    it('should return the parsed params', async () => {
      const response = await request(echoApp()).get('/params/abc');

      expect(response.body).toEqual({ id: 'abc' });
    });

    it('should reject params that fail the schema', async () => {
      const response = await request(echoApp()).get('/params/ab');

      expect(response.status).toBe(400);
      expect(response.body.error.message).toMatch(/^Params validation failed: id: /);
    });
  });

  describe('validateQuery', () => {
    it('should coerce query values', async () => {
      const response = await request(echoApp()).get('/query?limit=5');

      expect(response.body).toEqual({ limit: 5 });
    });

    it('should reject a missing query value', async () => {
      const response = await request(echoApp()).get('/query');

      expect(response.status).toBe(400);
      expect(response.body.error.message).toMatch(/^Query validation failed: limit: /);
    });
  });
});
