/**
 * Unit tests for HttpErrorHandler
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import express, { Express } from 'express';
import request from 'supertest';
import { HttpErrorHandler } from './HttpErrorHandler';
import { ILogger } from '../../../domain/interfaces';

describe('HttpErrorHandler', () => {
  let logger: ILogger;
  let app: Express;

  beforeEach(() => {
    logger = {
      info: vi.fn(),
      error: vi.fn(),
      warn: vi.fn(),
      debug: vi.fn(),
      log: vi.fn()
    };
    app = express();
  });

  it('should answer 500 with the error message', async () => {
    app.get('/', () => {
      throw new Error('database unavailable');
    });
    app.use(HttpErrorHandler.middleware(logger));

    const response = await request(app).get('/');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: 'database unavailable' });
    expect(logger.error).toHaveBeenCalledWith('[GET /] database unavailable');
  });

  it('should describe values that are not errors', async () => {
    app.get('/', (_req, _res, next) => {
      next('plain failure');
    });
    app.use(HttpErrorHandler.middleware(logger));

    const response = await request(app).get('/');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: 'plain failure' });
  });

  it('should fall back to a generic message for an empty error', async () => {
    app.get('/', () => {
      throw new Error('');
    });
    app.use(HttpErrorHandler.middleware(logger));

    const response = await request(app).get('/');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: 'Internal server error' });
  });
});
