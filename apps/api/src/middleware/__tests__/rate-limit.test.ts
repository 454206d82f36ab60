import { describe, it, expect, vi } from 'vitest';
import express from 'express';
import request from 'supertest';
import { ERROR_CODES } from '@triviaduel/shared-types';
import { createRateLimiter } from '../rate-limit.middleware';
import { requestIdMiddleware } from '../request-id.middleware';

vi.mock('@sentry/node', () => ({
  getCurrentScope: () => ({ setContext: vi.fn() }),
}));

vi.mock('../../queues/connection', () => ({
  getRedisConnection: () => {
    throw new Error('no redis in tests');
  },
}));

function appWithLimit(store: 'memory' | 'redis') {
  const app = express();
  app.use(requestIdMiddleware);
  app.use(createRateLimiter({ windowMs: 60_000, max: 2, prefix: 'test', store }));
  app.get('/ping', (_req, res) => {
    res.json({ pong: true });
  });
  return app;
}

describe('createRateLimiter', () => {
  it('answers 429 with the error envelope once the window is spent', async () => {
    const app = appWithLimit('memory');

    expect((await request(app).get('/ping')).status).toBe(200);
    expect((await request(app).get('/ping')).status).toBe(200);
    const limited = await request(app).get('/ping').set('x-request-id', 'req-9');

    expect(limited.status).toBe(429);
    expect(limited.body).toMatchObject({
      success: false,
      error: { code: ERROR_CODES.RATE_LIMITED, message: 'Too many requests. Please try again later.' },
      meta: { requestId: 'req-9' },
    });
  });

  it('falls back to the memory store when Redis is unavailable', async () => {
    const app = appWithLimit('redis');

    expect((await request(app).get('/ping')).status).toBe(200);
  });
});
