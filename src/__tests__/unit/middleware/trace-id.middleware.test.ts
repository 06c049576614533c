import request from 'supertest';
import express from 'express';
import { getTraceId, traceIdMiddleware } from '../../../middleware/trace-id.middleware';

describe('traceIdMiddleware', () => {
  function makeApp() {
    const app = express();
    app.use(traceIdMiddleware);
    app.get('/t', (_req, res) => {
      res.json({ traceId: getTraceId(res), header: res.getHeader('X-Trace-Id') });
    });
    return app;
  }

  it('generates a trace id and exposes it on header and locals', async () => {
    const res = await request(makeApp()).get('/t').expect(200);

    expect(res.headers['x-trace-id']).toMatch(/^[0-9a-f-]{36}$/);
    expect(res.body.traceId).toBe(res.headers['x-trace-id']);
    expect(res.body.header).toBe(res.headers['x-trace-id']);
  });

  it('propagates an incoming X-Trace-Id', async () => {
    const res = await request(makeApp()).get('/t').set('X-Trace-Id', 'trace-12345').expect(200);

    expect(res.headers['x-trace-id']).toBe('trace-12345');
    expect(res.body.traceId).toBe('trace-12345');
  });

  it('falls back to a trace-id header and ignores blank values', async () => {
    const res = await request(makeApp()).get('/t').set('X-Trace-Id', '  ').set('trace-id', 'legacy-1').expect(200);

    expect(res.body.traceId).toBe('legacy-1');
  });
});
