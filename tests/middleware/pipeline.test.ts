import { describe, it, expect, beforeEach } from 'vitest';
import { pipeline } from '../../src/middleware/pipeline.js';
import { createLoggingMiddleware } from '../../src/middleware/logging.js';
import { createErrorHandler } from '../../src/middleware/error-handler.js';
import { validateBody } from '../../src/middleware/validate-body.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { NotFoundError } from '../../src/errors.js';
import type { Handler, HandlerContext, Middleware } from '../../src/middleware/pipeline.js';

const ctx: HandlerContext = { requestId: 'req-7' };

function rateRequest(body: unknown): Request {
  return new Request('http://test/api/v1/solutions/orb/ratings', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('pipeline', () => {
  let logProvider: ConsoleLogProvider;
  let ratingEndpoint: (handler: Handler) => Handler;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    ratingEndpoint = pipeline(
      createLoggingMiddleware(logProvider),
      createErrorHandler(logProvider),
      validateBody({ rating: { type: 'number', required: true, min: 0, max: 5 } })
    );
  });

  it('should return the handler unchanged without middleware', async () => {
    const handler: Handler = async () => new Response('rated');

    const res = await pipeline()(handler)(rateRequest({ rating: 3 }), ctx);

    expect(await res.text()).toBe('rated');
  });

  it('should wrap left to right so the first middleware is outermost', async () => {
    const order: string[] = [];
    const trace =
      (name: string): Middleware =>
      (next) =>
      async (req, context) => {
        order.push(`${name}:in`);
        const res = await next(req, context);
        order.push(`${name}:out`);
        return res;
      };

    await pipeline(trace('logging'), trace('errors'))(async () => {
      order.push('handler');
      return new Response(null, { status: 204 });
    })(rateRequest({}), ctx);

    expect(order).toEqual(['logging:in', 'errors:in', 'handler', 'errors:out', 'logging:out']);
  });

  it('should hand the validated body to the handler', async () => {
    const res = await ratingEndpoint(async (req) => new Response(await req.text()))(
      rateRequest({ rating: 4 }),
      ctx
    );

    expect(await res.json()).toEqual({ rating: 4 });
    expect(logProvider.events).toMatchObject([
      { level: 'info', status: 200, route: '/api/v1/solutions/:id/ratings', solutionId: 'orb' },
    ]);
  });

  it('should stop at validation without reaching the handler', async () => {
    let reached = false;

    const res = await ratingEndpoint(async () => {
      reached = true;
      return new Response(null, { status: 204 });
    })(rateRequest({ rating: 9 }), ctx);

    expect(reached).toBe(false);
    expect(res.status).toBe(400);
    expect(logProvider.events[0]).toMatchObject({ level: 'warn', status: 400, requestId: 'req-7' });
  });

  it('should let the error handler turn thrown errors into responses the logger sees', async () => {
    const res = await ratingEndpoint(async () => {
      throw new NotFoundError('Solution "orb" not found');
    })(rateRequest({ rating: 2 }), ctx);

    expect(res.status).toBe(404);
    expect(logProvider.events).toHaveLength(1);
    expect(logProvider.events[0]).toMatchObject({ level: 'warn', status: 404 });
  });
});
