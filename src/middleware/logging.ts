/**
 * Request logging middleware.
 * One event per request with the route template (ids replaced by `:id`), the
 * solution the request targets, status, duration and request id.
 * 5xx and thrown handlers log at error, 4xx at warn, everything else at info.
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';

/** Segments after `/solutions/` that name a collection route, not an id. */
const COLLECTION_ROUTES = new Set(['generate', 'import', 'search', 'top-rated', 'most-used']);

export interface RequestTarget {
  route: string;
  solutionId?: string;
}

/** `/api/v1/solutions/orb/versions` → `{ route: '/api/v1/solutions/:id/versions', solutionId: 'orb' }` */
export function describeTarget(path: string): RequestTarget {
  const segments = path.split('/');
  const index = segments.indexOf('solutions');
  const candidate = index >= 0 ? segments[index + 1] : undefined;

  if (candidate === undefined || candidate === '' || COLLECTION_ROUTES.has(candidate)) {
    return { route: path };
  }

  segments[index + 1] = ':id';
  return { route: segments.join('/'), solutionId: decodeURIComponent(candidate) };
}

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const method = req.method;
      const path = new URL(req.url).pathname;
      const target = describeTarget(path);
      const start = performance.now();

      const emit = (status: number, level: LogLevel, error?: unknown) => {
        const durationMs = Math.round(performance.now() - start);
        const event: RequestLogEvent = {
          level,
          message: `${method} ${target.route} → ${status} (${durationMs}ms)`,
          method,
          path,
          route: target.route,
          status,
          durationMs,
          requestId: ctx.requestId,
          ...(target.solutionId !== undefined && { solutionId: target.solutionId }),
          ...(error !== undefined && {
            fields: { error: error instanceof Error ? error.message : String(error) },
          }),
        };
        logProvider.log(event);
      };

      let response: Response;
      try {
        response = await next(req, ctx);
      } catch (err) {
        emit(500, 'error', err);
        throw err;
      }

      emit(response.status, levelForStatus(response.status));
      return response;
    };
  };
}
