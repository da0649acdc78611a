/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic: works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createSolutionHandlers } from './solutions.js';
import { createVersionHandlers } from './versions.js';
import { createRecommendationHandlers } from './recommendations.js';
import { createStatsHandlers } from './stats.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const solutions = createSolutionHandlers(container);
  const versions = createVersionHandlers(container);
  const recommendations = createRecommendationHandlers(container);
  const stats = createStatsHandlers(container);

  // Fixed paths under /solutions come before the /solutions/:id patterns
  const routes: Route[] = [
    // Solutions
    { method: 'GET', pattern: /^\/api\/v1\/solutions\/?$/, handler: solutions.list },
    { method: 'POST', pattern: /^\/api\/v1\/solutions\/?$/, handler: solutions.create },
    { method: 'POST', pattern: /^\/api\/v1\/solutions\/generate\/?$/, handler: solutions.generate },
    { method: 'POST', pattern: /^\/api\/v1\/solutions\/import\/?$/, handler: solutions.importSolutions },
    { method: 'POST', pattern: /^\/api\/v1\/solutions\/search\/?$/, handler: solutions.search },
    { method: 'GET', pattern: /^\/api\/v1\/solutions\/top-rated\/?$/, handler: solutions.topRated },
    { method: 'GET', pattern: /^\/api\/v1\/solutions\/most-used\/?$/, handler: solutions.mostUsed },
    { method: 'GET', pattern: /^\/api\/v1\/solutions\/[^/]+\/?$/, handler: solutions.getById },
    { method: 'PATCH', pattern: /^\/api\/v1\/solutions\/[^/]+\/?$/, handler: solutions.update },
    { method: 'DELETE', pattern: /^\/api\/v1\/solutions\/[^/]+\/?$/, handler: solutions.delete },
    { method: 'POST', pattern: /^\/api\/v1\/solutions\/[^/]+\/favorite\/?$/, handler: solutions.addFavorite },
    { method: 'DELETE', pattern: /^\/api\/v1\/solutions\/[^/]+\/favorite\/?$/, handler: solutions.removeFavorite },
    { method: 'POST', pattern: /^\/api\/v1\/solutions\/[^/]+\/ratings\/?$/, handler: solutions.rate },
    { method: 'GET', pattern: /^\/api\/v1\/solutions\/[^/]+\/export\/?$/, handler: solutions.exportSolution },
    { method: 'GET', pattern: /^\/api\/v1\/favorites\/?$/, handler: solutions.listFavorites },

    // Versions
    { method: 'GET', pattern: /^\/api\/v1\/solutions\/[^/]+\/versions\/?$/, handler: versions.history },
    { method: 'POST', pattern: /^\/api\/v1\/solutions\/[^/]+\/versions\/?$/, handler: versions.create },
    { method: 'POST', pattern: /^\/api\/v1\/solutions\/[^/]+\/rollback\/?$/, handler: versions.rollback },

    // Recommendations
    { method: 'POST', pattern: /^\/api\/v1\/recommendations\/?$/, handler: recommendations.recommend },
    { method: 'GET', pattern: /^\/api\/v1\/solutions\/[^/]+\/similar\/?$/, handler: recommendations.similar },
    { method: 'GET', pattern: /^\/api\/v1\/trending\/?$/, handler: recommendations.trending },
    { method: 'GET', pattern: /^\/api\/v1\/preferences\/?$/, handler: recommendations.preferences },
    { method: 'POST', pattern: /^\/api\/v1\/interactions\/?$/, handler: recommendations.interact },

    // Stats
    { method: 'GET', pattern: /^\/api\/v1\/stats\/?$/, handler: stats.getStats },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        const response = await route.handler(req, ctx);
        return addCorsHeaders(response);
      }
    }

    // Check if path matches but method doesn't
    const matching = routes.filter((r) => r.pattern.test(url.pathname));
    if (matching.length > 0) {
      const allowed = [...new Set(matching.map((r) => r.method))].join(', ');

      return new Response(
        JSON.stringify({
          error: {
            code: 'INVALID_REQUEST',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: allowed,
            ...corsHeaders(),
          },
        }
      );
    }

    return new Response(
      JSON.stringify({
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
        },
      }),
      {
        status: 404,
        headers: { 'Content-Type': 'application/json', ...corsHeaders() },
      }
    );
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, PATCH, DELETE, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }

  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
