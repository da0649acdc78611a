/**
 * Netlify Function entry point.
 * Single function handles all /api/v1/* routes via the router.
 */

import type { Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import { loadConfig } from '../../src/config.js';
import { createProductionContainer } from '../../src/container.production.js';

type Router = ReturnType<typeof createRouter>;

// Built once per cold start and shared across warm invocations
let router: Promise<Router> | null = null;

function getRouter(): Promise<Router> {
  if (!router) {
    router = createProductionContainer(loadConfig()).then(createRouter);
    // A failed start is retried on the next invocation
    void router.catch(() => {
      router = null;
    });
  }
  return router;
}

export async function handleRequest(req: Request, requestId: string): Promise<Response> {
  const { handle } = await getRouter();
  return handle(req, { requestId });
}

export default async (req: Request, context: Context) => {
  return handleRequest(req, context.requestId);
};

export const config = {
  path: '/api/v1/*',
};
