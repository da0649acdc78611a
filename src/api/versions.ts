/**
 * Version endpoints.
 * GET  /api/v1/solutions/:id/versions  - Version history of a solution
 * POST /api/v1/solutions/:id/versions  - Snapshot the current state as a new version
 * POST /api/v1/solutions/:id/rollback  - Restore a version as a new solution
 */

import { pipeline } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { NotFoundError } from '../errors.js';
import { json, optionalString, pathParam, readBody, requiredString, toSolutionResponse, toVersionResponse } from './http.js';

const createVersionSchema: BodySchema = {
  description: { type: 'string', required: false, maxLength: 2000 },
};

const rollbackSchema: BodySchema = {
  version: { type: 'string', required: true, maxLength: 50 },
};

export function createVersionHandlers(container: Container) {
  const { solutionService } = container;

  const history: Handler = pipeline(container.logging, container.errorHandler)(async (req) => {
    const id = pathParam(req, 'solutions');
    return json({ data: solutionService.getVersionHistory(id).map(toVersionResponse) });
  });

  const create: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(createVersionSchema)
  )(async (req) => {
    const id = pathParam(req, 'solutions');
    const body = await readBody(req);

    const version = await solutionService.createVersion(id, optionalString(body, 'description') ?? '');
    return json({ solutionId: id, version }, 201);
  });

  const rollback: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(rollbackSchema)
  )(async (req) => {
    const id = pathParam(req, 'solutions');
    const body = await readBody(req);
    const version = requiredString(body, 'version');

    const restored = await solutionService.rollback(id, version);
    if (!restored) {
      throw new NotFoundError(`Version "${version}" of solution "${id}" not found`);
    }

    return json(toSolutionResponse(restored, false), 201);
  });

  return { history, create, rollback };
}
