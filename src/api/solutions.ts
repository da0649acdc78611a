/**
 * Solution endpoints.
 * GET    /api/v1/solutions               - List solutions (?category=, ?tier=)
 * POST   /api/v1/solutions               - Add a solution (evaluated on insert)
 * POST   /api/v1/solutions/generate      - Produce and add a solution from a description
 * POST   /api/v1/solutions/import        - Import JSON records, an HTML document or a CodePen payload
 * POST   /api/v1/solutions/search        - Search with filters
 * GET    /api/v1/solutions/top-rated     - Highest user rating first
 * GET    /api/v1/solutions/most-used     - Highest usage count first
 * GET    /api/v1/solutions/:id           - Get a solution
 * PATCH  /api/v1/solutions/:id           - Edit a solution (code edits re-evaluate)
 * DELETE /api/v1/solutions/:id           - Delete a solution
 * POST   /api/v1/solutions/:id/favorite  - Add to favorites
 * DELETE /api/v1/solutions/:id/favorite  - Remove from favorites
 * GET    /api/v1/favorites               - List favorites
 * POST   /api/v1/solutions/:id/ratings   - Rate a solution (0-5)
 * GET    /api/v1/solutions/:id/export    - Export (?format=json|html|codepen)
 */

import { pipeline } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { Solution } from '../types/models.js';
import { QUALITY_TIERS, SOLUTION_CATEGORIES, TECH_STACKS } from '../types/models.js';
import { createSolution } from '../domain/solution.js';
import { AppError, NotFoundError, ValidationError } from '../errors.js';
import {
  json,
  optionalEnum,
  optionalNumber,
  optionalString,
  optionalStringArray,
  pathParam,
  queryLimit,
  readBody,
  requiredString,
  toSolutionResponse,
} from './http.js';

const MAX_CODE_LENGTH = 200_000;

const codeFields: BodySchema = {
  name: { type: 'string', required: false, maxLength: 200 },
  description: { type: 'string', required: false, maxLength: 5000 },
  category: { type: 'string', required: false, enum: SOLUTION_CATEGORIES },
  techStack: { type: 'string', required: false, enum: TECH_STACKS },
  htmlCode: { type: 'string', required: false, maxLength: MAX_CODE_LENGTH },
  cssCode: { type: 'string', required: false, maxLength: MAX_CODE_LENGTH },
  jsCode: { type: 'string', required: false, maxLength: MAX_CODE_LENGTH },
  tags: { type: 'array', required: false, items: 'string', maxLength: 50 },
};

const createSchema: BodySchema = {
  ...codeFields,
  id: { type: 'string', required: false, maxLength: 100 },
  author: { type: 'string', required: false, maxLength: 200 },
};

const searchSchema: BodySchema = {
  query: { type: 'string', required: true, maxLength: 500 },
  category: { type: 'string', required: false, enum: SOLUTION_CATEGORIES },
  techStack: { type: 'string', required: false, enum: TECH_STACKS },
  minQuality: { type: 'number', required: false, min: 0, max: 100 },
  minRating: { type: 'number', required: false, min: 0, max: 5 },
};

const ratingSchema: BodySchema = {
  rating: { type: 'number', required: true, min: 0, max: 5 },
};

const generateSchema: BodySchema = {
  description: { type: 'string', required: true, maxLength: 5000 },
  category: { type: 'string', required: false, enum: SOLUTION_CATEGORIES },
  techStack: { type: 'string', required: false, enum: TECH_STACKS },
  hints: { type: 'array', required: false, items: 'string', maxLength: 20 },
};

const importSchema: BodySchema = {
  format: { type: 'string', required: true, enum: ['json', 'html', 'codepen'] },
  data: { type: 'object', required: false },
  html: { type: 'string', required: false, maxLength: MAX_CODE_LENGTH * 3 },
  name: { type: 'string', required: false, maxLength: 200 },
};

const EXPORT_FORMATS = ['json', 'html', 'codepen'] as const;

export function createSolutionHandlers(container: Container) {
  const { solutionService, transferService, interactionService } = container;
  const base = pipeline(container.logging, container.errorHandler);

  const respond = (solution: Solution, status = 200) =>
    json(toSolutionResponse(solution, solutionService.isFavorite(solution.id)), status);

  const respondList = (solutions: Solution[]) =>
    json({ data: solutions.map((solution) => toSolutionResponse(solution, solutionService.isFavorite(solution.id))) });

  const getOrThrow = (id: string): Solution => {
    const solution = solutionService.get(id);
    if (!solution) throw new NotFoundError(`Solution "${id}" not found`);
    return solution;
  };

  const list: Handler = base(async (req) => {
    const params = new URL(req.url).searchParams;
    const category = SOLUTION_CATEGORIES.find((value) => value === params.get('category'));
    const tier = QUALITY_TIERS.find((value) => value === params.get('tier'));

    let solutions = solutionService.list();
    if (category) solutions = solutions.filter((solution) => solution.category === category);
    if (tier) solutions = solutions.filter((solution) => solution.qualityTier === tier);

    return respondList(solutions);
  });

  const create: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(createSchema)
  )(async (req) => {
    const body = await readBody(req);

    const solution = createSolution({
      id: optionalString(body, 'id'),
      name: optionalString(body, 'name'),
      description: optionalString(body, 'description'),
      category: optionalEnum(body, 'category', SOLUTION_CATEGORIES),
      techStack: optionalEnum(body, 'techStack', TECH_STACKS),
      htmlCode: optionalString(body, 'htmlCode'),
      cssCode: optionalString(body, 'cssCode'),
      jsCode: optionalString(body, 'jsCode'),
      tags: optionalStringArray(body, 'tags'),
      author: optionalString(body, 'author'),
    });

    const id = await solutionService.add(solution);
    return respond(getOrThrow(id), 201);
  });

  const generate: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(generateSchema)
  )(async (req) => {
    const producer = container.producer;
    if (!producer) {
      throw new AppError('PRODUCER_UNAVAILABLE', 'No solution producer is configured', 503);
    }

    const body = await readBody(req);
    const produced = await producer.produce(requiredString(body, 'description'), {
      category: optionalEnum(body, 'category', SOLUTION_CATEGORIES),
      techStack: optionalEnum(body, 'techStack', TECH_STACKS),
      hints: optionalStringArray(body, 'hints'),
    });

    const id = await solutionService.add(produced);
    return respond(getOrThrow(id), 201);
  });

  const importSolutions: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(importSchema)
  )(async (req) => {
    const body = await readBody(req);
    const format = optionalEnum(body, 'format', EXPORT_FORMATS);

    let candidates: Solution[];
    const rejected: Array<{ source: string; reason: string }> = [];

    if (format === 'html') {
      const html = requiredString(body, 'html');
      candidates = [transferService.importHtml(html, optionalString(body, 'name') ?? 'Imported solution')];
    } else if (format === 'codepen') {
      candidates = [transferService.importCodePen(body.data)];
    } else {
      const result = transferService.importJson(body.data);
      candidates = result.solutions;
      rejected.push(...result.rejected);
    }

    const imported: Solution[] = [];
    for (const candidate of candidates) {
      if (solutionService.get(candidate.id)) {
        rejected.push({ source: candidate.id, reason: 'a solution with this id already exists' });
        continue;
      }
      // JSON records keep their stored metrics; HTML and CodePen imports have none yet
      await solutionService.add(candidate, format !== 'json');
      imported.push(getOrThrow(candidate.id));
    }

    return json(
      {
        data: imported.map((solution) => toSolutionResponse(solution, solutionService.isFavorite(solution.id))),
        rejected,
      },
      201
    );
  });

  const search: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(searchSchema)
  )(async (req) => {
    const body = await readBody(req);

    const results = solutionService.search(requiredString(body, 'query'), {
      category: optionalEnum(body, 'category', SOLUTION_CATEGORIES),
      techStack: optionalEnum(body, 'techStack', TECH_STACKS),
      minQuality: optionalNumber(body, 'minQuality'),
      minRating: optionalNumber(body, 'minRating'),
    });

    return respondList(results);
  });

  const topRated: Handler = base(async (req) => respondList(solutionService.topRated(queryLimit(req, 10))));

  const mostUsed: Handler = base(async (req) => respondList(solutionService.mostUsed(queryLimit(req, 10))));

  const getById: Handler = base(async (req) => {
    return respond(getOrThrow(pathParam(req, 'solutions')));
  });

  const update: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(codeFields)
  )(async (req) => {
    const id = pathParam(req, 'solutions');
    const body = await readBody(req);

    const updated = await solutionService.update(id, {
      name: optionalString(body, 'name'),
      description: optionalString(body, 'description'),
      category: optionalEnum(body, 'category', SOLUTION_CATEGORIES),
      techStack: optionalEnum(body, 'techStack', TECH_STACKS),
      htmlCode: optionalString(body, 'htmlCode'),
      cssCode: optionalString(body, 'cssCode'),
      jsCode: optionalString(body, 'jsCode'),
      tags: optionalStringArray(body, 'tags'),
    });

    return respond(updated);
  });

  const del: Handler = base(async (req) => {
    await solutionService.remove(pathParam(req, 'solutions'));
    return new Response(null, { status: 204 });
  });

  const addFavorite: Handler = base(async (req) => {
    const id = pathParam(req, 'solutions');
    await interactionService.record({ solutionId: id, action: 'favorite' });
    return respond(getOrThrow(id));
  });

  const removeFavorite: Handler = base(async (req) => {
    const id = pathParam(req, 'solutions');
    getOrThrow(id);
    await solutionService.removeFromFavorites(id);
    return respond(getOrThrow(id));
  });

  const listFavorites: Handler = base(async () => {
    return json({ data: solutionService.getFavorites().map((solution) => toSolutionResponse(solution, true)) });
  });

  const rate: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(ratingSchema)
  )(async (req) => {
    const id = pathParam(req, 'solutions');
    const body = await readBody(req);
    const rating = optionalNumber(body, 'rating');
    if (rating === undefined) throw new ValidationError('rating is required');

    await interactionService.record({ solutionId: id, action: 'rate', rating });
    return respond(getOrThrow(id));
  });

  const exportSolution: Handler = base(async (req) => {
    const solution = getOrThrow(pathParam(req, 'solutions'));
    const requested = new URL(req.url).searchParams.get('format') ?? 'json';
    const format = EXPORT_FORMATS.find((value) => value === requested);

    switch (format) {
      case 'json':
        return json(transferService.exportSolution(solution));
      case 'codepen':
        return json(transferService.toCodePen(solution));
      case 'html':
        return new Response(transferService.toStandaloneHtml(solution), {
          status: 200,
          headers: { 'Content-Type': 'text/html; charset=utf-8' },
        });
      default:
        throw new ValidationError(`format must be one of: ${EXPORT_FORMATS.join(', ')}`, { format: requested });
    }
  });

  return {
    list,
    create,
    generate,
    importSolutions,
    search,
    topRated,
    mostUsed,
    getById,
    update,
    delete: del,
    addFavorite,
    removeFavorite,
    listFavorites,
    rate,
    exportSolution,
  };
}
