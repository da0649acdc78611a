/**
 * Upstream producer of new solutions (typically a generative model).
 * Only the shape of the produced solution is checked here, by the evaluator;
 * whether its code actually animates correctly is the producer's concern.
 */

import type { Solution, SolutionCategory, TechStack } from '../types/models.js';

export interface ProductionConstraints {
  category?: SolutionCategory;
  techStack?: TechStack;
  /** Free-form hints passed through to the producer. */
  hints?: string[];
}

export interface ISolutionProducer {
  produce(description: string, constraints?: ProductionConstraints): Promise<Solution>;
}
