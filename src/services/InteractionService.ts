/**
 * Single entry point for user interactions with a solution.
 * Applies the interaction to the corpus, records it in the behavior log and
 * drops cached recommendations, which no longer reflect the user's preferences.
 */

import type { BehaviorAction } from '../types/models.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { SolutionService } from './SolutionService.js';
import type { BehaviorTracker } from './BehaviorTracker.js';
import type { RecommendationEngine } from './RecommendationEngine.js';
import { NotFoundError, ValidationError } from '../errors.js';

export interface InteractionInput {
  solutionId: string;
  action: BehaviorAction;
  /** Required for `rate`, ignored otherwise. */
  rating?: number;
}

export class InteractionService {
  constructor(
    private readonly solutionService: SolutionService,
    private readonly tracker: BehaviorTracker,
    private readonly recommendationEngine: RecommendationEngine,
    private readonly logProvider: ILogProvider
  ) {}

  async record(input: InteractionInput): Promise<void> {
    const solution = this.solutionService.get(input.solutionId);
    if (!solution) {
      throw new NotFoundError(`Solution "${input.solutionId}" not found`);
    }

    switch (input.action) {
      case 'view':
        this.tracker.trackView(solution);
        break;
      case 'apply':
        await this.solutionService.recordUsage(solution.id);
        this.tracker.trackApply(solution);
        break;
      case 'favorite':
        // Re-favoriting changes nothing, so it is not a new signal either
        if (await this.solutionService.addToFavorites(solution.id)) {
          this.tracker.trackFavorite(solution);
        }
        break;
      case 'rate':
        if (input.rating === undefined) {
          throw new ValidationError('rating is required for rate interactions');
        }
        await this.solutionService.rate(solution.id, input.rating);
        this.tracker.trackRating(solution, input.rating);
        break;
    }

    this.recommendationEngine.invalidateCache();
    this.logProvider.debug('Interaction recorded', {
      solutionId: solution.id,
      action: input.action,
    });
  }
}
