/**
 * Dependency wiring.
 * Constructs all services with their dependencies. One container per session;
 * tests build their own around in-memory repositories.
 */

import type { ISolutionRepository } from './repositories/ISolutionRepository.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { ISolutionProducer } from './providers/ISolutionProducer.js';
import type { Middleware } from './middleware/pipeline.js';
import type { DimensionRules } from './domain/heuristics.js';
import { QualityEvaluator } from './services/QualityEvaluator.js';
import { VersionManager } from './services/VersionManager.js';
import { SolutionService } from './services/SolutionService.js';
import { BehaviorTracker } from './services/BehaviorTracker.js';
import { PreferenceModel } from './services/PreferenceModel.js';
import { SimilarityCalculator } from './services/SimilarityCalculator.js';
import { RecommendationEngine } from './services/RecommendationEngine.js';
import { InteractionService } from './services/InteractionService.js';
import { TransferService } from './services/TransferService.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { createErrorHandler } from './middleware/error-handler.js';

export interface Container {
  evaluator: QualityEvaluator;
  versionManager: VersionManager;
  solutionService: SolutionService;
  tracker: BehaviorTracker;
  preferenceModel: PreferenceModel;
  similarityCalculator: SimilarityCalculator;
  recommendationEngine: RecommendationEngine;
  interactionService: InteractionService;
  transferService: TransferService;
  /** Null when no generator is configured. */
  producer: ISolutionProducer | null;
  logProvider: ILogProvider;
  logging: Middleware;
  errorHandler: Middleware;
}

export function createContainer(deps: {
  solutionRepo: ISolutionRepository;
  logProvider: ILogProvider;
  producer?: ISolutionProducer;
  tracker?: BehaviorTracker;
  heuristicRules?: DimensionRules;
  cacheTtlMs?: number;
}): Container {
  const evaluator = new QualityEvaluator(deps.logProvider, { rules: deps.heuristicRules });
  const versionManager = new VersionManager(deps.logProvider);
  const solutionService = new SolutionService(
    deps.solutionRepo,
    evaluator,
    versionManager,
    deps.logProvider
  );

  const tracker = deps.tracker ?? new BehaviorTracker();
  const preferenceModel = new PreferenceModel(tracker);
  const similarityCalculator = new SimilarityCalculator();
  const recommendationEngine = new RecommendationEngine(
    tracker,
    preferenceModel,
    similarityCalculator,
    deps.logProvider,
    { cacheTtlMs: deps.cacheTtlMs }
  );

  const interactionService = new InteractionService(
    solutionService,
    tracker,
    recommendationEngine,
    deps.logProvider
  );
  const transferService = new TransferService(deps.logProvider);

  return {
    evaluator,
    versionManager,
    solutionService,
    tracker,
    preferenceModel,
    similarityCalculator,
    recommendationEngine,
    interactionService,
    transferService,
    producer: deps.producer ?? null,
    logProvider: deps.logProvider,
    logging: createLoggingMiddleware(deps.logProvider),
    errorHandler: createErrorHandler(deps.logProvider),
  };
}
