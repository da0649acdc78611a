export { createContainer, type Container } from './container.js';
export { createProductionContainer } from './container.production.js';
export { loadConfig, type AppConfig } from './config.js';
export { createRouter } from './api/router.js';
export * from './providers/index.js';
export * from './errors.js';
export * from './types/models.js';
export { QualityEvaluator } from './services/QualityEvaluator.js';
export { VersionManager } from './services/VersionManager.js';
export { SolutionService } from './services/SolutionService.js';
export { BehaviorTracker } from './services/BehaviorTracker.js';
export { PreferenceModel } from './services/PreferenceModel.js';
export { SimilarityCalculator } from './services/SimilarityCalculator.js';
export { RecommendationEngine } from './services/RecommendationEngine.js';
export { InteractionService } from './services/InteractionService.js';
export { TransferService } from './services/TransferService.js';
export { FileSolutionRepository } from './repositories/FileSolutionRepository.js';
export { SupabaseSolutionRepository } from './repositories/SupabaseSolutionRepository.js';
export type { ISolutionRepository } from './repositories/ISolutionRepository.js';
