/**
 * Production container: picks the storage backend and log provider from
 * configuration and loads the stored corpus before returning.
 */

import { createContainer, type Container } from './container.js';
import type { AppConfig } from './config.js';
import type { ISolutionRepository } from './repositories/ISolutionRepository.js';
import { getSupabaseClient } from './db.js';
import { FileSolutionRepository } from './repositories/FileSolutionRepository.js';
import { SupabaseSolutionRepository } from './repositories/SupabaseSolutionRepository.js';
import { ConsoleLogProvider, type ILogProvider } from './providers/index.js';

export async function createProductionContainer(config: AppConfig): Promise<Container> {
  const logProvider = new ConsoleLogProvider({
    outputToConsole: config.LOG_TO_CONSOLE,
    minLevel: config.LOG_LEVEL,
    retainEvents: false,
  });

  const container = createContainer({
    solutionRepo: createSolutionRepository(config, logProvider),
    logProvider,
    cacheTtlMs: config.RECOMMENDATION_CACHE_TTL_MS,
  });

  await container.solutionService.load();
  return container;
}

function createSolutionRepository(config: AppConfig, logProvider: ILogProvider): ISolutionRepository {
  if (config.STORAGE_DRIVER === 'supabase') {
    if (!config.SUPABASE_URL || !config.SUPABASE_SERVICE_ROLE_KEY) {
      throw new Error('Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY');
    }
    return new SupabaseSolutionRepository(
      getSupabaseClient(config.SUPABASE_URL, config.SUPABASE_SERVICE_ROLE_KEY)
    );
  }

  return new FileSolutionRepository(config.SOLUTIONS_DIR, logProvider);
}
