/**
 * Environment configuration, parsed once per cold start.
 */

import { z } from 'zod';
import { LOG_LEVELS } from './providers/ILogProvider.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

const schema = z
  .object({
    STORAGE_DRIVER: z.enum(['file', 'supabase']).default('file'),
    SOLUTIONS_DIR: z.string().min(1).default('solutions'),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    LOG_TO_CONSOLE: booleanFlag,
    RECOMMENDATION_CACHE_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER !== 'supabase') return;
    for (const key of ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY'] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: 'required when STORAGE_DRIVER is supabase',
        });
      }
    }
  });

export type AppConfig = z.infer<typeof schema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  return parsed.data;
}
