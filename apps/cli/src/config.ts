import { DEFAULT_REACTION_WINDOW_MS, FLIP_INTERVAL_MS, reactionWindowMsSchema, type ReactionWindowMs } from '@card-table/shared';
import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const rawEnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NODE_ENV: z.string().default('development'),
  SLAPJACK_FLIP_INTERVAL_MS: z.coerce.number().int().min(250).max(10000).default(FLIP_INTERVAL_MS),
  SLAPJACK_REACTION_WINDOW_MS: z.coerce.number().pipe(reactionWindowMsSchema).default(DEFAULT_REACTION_WINDOW_MS),
  CARD_TABLE_SEED: z.string().trim().min(1).optional(),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  logLevel: LogLevel;
  nodeEnv: string;
  isProduction: boolean;
  flipIntervalMs: number;
  reactionWindowMs: ReactionWindowMs;
  seed: string | undefined;
}

export const parseConfigFromEnv = (env: NodeJS.ProcessEnv): AppConfig => {
  const parsed = rawEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`invalid environment: ${issues}`);
  }

  const raw = parsed.data;
  return {
    logLevel: raw.LOG_LEVEL,
    nodeEnv: raw.NODE_ENV,
    isProduction: raw.NODE_ENV === 'production',
    flipIntervalMs: raw.SLAPJACK_FLIP_INTERVAL_MS,
    reactionWindowMs: raw.SLAPJACK_REACTION_WINDOW_MS,
    seed: raw.CARD_TABLE_SEED,
  };
};
