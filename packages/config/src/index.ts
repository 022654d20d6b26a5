import { z } from 'zod';
import os from 'node:os';
import path from 'node:path';

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    // Spotify Web API (refresh-token grant)
    SPOTIFY_CLIENT_ID: z.string().min(1),
    SPOTIFY_CLIENT_SECRET: z.string().min(1),
    SPOTIFY_REFRESH_TOKEN: z.string().min(1),
    // Recommendation backend
    OPENAI_API_KEY: z.string().optional(),
    GPT_MODEL: z.string().default('gpt-4o-mini'),
    USE_LOCAL_LLM: flag,
    LOCAL_LLM_URL: z.string().url().optional(),
    SYSTEM_PROMPT: z.string().default(''),
    // Last.fm scrobbling, disabled unless all three are present
    LASTFM_API_KEY: z.string().optional(),
    LASTFM_API_SECRET: z.string().optional(),
    LASTFM_SESSION_KEY: z.string().optional(),
    // Files
    HISTORY_FILE: z.string().default(path.join(os.homedir(), '.autodj', 'song_history.jsonl')),
    PROMPTS_FILE: z.string().optional(),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    LOG_FILE: z.string().optional(),
    // Auto-DJ tuning
    AUTODJ_REPEAT_WINDOW: z.coerce.number().int().positive().default(10),
    AUTODJ_QUEUE_TARGET: z.coerce.number().int().min(0).default(1),
    AUTODJ_INTERVAL_MS: z.coerce.number().int().positive().default(120_000),
    AUTODJ_COOLDOWN_MS: z.coerce.number().int().positive().default(5_000),
    AUTODJ_MAX_COOLDOWN_MS: z.coerce.number().int().positive().default(120_000),
    AUTODJ_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(3),
    AUTODJ_UPSTREAM_COOLDOWN_MS: z.coerce.number().int().positive().default(60_000),
    // Session loop
    POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1_000),
    TICK_MS: z.coerce.number().int().positive().default(100),
  })
  .superRefine((value, ctx) => {
    if (!value.USE_LOCAL_LLM && !value.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'OPENAI_API_KEY is required unless USE_LOCAL_LLM is enabled',
      });
    }
    if (value.USE_LOCAL_LLM && !value.LOCAL_LLM_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['LOCAL_LLM_URL'],
        message: 'LOCAL_LLM_URL is required when USE_LOCAL_LLM is enabled',
      });
    }
    if (value.AUTODJ_MAX_COOLDOWN_MS < value.AUTODJ_COOLDOWN_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AUTODJ_MAX_COOLDOWN_MS'],
        message: 'AUTODJ_MAX_COOLDOWN_MS must not be smaller than AUTODJ_COOLDOWN_MS',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

export const env: Env = parseEnv(process.env);
