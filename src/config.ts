import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { TIERS, type Tier } from './validation/types.js';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Validation
  VALIDATION_DEFAULT_LEVEL:        z.enum(TIERS).default('standard'),
  VALIDATION_MAX_SCENES_PER_BATCH: z.coerce.number().int().positive().default(50),
  VALIDATION_TIMEOUT_SECONDS:      z.coerce.number().positive().default(120),
  VALIDATION_UNKEYED_SCENES:       z.enum(['report', 'skip']).default('report'),

  // Continuity advisor
  ADVISOR_MODEL:                   z.string().min(1).default('claude-sonnet-4-6'),
  ADVISOR_API_KEY_ENV:             z.string().min(1).default('ANTHROPIC_API_KEY'),
  ADVISOR_TEMPERATURE:             z.coerce.number().min(0).max(1).default(0.2),
  // Replaces temperature when set; the two are never sent together.
  ADVISOR_TOP_P:                   z.coerce.number().min(0).max(1).optional(),
  ADVISOR_TOP_K:                   z.coerce.number().int().positive().default(40),
  ADVISOR_MAX_OUTPUT_TOKENS:       z.coerce.number().int().positive().default(1024),

  // Database (optional — results stay in memory when unset)
  SUPABASE_URL:                    z.string().url().optional(),
  SUPABASE_SERVICE_KEY:            z.string().min(1).optional(),
  SUPABASE_BUCKET:                 z.string().min(1).default('scene-validator-storage'),
  LOCAL_FALLBACK_DB:               z.string().min(1).default(`${process.env['HOME'] ?? '/tmp'}/scene-validator/local_fallback.db`),

  // HTTP
  PORT:                            z.coerce.number().int().positive().default(8080),
  APP_VERSION:                     z.string().min(1).default('1.0.0'),

  // Logging
  LOG_LEVEL:                       z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:                      z.enum(['text', 'json']).default('text'),
});

export type Env = z.infer<typeof EnvSchema>;

export type EnvSource = Record<string, string | undefined>;

export function parseEnv(source: EnvSource): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new Error(`Missing or invalid environment variables: ${invalid}`);
  }
  return parsed.data;
}

export const env = parseEnv(process.env);

// ── Validator config ──────────────────────────────────────────────────────────

export interface GenerationConfig {
  temperature:     number;
  /** Null means sample by temperature. */
  topP:            number | null;
  topK:            number;
  maxOutputTokens: number;
}

export interface AdvisorConfig {
  model:      string;
  /** Null disables the advisory rule even at the thorough tier. */
  apiKey:     string | null;
  timeoutMs:  number;
  generation: GenerationConfig;
}

export interface ValidatorConfig {
  defaultLevel:      Tier;
  maxScenesPerBatch: number;
  unkeyedScenes:     'report' | 'skip';
  advisor:           AdvisorConfig;
}

/**
 * Freezes the effective configuration once at start-up. The advisor
 * credential is looked up in `source` under the variable named by
 * ADVISOR_API_KEY_ENV.
 */
export function buildValidatorConfig(parsed: Env, source: EnvSource): Readonly<ValidatorConfig> {
  const apiKey = source[parsed.ADVISOR_API_KEY_ENV]?.trim() || null;

  return Object.freeze({
    defaultLevel:      parsed.VALIDATION_DEFAULT_LEVEL,
    maxScenesPerBatch: parsed.VALIDATION_MAX_SCENES_PER_BATCH,
    unkeyedScenes:     parsed.VALIDATION_UNKEYED_SCENES,
    advisor: Object.freeze({
      model:     parsed.ADVISOR_MODEL,
      apiKey,
      timeoutMs: Math.round(parsed.VALIDATION_TIMEOUT_SECONDS * 1_000),
      generation: Object.freeze({
        temperature:     parsed.ADVISOR_TEMPERATURE,
        topP:            parsed.ADVISOR_TOP_P ?? null,
        topK:            parsed.ADVISOR_TOP_K,
        maxOutputTokens: parsed.ADVISOR_MAX_OUTPUT_TOKENS,
      }),
    }),
  });
}
