import { z } from 'zod';
import { ConfigError } from './errors.js';
import { MAX_TIMER_MS } from './abort.js';
import { DEFAULT_DIMENSIONS } from '../agents/types.js';
import type { QualityGateConfig, RevisionLoopConfig } from '../agents/types.js';

export interface TelegramConfig {
  readonly bot_token: string;
  readonly chat_id: string;
}

export interface AppConfig {
  readonly gate: QualityGateConfig;
  readonly loop: RevisionLoopConfig;
  readonly profile: {
    readonly name: string;
    readonly path: string;
  };
  /** Null when either Telegram variable is unset. */
  readonly telegram: TelegramConfig | null;
}

// ─── Env parsing helpers ─────────────────────────────────────────────

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

function listVar(fallback: readonly string[]) {
  return z.preprocess(
    blankToUndefined,
    z.string()
      .transform((raw) => raw.split(',').map((s) => s.trim()).filter(Boolean))
      .pipe(z.array(z.string()).min(1, 'must name at least one dimension').superRefine((dims, ctx) => {
        const seen = new Set<string>();
        for (const dim of dims) {
          if (seen.has(dim)) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate dimension "${dim}"` });
          seen.add(dim);
        }
      }))
      .default(fallback.join(',')),
  );
}

/** Millisecond durations handed to setTimeout, which cannot wait longer than MAX_TIMER_MS. */
const durationMs = z.coerce.number().int().positive().max(MAX_TIMER_MS, `must be at most ${MAX_TIMER_MS}`);

const WeightsSchema = z.string().transform((raw, ctx) => {
  const weights: Record<string, number> = {};
  for (const entry of raw.split(',').map((s) => s.trim()).filter(Boolean)) {
    const parts = entry.split(':').map((s) => s.trim());
    const weight = parts.length === 2 && parts[1] !== '' ? Number(parts[1]) : Number.NaN;
    if (!parts[0] || !Number.isFinite(weight) || weight < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid entry "${entry}", expected dimension:weight` });
      return z.NEVER;
    }
    weights[parts[0]] = weight;
  }
  return weights;
});

const EnvSchema = z.object({
  QUALITY_THRESHOLD: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(10).default(7.5)),
  QUALITY_DIMENSIONS: listVar(DEFAULT_DIMENSIONS),
  DIMENSION_WEIGHTS: z.preprocess(blankToUndefined, WeightsSchema.optional()),
  SAFETY_FLOOR: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(10).optional()),
  SAFETY_DIMENSIONS: listVar(['safety']),
  MAX_REVISIONS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(10).default(2)),
  GENERATION_TIMEOUT_MS: z.preprocess(blankToUndefined, durationMs.default(60_000)),
  SCORING_TIMEOUT_MS: z.preprocess(blankToUndefined, durationMs.default(60_000)),
  SESSION_BUDGET_MS: z.preprocess(blankToUndefined, durationMs.optional()),
  CANDIDATE_NAME: z.preprocess(blankToUndefined, z.string().trim().default('the candidate')),
  PROFILE_PATH: z.preprocess(blankToUndefined, z.string().trim().default('me/summary.txt')),
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_ID: optionalString,
}).superRefine((env, ctx) => {
  const known = new Set(env.QUALITY_DIMENSIONS);
  if (env.DIMENSION_WEIGHTS) {
    const entries = Object.entries(env.DIMENSION_WEIGHTS);
    for (const [dim] of entries) {
      if (!known.has(dim)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['DIMENSION_WEIGHTS'], message: `unknown dimension "${dim}"` });
      }
    }
    const total = env.QUALITY_DIMENSIONS.reduce((sum, dim) => sum + (env.DIMENSION_WEIGHTS?.[dim] ?? 1), 0);
    if (total <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['DIMENSION_WEIGHTS'], message: 'weights must have a positive total' });
    }
  }
  if (env.SAFETY_FLOOR !== undefined) {
    for (const dim of env.SAFETY_DIMENSIONS) {
      if (!known.has(dim)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SAFETY_DIMENSIONS'], message: `unknown dimension "${dim}"` });
      }
    }
  }
  if (Boolean(env.TELEGRAM_BOT_TOKEN) !== Boolean(env.TELEGRAM_CHAT_ID)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [env.TELEGRAM_BOT_TOKEN ? 'TELEGRAM_CHAT_ID' : 'TELEGRAM_BOT_TOKEN'],
      message: 'TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together',
    });
  }
});

// ─── Loader ──────────────────────────────────────────────────────────

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Read the process configuration from environment variables. Throws
 * ConfigError naming the first offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.length > 0 ? String(issue.path[0]) : 'env';
    throw new ConfigError(`Invalid ${field}: ${issue.message}`, field);
  }
  const e = result.data;

  const gate: QualityGateConfig = {
    threshold: e.QUALITY_THRESHOLD,
    dimensions: e.QUALITY_DIMENSIONS,
    safety_dimensions: e.SAFETY_DIMENSIONS,
    ...(e.DIMENSION_WEIGHTS ? { dimension_weights: e.DIMENSION_WEIGHTS } : {}),
    ...(e.SAFETY_FLOOR !== undefined ? { safety_floor: e.SAFETY_FLOOR } : {}),
  };

  const loop: RevisionLoopConfig = {
    max_rounds: e.MAX_REVISIONS,
    generation_timeout_ms: e.GENERATION_TIMEOUT_MS,
    scoring_timeout_ms: e.SCORING_TIMEOUT_MS,
    ...(e.SESSION_BUDGET_MS !== undefined ? { session_budget_ms: e.SESSION_BUDGET_MS } : {}),
  };

  return deepFreeze({
    gate,
    loop,
    profile: { name: e.CANDIDATE_NAME, path: e.PROFILE_PATH },
    telegram: e.TELEGRAM_BOT_TOKEN && e.TELEGRAM_CHAT_ID
      ? { bot_token: e.TELEGRAM_BOT_TOKEN, chat_id: e.TELEGRAM_CHAT_ID }
      : null,
  });
}
