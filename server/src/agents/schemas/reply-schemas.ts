/**
 * Zod schemas for the reply writer's tool calls and the evaluator's output.
 *
 * Tool inputs are strict: a call that does not match is dropped rather than
 * committed with guessed fields. Evaluator output is permissive: scores may
 * arrive nested or flat, as numbers or numeric strings, and anything the gate
 * cannot use becomes NaN so the gate reports it by name.
 */

import { z } from 'zod';
import type { DeclaredAction, DimensionScores, ScoreSheet } from '../types.js';

// ─── Tool inputs → DeclaredAction ─────────────────────────────────────

const nonEmpty = z.string().trim().min(1);

export const ScheduleInterviewInputSchema = z.object({
  date: nonEmpty,
  time: nonEmpty,
  format: nonEmpty,
  interviewer: nonEmpty.optional(),
});

export const DeclineOfferInputSchema = z.object({
  company: nonEmpty,
  reason: nonEmpty,
});

export const RecordContactInputSchema = z.object({
  email: z.string().trim().email(),
  company: nonEmpty,
  name: nonEmpty.optional(),
  role: nonEmpty.optional(),
});

export const RequestHumanReviewInputSchema = z.object({
  question: nonEmpty,
  confidence: z.coerce.number().min(0).max(1).optional(),
});

export const ACTION_TOOL_NAMES = [
  'schedule_interview',
  'decline_offer',
  'record_contact',
  'request_human_review',
] as const;

export type ActionToolName = (typeof ACTION_TOOL_NAMES)[number];

export type ParsedToolCall =
  | { ok: true; action: DeclaredAction }
  | { ok: false; error: string };

function issuesOf(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/** Validate one tool call into a DeclaredAction. Unknown tools are rejected. */
export function parseToolCall(name: string, input: unknown): ParsedToolCall {
  switch (name) {
    case 'schedule_interview': {
      const r = ScheduleInterviewInputSchema.safeParse(input);
      return r.success
        ? { ok: true, action: { kind: 'schedule_interview', payload: r.data } }
        : { ok: false, error: issuesOf(r.error) };
    }
    case 'decline_offer': {
      const r = DeclineOfferInputSchema.safeParse(input);
      return r.success
        ? { ok: true, action: { kind: 'decline_offer', payload: r.data } }
        : { ok: false, error: issuesOf(r.error) };
    }
    case 'record_contact': {
      const r = RecordContactInputSchema.safeParse(input);
      return r.success
        ? { ok: true, action: { kind: 'record_contact', payload: r.data } }
        : { ok: false, error: issuesOf(r.error) };
    }
    case 'request_human_review': {
      const r = RequestHumanReviewInputSchema.safeParse(input);
      if (!r.success) return { ok: false, error: issuesOf(r.error) };
      const { question, confidence } = r.data;
      return {
        ok: true,
        action: confidence === undefined
          ? { kind: 'request_human_review', payload: { question } }
          : { kind: 'request_human_review', payload: { question }, confidence },
      };
    }
    default:
      return { ok: false, error: `unknown tool "${name}"` };
  }
}

// ─── Evaluator output → ScoreSheet ────────────────────────────────────

/** Numbers pass through, numeric strings are coerced, everything else is NaN. */
export const ScoreValueSchema = z.unknown().transform((value): number => {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value.trim());
  return Number.NaN;
});

const TextSchema = z
  .union([z.string(), z.array(z.string())])
  .nullable()
  .optional()
  .transform((value) => (Array.isArray(value) ? value.join('\n') : value ?? null));

export const EvaluatorOutputSchema = z.object({
  scores: z.record(ScoreValueSchema).optional(),
  dimension_scores: z.record(ScoreValueSchema).optional(),
  feedback: TextSchema,
  suggested_improvements: TextSchema,
}).passthrough();

export type EvaluatorOutput = z.infer<typeof EvaluatorOutputSchema>;

/**
 * Pick the configured dimensions out of either shape. Missing dimensions stay
 * missing so the gate can name them; reported overall/pass fields are dropped.
 */
export function toScoreSheet(output: EvaluatorOutput, dimensions: readonly string[]): ScoreSheet {
  const nested = output.dimension_scores ?? output.scores;
  const dimension_scores: Record<string, number> = {};
  for (const dim of dimensions) {
    if (nested) {
      if (Object.prototype.hasOwnProperty.call(nested, dim)) dimension_scores[dim] = nested[dim];
    } else if (Object.prototype.hasOwnProperty.call(output, dim)) {
      dimension_scores[dim] = ScoreValueSchema.parse(output[dim]);
    }
  }
  const scores: DimensionScores = dimension_scores;
  return {
    dimension_scores: scores,
    feedback: output.feedback,
    suggested_improvements: output.suggested_improvements,
  };
}
