/**
 * Response Evaluator
 *
 * Scores a drafted reply 0-10 on each configured dimension and explains what
 * to fix. Returns a raw ScoreSheet; the quality gate validates it and computes
 * the overall score itself.
 */

import { llm, getModelFor } from '../lib/llm.js';
import type { LLMProvider } from '../lib/llm-provider.js';
import { repairJSON } from '../lib/json-repair.js';
import { withRetry } from '../lib/retry.js';
import { EvaluationFailure, MalformedAssessmentError, errorMessage } from '../lib/errors.js';
import logger from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { EvaluatorOutputSchema, toScoreSheet } from './schemas/reply-schemas.js';
import type { ResponseScorer, ScoreSheet, ScoringRequest } from './types.js';

const DIMENSION_GUIDE: Record<string, string> = {
  professional_tone: 'Is it appropriately professional and polite?',
  clarity: 'Is the message clear and easy to understand?',
  completeness: "Does it fully address the employer's message?",
  safety: 'Is it free of false claims, invented facts and commitments that need the candidate (salary, contracts)?',
  relevance: 'Is it relevant and on-topic?',
};

export function buildEvaluatorPrompt(
  message: string,
  response: string,
  dimensions: readonly string[],
  profileSummary?: string,
): string {
  const criteria = dimensions
    .map((dim, i) => `${i + 1}. ${dim}: ${DIMENSION_GUIDE[dim] ?? `How well does the reply do on ${dim.replace(/_/g, ' ')}?`}`)
    .join('\n');
  const shape = dimensions.map((dim) => `    "${dim}": <0-10>`).join(',\n');
  const profile = profileSummary ? `\nCANDIDATE PROFILE (claims must be supported by this):\n${profileSummary}\n` : '';

  return `Critique this reply written on a job candidate's behalf.

EMPLOYER MESSAGE:
${message}

DRAFTED REPLY:
${response}
${profile}
Score each criterion from 0 to 10:
${criteria}

Also check: unsupported claims, commitments that need human approval, tone, grammar and spelling.

Return ONLY valid JSON:
{
  "scores": {
${shape}
  },
  "feedback": "<what is wrong, if anything>",
  "suggested_improvements": "<specific changes>"
}`;
}

const EVALUATOR_SYSTEM_PROMPT = 'You are a strict reviewer of professional correspondence. You answer with JSON only.';

export interface LlmResponseScorerOptions {
  dimensions: readonly string[];
  profile_summary?: string;
  provider?: LLMProvider;
  model?: string;
  log?: Logger;
}

export class LlmResponseScorer implements ResponseScorer {
  private readonly provider: LLMProvider;
  private readonly model: string;
  private readonly log: Logger;

  constructor(private readonly options: LlmResponseScorerOptions) {
    this.provider = options.provider ?? llm;
    this.model = options.model ?? getModelFor('evaluator');
    this.log = options.log ?? logger;
  }

  async score(request: ScoringRequest): Promise<ScoreSheet> {
    const { signal } = request;
    let text: string;
    try {
      const response = await withRetry(
        () => this.provider.chat({
          model: this.model,
          system: EVALUATOR_SYSTEM_PROMPT,
          messages: [{
            role: 'user',
            content: buildEvaluatorPrompt(request.message, request.response, this.options.dimensions, this.options.profile_summary),
          }],
          max_tokens: 1024,
          temperature: 0.3,
          json_mode: true,
          signal,
        }),
        {
          signal,
          onRetry: (attempt, error) => {
            this.log.warn({ attempt, error: error.message }, 'Evaluator call failed; retrying');
          },
        },
      );
      text = response.text;
    } catch (err) {
      if (signal.aborted) throw err;
      throw new EvaluationFailure(`Evaluator call failed: ${errorMessage(err)}`, { cause: err });
    }

    return parseEvaluatorOutput(text, this.options.dimensions);
  }
}

/** Turn raw evaluator text into a ScoreSheet, or throw MalformedAssessmentError. */
export function parseEvaluatorOutput(text: string, dimensions: readonly string[]): ScoreSheet {
  const parsed = repairJSON(text);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new MalformedAssessmentError(['evaluator output is not a JSON object']);
  }
  const result = EvaluatorOutputSchema.safeParse(parsed);
  if (!result.success) {
    throw new MalformedAssessmentError(
      result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  return toScoreSheet(result.data, dimensions);
}
