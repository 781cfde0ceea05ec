import logger from './logger.js';
import type { Logger } from './logger.js';
import type { DimensionScores, Outcome, ReplySession } from '../agents/types.js';

const PREVIEW_CHARS = 200;

/** One line per handled message, shaped for log search rather than display. */
export interface OutcomeRecord {
  readonly event: 'reply_outcome';
  readonly timestamp: string;
  readonly session_id: string;
  readonly sender_name: string;
  readonly message_preview: string;
  readonly response_preview: string | null;
  readonly status: Outcome['kind'];
  readonly escalation_reason: string | null;
  readonly round_count: number;
  readonly revision_count: number;
  readonly overall_score: number | null;
  readonly dimension_scores: DimensionScores | null;
}

function preview(text: string): string {
  return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS)}...` : text;
}

export function buildOutcomeRecord(
  session: Pick<ReplySession, 'id' | 'sender_name' | 'message'>,
  outcome: Outcome,
  now: Date = new Date(),
): OutcomeRecord {
  const response = outcome.kind === 'approved' ? outcome.candidate : outcome.best_candidate;
  const assessment = outcome.kind === 'approved' ? outcome.assessment : outcome.last_assessment;
  return {
    event: 'reply_outcome',
    timestamp: now.toISOString(),
    session_id: session.id,
    sender_name: session.sender_name,
    message_preview: preview(session.message),
    response_preview: response ? preview(response.text) : null,
    status: outcome.kind,
    escalation_reason: outcome.kind === 'escalated' ? outcome.escalation_reason : null,
    round_count: outcome.round_count,
    revision_count: Math.max(0, outcome.round_count - 1),
    overall_score: assessment?.overall_score ?? null,
    dimension_scores: assessment?.dimension_scores ?? null,
  };
}

export function recordOutcome(
  session: Pick<ReplySession, 'id' | 'sender_name' | 'message'>,
  outcome: Outcome,
  log: Logger = logger,
): OutcomeRecord {
  const record = buildOutcomeRecord(session, outcome);
  log.info(record, 'Reply outcome recorded');
  return record;
}
