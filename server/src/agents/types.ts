/**
 * Shared types for the employer-reply quality loop.
 *
 * Field names follow the JSON shapes exchanged with the LLM services
 * (snake_case), so outcomes can be logged as-is.
 */

import type { Logger } from '../lib/logger.js';

// ─── Quality dimensions ──────────────────────────────────────────────

export const DEFAULT_DIMENSIONS = [
  'professional_tone',
  'clarity',
  'completeness',
  'safety',
  'relevance',
] as const;

export const SCORE_MIN = 0;
export const SCORE_MAX = 10;

export type DimensionScores = Readonly<Record<string, number>>;

export interface QualityGateConfig {
  /** Minimum overall score to pass (inclusive). */
  readonly threshold: number;
  /** Every dimension the scorer must return. */
  readonly dimensions: readonly string[];
  /** Relative weight per dimension; missing entries weigh 1. Uniform when absent. */
  readonly dimension_weights?: Readonly<Record<string, number>>;
  /** Any safety dimension strictly below this fails the gate. Disabled when absent. */
  readonly safety_floor?: number;
  readonly safety_dimensions: readonly string[];
}

/** Raw output of the Scoring Service, before the gate validates it. */
export interface ScoreSheet {
  readonly dimension_scores: DimensionScores;
  readonly feedback?: string | null;
  readonly suggested_improvements?: string | null;
}

/** Validated, immutable assessment. Built only by buildAssessment(). */
export interface Assessment {
  readonly dimension_scores: DimensionScores;
  readonly overall_score: number;
  readonly passed: boolean;
  /** Always present when passed === false. */
  readonly feedback: string | null;
  readonly suggested_improvements: string | null;
}

export interface GateVerdict {
  readonly passed: boolean;
  readonly overall_score: number;
  readonly meets_threshold: boolean;
  /** Safety dimensions below the configured floor. */
  readonly floor_breaches: readonly string[];
}

// ─── Declared actions ────────────────────────────────────────────────

export interface ScheduleInterviewAction {
  readonly kind: 'schedule_interview';
  readonly payload: {
    readonly date: string;
    readonly time: string;
    readonly format: string;
    readonly interviewer?: string;
  };
}

export interface DeclineOfferAction {
  readonly kind: 'decline_offer';
  readonly payload: {
    readonly company: string;
    readonly reason: string;
  };
}

export interface RecordContactAction {
  readonly kind: 'record_contact';
  readonly payload: {
    readonly email: string;
    readonly company: string;
    readonly name?: string;
    readonly role?: string;
  };
}

/** The writer cannot answer with confidence; a human must take over. */
export interface RequestHumanReviewAction {
  readonly kind: 'request_human_review';
  readonly payload: {
    readonly question: string;
  };
  /** Writer's confidence in [0, 1], when it gave one. */
  readonly confidence?: number;
}

export type DeclaredAction =
  | ScheduleInterviewAction
  | DeclineOfferAction
  | RecordContactAction
  | RequestHumanReviewAction;

export type ActionKind = DeclaredAction['kind'];

export type CommittableAction = Exclude<DeclaredAction, RequestHumanReviewAction>;

export function isHumanReviewAction(action: DeclaredAction): action is RequestHumanReviewAction {
  return action.kind === 'request_human_review';
}

// ─── Candidates and rounds ───────────────────────────────────────────

export interface Candidate {
  readonly text: string;
  readonly declared_actions: readonly DeclaredAction[];
}

export interface RevisionRound {
  /** 1-based; equals the generation call that produced the candidate. */
  readonly round: number;
  readonly candidate: Candidate;
  readonly assessment: Assessment;
}

// ─── Outcome ─────────────────────────────────────────────────────────

export const ESCALATION_REASONS = [
  'generation-failure',
  'evaluation-failure',
  'flagged-by-agent',
  'max-rounds-exceeded',
] as const;

export type EscalationReason = (typeof ESCALATION_REASONS)[number];

export interface ApprovedOutcome {
  readonly kind: 'approved';
  readonly candidate: Candidate;
  readonly assessment: Assessment;
  readonly round_count: number;
  /** Only the approved candidate's actions; superseded candidates never contribute. */
  readonly committed_actions: readonly CommittableAction[];
  readonly rounds: readonly RevisionRound[];
}

export interface EscalatedOutcome {
  readonly kind: 'escalated';
  /** Highest-scoring candidate seen (earliest on ties); null if nothing was scored. */
  readonly best_candidate: Candidate | null;
  readonly last_assessment: Assessment | null;
  readonly round_count: number;
  readonly escalation_reason: EscalationReason;
  /** Human-readable cause: error message, flagged question or score summary. */
  readonly detail: string;
  readonly rounds: readonly RevisionRound[];
}

export type Outcome = ApprovedOutcome | EscalatedOutcome;

// ─── Conversation and services ───────────────────────────────────────

export interface ConversationTurn {
  readonly role: 'employer' | 'assistant';
  readonly text: string;
}

export interface GenerationRequest {
  readonly message: string;
  readonly context: readonly ConversationTurn[];
  /** Feedback of the most recent failing round only; null on the first round. */
  readonly feedback: string | null;
  /** The reply that feedback refers to. */
  readonly previous_response: string | null;
  readonly signal: AbortSignal;
}

export interface ScoringRequest {
  readonly message: string;
  readonly response: string;
  readonly signal: AbortSignal;
}

export interface ResponseGenerator {
  generate(request: GenerationRequest): Promise<Candidate>;
}

export interface ResponseScorer {
  score(request: ScoringRequest): Promise<ScoreSheet>;
}

// ─── Notifications ───────────────────────────────────────────────────

export const NOTIFICATION_PRIORITIES = ['normal', 'high', 'emergency'] as const;

export type NotificationPriority = (typeof NOTIFICATION_PRIORITIES)[number];

export type NotificationReason = EscalationReason | 'message-received' | 'approved' | 'action-committed';

export interface NotificationPayload {
  readonly message: string;
  readonly candidate_text: string | null;
  readonly reason: NotificationReason;
  readonly round_count: number;
  readonly sender_name?: string;
  readonly detail?: string;
}

export interface Notification {
  readonly priority: NotificationPriority;
  readonly payload: NotificationPayload;
}

export interface EscalationSink {
  readonly name: string;
  notify(notification: Notification): Promise<void>;
}

// ─── Session ─────────────────────────────────────────────────────────

/**
 * Per-message state owned by the caller and threaded through every call.
 * Nothing here is shared between sessions.
 */
export interface ReplySession {
  readonly id: string;
  readonly sender_name: string;
  readonly message: string;
  readonly context: readonly ConversationTurn[];
  readonly log: Logger;
  /** Caller-side cancellation for the whole session. */
  readonly signal?: AbortSignal;
}

export interface RevisionLoopConfig {
  /** Revisions allowed after the first attempt (total generations = max_rounds + 1). */
  readonly max_rounds: number;
  readonly generation_timeout_ms: number;
  readonly scoring_timeout_ms: number;
  /** Wall-clock budget for the whole session; unlimited when absent. */
  readonly session_budget_ms?: number;
}
