/**
 * Revision Controller
 *
 * Drives one inbound message through generate → score → gate, revising with
 * the latest evaluator feedback until the gate passes or the round budget is
 * spent. Produces exactly one Outcome; never throws for collaborator errors.
 *
 *   init → generating → evaluating → approved
 *                                  → revising → generating
 *                                  → escalating
 *
 * Rounds are strictly sequential. Each service call is a single suspension
 * point with its own timeout, clamped to the remaining session budget.
 */

import { runWithTimeout } from '../lib/abort.js';
import { errorMessage } from '../lib/errors.js';
import { buildAssessment, formatRevisionFeedback } from './quality-gate.js';
import { buildEscalationNotification, dispatchNotification } from './escalation.js';
import { isHumanReviewAction } from './types.js';
import type {
  ApprovedOutcome,
  Assessment,
  Candidate,
  CommittableAction,
  DeclaredAction,
  EscalatedOutcome,
  EscalationReason,
  EscalationSink,
  Outcome,
  QualityGateConfig,
  ReplySession,
  ResponseGenerator,
  ResponseScorer,
  RevisionLoopConfig,
  RevisionRound,
} from './types.js';

export interface RevisionControllerConfig {
  readonly gate: QualityGateConfig;
  readonly loop: RevisionLoopConfig;
}

export interface RevisionControllerDeps {
  readonly generator: ResponseGenerator;
  readonly scorer: ResponseScorer;
  /** Receives escalations. Optional so the loop can run headless in batch evaluation. */
  readonly sink?: EscalationSink;
  /** Clock for the session budget. */
  readonly now?: () => number;
}

type LoopState = 'generating' | 'evaluating' | 'revising' | 'approved' | 'escalating';

/** Highest overall score wins; the earliest round wins a tie. */
export function selectBestRound(rounds: readonly RevisionRound[]): RevisionRound | null {
  let best: RevisionRound | null = null;
  for (const r of rounds) {
    if (best === null || r.assessment.overall_score > best.assessment.overall_score) {
      best = r;
    }
  }
  return best;
}

function isCommittable(action: DeclaredAction): action is CommittableAction {
  return !isHumanReviewAction(action);
}

export async function runRevisionLoop(
  session: ReplySession,
  config: RevisionControllerConfig,
  deps: RevisionControllerDeps,
): Promise<Outcome> {
  const { gate, loop } = config;
  const now = deps.now ?? Date.now;
  const log = session.log.child({ component: 'revision-controller' });
  const maxGenerations = loop.max_rounds + 1;
  const deadline = loop.session_budget_ms !== undefined ? now() + loop.session_budget_ms : Infinity;

  const rounds: RevisionRound[] = [];
  let roundCount = 0;
  let feedback: string | null = null;
  let previousResponse: string | null = null;

  const transition = (state: LoopState, round: number) => {
    log.debug({ state, round }, 'Revision loop transition');
  };

  const callTimeout = (configuredMs: number): number =>
    Math.min(configuredMs, deadline - now());

  const finish = (outcome: Outcome): Outcome => {
    if (outcome.kind === 'approved') {
      log.info(
        {
          round_count: outcome.round_count,
          overall_score: outcome.assessment.overall_score,
          committed_actions: outcome.committed_actions.map((a) => a.kind),
        },
        'Response approved',
      );
    } else {
      log.warn(
        {
          round_count: outcome.round_count,
          reason: outcome.escalation_reason,
          detail: outcome.detail,
          best_score: outcome.last_assessment === null
            ? null
            : selectBestRound(outcome.rounds)?.assessment.overall_score ?? null,
        },
        'Response escalated',
      );
      if (deps.sink) {
        dispatchNotification(deps.sink, buildEscalationNotification(session, outcome), log);
      }
    }
    return outcome;
  };

  const escalate = (reason: EscalationReason, detail: string): Outcome => {
    transition('escalating', roundCount);
    const best = selectBestRound(rounds);
    const outcome: EscalatedOutcome = {
      kind: 'escalated',
      best_candidate: best?.candidate ?? null,
      last_assessment: rounds.length > 0 ? rounds[rounds.length - 1].assessment : null,
      round_count: roundCount,
      escalation_reason: reason,
      detail,
      rounds: [...rounds],
    };
    return finish(outcome);
  };

  const approve = (candidate: Candidate, assessment: Assessment): Outcome => {
    transition('approved', roundCount);
    const outcome: ApprovedOutcome = {
      kind: 'approved',
      candidate,
      assessment,
      round_count: roundCount,
      committed_actions: candidate.declared_actions.filter(isCommittable),
      rounds: [...rounds],
    };
    return finish(outcome);
  };

  for (let round = 1; round <= maxGenerations; round++) {
    // ── Generating ──
    transition('generating', round);
    const generationBudget = callTimeout(loop.generation_timeout_ms);
    if (generationBudget <= 0) {
      return escalate('generation-failure', 'Session budget exhausted before generation');
    }
    roundCount = round;

    let candidate: Candidate;
    try {
      candidate = await runWithTimeout(
        (signal) => deps.generator.generate({
          message: session.message,
          context: session.context,
          feedback,
          previous_response: previousResponse,
          signal,
        }),
        generationBudget,
        session.signal,
      );
    } catch (err) {
      log.error({ round, error: errorMessage(err) }, 'Generation failed');
      return escalate('generation-failure', `Generation failed: ${errorMessage(err)}`);
    }

    // ── Evaluating ──
    transition('evaluating', round);
    const scoringBudget = callTimeout(loop.scoring_timeout_ms);
    if (scoringBudget <= 0) {
      return escalate('evaluation-failure', 'Session budget exhausted before evaluation');
    }

    let assessment: Assessment;
    try {
      const sheet = await runWithTimeout(
        (signal) => deps.scorer.score({ message: session.message, response: candidate.text, signal }),
        scoringBudget,
        session.signal,
      );
      assessment = buildAssessment(sheet, gate);
    } catch (err) {
      log.error({ round, error: errorMessage(err) }, 'Evaluation failed');
      return escalate('evaluation-failure', `Evaluation failed: ${errorMessage(err)}`);
    }

    rounds.push({ round, candidate, assessment });
    log.info(
      {
        round,
        dimension_scores: assessment.dimension_scores,
        overall_score: assessment.overall_score,
        passed: assessment.passed,
        declared_actions: candidate.declared_actions.map((a) => a.kind),
      },
      'Round scored',
    );

    // A declared need for human review outranks any score.
    const flagged = candidate.declared_actions.find(isHumanReviewAction);
    if (flagged) {
      const confidence = flagged.confidence !== undefined ? ` (confidence ${flagged.confidence})` : '';
      return escalate('flagged-by-agent', `Flagged for human review: ${flagged.payload.question}${confidence}`);
    }

    if (assessment.passed) {
      return approve(candidate, assessment);
    }

    if (round < maxGenerations) {
      transition('revising', round);
      // Only the latest failing round's feedback is carried forward.
      feedback = formatRevisionFeedback(assessment);
      previousResponse = candidate.text;
    }
  }

  const best = selectBestRound(rounds);
  const bestScore = best ? best.assessment.overall_score.toFixed(2) : 'n/a';
  return escalate(
    'max-rounds-exceeded',
    `No passing response after ${roundCount} rounds (best ${bestScore}, threshold ${gate.threshold})`,
  );
}
