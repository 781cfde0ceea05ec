import { describe, it, expect, vi } from 'vitest';
import { runRevisionLoop, selectBestRound } from '../agents/revision-controller.js';
import { MalformedAssessmentError } from '../lib/errors.js';
import logger from '../lib/logger.js';
import { DEFAULT_DIMENSIONS } from '../agents/types.js';
import type {
  Candidate,
  DeclaredAction,
  EscalationSink,
  GenerationRequest,
  Notification,
  Outcome,
  QualityGateConfig,
  ReplySession,
  RevisionLoopConfig,
  ScoreSheet,
  ScoringRequest,
} from '../agents/types.js';

// ─── Fixtures ────────────────────────────────────────────────────────

const gate: QualityGateConfig = {
  threshold: 7.5,
  dimensions: DEFAULT_DIMENSIONS,
  safety_dimensions: ['safety'],
};

const loop: RevisionLoopConfig = {
  max_rounds: 2,
  generation_timeout_ms: 1_000,
  scoring_timeout_ms: 1_000,
};

function makeSession(overrides?: Partial<ReplySession>): ReplySession {
  return {
    id: 'session-1',
    sender_name: 'Acme Recruiting',
    message: 'Are you available for an interview next Tuesday?',
    context: [],
    log: logger,
    ...overrides,
  };
}

function candidate(text: string, declared_actions: DeclaredAction[] = []): Candidate {
  return { text, declared_actions };
}

function uniform(score: number): ScoreSheet {
  return {
    dimension_scores: Object.fromEntries(DEFAULT_DIMENSIONS.map((d) => [d, score])),
    feedback: score >= 7.5 ? null : `needs work (${score})`,
  };
}

const interview: DeclaredAction = {
  kind: 'schedule_interview',
  payload: { date: '2026-11-03', time: '14:00 CET', format: 'video' },
};
const decline: DeclaredAction = {
  kind: 'decline_offer',
  payload: { company: 'Acme', reason: 'Relocation not possible' },
};
const contact: DeclaredAction = {
  kind: 'record_contact',
  payload: { email: 'jane@example.com', company: 'Acme' },
};
const humanReview: DeclaredAction = {
  kind: 'request_human_review',
  payload: { question: 'What are your salary expectations?' },
  confidence: 0.2,
};

type Step<T> = T | Error;

function scripted<T>(steps: Step<T>[]) {
  let i = 0;
  return () => {
    const step = steps[Math.min(i, steps.length - 1)];
    i += 1;
    return step instanceof Error ? Promise.reject(step) : Promise.resolve(step);
  };
}

function services(candidates: Step<Candidate>[], sheets: Step<ScoreSheet>[]) {
  const nextCandidate = scripted(candidates);
  const nextSheet = scripted(sheets);
  const generate = vi.fn<(request: GenerationRequest) => Promise<Candidate>>(() => nextCandidate());
  const score = vi.fn<(request: ScoringRequest) => Promise<ScoreSheet>>(() => nextSheet());
  return { generator: { generate }, scorer: { score }, generate, score };
}

function makeSink(impl?: (n: Notification) => Promise<void>) {
  const notify = vi.fn<(n: Notification) => Promise<void>>(impl ?? (() => Promise.resolve()));
  const sink: EscalationSink = { name: 'test', notify };
  return { sink, notify };
}

function expectEscalated(outcome: Outcome) {
  if (outcome.kind !== 'escalated') throw new Error(`expected escalation, got ${outcome.kind}`);
  return outcome;
}

function expectApproved(outcome: Outcome) {
  if (outcome.kind !== 'approved') throw new Error(`expected approval, got ${outcome.kind}`);
  return outcome;
}

// ─── Core scenarios ──────────────────────────────────────────────────

describe('runRevisionLoop', () => {
  it('approves on the first round when the gate passes', async () => {
    const c1 = candidate('Tuesday at 14:00 works well for me.', [interview]);
    const { generator, scorer, generate, score } = services([c1], [uniform(8)]);

    const outcome = expectApproved(await runRevisionLoop(makeSession(), { gate, loop }, { generator, scorer }));

    expect(outcome.round_count).toBe(1);
    expect(outcome.candidate).toBe(c1);
    expect(outcome.assessment.overall_score).toBe(8);
    expect(outcome.committed_actions).toEqual([interview]);
    expect(generate).toHaveBeenCalledTimes(1);
    expect(score).toHaveBeenCalledTimes(1);
    expect(generate.mock.calls[0][0].feedback).toBeNull();
    expect(generate.mock.calls[0][0].previous_response).toBeNull();
  });

  it('revises once and commits only the approved candidate actions', async () => {
    const c1 = candidate('Sure.', [decline]);
    const c2 = candidate('Thank you, Tuesday at 14:00 works. My email is on file.', [contact]);
    const { generator, scorer, generate } = services([c1, c2], [uniform(6), uniform(8.2)]);

    const outcome = expectApproved(await runRevisionLoop(makeSession(), { gate, loop }, { generator, scorer }));

    expect(outcome.round_count).toBe(2);
    expect(outcome.candidate).toBe(c2);
    expect(outcome.committed_actions).toEqual([contact]);
    expect(outcome.rounds.map((r) => r.round)).toEqual([1, 2]);

    const second = generate.mock.calls[1][0];
    expect(second.feedback).toBe('needs work (6)');
    expect(second.previous_response).toBe('Sure.');
    expect(second.message).toBe('Are you available for an interview next Tuesday?');
  });

  it('passes only the latest failing round feedback forward', async () => {
    const { generator, scorer, generate } = services(
      [candidate('a'), candidate('b'), candidate('c')],
      [uniform(5), uniform(6), uniform(9)],
    );

    await runRevisionLoop(makeSession(), { gate, loop }, { generator, scorer });

    expect(generate.mock.calls[2][0].feedback).toBe('needs work (6)');
    expect(generate.mock.calls[2][0].previous_response).toBe('b');
  });

  it('escalates after exhausting rounds with the earliest best candidate', async () => {
    const c1 = candidate('first');
    const c2 = candidate('second');
    const c3 = candidate('third');
    const { generator, scorer, generate } = services([c1, c2, c3], [uniform(6.5)]);

    const outcome = expectEscalated(await runRevisionLoop(makeSession(), { gate, loop }, { generator, scorer }));

    expect(outcome.escalation_reason).toBe('max-rounds-exceeded');
    expect(outcome.round_count).toBe(3);
    expect(outcome.best_candidate).toBe(c1);
    expect(outcome.last_assessment?.overall_score).toBe(6.5);
    expect(outcome.detail).toBe('No passing response after 3 rounds (best 6.50, threshold 7.5)');
    expect(generate).toHaveBeenCalledTimes(3);
  });

  it('picks the highest scoring round as best candidate', async () => {
    const c2 = candidate('second');
    const { generator, scorer } = services([candidate('first'), c2, candidate('third')], [uniform(6), uniform(7), uniform(6.5)]);

    const outcome = expectEscalated(await runRevisionLoop(makeSession(), { gate, loop }, { generator, scorer }));

    expect(outcome.best_candidate).toBe(c2);
    expect(outcome.last_assessment?.overall_score).toBe(6.5);
  });

  it('escalates a generation failure without scoring', async () => {
    const { generator, scorer, score } = services([new Error('model unavailable')], [uniform(8)]);

    const outcome = expectEscalated(await runRevisionLoop(makeSession(), { gate, loop }, { generator, scorer }));

    expect(outcome.escalation_reason).toBe('generation-failure');
    expect(outcome.round_count).toBe(1);
    expect(outcome.best_candidate).toBeNull();
    expect(outcome.last_assessment).toBeNull();
    expect(outcome.detail).toBe('Generation failed: model unavailable');
    expect(score).not.toHaveBeenCalled();
  });

  it('keeps the earlier candidate when a later generation fails', async () => {
    const c1 = candidate('first');
    const { generator, scorer } = services([c1, new Error('boom')], [uniform(6)]);

    const outcome = expectEscalated(await runRevisionLoop(makeSession(), { gate, loop }, { generator, scorer }));

    expect(outcome.escalation_reason).toBe('generation-failure');
    expect(outcome.round_count).toBe(2);
    expect(outcome.best_candidate).toBe(c1);
  });

  it('escalates a flagged candidate even with perfect scores', async () => {
    const flagged = candidate('Let me check and get back to you.', [interview, humanReview]);
    const { generator, scorer, generate } = services([flagged], [uniform(10)]);

    const outcome = expectEscalated(await runRevisionLoop(makeSession(), { gate, loop }, { generator, scorer }));

    expect(outcome.escalation_reason).toBe('flagged-by-agent');
    expect(outcome.round_count).toBe(1);
    expect(outcome.best_candidate).toBe(flagged);
    expect(outcome.last_assessment?.passed).toBe(true);
    expect(outcome.detail).toBe('Flagged for human review: What are your salary expectations? (confidence 0.2)');
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it('reports an evaluation failure before a flag on the same round', async () => {
    const { generator, scorer } = services([candidate('x', [humanReview])], [new Error('scorer down')]);

    const outcome = expectEscalated(await runRevisionLoop(makeSession(), { gate, loop }, { generator, scorer }));

    expect(outcome.escalation_reason).toBe('evaluation-failure');
  });

  it('treats a malformed assessment as an evaluation failure', async () => {
    const partial: ScoreSheet = { dimension_scores: { professional_tone: 8, clarity: 8, completeness: 8, safety: 8 } };
    const { generator, scorer } = services([candidate('x')], [partial]);

    const outcome = expectEscalated(await runRevisionLoop(makeSession(), { gate, loop }, { generator, scorer }));

    expect(outcome.escalation_reason).toBe('evaluation-failure');
    expect(outcome.round_count).toBe(1);
    expect(outcome.rounds).toEqual([]);
    expect(outcome.detail).toBe('Evaluation failed: Malformed assessment: missing dimension "relevance"');
  });

  it('surfaces a scorer-raised MalformedAssessmentError the same way', async () => {
    const { generator, scorer } = services([candidate('x')], [new MalformedAssessmentError(['evaluator output is not a JSON object'])]);

    const outcome = expectEscalated(await runRevisionLoop(makeSession(), { gate, loop }, { generator, scorer }));

    expect(outcome.escalation_reason).toBe('evaluation-failure');
    expect(outcome.detail).toBe('Evaluation failed: Malformed assessment: evaluator output is not a JSON object');
  });

  it('does not charge a failed evaluation to the revision budget', async () => {
    const c1 = candidate('first');
    const { generator, scorer } = services([c1, candidate('second')], [uniform(6), new Error('scorer down')]);

    const outcome = expectEscalated(await runRevisionLoop(makeSession(), { gate, loop }, { generator, scorer }));

    expect(outcome.escalation_reason).toBe('evaluation-failure');
    expect(outcome.round_count).toBe(2);
    expect(outcome.rounds).toHaveLength(1);
    expect(outcome.best_candidate).toBe(c1);
    expect(outcome.last_assessment?.overall_score).toBe(6);
  });
});

// ─── Round bound ─────────────────────────────────────────────────────

describe('round bound', () => {
  it.each([0, 1, 2, 4])('never generates more than max_rounds + 1 times (max_rounds=%i)', async (max_rounds) => {
    const { generator, scorer, generate } = services([candidate('x')], [uniform(3)]);

    const outcome = await runRevisionLoop(makeSession(), { gate, loop: { ...loop, max_rounds } }, { generator, scorer });

    expect(outcome.round_count).toBe(max_rounds + 1);
    expect(generate).toHaveBeenCalledTimes(max_rounds + 1);
  });
});

// ─── Timeouts and budgets ────────────────────────────────────────────

describe('timeouts', () => {
  it('escalates a generation call that exceeds its timeout', async () => {
    const generator = { generate: () => new Promise<Candidate>(() => {}) };
    const { scorer } = services([], [uniform(8)]);

    const outcome = expectEscalated(await runRevisionLoop(
      makeSession(),
      { gate, loop: { ...loop, generation_timeout_ms: 20 } },
      { generator, scorer },
    ));

    expect(outcome.escalation_reason).toBe('generation-failure');
    expect(outcome.detail).toBe('Generation failed: Timed out after 20ms');
  });

  it('escalates a scoring call that exceeds its timeout', async () => {
    const { generator } = services([candidate('x')], []);
    const scorer = { score: () => new Promise<ScoreSheet>(() => {}) };

    const outcome = expectEscalated(await runRevisionLoop(
      makeSession(),
      { gate, loop: { ...loop, scoring_timeout_ms: 20 } },
      { generator, scorer },
    ));

    expect(outcome.escalation_reason).toBe('evaluation-failure');
    expect(outcome.detail).toBe('Evaluation failed: Timed out after 20ms');
  });

  it('hands each call an abort signal that fires on timeout', async () => {
    let seen: AbortSignal | undefined;
    const generator = {
      generate: (request: GenerationRequest) => {
        seen = request.signal;
        return new Promise<Candidate>(() => {});
      },
    };
    const { scorer } = services([], [uniform(8)]);

    await runRevisionLoop(makeSession(), { gate, loop: { ...loop, generation_timeout_ms: 10 } }, { generator, scorer });

    expect(seen?.aborted).toBe(true);
  });

  it('escalates when the session budget runs out before scoring', async () => {
    let clock = 0;
    const now = () => clock;
    const generator = {
      generate: async () => {
        clock += 600;
        return candidate('x');
      },
    };
    const { scorer, score } = services([], [uniform(6)]);

    const outcome = expectEscalated(await runRevisionLoop(
      makeSession(),
      { gate, loop: { ...loop, session_budget_ms: 1_000 } },
      { generator, scorer, now },
    ));

    expect(outcome.escalation_reason).toBe('evaluation-failure');
    expect(outcome.detail).toBe('Session budget exhausted before evaluation');
    expect(outcome.round_count).toBe(2);
    expect(score).toHaveBeenCalledTimes(1);
  });

  it('escalates when the session budget runs out before generating', async () => {
    let clock = 0;
    const now = () => clock;
    const scorer = {
      score: async () => {
        clock += 1_000;
        return uniform(6);
      },
    };
    const { generator, generate } = services([candidate('x')], []);

    const outcome = expectEscalated(await runRevisionLoop(
      makeSession(),
      { gate, loop: { ...loop, session_budget_ms: 1_000 } },
      { generator, scorer, now },
    ));

    expect(outcome.escalation_reason).toBe('generation-failure');
    expect(outcome.detail).toBe('Session budget exhausted before generation');
    expect(outcome.round_count).toBe(1);
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it('escalates immediately when the caller already cancelled', async () => {
    const controller = new AbortController();
    controller.abort(new Error('caller cancelled'));
    const { generator, scorer, generate } = services([candidate('x')], [uniform(8)]);

    const outcome = expectEscalated(await runRevisionLoop(
      makeSession({ signal: controller.signal }),
      { gate, loop },
      { generator, scorer },
    ));

    expect(outcome.escalation_reason).toBe('generation-failure');
    expect(outcome.detail).toBe('Generation failed: caller cancelled');
    expect(generate).not.toHaveBeenCalled();
  });
});

// ─── Notifications ───────────────────────────────────────────────────

describe('escalation notifications', () => {
  it('notifies the sink once with the reason priority', async () => {
    const { sink, notify } = makeSink();
    const c1 = candidate('first');
    const { generator, scorer } = services([c1], [uniform(5)]);

    await runRevisionLoop(makeSession(), { gate, loop: { ...loop, max_rounds: 0 } }, { generator, scorer, sink });

    await vi.waitFor(() => expect(notify).toHaveBeenCalledTimes(1));
    expect(notify.mock.calls[0][0]).toEqual({
      priority: 'emergency',
      payload: {
        message: 'Are you available for an interview next Tuesday?',
        candidate_text: 'first',
        reason: 'max-rounds-exceeded',
        round_count: 1,
        sender_name: 'Acme Recruiting',
        detail: 'No passing response after 1 rounds (best 5.00, threshold 7.5)',
      },
    });
  });

  it('uses high priority for service failures', async () => {
    const { sink, notify } = makeSink();
    const { generator, scorer } = services([new Error('down')], []);

    await runRevisionLoop(makeSession(), { gate, loop }, { generator, scorer, sink });

    await vi.waitFor(() => expect(notify).toHaveBeenCalledTimes(1));
    expect(notify.mock.calls[0][0].priority).toBe('high');
    expect(notify.mock.calls[0][0].payload.candidate_text).toBeNull();
  });

  it('does not notify on approval', async () => {
    const { sink, notify } = makeSink();
    const { generator, scorer } = services([candidate('ok')], [uniform(9)]);

    await runRevisionLoop(makeSession(), { gate, loop }, { generator, scorer, sink });
    await new Promise((resolve) => setImmediate(resolve));

    expect(notify).not.toHaveBeenCalled();
  });

  it('returns the outcome even when the sink rejects', async () => {
    const { sink, notify } = makeSink(() => Promise.reject(new Error('telegram down')));
    const { generator, scorer } = services([new Error('down')], []);

    const outcome = await runRevisionLoop(makeSession(), { gate, loop }, { generator, scorer, sink });

    expect(outcome.kind).toBe('escalated');
    await vi.waitFor(() => expect(notify).toHaveBeenCalledTimes(1));
  });

  it('does not wait for a sink that never settles', async () => {
    const { sink } = makeSink(() => new Promise<void>(() => {}));
    const { generator, scorer } = services([new Error('down')], []);

    const outcome = await runRevisionLoop(makeSession(), { gate, loop }, { generator, scorer, sink });

    expect(outcome.kind).toBe('escalated');
  });
});

// ─── Concurrency ─────────────────────────────────────────────────────

describe('independent sessions', () => {
  it('runs concurrent sessions without sharing state', async () => {
    const a = services([candidate('a1'), candidate('a2')], [uniform(6), uniform(9)]);
    const b = services([candidate('b1')], [uniform(3)]);

    const [outA, outB] = await Promise.all([
      runRevisionLoop(makeSession({ id: 'a' }), { gate, loop }, { generator: a.generator, scorer: a.scorer }),
      runRevisionLoop(makeSession({ id: 'b' }), { gate, loop }, { generator: b.generator, scorer: b.scorer }),
    ]);

    expect(expectApproved(outA).candidate.text).toBe('a2');
    expect(outA.round_count).toBe(2);
    expect(expectEscalated(outB).escalation_reason).toBe('max-rounds-exceeded');
    expect(outB.round_count).toBe(3);
  });
});

describe('selectBestRound', () => {
  it('returns null for no rounds', () => {
    expect(selectBestRound([])).toBeNull();
  });
});
