import { vi, describe, it, expect, beforeEach } from 'vitest';

const mockChat = vi.hoisted(() => vi.fn<(params: ChatParams) => Promise<ChatResponse>>());
vi.mock('../lib/llm.js', () => ({
  llm: { name: 'mock', chat: mockChat },
  getModelFor: (role: string) => `mock-${role}`,
  MAX_TOKENS: 2000,
}));

import { EmployerReplyAssistant, createAssistant, createSink } from '../agents/assistant.js';
import { CompositeSink, LogSink } from '../agents/escalation.js';
import { PROFILE_PLACEHOLDER } from '../agents/profile.js';
import { loadConfig } from '../lib/config.js';
import { DEFAULT_DIMENSIONS } from '../agents/types.js';
import type { ChatParams, ChatResponse } from '../lib/llm-provider.js';
import type {
  Candidate,
  EscalationSink,
  GenerationRequest,
  Notification,
  QualityGateConfig,
  ResponseGenerator,
  ResponseScorer,
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

function uniformSheet(score: number): ScoreSheet {
  return {
    dimension_scores: Object.fromEntries(DEFAULT_DIMENSIONS.map((d) => [d, score])),
    feedback: score >= 7.5 ? null : 'Be more specific about availability.',
  };
}

function recordingSink() {
  const notify = vi.fn<(n: Notification) => Promise<void>>(async () => {});
  const sink: EscalationSink = { name: 'recording', notify };
  return { sink, notify };
}

function makeAssistant(candidate: Candidate, score: number, sink: EscalationSink) {
  const generate = vi.fn<(r: GenerationRequest) => Promise<Candidate>>(async () => candidate);
  const scoreFn = vi.fn<(r: ScoringRequest) => Promise<ScoreSheet>>(async () => uniformSheet(score));
  const generator: ResponseGenerator = { generate };
  const scorer: ResponseScorer = { score: scoreFn };
  const assistant = new EmployerReplyAssistant({
    generator,
    scorer,
    sink,
    gate,
    loop,
    createSessionId: () => 'session-fixed',
  });
  return { assistant, generate, scoreFn };
}

const interviewReply: Candidate = {
  text: 'Tuesday at 14:00 works for me.',
  declared_actions: [
    { kind: 'schedule_interview', payload: { date: 'Tuesday', time: '14:00', format: 'video' } },
  ],
};

// ─── EmployerReplyAssistant ──────────────────────────────────────────

describe('EmployerReplyAssistant.handleMessage', () => {
  it('approves, commits actions and notifies in order', async () => {
    const { sink, notify } = recordingSink();
    const { assistant } = makeAssistant(interviewReply, 9, sink);

    const handled = await assistant.handleMessage({ message: '  Free on Tuesday at 14:00?  ', sender_name: 'Acme' });

    expect(handled.session_id).toBe('session-fixed');
    expect(handled.outcome.kind).toBe('approved');
    expect(handled.outcome.round_count).toBe(1);
    expect(handled.action_results).toEqual([{ kind: 'schedule_interview', ok: true }]);
    expect(handled.record.status).toBe('approved');
    expect(handled.record.message_preview).toBe('Free on Tuesday at 14:00?');
    expect(handled.record.overall_score).toBe(9);

    await vi.waitFor(() => expect(notify).toHaveBeenCalledTimes(3));
    const sent = notify.mock.calls.map(([n]) => [n.priority, n.payload.reason]);
    expect(sent).toEqual([
      ['high', 'message-received'],
      ['high', 'action-committed'],
      ['normal', 'approved'],
    ]);
    const approved = notify.mock.calls[2][0];
    expect(approved.payload.candidate_text).toBe('Tuesday at 14:00 works for me.');
    expect(approved.payload.detail).toBe('Score 9.00');
    expect(approved.payload.sender_name).toBe('Acme');
  });

  it('escalates after exhausting revisions and commits nothing', async () => {
    const { sink, notify } = recordingSink();
    const { assistant, generate } = makeAssistant(interviewReply, 5, sink);

    const handled = await assistant.handleMessage({ message: 'Free on Tuesday?' });

    expect(generate).toHaveBeenCalledTimes(3);
    expect(handled.action_results).toEqual([]);
    expect(handled.record.escalation_reason).toBe('max-rounds-exceeded');
    expect(handled.record.round_count).toBe(3);
    expect(handled.record.revision_count).toBe(2);
    expect(handled.record.sender_name).toBe('Employer');

    await vi.waitFor(() => expect(notify).toHaveBeenCalledTimes(2));
    const sent = notify.mock.calls.map(([n]) => [n.priority, n.payload.reason]);
    expect(sent).toEqual([
      ['high', 'message-received'],
      ['emergency', 'max-rounds-exceeded'],
    ]);
  });

  it('passes prior conversation turns to the generator', async () => {
    const { sink } = recordingSink();
    const { assistant, generate } = makeAssistant(interviewReply, 9, sink);
    const context = [
      { role: 'employer' as const, text: 'Thanks for applying.' },
      { role: 'assistant' as const, text: 'Thank you for reaching out.' },
    ];

    await assistant.handleMessage({ message: 'Free on Tuesday?', context });

    expect(generate.mock.calls[0][0].context).toEqual(context);
  });

  it('rejects a blank message before starting a session', async () => {
    const { sink, notify } = recordingSink();
    const { assistant, generate } = makeAssistant(interviewReply, 9, sink);

    await expect(assistant.handleMessage({ message: '   ' }))
      .rejects.toThrow('Invalid incoming message: message must not be empty');
    expect(generate).not.toHaveBeenCalled();
    expect(notify).not.toHaveBeenCalled();
  });

  it('uses custom action handlers when given', async () => {
    const { sink } = recordingSink();
    const schedule = vi.fn(async () => {});
    const assistant = new EmployerReplyAssistant({
      generator: { generate: async () => interviewReply },
      scorer: { score: async () => uniformSheet(9) },
      sink,
      gate,
      loop,
      action_handlers: {
        schedule_interview: schedule,
        decline_offer: async () => {},
        record_contact: async () => {},
      },
    });

    await assistant.handleMessage({ message: 'Free on Tuesday?' });

    expect(schedule).toHaveBeenCalledTimes(1);
  });
});

// ─── Factory ─────────────────────────────────────────────────────────

describe('createSink', () => {
  it('logs only when Telegram is not configured', () => {
    expect(createSink({ telegram: null })).toBeInstanceOf(LogSink);
  });

  it('fans out to Telegram and the log when configured', () => {
    const sink = createSink({ telegram: { bot_token: 'test-token', chat_id: '42' } });
    expect(sink).toBeInstanceOf(CompositeSink);
  });
});

describe('createAssistant', () => {
  beforeEach(() => {
    mockChat.mockReset();
  });

  it('wires the LLM services with the profile placeholder when no file exists', async () => {
    const config = loadConfig({ PROFILE_PATH: '/nonexistent/reply-profile/summary.txt', CANDIDATE_NAME: 'Alex Example' });
    const { sink } = recordingSink();
    mockChat
      .mockResolvedValueOnce({
        text: 'Tuesday at 14:00 works for me.',
        tool_calls: [],
        usage: { input_tokens: 0, output_tokens: 0 },
      })
      .mockResolvedValueOnce({
        text: JSON.stringify({
          scores: { professional_tone: 9, clarity: 8, completeness: 8, safety: 10, relevance: 9 },
          feedback: 'Clear and polite.',
          suggested_improvements: null,
        }),
        tool_calls: [],
        usage: { input_tokens: 0, output_tokens: 0 },
      });

    const assistant = await createAssistant(config, { sink });
    const handled = await assistant.handleMessage({ message: 'Free on Tuesday at 14:00?' });

    expect(handled.outcome.kind).toBe('approved');
    expect(handled.record.overall_score).toBe(8.8);
    expect(mockChat).toHaveBeenCalledTimes(2);

    const writerCall = mockChat.mock.calls[0][0];
    expect(writerCall.model).toBe('mock-responder');
    expect(writerCall.system).toContain("You are Alex Example's career assistant.");
    expect(writerCall.system).toContain(`PROFILE:\n${PROFILE_PLACEHOLDER}`);

    const evaluatorCall = mockChat.mock.calls[1][0];
    expect(evaluatorCall.json_mode).toBe(true);
  });
});
