/**
 * Employer Reply Assistant
 *
 * Composition root for one process: owns the services and the sink, and
 * turns each inbound employer message into its own session. Sessions share
 * nothing mutable, so handleMessage() may run concurrently.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { createSessionLogger } from '../lib/logger.js';
import { loadConfig } from '../lib/config.js';
import type { AppConfig } from '../lib/config.js';
import { initSentry, flushSentry } from '../lib/sentry.js';
import { recordOutcome } from '../lib/outcome-log.js';
import type { OutcomeRecord } from '../lib/outcome-log.js';
import { runRevisionLoop } from './revision-controller.js';
import { commitApprovedActions, createDefaultActionHandlers } from './action-commit.js';
import type { ActionHandlers, ActionResult } from './action-commit.js';
import { CompositeSink, LogSink, TelegramSink, dispatchNotification } from './escalation.js';
import { LlmResponseGenerator } from './responder.js';
import { LlmResponseScorer } from './evaluator.js';
import { loadProfile } from './profile.js';
import type {
  ConversationTurn,
  EscalationSink,
  Outcome,
  QualityGateConfig,
  ReplySession,
  ResponseGenerator,
  ResponseScorer,
  RevisionLoopConfig,
} from './types.js';

export const IncomingMessageSchema = z.object({
  message: z.string().trim().min(1, 'message must not be empty'),
  sender_name: z.string().trim().min(1).default('Employer'),
  context: z.array(z.object({
    role: z.enum(['employer', 'assistant']),
    text: z.string(),
  })).default([]),
});

export interface IncomingMessage {
  readonly message: string;
  readonly sender_name?: string;
  readonly context?: readonly ConversationTurn[];
  /** Cancels the whole session, including in-flight service calls. */
  readonly signal?: AbortSignal;
}

export interface HandledMessage {
  readonly session_id: string;
  readonly outcome: Outcome;
  readonly action_results: readonly ActionResult[];
  readonly record: OutcomeRecord;
}

export interface EmployerReplyAssistantOptions {
  readonly generator: ResponseGenerator;
  readonly scorer: ResponseScorer;
  readonly sink: EscalationSink;
  readonly gate: QualityGateConfig;
  readonly loop: RevisionLoopConfig;
  readonly action_handlers?: ActionHandlers;
  readonly now?: () => number;
  readonly createSessionId?: () => string;
}

export class EmployerReplyAssistant {
  private readonly handlers: ActionHandlers;
  private readonly createSessionId: () => string;

  constructor(private readonly options: EmployerReplyAssistantOptions) {
    this.handlers = options.action_handlers ?? createDefaultActionHandlers(options.sink);
    this.createSessionId = options.createSessionId ?? randomUUID;
  }

  async handleMessage(input: IncomingMessage): Promise<HandledMessage> {
    const parsed = IncomingMessageSchema.safeParse(input);
    if (!parsed.success) {
      throw new Error(`Invalid incoming message: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }
    const { message, sender_name, context } = parsed.data;
    const { sink, gate, loop, generator, scorer, now } = this.options;

    const id = this.createSessionId();
    const log = createSessionLogger(id, { sender_name });
    const session: ReplySession = {
      id,
      sender_name,
      message,
      context,
      log,
      ...(input.signal ? { signal: input.signal } : {}),
    };

    log.info({ message_chars: message.length, context_turns: context.length }, 'Employer message received');
    dispatchNotification(sink, {
      priority: 'high',
      payload: { message, candidate_text: null, reason: 'message-received', round_count: 0, sender_name },
    }, log);

    const outcome = await runRevisionLoop(
      session,
      { gate, loop },
      { generator, scorer, sink, ...(now ? { now } : {}) },
    );

    let action_results: ActionResult[] = [];
    if (outcome.kind === 'approved') {
      action_results = await commitApprovedActions(outcome, session, this.handlers, log);
      dispatchNotification(sink, {
        priority: 'normal',
        payload: {
          message,
          candidate_text: outcome.candidate.text,
          reason: 'approved',
          round_count: outcome.round_count,
          sender_name,
          detail: `Score ${outcome.assessment.overall_score.toFixed(2)}`,
        },
      }, log);
    }

    const record = recordOutcome(session, outcome, log);
    return { session_id: id, outcome, action_results, record };
  }

  /** Flush buffered error reports before the process exits. */
  async shutdown(): Promise<void> {
    await flushSentry();
  }
}

// ─── Factory ─────────────────────────────────────────────────────────

export function createSink(config: Pick<AppConfig, 'telegram'>): EscalationSink {
  const logSink = new LogSink();
  if (!config.telegram) return logSink;
  return new CompositeSink([
    new TelegramSink({ botToken: config.telegram.bot_token, chatId: config.telegram.chat_id }),
    logSink,
  ]);
}

export interface CreateAssistantOverrides {
  readonly sink?: EscalationSink;
  readonly action_handlers?: ActionHandlers;
}

/** Wire the LLM-backed services, the candidate profile and the sink from config. */
export async function createAssistant(
  config: AppConfig = loadConfig(),
  overrides: CreateAssistantOverrides = {},
): Promise<EmployerReplyAssistant> {
  initSentry();
  const profile = await loadProfile(config.profile.path, config.profile.name);
  const sink = overrides.sink ?? createSink(config);

  return new EmployerReplyAssistant({
    generator: new LlmResponseGenerator({ profile }),
    scorer: new LlmResponseScorer({ dimensions: config.gate.dimensions, profile_summary: profile.summary }),
    sink,
    gate: config.gate,
    loop: config.loop,
    ...(overrides.action_handlers ? { action_handlers: overrides.action_handlers } : {}),
  });
}
