/**
 * Applies the declared actions of an approved reply.
 *
 * Only committed_actions of an approved Outcome reach here; an escalated
 * Outcome commits nothing. Handlers run in declaration order and one failing
 * handler does not stop the rest.
 */

import logger from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { captureError } from '../lib/sentry.js';
import { errorMessage } from '../lib/errors.js';
import { dispatchNotification } from './escalation.js';
import type {
  CommittableAction,
  EscalationSink,
  NotificationPriority,
  Outcome,
  ReplySession,
} from './types.js';

export type CommittableKind = CommittableAction['kind'];

export interface ActionContext {
  readonly session: Pick<ReplySession, 'id' | 'message' | 'sender_name'>;
  readonly round_count: number;
  readonly log: Logger;
}

export type ActionHandlers = {
  readonly [K in CommittableKind]: (
    action: Extract<CommittableAction, { kind: K }>,
    ctx: ActionContext,
  ) => Promise<void>;
};

export type ActionResult =
  | { readonly kind: CommittableKind; readonly ok: true }
  | { readonly kind: CommittableKind; readonly ok: false; readonly error: string };

function runHandler(action: CommittableAction, handlers: ActionHandlers, ctx: ActionContext): Promise<void> {
  switch (action.kind) {
    case 'schedule_interview':
      return handlers.schedule_interview(action, ctx);
    case 'decline_offer':
      return handlers.decline_offer(action, ctx);
    case 'record_contact':
      return handlers.record_contact(action, ctx);
    default: {
      const unhandled: never = action;
      return Promise.reject(new Error(`No handler for action ${JSON.stringify(unhandled)}`));
    }
  }
}

export async function commitApprovedActions(
  outcome: Outcome,
  session: ActionContext['session'],
  handlers: ActionHandlers,
  log: Logger = logger,
): Promise<ActionResult[]> {
  if (outcome.kind !== 'approved') return [];

  const ctx: ActionContext = { session, round_count: outcome.round_count, log };
  const results: ActionResult[] = [];
  for (const action of outcome.committed_actions) {
    try {
      await Promise.resolve().then(() => runHandler(action, handlers, ctx));
      results.push({ kind: action.kind, ok: true });
    } catch (err) {
      log.error({ action: action.kind, error: errorMessage(err) }, 'Action commit failed');
      captureError(err, { source: 'action-commit', action: action.kind, sessionId: session.id });
      results.push({ kind: action.kind, ok: false, error: errorMessage(err) });
    }
  }
  return results;
}

// ─── Default handlers ────────────────────────────────────────────────

function announce(
  sink: EscalationSink,
  ctx: ActionContext,
  priority: NotificationPriority,
  detail: string,
): void {
  dispatchNotification(sink, {
    priority,
    payload: {
      message: ctx.session.message,
      candidate_text: null,
      reason: 'action-committed',
      round_count: ctx.round_count,
      sender_name: ctx.session.sender_name,
      detail,
    },
  }, ctx.log);
}

/** Log each action as a structured record and tell the candidate about it. */
export function createDefaultActionHandlers(sink: EscalationSink): ActionHandlers {
  return {
    async schedule_interview(action, ctx) {
      const { date, time, format, interviewer } = action.payload;
      ctx.log.info({ action: action.kind, ...action.payload }, 'Interview scheduled');
      announce(sink, ctx, 'high', `Interview ${date} ${time} (${format})${interviewer ? ` with ${interviewer}` : ''}`);
    },
    async decline_offer(action, ctx) {
      ctx.log.info({ action: action.kind, ...action.payload }, 'Offer declined');
      announce(sink, ctx, 'normal', `Declined ${action.payload.company}: ${action.payload.reason}`);
    },
    async record_contact(action, ctx) {
      const { email, company, name, role } = action.payload;
      ctx.log.info({ action: action.kind, ...action.payload }, 'Employer contact recorded');
      announce(sink, ctx, 'normal', `Contact ${name ?? 'unknown'} <${email}> at ${company}${role ? `, ${role}` : ''}`);
    },
  };
}
