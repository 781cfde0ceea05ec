/**
 * Escalation Sink implementations and the fire-and-forget dispatcher.
 *
 * Notifications are a side channel: a failing sink is logged and reported,
 * never propagated, and never delays the outcome.
 */

import logger from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { captureError } from '../lib/sentry.js';
import { errorMessage } from '../lib/errors.js';
import type {
  EscalatedOutcome,
  EscalationReason,
  EscalationSink,
  Notification,
  NotificationPriority,
  ReplySession,
} from './types.js';

const PREVIEW_CHARS = 150;

const ESCALATION_PRIORITY: Record<EscalationReason, NotificationPriority> = {
  'flagged-by-agent': 'emergency',
  'max-rounds-exceeded': 'emergency',
  'generation-failure': 'high',
  'evaluation-failure': 'high',
};

export function priorityForEscalation(reason: EscalationReason): NotificationPriority {
  return ESCALATION_PRIORITY[reason];
}

export function buildEscalationNotification(
  session: Pick<ReplySession, 'message' | 'sender_name'>,
  outcome: EscalatedOutcome,
): Notification {
  return {
    priority: priorityForEscalation(outcome.escalation_reason),
    payload: {
      message: session.message,
      candidate_text: outcome.best_candidate?.text ?? null,
      reason: outcome.escalation_reason,
      round_count: outcome.round_count,
      sender_name: session.sender_name,
      detail: outcome.detail,
    },
  };
}

/**
 * Hand a notification to the sink without awaiting it. Returns immediately;
 * any rejection or synchronous throw from the sink is swallowed after logging.
 */
export function dispatchNotification(sink: EscalationSink, notification: Notification, log: Logger = logger): void {
  void Promise.resolve()
    .then(() => sink.notify(notification))
    .then(() => {
      log.debug({ sink: sink.name, priority: notification.priority, reason: notification.payload.reason }, 'Notification delivered');
    })
    .catch((err: unknown) => {
      log.warn(
        { sink: sink.name, reason: notification.payload.reason, error: errorMessage(err) },
        'Notification failed; outcome unaffected',
      );
      captureError(err, { source: 'escalation-sink', sink: sink.name, reason: notification.payload.reason });
    });
}

// ─── Message formatting ──────────────────────────────────────────────

const PRIORITY_EMOJI: Record<NotificationPriority, string> = {
  normal: '📬',
  high: '⚡',
  emergency: '🚨',
};

const REASON_TITLE: Record<Notification['payload']['reason'], string> = {
  'message-received': 'NEW EMPLOYER MESSAGE',
  'approved': 'RESPONSE APPROVED',
  'action-committed': 'ACTION RECORDED',
  'flagged-by-agent': 'HUMAN INTERVENTION NEEDED: flagged by assistant',
  'max-rounds-exceeded': 'HUMAN INTERVENTION NEEDED: quality below threshold',
  'generation-failure': 'HUMAN INTERVENTION NEEDED: reply generation failed',
  'evaluation-failure': 'HUMAN INTERVENTION NEEDED: evaluation failed',
};

function preview(text: string): string {
  return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS)}...` : text;
}

/** Escape the characters Telegram's legacy Markdown treats as entity delimiters. */
export function escapeMarkdown(text: string): string {
  return text.replace(/[_*`[]/g, '\\$&');
}

/** Markdown body shared by chat-style sinks. Interpolated values are escaped. */
export function formatNotification(notification: Notification): string {
  const { payload } = notification;
  const lines = [
    `${PRIORITY_EMOJI[notification.priority]} *${REASON_TITLE[payload.reason]}*`,
    '',
  ];
  if (payload.sender_name) lines.push(`*From:* ${escapeMarkdown(payload.sender_name)}`);
  lines.push(`*Rounds:* ${payload.round_count}`);
  if (payload.detail) lines.push(`*Detail:* ${escapeMarkdown(payload.detail)}`);
  lines.push('', `*Message:*\n${escapeMarkdown(preview(payload.message))}`);
  if (payload.candidate_text) {
    lines.push('', `*Response:*\n${escapeMarkdown(preview(payload.candidate_text))}`);
  }
  return lines.join('\n');
}

// ─── Sinks ───────────────────────────────────────────────────────────

export interface TelegramSinkConfig {
  botToken: string;
  chatId: string;
  baseUrl?: string;
}

export class TelegramSink implements EscalationSink {
  readonly name = 'telegram';
  private readonly endpoint: string;

  constructor(private readonly config: TelegramSinkConfig) {
    const base = (config.baseUrl ?? 'https://api.telegram.org').replace(/\/$/, '');
    this.endpoint = `${base}/bot${config.botToken}/sendMessage`;
  }

  async notify(notification: Notification): Promise<void> {
    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        chat_id: this.config.chatId,
        text: formatNotification(notification),
        parse_mode: 'Markdown',
      }),
      signal: AbortSignal.timeout(10_000),
    });
    if (!response.ok) {
      const errText = await response.text().catch(() => '');
      throw new Error(`Telegram API error ${response.status}: ${errText.slice(0, 200)}`);
    }
  }
}

/** Writes notifications to the structured log; used when no chat sink is configured. */
export class LogSink implements EscalationSink {
  readonly name = 'log';

  constructor(private readonly log: Logger = logger) {}

  async notify(notification: Notification): Promise<void> {
    const level = notification.priority === 'normal' ? 'info' : 'warn';
    this.log[level](
      {
        priority: notification.priority,
        reason: notification.payload.reason,
        round_count: notification.payload.round_count,
        sender_name: notification.payload.sender_name,
        detail: notification.payload.detail,
      },
      REASON_TITLE[notification.payload.reason],
    );
  }
}

/** Fans out to every sink; rejects only after all sinks settled, if any failed. */
export class CompositeSink implements EscalationSink {
  readonly name: string;

  constructor(private readonly sinks: readonly EscalationSink[]) {
    this.name = sinks.map((s) => s.name).join('+') || 'none';
  }

  async notify(notification: Notification): Promise<void> {
    const results = await Promise.allSettled(
      this.sinks.map((s) => Promise.resolve().then(() => s.notify(notification))),
    );
    const failures = results.flatMap((r, i) =>
      r.status === 'rejected' ? [`${this.sinks[i].name}: ${errorMessage(r.reason)}`] : [],
    );
    if (failures.length > 0) {
      throw new Error(`Notification failed for ${failures.join('; ')}`);
    }
  }
}
