import { createRequire } from 'node:module';
import logger from './logger.js';

type SentryEvent = Record<string, unknown>;

type SentryLike = {
  init: (options: {
    dsn: string;
    environment?: string;
    tracesSampleRate?: number;
    beforeSend?: (event: SentryEvent) => SentryEvent | null;
  }) => void;
  withScope: (callback: (scope: { setExtra: (key: string, value: unknown) => void }) => void) => void;
  captureException: (err: unknown) => void;
  flush: (timeoutMs?: number) => Promise<unknown>;
};

const require = createRequire(import.meta.url);
let sentryModule: SentryLike | null | undefined;

function isSentryLike(value: unknown): value is SentryLike {
  if (typeof value !== 'object' || value === null) return false;
  const candidate = value as Partial<Record<keyof SentryLike, unknown>>;
  return typeof candidate.init === 'function'
    && typeof candidate.withScope === 'function'
    && typeof candidate.captureException === 'function'
    && typeof candidate.flush === 'function';
}

function getSentry(): SentryLike | null {
  if (sentryModule !== undefined) return sentryModule;
  try {
    const loaded: unknown = require('@sentry/node');
    sentryModule = isSentryLike(loaded) ? loaded : null;
  } catch {
    sentryModule = null;
  }
  return sentryModule;
}

const SENSITIVE_ENV_KEYS = [
  'LLM_API_KEY',
  'ANTHROPIC_API_KEY',
  'TELEGRAM_BOT_TOKEN',
  'SENTRY_DSN',
];

const SENSITIVE_FIELD = /key|token|secret|authorization/i;

function scrubEvent(event: SentryEvent): SentryEvent {
  const extra = event.extra;
  if (extra && typeof extra === 'object' && !Array.isArray(extra)) {
    const fields = extra as Record<string, unknown>;
    for (const key of Object.keys(fields)) {
      if (SENSITIVE_ENV_KEYS.includes(key) || SENSITIVE_FIELD.test(key)) {
        fields[key] = '[REDACTED]';
      }
    }
  }
  return event;
}

export function initSentry(): void {
  const dsn = process.env.SENTRY_DSN;
  if (!dsn) {
    logger.debug('SENTRY_DSN not set; Sentry disabled');
    return;
  }
  const Sentry = getSentry();
  if (!Sentry) {
    logger.warn('Sentry requested but @sentry/node could not be loaded; continuing without Sentry');
    return;
  }

  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV ?? 'development',
    tracesSampleRate: 0,
    beforeSend: scrubEvent,
  });

  logger.info('Sentry initialized');
}

export function captureError(err: unknown, context?: Record<string, unknown>): void {
  if (!process.env.SENTRY_DSN) return;
  const Sentry = getSentry();
  if (!Sentry) return;

  Sentry.withScope((scope) => {
    if (context) {
      for (const [key, value] of Object.entries(context)) {
        scope.setExtra(key, value);
      }
    }
    Sentry.captureException(err);
  });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!process.env.SENTRY_DSN) return;
  const Sentry = getSentry();
  if (!Sentry) return;
  try {
    await Sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Sentry flush failed');
  }
}
