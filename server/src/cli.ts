#!/usr/bin/env node
/**
 * Handle a single employer message from the command line.
 *
 *   employer-reply --from "Jane at Acme" "Are you free for a call Tuesday?"
 *   echo "..." | employer-reply --from "Acme"
 *
 * Prints the outcome as JSON. Exit code 0 when approved, 2 when escalated.
 */

import { parseArgs } from 'node:util';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import logger from './lib/logger.js';
import { captureError } from './lib/sentry.js';
import { createAssistant } from './agents/assistant.js';

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) return '';
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: { from: { type: 'string', short: 'f' } },
    allowPositionals: true,
  });
  const message = positionals.length > 0 ? positionals.join(' ') : await readStdin();

  const assistant = await createAssistant();
  const controller = new AbortController();
  const onSignal = (signal: string) => {
    logger.warn({ signal }, 'Interrupted; abandoning session');
    controller.abort(new Error(`Interrupted by ${signal}`));
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const result = await assistant.handleMessage({
      message,
      sender_name: values.from,
      signal: controller.signal,
    });
    const { outcome } = result;
    const summary = outcome.kind === 'approved'
      ? { status: outcome.kind, reply: outcome.candidate.text, round_count: outcome.round_count, actions: result.action_results }
      : {
          status: outcome.kind,
          reason: outcome.escalation_reason,
          detail: outcome.detail,
          best_reply: outcome.best_candidate?.text ?? null,
          round_count: outcome.round_count,
        };
    process.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
    return outcome.kind === 'approved' ? 0 : 2;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await assistant.shutdown();
  }
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      captureError(err, { source: 'cli' });
      logger.error({ err }, 'Employer reply failed');
      process.exitCode = 1;
    },
  );
}
