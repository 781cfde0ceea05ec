/**
 * Error types raised by the collaborators of the revision loop.
 *
 * None of these reach the caller of runRevisionLoop: the controller maps
 * each of them onto an escalation reason.
 */

export class MalformedAssessmentError extends Error {
  override readonly name = 'MalformedAssessmentError';

  constructor(readonly issues: readonly string[]) {
    super(`Malformed assessment: ${issues.join('; ')}`);
  }
}

export class GenerationFailure extends Error {
  override readonly name = 'GenerationFailure';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class EvaluationFailure extends Error {
  override readonly name = 'EvaluationFailure';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ServiceTimeoutError extends Error {
  override readonly name = 'ServiceTimeoutError';

  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
  }
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
