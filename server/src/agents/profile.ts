import { readFile } from 'node:fs/promises';
import logger from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';

export interface CandidateProfile {
  readonly name: string;
  /** Free-text CV summary the reply writer answers from. */
  readonly summary: string;
  /** File the summary was read from; null when the placeholder is in use. */
  readonly source: string | null;
}

export const PROFILE_PLACEHOLDER = 'No profile summary available. Answer only from what the employer wrote and flag anything that needs the candidate.';

/**
 * Read the candidate summary. A missing or unreadable file is not fatal: the
 * writer then runs on the placeholder and is pushed toward human review.
 */
export async function loadProfile(path: string, name: string, log: Logger = logger): Promise<CandidateProfile> {
  try {
    const text = (await readFile(path, 'utf-8')).trim();
    if (text) return { name, summary: text, source: path };
    log.warn({ path }, 'Profile file is empty; using placeholder');
  } catch (err) {
    log.warn({ path, error: errorMessage(err) }, 'Profile file not readable; using placeholder');
  }
  return { name, summary: PROFILE_PLACEHOLDER, source: null };
}
