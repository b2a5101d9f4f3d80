/**
 * Retry classification
 *
 * Two tables decide what is worth another attempt. Anything not listed is fatal and
 * propagates to the caller unchanged.
 */

import { HandshakeError, PreconditionRaceError } from '../utils/errors.js';

type ErrorClass = abstract new (...args: never[]) => Error;

/** Failures that restart the publish + handshake cycle with a new keypair */
export const OUTER_RETRYABLE: readonly ErrorClass[] = [PreconditionRaceError, HandshakeError];

/** Failures that repeat only the SSH connect, with the same published key */
export const INNER_RETRYABLE: readonly ErrorClass[] = [HandshakeError];

/** Upper bound (inclusive) of the jittered wait between cycles */
export const MAX_RETRY_JITTER_SECONDS = 10;

/** Connect attempts per cycle; the wait after failed attempt n is n seconds */
export const HANDSHAKE_ATTEMPTS = 6;

export type FailureClass = 'retryable' | 'fatal';

export function classify(error: unknown, table: readonly ErrorClass[]): FailureClass {
  return table.some(errorClass => error instanceof errorClass) ? 'retryable' : 'fatal';
}

export function classifyCycleFailure(error: unknown): FailureClass {
  return classify(error, OUTER_RETRYABLE);
}

export function classifyHandshakeFailure(error: unknown): FailureClass {
  return classify(error, INNER_RETRYABLE);
}

/**
 * Seconds to wait after failed handshake attempt `attempt` (0-based), or null when
 * the attempt was the last one
 */
export function handshakeBackoffSeconds(attempt: number): number | null {
  return attempt >= HANDSHAKE_ATTEMPTS - 1 ? null : attempt;
}
