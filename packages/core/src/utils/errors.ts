/**
 * Custom error classes
 *
 * All Ephemera errors extend EphemeraError. The `retryable` flag is informational;
 * the orchestrator decides retries from its own classification tables.
 */

export class EphemeraError extends Error {
  constructor(
    message: string,
    public code: string,
    public retryable: boolean = false,
    public details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'EphemeraError';
  }
}

/** Missing or invalid target/policy fields. */
export class ConfigurationError extends EphemeraError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'configuration_error', false, details, options);
    this.name = 'ConfigurationError';
  }
}

export class KeyGenerationError extends EphemeraError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'key_generation_failed', false, undefined, options);
    this.name = 'KeyGenerationError';
  }
}

/** The auth backend refused the public key for a reason other than a concurrent write. */
export class PublishError extends EphemeraError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'publish_failed', false, details, options);
    this.name = 'PublishError';
  }
}

/** Metadata write lost an optimistic-concurrency race (HTTP 412). */
export class PreconditionRaceError extends EphemeraError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'precondition_failed', true, details, options);
    this.name = 'PreconditionRaceError';
  }
}

export class HandshakeError extends EphemeraError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'handshake_failed', true, details, options);
    this.name = 'HandshakeError';
  }
}

export class MaxRetriesExceededError extends EphemeraError {
  constructor(attempts: number, cause: unknown) {
    super(
      'Maximum retries exceeded. Aborting operation.',
      'max_retries_exceeded',
      false,
      { attempts },
      { cause }
    );
    this.name = 'MaxRetriesExceededError';
  }
}

export class TunnelError extends EphemeraError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'tunnel_failed', false, details, options);
    this.name = 'TunnelError';
  }
}

export class CommandTimeoutError extends EphemeraError {
  constructor(command: string, timeoutSeconds: number) {
    super(`Command timed out after ${timeoutSeconds}s`, 'command_timeout', false, {
      command,
      timeout_seconds: timeoutSeconds,
    });
    this.name = 'CommandTimeoutError';
  }
}

/**
 * Render an unknown thrown value for log lines
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
