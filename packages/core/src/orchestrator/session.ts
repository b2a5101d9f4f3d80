/**
 * ActiveSession
 *
 * The caller-owned result of obtainSession(). Owns the SSH connection plus whatever
 * was acquired to reach it (tunnel process, authorization lease) and releases all of
 * it on close().
 */

import type { Duplex } from 'stream';
import type { ConnectionPolicy } from '../config/schema.js';
import type { PublishedCredential } from '../publishers/types.js';
import type { ExecOptions, ExecResult, ShellSession } from '../spi/index.js';
import { EphemeraError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ResourceGuard } from '../utils/resource-guard.js';

export class ActiveSession {
  private closed = false;

  constructor(
    readonly connectionId: string,
    readonly host: string,
    readonly credential: PublishedCredential,
    private shellSession: ShellSession,
    private resources: ResourceGuard,
    private policy: ConnectionPolicy
  ) {}

  get username(): string {
    return this.credential.username;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Run a command. Uses the policy's command_timeout unless one is given.
   */
  async exec(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    this.assertOpen();
    const timeout =
      options.timeout_seconds === undefined ? this.policy.command_timeout : options.timeout_seconds;
    return this.shellSession.exec(command, { timeout_seconds: timeout });
  }

  async shell(): Promise<Duplex> {
    this.assertOpen();
    return this.shellSession.shell();
  }

  /**
   * Close the SSH connection, then tear down the tunnel and lease. Idempotent.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    logger.info({ connection_id: this.connectionId, host: this.host }, '[session] Closing');
    try {
      await this.shellSession.close();
    } finally {
      const failures = await this.resources.release();
      if (failures.length > 0) {
        throw new EphemeraError(
          `Failed to release ${failures.length} session resource(s)`,
          'release_failed',
          false,
          undefined,
          { cause: failures[0] }
        );
      }
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new EphemeraError('Session is closed', 'session_closed');
    }
  }
}
