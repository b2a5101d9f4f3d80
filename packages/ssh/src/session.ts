/**
 * Ssh2Session
 *
 * ShellSession over a connected ssh2 Client.
 */

import type { Duplex } from 'stream';
import type { Client, ClientChannel } from 'ssh2';
import {
  CommandTimeoutError,
  EphemeraError,
  logger,
  type ExecOptions,
  type ExecResult,
  type ShellSession,
} from '@ephemera/core';

export class Ssh2Session implements ShellSession {
  private closed = false;
  private closedPromise: Promise<void>;

  constructor(private client: Client) {
    this.closedPromise = new Promise(resolve => {
      client.on('close', () => {
        this.closed = true;
        resolve();
      });
    });
  }

  /**
   * Run `command` and collect its output. With a timeout the channel is destroyed
   * once it expires and CommandTimeoutError is raised.
   */
  async exec(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    const channel = await this.openExec(command);
    const timeoutSeconds = options.timeout_seconds ?? null;

    return new Promise<ExecResult>((resolve, reject) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let exitCode: number | null = null;
      let timer: NodeJS.Timeout | undefined;

      if (timeoutSeconds !== null) {
        timer = setTimeout(() => {
          logger.warn({ command, timeout_seconds: timeoutSeconds }, '[ssh] Command timed out');
          channel.destroy();
          reject(new CommandTimeoutError(command, timeoutSeconds));
        }, timeoutSeconds * 1000);
      }

      channel.on('data', (chunk: Buffer) => stdout.push(chunk));
      channel.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
      channel.on('exit', (code: unknown) => {
        exitCode = typeof code === 'number' ? code : null;
      });
      channel.on('close', () => {
        clearTimeout(timer);
        resolve({
          stdout: Buffer.concat(stdout).toString('utf-8'),
          stderr: Buffer.concat(stderr).toString('utf-8'),
          exit_code: exitCode,
        });
      });
    });
  }

  /** Interactive shell without a PTY */
  async shell(): Promise<Duplex> {
    this.assertOpen();
    return new Promise<ClientChannel>((resolve, reject) => {
      this.client.shell(false, (err, channel) => {
        if (err) {
          reject(
            new EphemeraError(`Failed to open shell: ${err.message}`, 'shell_failed', false, undefined, {
              cause: err,
            })
          );
          return;
        }
        resolve(channel);
      });
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.client.end();
    await this.closedPromise;
  }

  private openExec(command: string): Promise<ClientChannel> {
    this.assertOpen();
    return new Promise((resolve, reject) => {
      this.client.exec(command, (err, channel) => {
        if (err) {
          reject(
            new EphemeraError(`Failed to run command: ${err.message}`, 'exec_failed', false, { command }, {
              cause: err,
            })
          );
          return;
        }
        resolve(channel);
      });
    });
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new EphemeraError('SSH connection is closed', 'session_closed');
    }
  }
}
