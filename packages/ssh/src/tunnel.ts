/**
 * GcloudIapTunnel
 *
 * Runs `gcloud compute start-iap-tunnel ... --listen-on-stdin` and exposes the
 * process's stdio as the socket for the SSH handshake. The child gets a
 * whitelisted environment plus the authorization lease's variables.
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'child_process';
import { Duplex } from 'stream';
import {
  SSH_PORT,
  TunnelError,
  logger,
  type ConnectionPolicy,
  type ResolvedTarget,
  type TunnelLauncher,
  type TunnelStream,
} from '@ephemera/core';

/**
 * Only these variables of our own environment reach the gcloud process
 */
export const SAFE_ENV_VARS = ['PATH', 'HOME', 'LANG', 'TZ', 'TERM', 'USER', 'SHELL', 'CLOUDSDK_CONFIG'];

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => ChildProcess;

export interface GcloudIapTunnelOptions {
  /** Defaults to `gcloud` on PATH */
  gcloudPath?: string;
  spawn?: SpawnFunction;
  /** Defaults to TERMINATE_GRACE_MS */
  terminateGraceMs?: number;
}

export function buildTunnelArgs(target: ResolvedTarget, policy: ConnectionPolicy): string[] {
  const args = [
    'compute',
    'start-iap-tunnel',
    target.instance_id,
    String(SSH_PORT),
    '--listen-on-stdin',
    `--project=${target.project_id}`,
    `--zone=${target.zone}`,
    '--verbosity=warning',
  ];
  if (policy.impersonation_identity) {
    args.push(`--impersonate-service-account=${policy.impersonation_identity}`);
  }
  return args;
}

export function buildTunnelEnv(
  leaseEnv: Record<string, string>,
  source: NodeJS.ProcessEnv = process.env
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of SAFE_ENV_VARS) {
    const value = source[key];
    if (value) {
      env[key] = value;
    }
  }
  return { ...env, ...leaseEnv };
}

/** Wait after SIGTERM before the tunnel process is killed outright */
export const TERMINATE_GRACE_MS = 5000;

export class GcloudIapTunnel implements TunnelLauncher {
  private gcloudPath: string;
  private spawnProcess: SpawnFunction;
  private terminateGraceMs: number;

  constructor(options: GcloudIapTunnelOptions = {}) {
    this.gcloudPath = options.gcloudPath ?? 'gcloud';
    this.terminateGraceMs = options.terminateGraceMs ?? TERMINATE_GRACE_MS;
    this.spawnProcess = options.spawn ?? ((command, args, spawnOptions) => spawn(command, args, spawnOptions));
  }

  async open(
    target: ResolvedTarget,
    policy: ConnectionPolicy,
    env: Record<string, string>
  ): Promise<TunnelStream> {
    const args = buildTunnelArgs(target, policy);
    logger.info(
      { instance_id: target.instance_id, command: `${this.gcloudPath} ${args.join(' ')}` },
      '[tunnel] Starting IAP tunnel'
    );

    const child = this.spawnProcess(this.gcloudPath, args, {
      env: buildTunnelEnv(env),
      stdio: ['pipe', 'pipe', 'pipe'],
    });
    const exited = new Promise<void>(resolve => {
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        logger.debug({ instance_id: target.instance_id, code, signal }, '[tunnel] Process exited');
        resolve();
      });
    });

    await new Promise<void>((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.once('error', (err: Error) => {
        reject(
          new TunnelError(
            `Failed to start IAP tunnel to ${target.instance_id}: ${err.message}`,
            { instance_id: target.instance_id, command: this.gcloudPath },
            { cause: err }
          )
        );
      });
    });

    const { stdin, stdout, stderr } = child;
    if (!stdin || !stdout) {
      child.kill();
      throw new TunnelError(`IAP tunnel to ${target.instance_id} has no stdio pipes`);
    }

    stderr?.on('data', (chunk: Buffer) => {
      const text = chunk.toString().trim();
      if (text) {
        logger.warn({ instance_id: target.instance_id }, `[tunnel] ${text.substring(0, 500)}`);
      }
    });

    const stream = Duplex.from({ readable: stdout, writable: stdin });

    return {
      stream,
      terminate: async () => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill('SIGTERM');
          const escalation = setTimeout(() => {
            logger.warn({ instance_id: target.instance_id }, '[tunnel] Process ignored SIGTERM, killing it');
            child.kill('SIGKILL');
          }, this.terminateGraceMs);
          await exited.finally(() => clearTimeout(escalation));
        }
        stream.destroy();
      },
    };
  }
}
