/**
 * ConnectionOrchestrator
 *
 * Drives one obtainSession() call through
 *   resolving_address → generating_key → publishing_credential → handshaking → established
 * with retry_wait looping back to generating_key, so every cycle publishes a brand
 * new keypair. A key whose publication raced with a failed handshake is never reused.
 *
 * Concurrency is external only: parallel callers may target the same instance, which
 * is why metadata writes can lose races and why the wait between cycles is jittered.
 */

import { randomInt as cryptoRandomInt } from 'crypto';
import type { Duplex } from 'stream';
import { setTimeout as delay } from 'timers/promises';
import { v4 as uuidv4 } from 'uuid';
import { ZodError } from 'zod';
import {
  ConnectionPolicySchema,
  type ConnectionPolicy,
  type ConnectionPolicyInput,
  type ConnectionTarget,
  type ResolvedTarget,
} from '../config/schema.js';
import { configurationErrorFromZod } from '../config/index.js';
import { AddressResolver } from '../address/index.js';
import { selectPublisher, type CredentialPublisher, type PublishedCredential } from '../publishers/index.js';
import type {
  AuthorizationContext,
  AuthorizationLease,
  EphemeralKeyPair,
  IdentityRegistry,
  InstanceDirectory,
  KeyPairGenerator,
  SecureShellClient,
  TunnelLauncher,
} from '../spi/index.js';
import { ConfigurationError, MaxRetriesExceededError, describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { ResourceGuard } from '../utils/resource-guard.js';
import {
  MAX_RETRY_JITTER_SECONDS,
  classifyCycleFailure,
  classifyHandshakeFailure,
  handshakeBackoffSeconds,
} from './retry-policy.js';
import { ActiveSession } from './session.js';

export * from './retry-policy.js';
export { ActiveSession } from './session.js';

export const SSH_PORT = 22;

export type ConnectionState =
  | 'resolving_address'
  | 'generating_key'
  | 'publishing_credential'
  | 'handshaking'
  | 'retry_wait'
  | 'established'
  | 'aborted';

export interface StateChange {
  connection_id: string;
  state: ConnectionState;
  /** 1-based cycle number; 0 before the first cycle */
  attempt: number;
}

/**
 * Collaborators and hooks for the orchestrator
 */
export interface OrchestratorDependencies {
  directory: InstanceDirectory;
  keys: KeyPairGenerator;
  shell: SecureShellClient;
  /** Required when the policy uses the login registry */
  identity?: IdentityRegistry;
  /** Required when the policy uses a tunnel */
  tunnels?: TunnelLauncher;
  /** Defaults to a lease with no environment */
  authorization?: AuthorizationContext;
  sleep?: (ms: number) => Promise<void>;
  /** Integer in [min, max) */
  randomInt?: (min: number, max: number) => number;
  onStateChange?: (change: StateChange) => void;
}

const noAuthorization: AuthorizationContext = {
  acquire: async (): Promise<AuthorizationLease> => ({ env: {}, release: async () => {} }),
};

/**
 * Cycle-scoped context; rebuilt for every attempt
 */
interface Cycle {
  connectionId: string;
  attempt: number;
  target: ResolvedTarget;
  policy: ConnectionPolicy;
  host: string;
}

export class ConnectionOrchestrator {
  private sleep: (ms: number) => Promise<void>;
  private randomInt: (min: number, max: number) => number;
  private authorization: AuthorizationContext;

  constructor(private deps: OrchestratorDependencies) {
    this.sleep = deps.sleep ?? (ms => delay(ms));
    this.randomInt = deps.randomInt ?? cryptoRandomInt;
    this.authorization = deps.authorization ?? noAuthorization;
  }

  /**
   * Obtain a ready SSH session to the target instance
   *
   * @throws ConfigurationError, KeyGenerationError, PublishError, TunnelError (fatal, unwrapped)
   * @throws MaxRetriesExceededError once every cycle failed retryably
   */
  async obtainSession(
    target: ConnectionTarget,
    policyInput: ConnectionPolicyInput = {}
  ): Promise<ActiveSession> {
    const connectionId = uuidv4();
    const policy = parsePolicy(policyInput);

    try {
      const resolved = await this.resolveTarget(target);
      const publisher = selectPublisher(policy, this.deps);
      if (policy.use_tunnel && !this.deps.tunnels) {
        throw new ConfigurationError('use_tunnel is set but no tunnel launcher is configured');
      }

      logger.info(
        {
          connection_id: connectionId,
          instance_id: resolved.instance_id,
          zone: resolved.zone,
          project_id: resolved.project_id,
          user: policy.user,
          use_internal_address: policy.use_internal_address,
          use_tunnel: policy.use_tunnel,
          use_login_registry: policy.use_login_registry,
        },
        '[orchestrator] Connecting to instance'
      );

      this.transition(connectionId, 'resolving_address', 0);
      const host = await new AddressResolver(this.deps.directory).resolve(resolved, policy);

      return await this.runCycles(publisher, {
        connectionId,
        attempt: 0,
        target: resolved,
        policy,
        host,
      });
    } catch (error) {
      this.transition(connectionId, 'aborted', 0);
      throw error;
    }
  }

  /**
   * Fill in the project id and reject targets with missing fields
   */
  async resolveTarget(target: ConnectionTarget): Promise<ResolvedTarget> {
    const projectId = target.project_id || (await this.deps.directory.resolveProjectId());

    const fields: Record<string, string | undefined> = {
      instance_id: target.instance_id,
      zone: target.zone,
      project_id: projectId,
    };
    const missing = Object.keys(fields).filter(key => !fields[key]);
    if (!target.instance_id || !target.zone || !projectId) {
      throw new ConfigurationError(
        `Required parameters are missing: ${missing.join(', ')}. Set them in the target or the config file.`,
        { missing_fields: missing }
      );
    }

    return {
      instance_id: target.instance_id,
      zone: target.zone,
      project_id: projectId,
      hostname_override: target.hostname_override,
    };
  }

  private async runCycles(publisher: CredentialPublisher, base: Cycle): Promise<ActiveSession> {
    const maxAttempts = base.policy.max_connection_retries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const cycle: Cycle = { ...base, attempt };
      try {
        return await this.runCycle(publisher, cycle);
      } catch (error) {
        if (classifyCycleFailure(error) === 'fatal') {
          throw error;
        }
        lastError = error;

        if (attempt === maxAttempts) {
          break;
        }

        this.transition(cycle.connectionId, 'retry_wait', attempt);
        const delaySeconds = this.randomInt(0, MAX_RETRY_JITTER_SECONDS + 1);
        logger.info(
          {
            connection_id: cycle.connectionId,
            attempt,
            max_attempts: maxAttempts,
            delay_seconds: delaySeconds,
            cause: describeError(error),
          },
          '[orchestrator] Failed to establish SSH connection, waiting to retry'
        );
        await this.sleep(delaySeconds * 1000);
      }
    }

    logger.error(
      { connection_id: base.connectionId, attempts: maxAttempts, cause: describeError(lastError) },
      '[orchestrator] Maximum retries exceeded'
    );
    throw new MaxRetriesExceededError(maxAttempts, lastError);
  }

  /**
   * One generate → publish → handshake cycle. The keypair never leaves this frame
   * except inside the returned session's handshake.
   */
  private async runCycle(publisher: CredentialPublisher, cycle: Cycle): Promise<ActiveSession> {
    this.transition(cycle.connectionId, 'generating_key', cycle.attempt);
    logger.info({ connection_id: cycle.connectionId }, '[orchestrator] Generating SSH key');
    const keyPair = this.deps.keys.generate(cycle.policy.user);

    this.transition(cycle.connectionId, 'publishing_credential', cycle.attempt);
    const credential = await publisher.publish(cycle.target, keyPair);

    this.transition(cycle.connectionId, 'handshaking', cycle.attempt);
    const session = await this.handshake(cycle, credential, keyPair);

    this.transition(cycle.connectionId, 'established', cycle.attempt);
    return session;
  }

  /**
   * Bounded connect loop with linear backoff. Only the final failure escapes.
   */
  private async handshake(
    cycle: Cycle,
    credential: PublishedCredential,
    keyPair: EphemeralKeyPair
  ): Promise<ActiveSession> {
    logger.info(
      { connection_id: cycle.connectionId, username: credential.username, host: cycle.host },
      '[orchestrator] Opening remote connection'
    );

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.connectOnce(cycle, credential, keyPair);
      } catch (error) {
        const backoff = handshakeBackoffSeconds(attempt);
        if (classifyHandshakeFailure(error) === 'fatal' || backoff === null) {
          throw error;
        }
        logger.info(
          { connection_id: cycle.connectionId, handshake_attempt: attempt + 1, cause: describeError(error) },
          `[orchestrator] Failed to connect. Waiting ${backoff}s to retry`
        );
        await this.sleep(backoff * 1000);
      }
    }
  }

  /**
   * Acquire lease → open tunnel → connect. Everything acquired is released on any
   * failure; on success the session takes ownership.
   */
  private async connectOnce(
    cycle: Cycle,
    credential: PublishedCredential,
    keyPair: EphemeralKeyPair
  ): Promise<ActiveSession> {
    const guard = new ResourceGuard();
    try {
      const lease = await this.authorization.acquire(cycle.target, cycle.policy);
      guard.defer('authorization', () => lease.release());

      let sock: Duplex | undefined;
      if (cycle.policy.use_tunnel && this.deps.tunnels) {
        const tunnel = await this.deps.tunnels.open(cycle.target, cycle.policy, lease.env);
        guard.defer('tunnel', () => tunnel.terminate());
        sock = tunnel.stream;
      }

      const shellSession = await this.deps.shell.connect({
        host: cycle.host,
        port: SSH_PORT,
        sock,
        username: credential.username,
        private_key: keyPair.private_key,
        timeout_ms: cycle.policy.connect_timeout * 1000,
      });

      return new ActiveSession(
        cycle.connectionId,
        cycle.host,
        credential,
        shellSession,
        guard.transfer(),
        cycle.policy
      );
    } finally {
      await guard.release();
    }
  }

  private transition(connectionId: string, state: ConnectionState, attempt: number): void {
    logger.debug({ connection_id: connectionId, state, attempt }, '[orchestrator] State change');
    this.deps.onStateChange?.({ connection_id: connectionId, state, attempt });
  }
}

function parsePolicy(input: ConnectionPolicyInput): ConnectionPolicy {
  try {
    return ConnectionPolicySchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw configurationErrorFromZod(error);
    }
    throw error;
  }
}
