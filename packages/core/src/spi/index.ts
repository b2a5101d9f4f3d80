/**
 * Service Provider Interface (SPI) definitions
 *
 * Narrow contracts for everything the orchestrator talks to: the instance directory,
 * the login registry, the SSH client, the tunnel and the authorization context.
 * Implementations live in @ephemera/gcp and @ephemera/ssh; tests supply fakes.
 */

import type { Duplex } from 'stream';
import type { ConnectionPolicy, ResolvedTarget } from '../config/schema.js';

// ===== Key material =====

/**
 * Throwaway keypair. Held in memory only and dropped when the cycle that
 * created it ends.
 */
export interface EphemeralKeyPair {
  /** OpenSSH private key */
  private_key: string;
  /** "<algorithm> <base64-key> <user>" */
  public_key: string;
  user: string;
  created_at: Date;
}

export interface KeyPairGenerator {
  /** @throws KeyGenerationError */
  generate(user: string): EphemeralKeyPair;
}

// ===== Instance directory (compute API) =====

export interface MetadataItem {
  key: string;
  value: string;
}

export interface InstanceMetadata {
  /** Optimistic-concurrency token returned by the read, echoed on write */
  fingerprint?: string;
  items: MetadataItem[];
}

export type MetadataWriteResult =
  | { status: 'ok' }
  | { status: 'precondition_failed'; message: string };

export interface InstanceDirectory {
  resolveProjectId(): Promise<string>;

  /** Returns null when the instance has no address of the requested kind */
  resolveAddress(target: ResolvedTarget, internal: boolean): Promise<string | null>;

  readMetadata(target: ResolvedTarget): Promise<InstanceMetadata>;

  /**
   * Write metadata back. A stale fingerprint yields `precondition_failed`;
   * any other rejection throws PublishError.
   */
  writeMetadata(target: ResolvedTarget, metadata: InstanceMetadata): Promise<MetadataWriteResult>;
}

// ===== Identity / login registry =====

export interface PosixAccount {
  username: string;
  primary?: boolean;
}

export interface LoginProfile {
  name?: string;
  posix_accounts: PosixAccount[];
}

export interface KeyRegistration {
  /** Principal email the key is registered for */
  user: string;
  public_key: string;
  expiry_usec: number;
  project_id: string;
}

export interface IdentityRegistry {
  currentPrincipalEmail(): Promise<string>;

  /** @throws PublishError when the registry rejects the key */
  registerKey(registration: KeyRegistration): Promise<LoginProfile>;
}

// ===== Authorization context =====

/**
 * Lease held for the lifetime of one handshake attempt (and, on success, the session)
 */
export interface AuthorizationLease {
  /** Extra environment for subprocesses started under this lease */
  env: Record<string, string>;
  release(): Promise<void>;
}

export interface AuthorizationContext {
  acquire(target: ResolvedTarget, policy: ConnectionPolicy): Promise<AuthorizationLease>;
}

// ===== Tunnel =====

export interface TunnelStream {
  /** Bytes written here reach port 22 of the instance */
  stream: Duplex;
  terminate(): Promise<void>;
}

export interface TunnelLauncher {
  /** @throws TunnelError if the tunnel process cannot be started */
  open(
    target: ResolvedTarget,
    policy: ConnectionPolicy,
    env: Record<string, string>
  ): Promise<TunnelStream>;
}

// ===== Secure shell =====

export interface HandshakeOptions {
  host: string;
  port: number;
  /** Pre-established transport (tunnel); host/port are then informational */
  sock?: Duplex;
  username: string;
  private_key: string;
  timeout_ms: number;
}

export interface ExecOptions {
  /** Seconds; null or undefined disables the limit */
  timeout_seconds?: number | null;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exit_code: number | null;
}

export interface ShellSession {
  /** @throws CommandTimeoutError */
  exec(command: string, options?: ExecOptions): Promise<ExecResult>;

  /** Interactive shell without PTY allocation */
  shell(): Promise<Duplex>;

  close(): Promise<void>;
}

export interface SecureShellClient {
  /** @throws HandshakeError on any transport or authentication failure */
  connect(options: HandshakeOptions): Promise<ShellSession>;
}
