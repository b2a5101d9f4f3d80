/**
 * In-process fakes for the collaborator interfaces
 *
 * Every fake appends to a shared `events` log so tests can assert ordering across
 * collaborators (e.g. metadata write before handshake).
 */

import { PassThrough, type Duplex } from 'stream';
import type {
  ConnectionTarget,
  EphemeralKeyPair,
  ExecOptions,
  ExecResult,
  HandshakeOptions,
  IdentityRegistry,
  InstanceDirectory,
  InstanceMetadata,
  KeyPairGenerator,
  KeyRegistration,
  LoginProfile,
  MetadataWriteResult,
  PosixAccount,
  ResolvedTarget,
  SecureShellClient,
  ShellSession,
  TunnelLauncher,
  TunnelStream,
  AuthorizationContext,
  AuthorizationLease,
} from '../src/index.js';
import { HandshakeError } from '../src/index.js';

/**
 * Await a promise expected to reject with `errorClass` and return the narrowed error
 */
export async function captureRejection<T>(
  promise: Promise<unknown>,
  errorClass: new (...args: never[]) => T
): Promise<T> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof errorClass) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected rejection with ${errorClass.name}`);
}

export function makeTarget(overrides: Partial<ConnectionTarget> = {}): ConnectionTarget {
  return {
    instance_id: 'vm1',
    zone: 'us-central1-a',
    project_id: 'p1',
    ...overrides,
  };
}

export function makeResolvedTarget(overrides: Partial<ResolvedTarget> = {}): ResolvedTarget {
  return {
    instance_id: 'vm1',
    zone: 'us-central1-a',
    project_id: 'p1',
    ...overrides,
  };
}

export class FakeDirectory implements InstanceDirectory {
  projectId = 'default-project';
  internalAddress: string | null = '10.128.0.7';
  externalAddress: string | null = '34.120.0.9';
  metadata: InstanceMetadata = { fingerprint: 'fp-0', items: [] };
  /** Consumed one per write; `ok` once empty */
  writeResults: MetadataWriteResult[] = [];
  writeError?: Error;
  writes: InstanceMetadata[] = [];
  addressLookups: boolean[] = [];
  private version = 0;

  constructor(private events: string[] = []) {}

  async resolveProjectId(): Promise<string> {
    this.events.push('resolveProjectId');
    return this.projectId;
  }

  async resolveAddress(_target: ResolvedTarget, internal: boolean): Promise<string | null> {
    this.events.push('resolveAddress');
    this.addressLookups.push(internal);
    return internal ? this.internalAddress : this.externalAddress;
  }

  async readMetadata(_target: ResolvedTarget): Promise<InstanceMetadata> {
    this.events.push('readMetadata');
    return { fingerprint: this.metadata.fingerprint, items: [...this.metadata.items] };
  }

  async writeMetadata(_target: ResolvedTarget, metadata: InstanceMetadata): Promise<MetadataWriteResult> {
    this.events.push('writeMetadata');
    this.writes.push(metadata);
    if (this.writeError) {
      throw this.writeError;
    }
    const result = this.writeResults.shift() ?? { status: 'ok' };
    if (result.status === 'ok') {
      this.version += 1;
      this.metadata = { fingerprint: `fp-${this.version}`, items: metadata.items };
    }
    return result;
  }
}

export class FakeIdentity implements IdentityRegistry {
  email = 'deployer@p1.iam.gserviceaccount.com';
  accounts: PosixAccount[] = [{ username: 'sa_deployer', primary: true }];
  registrations: KeyRegistration[] = [];

  constructor(private events: string[] = []) {}

  async currentPrincipalEmail(): Promise<string> {
    return this.email;
  }

  async registerKey(registration: KeyRegistration): Promise<LoginProfile> {
    this.events.push('registerKey');
    this.registrations.push(registration);
    return { name: `users/${registration.user}`, posix_accounts: this.accounts };
  }
}

/**
 * Deterministic keys: PRIVATE-1/ssh-rsa KEY1 <user>, PRIVATE-2/..., ...
 */
export class SequentialKeys implements KeyPairGenerator {
  generated: EphemeralKeyPair[] = [];

  constructor(private events: string[] = []) {}

  generate(user: string): EphemeralKeyPair {
    const n = this.generated.length + 1;
    this.events.push('generate');
    const keyPair: EphemeralKeyPair = {
      private_key: `PRIVATE-${n}`,
      public_key: `ssh-rsa KEY${n} ${user}`,
      user,
      created_at: new Date(0),
    };
    this.generated.push(keyPair);
    return keyPair;
  }
}

export class FakeShellSession implements ShellSession {
  closed = false;
  execCalls: { command: string; options?: ExecOptions }[] = [];

  constructor(
    readonly options: HandshakeOptions,
    private events: string[]
  ) {}

  async exec(command: string, options?: ExecOptions): Promise<ExecResult> {
    this.execCalls.push({ command, options });
    return { stdout: 'ok\n', stderr: '', exit_code: 0 };
  }

  async shell(): Promise<Duplex> {
    return new PassThrough();
  }

  async close(): Promise<void> {
    this.events.push('session.close');
    this.closed = true;
  }
}

/**
 * Connect outcomes are consumed in order; `ok` once the script runs out
 * (or always fail when `failAll` is set)
 */
export class ScriptedShell implements SecureShellClient {
  outcomes: ('ok' | Error)[] = [];
  failAll = false;
  connects: HandshakeOptions[] = [];
  sessions: FakeShellSession[] = [];

  constructor(private events: string[] = []) {}

  failNext(count: number, error: () => Error = () => new HandshakeError('Connection refused')): void {
    for (let i = 0; i < count; i++) {
      this.outcomes.push(error());
    }
  }

  async connect(options: HandshakeOptions): Promise<ShellSession> {
    this.events.push('connect');
    this.connects.push(options);
    if (this.failAll) {
      throw new HandshakeError('Connection refused');
    }
    const outcome = this.outcomes.shift() ?? 'ok';
    if (outcome !== 'ok') {
      throw outcome;
    }
    const session = new FakeShellSession(options, this.events);
    this.sessions.push(session);
    return session;
  }
}

export class FakeTunnels implements TunnelLauncher {
  opened: { env: Record<string, string>; stream: PassThrough }[] = [];
  openError?: Error;

  constructor(private events: string[] = []) {}

  async open(
    _target: ResolvedTarget,
    _policy: unknown,
    env: Record<string, string>
  ): Promise<TunnelStream> {
    this.events.push('tunnel.open');
    if (this.openError) {
      throw this.openError;
    }
    const stream = new PassThrough();
    this.opened.push({ env, stream });
    return {
      stream,
      terminate: async () => {
        this.events.push('tunnel.terminate');
      },
    };
  }
}

export class FakeAuthorization implements AuthorizationContext {
  acquired = 0;
  released = 0;

  constructor(private events: string[] = []) {}

  async acquire(): Promise<AuthorizationLease> {
    this.acquired += 1;
    this.events.push('lease.acquire');
    return {
      env: { CLOUDSDK_CORE_PROJECT: 'p1' },
      release: async () => {
        this.released += 1;
        this.events.push('lease.release');
      },
    };
  }
}
