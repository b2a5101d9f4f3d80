import type { ResolvedTarget } from '../config/schema.js';
import type { EphemeralKeyPair } from '../spi/index.js';

export type PublishStrategy = 'metadata' | 'login_registry';

/**
 * Proof that the instance's auth backend now accepts a public key for a login user
 */
export interface PublishedCredential {
  strategy: PublishStrategy;
  /** Login user the handshake must present */
  username: string;
  public_key: string;
  /** Only registry-published keys carry an expiry */
  expires_at?: Date;
}

export interface CredentialPublisher {
  readonly strategy: PublishStrategy;

  /**
   * @throws PreconditionRaceError when a concurrent metadata write won
   * @throws PublishError when the backend rejects the key
   */
  publish(target: ResolvedTarget, keyPair: EphemeralKeyPair): Promise<PublishedCredential>;
}
