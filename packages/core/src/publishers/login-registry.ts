/**
 * LoginProfileRegistrar
 *
 * Registers the key with the OS Login registry for the calling principal, with an
 * expiry. The registry decides the POSIX username; when the profile holds several
 * accounts the first one is used.
 */

import type { ConnectionPolicy, ResolvedTarget } from '../config/schema.js';
import type { EphemeralKeyPair, IdentityRegistry } from '../spi/index.js';
import { PublishError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { CredentialPublisher, PublishedCredential } from './types.js';

export class LoginProfileRegistrar implements CredentialPublisher {
  readonly strategy = 'login_registry' as const;

  constructor(
    private registry: IdentityRegistry,
    private policy: ConnectionPolicy,
    private now: () => number = Date.now
  ) {}

  async publish(target: ResolvedTarget, keyPair: EphemeralKeyPair): Promise<PublishedCredential> {
    const email = await this.registry.currentPrincipalEmail();
    logger.info({ user: email }, '[publisher:login_registry] Importing SSH public key using OS Login');

    const expiresAtMs = this.now() + this.policy.key_expiry_seconds * 1000;
    const profile = await this.registry.registerKey({
      user: email,
      public_key: keyPair.public_key,
      expiry_usec: expiresAtMs * 1000,
      project_id: target.project_id,
    });

    const account = profile.posix_accounts[0];
    if (!account) {
      throw new PublishError(`Login profile for ${email} has no POSIX account`, {
        user: email,
        project_id: target.project_id,
      });
    }

    return {
      strategy: this.strategy,
      username: account.username,
      public_key: keyPair.public_key,
      expires_at: new Date(expiresAtMs),
    };
  }
}
