/**
 * MetadataKeyInjector
 *
 * Publishes a key by prepending "<user>:<key>" to the instance's `ssh-keys` metadata
 * item. The read-modify-write is not atomic: a concurrent writer makes our write fail
 * its fingerprint check, which surfaces as PreconditionRaceError and the orchestrator
 * re-runs the whole cycle with a fresh read.
 */

import type { ConnectionPolicy, ResolvedTarget } from '../config/schema.js';
import type { EphemeralKeyPair, InstanceDirectory, MetadataItem } from '../spi/index.js';
import { PreconditionRaceError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { CredentialPublisher, PublishedCredential } from './types.js';

export const SSH_KEYS_METADATA_KEY = 'ssh-keys';

/**
 * Return a copy of `items` with `<user>:<publicKey>` first in the ssh-keys entry
 */
export function injectSshKey(items: MetadataItem[], user: string, publicKey: string): MetadataItem[] {
  const line = `${user}:${publicKey}\n`;
  const index = items.findIndex(item => item.key === SSH_KEYS_METADATA_KEY);

  if (index === -1) {
    return [...items, { key: SSH_KEYS_METADATA_KEY, value: line }];
  }

  return items.map((item, i) => (i === index ? { key: item.key, value: line + item.value } : item));
}

export class MetadataKeyInjector implements CredentialPublisher {
  readonly strategy = 'metadata' as const;

  constructor(
    private directory: InstanceDirectory,
    private policy: ConnectionPolicy
  ) {}

  async publish(target: ResolvedTarget, keyPair: EphemeralKeyPair): Promise<PublishedCredential> {
    logger.info(
      { instance_id: target.instance_id, user: this.policy.user },
      '[publisher:metadata] Appending SSH public key to instance metadata'
    );

    const metadata = await this.directory.readMetadata(target);
    const items = injectSshKey(metadata.items, this.policy.user, keyPair.public_key);

    const result = await this.directory.writeMetadata(target, {
      fingerprint: metadata.fingerprint,
      items,
    });

    if (result.status === 'precondition_failed') {
      throw new PreconditionRaceError(result.message, {
        instance_id: target.instance_id,
        fingerprint: metadata.fingerprint,
      });
    }

    return {
      strategy: this.strategy,
      username: this.policy.user,
      public_key: keyPair.public_key,
    };
  }
}
