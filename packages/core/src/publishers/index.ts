import type { ConnectionPolicy } from '../config/schema.js';
import type { IdentityRegistry, InstanceDirectory } from '../spi/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { LoginProfileRegistrar } from './login-registry.js';
import { MetadataKeyInjector } from './metadata.js';
import type { CredentialPublisher } from './types.js';

export * from './types.js';
export { LoginProfileRegistrar } from './login-registry.js';
export { MetadataKeyInjector, injectSshKey, SSH_KEYS_METADATA_KEY } from './metadata.js';

/**
 * Pick the publishing strategy for a policy. Fixed for the whole connection.
 */
export function selectPublisher(
  policy: ConnectionPolicy,
  deps: { directory: InstanceDirectory; identity?: IdentityRegistry }
): CredentialPublisher {
  if (!policy.use_login_registry) {
    return new MetadataKeyInjector(deps.directory, policy);
  }
  if (!deps.identity) {
    throw new ConfigurationError('use_login_registry is set but no identity registry is configured');
  }
  return new LoginProfileRegistrar(deps.identity, policy);
}
