/**
 * AddressResolver
 *
 * Picks the host the SSH handshake dials. Tunnelled connections terminate inside the
 * VPC, so they always use the internal address.
 */

import type { ConnectionPolicy, ResolvedTarget } from '../config/schema.js';
import type { InstanceDirectory } from '../spi/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export class AddressResolver {
  constructor(private directory: InstanceDirectory) {}

  /**
   * @throws ConfigurationError if the instance has no address of the required kind
   */
  async resolve(target: ResolvedTarget, policy: ConnectionPolicy): Promise<string> {
    if (target.hostname_override) {
      return target.hostname_override;
    }

    const internal = policy.use_internal_address || policy.use_tunnel;
    const address = await this.directory.resolveAddress(target, internal);
    if (!address) {
      throw new ConfigurationError(
        `Instance ${target.instance_id} has no ${internal ? 'internal' : 'external'} IP address`,
        { instance_id: target.instance_id, zone: target.zone, internal }
      );
    }

    logger.debug(
      { instance_id: target.instance_id, address, internal },
      '[address] Resolved instance address'
    );
    return address;
  }
}
