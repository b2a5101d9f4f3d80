/**
 * @ephemera/gcp
 *
 * Google Cloud adapters: Compute Engine instance directory, OS Login identity
 * registry and gcloud authorization for IAP tunnels.
 */

import type { GoogleConfig } from '@ephemera/core';
import { createComputeApi, createOsLoginApi } from './api.js';
import { GcloudAuthorization } from './authorization.js';
import { GoogleCredentials } from './credentials.js';
import { GoogleIdentityRegistry } from './identity-registry.js';
import { GoogleInstanceDirectory } from './instance-directory.js';

export * from './api.js';
export * from './authorization.js';
export { GoogleCredentials } from './credentials.js';
export { GoogleIdentityRegistry } from './identity-registry.js';
export { GoogleInstanceDirectory } from './instance-directory.js';

export interface GoogleAdapters {
  credentials: GoogleCredentials;
  directory: GoogleInstanceDirectory;
  identity: GoogleIdentityRegistry;
  authorization: GcloudAuthorization;
}

export async function createGoogleAdapters(
  config: GoogleConfig,
  impersonationIdentity?: string
): Promise<GoogleAdapters> {
  const credentials = await GoogleCredentials.create(config, impersonationIdentity);
  return {
    credentials,
    directory: new GoogleInstanceDirectory(createComputeApi(credentials.apiAuth), () =>
      credentials.projectId()
    ),
    identity: new GoogleIdentityRegistry(createOsLoginApi(credentials.apiAuth), () =>
      credentials.principalEmail()
    ),
    authorization: new GcloudAuthorization(credentials),
  };
}
