/**
 * GcloudAuthorization
 *
 * Hands the tunnel's gcloud process our credentials without touching the user's
 * gcloud configuration: a private config directory holding an access-token file.
 * The directory is removed when the lease is released.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  EphemeraError,
  describeError,
  type AuthorizationContext,
  type AuthorizationLease,
  type ConnectionPolicy,
  type ResolvedTarget,
} from '@ephemera/core';

export interface AccessTokenSource {
  /** Token of the source (non-impersonated) credentials */
  sourceAccessToken(): Promise<string>;
}

export const ACCESS_TOKEN_FILE = 'access_token';

export class GcloudAuthorization implements AuthorizationContext {
  constructor(
    private tokens: AccessTokenSource,
    private tempRoot: string = os.tmpdir()
  ) {}

  async acquire(target: ResolvedTarget, _policy: ConnectionPolicy): Promise<AuthorizationLease> {
    let token: string;
    try {
      token = await this.tokens.sourceAccessToken();
    } catch (error) {
      throw new EphemeraError(
        `Failed to obtain an access token for gcloud: ${describeError(error)}`,
        'authorization_failed',
        false,
        undefined,
        { cause: error }
      );
    }

    const configDir = await fs.mkdtemp(path.join(this.tempRoot, 'ephemera-gcloud-'));
    const tokenFile = path.join(configDir, ACCESS_TOKEN_FILE);
    try {
      await fs.writeFile(tokenFile, token, { mode: 0o600 });
    } catch (error) {
      await fs.rm(configDir, { recursive: true, force: true });
      throw error;
    }

    return {
      env: {
        CLOUDSDK_CONFIG: configDir,
        CLOUDSDK_AUTH_ACCESS_TOKEN_FILE: tokenFile,
        CLOUDSDK_CORE_PROJECT: target.project_id,
      },
      release: () => fs.rm(configDir, { recursive: true, force: true }),
    };
  }
}
