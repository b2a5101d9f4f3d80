/**
 * GoogleCredentials
 *
 * Application default credentials (or a key file), optionally impersonating a
 * service account for API calls.
 */

import { GoogleAuth, Impersonated, OAuth2Client } from 'google-auth-library';
import { ConfigurationError, EphemeraError, logger, type GoogleConfig } from '@ephemera/core';
import type { ApiAuth } from './api.js';
import type { AccessTokenSource } from './authorization.js';

const IMPERSONATION_LIFETIME_SECONDS = 3600;

export class GoogleCredentials implements AccessTokenSource {
  private constructor(
    private source: GoogleAuth,
    private impersonated: Impersonated | undefined,
    private impersonationIdentity: string | undefined
  ) {}

  static async create(config: GoogleConfig, impersonationIdentity?: string): Promise<GoogleCredentials> {
    const source = new GoogleAuth({ keyFile: config.key_file, scopes: config.scopes });
    if (!impersonationIdentity) {
      return new GoogleCredentials(source, undefined, undefined);
    }

    logger.info({ target_principal: impersonationIdentity }, '[google] Impersonating service account');
    const impersonated = new Impersonated({
      sourceClient: await source.getClient(),
      targetPrincipal: impersonationIdentity,
      targetScopes: config.scopes,
      lifetime: IMPERSONATION_LIFETIME_SECONDS,
      delegates: [],
    });
    return new GoogleCredentials(source, impersonated, impersonationIdentity);
  }

  /** Client the REST APIs authenticate with */
  get apiAuth(): ApiAuth {
    return this.impersonated ?? this.source;
  }

  projectId(): Promise<string> {
    return this.source.getProjectId();
  }

  async sourceAccessToken(): Promise<string> {
    const token = await this.source.getAccessToken();
    if (!token) {
      throw new EphemeraError('Google credentials returned no access token', 'authorization_failed');
    }
    return token;
  }

  /**
   * Email of the principal the APIs see: the impersonated account, else the key's
   * client_email, else whatever the token belongs to
   */
  async principalEmail(): Promise<string> {
    if (this.impersonationIdentity) {
      return this.impersonationIdentity;
    }

    const credentials = await this.source.getCredentials();
    if (credentials.client_email) {
      return credentials.client_email;
    }

    const info = await new OAuth2Client().getTokenInfo(await this.sourceAccessToken());
    if (!info.email) {
      throw new ConfigurationError(
        'Cannot determine the account email of the Google credentials; OS Login needs it'
      );
    }
    return info.email;
  }
}
