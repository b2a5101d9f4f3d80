/**
 * GoogleIdentityRegistry
 *
 * IdentityRegistry backed by the OS Login API.
 */

import type { oslogin_v1 } from 'googleapis';
import {
  PublishError,
  describeError,
  type IdentityRegistry,
  type KeyRegistration,
  type LoginProfile,
  type PosixAccount,
} from '@ephemera/core';
import type { OsLoginApi } from './api.js';

export class GoogleIdentityRegistry implements IdentityRegistry {
  constructor(
    private oslogin: OsLoginApi,
    private principalEmail: () => Promise<string>
  ) {}

  currentPrincipalEmail(): Promise<string> {
    return this.principalEmail();
  }

  async registerKey(registration: KeyRegistration): Promise<LoginProfile> {
    let response: oslogin_v1.Schema$ImportSshPublicKeyResponse;
    try {
      response = await this.oslogin.importSshPublicKey({
        parent: `users/${registration.user}`,
        projectId: registration.project_id,
        requestBody: {
          key: registration.public_key,
          expirationTimeUsec: String(registration.expiry_usec),
        },
      });
    } catch (error) {
      throw new PublishError(
        `Failed to import SSH public key for ${registration.user}: ${describeError(error)}`,
        { user: registration.user, project_id: registration.project_id },
        { cause: error }
      );
    }

    const profile = response.loginProfile;
    if (!profile) {
      throw new PublishError(`OS Login returned no login profile for ${registration.user}`, {
        user: registration.user,
      });
    }

    const accounts: PosixAccount[] = [];
    for (const account of profile.posixAccounts ?? []) {
      if (account.username) {
        accounts.push({ username: account.username, primary: account.primary ?? undefined });
      }
    }

    return { name: profile.name ?? undefined, posix_accounts: accounts };
  }
}
