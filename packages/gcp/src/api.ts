/**
 * Narrow views of the Compute Engine and OS Login REST clients
 *
 * The adapters depend on these interfaces rather than on the generated googleapis
 * surface; the factories below bind them to real clients.
 */

import { google, type compute_v1, type oslogin_v1 } from 'googleapis';
import type { GoogleAuth, Impersonated } from 'google-auth-library';

export interface InstanceRef {
  project: string;
  zone: string;
  instance: string;
}

export interface ComputeApi {
  getInstance(ref: InstanceRef): Promise<compute_v1.Schema$Instance>;
  setMetadata(
    ref: InstanceRef & { requestBody: compute_v1.Schema$Metadata }
  ): Promise<compute_v1.Schema$Operation>;
  /** Blocks server-side until the operation is done or the wait times out */
  waitZoneOperation(params: {
    project: string;
    zone: string;
    operation: string;
  }): Promise<compute_v1.Schema$Operation>;
}

export interface OsLoginApi {
  importSshPublicKey(params: {
    parent: string;
    projectId: string;
    requestBody: oslogin_v1.Schema$SshPublicKey;
  }): Promise<oslogin_v1.Schema$ImportSshPublicKeyResponse>;
}

export type ApiAuth = GoogleAuth | Impersonated;

export function createComputeApi(auth: ApiAuth): ComputeApi {
  const compute = google.compute({ version: 'v1', auth });
  return {
    getInstance: async ref => (await compute.instances.get(ref)).data,
    setMetadata: async params => (await compute.instances.setMetadata(params)).data,
    waitZoneOperation: async params => (await compute.zoneOperations.wait(params)).data,
  };
}

export function createOsLoginApi(auth: ApiAuth): OsLoginApi {
  const oslogin = google.oslogin({ version: 'v1', auth });
  return {
    importSshPublicKey: async params => (await oslogin.users.importSshPublicKey(params)).data,
  };
}

/**
 * HTTP status carried by a googleapis/gaxios error, if any
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const { response } = error;
    if ('status' in response && typeof response.status === 'number') {
      return response.status;
    }
  }
  if ('code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}
