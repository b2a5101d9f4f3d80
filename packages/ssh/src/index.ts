/**
 * @ephemera/ssh
 *
 * ssh2-backed key generation and handshakes, and the gcloud IAP tunnel launcher.
 */

export * from './keygen.js';
export { Ssh2Session } from './session.js';
export { Ssh2ShellClient, buildConnectConfig } from './client.js';
export * from './tunnel.js';
