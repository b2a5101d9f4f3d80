/**
 * Ssh2ShellClient
 *
 * Key-only handshake. Instances are ephemeral, so their host keys are unknown in
 * advance and are accepted unconditionally. The local SSH agent is never consulted.
 */

import { Client, type ConnectConfig } from 'ssh2';
import {
  HandshakeError,
  describeError,
  logger,
  type HandshakeOptions,
  type SecureShellClient,
  type ShellSession,
} from '@ephemera/core';
import { Ssh2Session } from './session.js';

export function buildConnectConfig(options: HandshakeOptions): ConnectConfig {
  const config: ConnectConfig = {
    host: options.host,
    port: options.port,
    username: options.username,
    privateKey: options.private_key,
    readyTimeout: options.timeout_ms,
    tryKeyboard: false,
    hostVerifier: () => true,
  };
  // ssh2 checks for the key, not its value
  if (options.sock) {
    config.sock = options.sock;
  }
  return config;
}

export class Ssh2ShellClient implements SecureShellClient {
  constructor(private createClient: () => Client = () => new Client()) {}

  connect(options: HandshakeOptions): Promise<ShellSession> {
    const client = this.createClient();
    const via = options.sock ? 'tunnel' : 'direct';

    return new Promise<ShellSession>((resolve, reject) => {
      let settled = false;

      const fail = (error: unknown): void => {
        if (settled) {
          logger.warn({ host: options.host, err: describeError(error) }, '[ssh] Connection error');
          return;
        }
        settled = true;
        client.end();
        reject(
          new HandshakeError(
            `SSH handshake with ${options.username}@${options.host} failed: ${describeError(error)}`,
            { host: options.host, port: options.port, via },
            { cause: error }
          )
        );
      };

      client.on('ready', () => {
        settled = true;
        logger.debug({ host: options.host, username: options.username, via }, '[ssh] Handshake complete');
        resolve(new Ssh2Session(client));
      });
      client.on('error', (err: Error) => fail(err));
      client.on('close', () => {
        if (!settled) {
          fail(new Error('Connection closed before authentication'));
        }
      });

      try {
        client.connect(buildConnectConfig(options));
      } catch (error) {
        fail(error);
      }
    });
  }
}
