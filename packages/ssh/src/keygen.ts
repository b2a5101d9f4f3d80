/**
 * RSA keypair generation for one connection cycle
 */

import { utils } from 'ssh2';
import { KeyGenerationError, type EphemeralKeyPair, type KeyPairGenerator } from '@ephemera/core';

export const MIN_RSA_BITS = 2048;

export interface RsaKeyMaterial {
  private: string;
  public: string;
}

export type RsaKeyFactory = (options: { bits: number; comment: string }) => RsaKeyMaterial;

export interface Ssh2KeyPairGeneratorOptions {
  bits?: number;
  generate?: RsaKeyFactory;
}

const generateWithSsh2: RsaKeyFactory = options => utils.generateKeyPairSync('rsa', options);

/**
 * Produces an OpenSSH private key and an `ssh-rsa <base64> <user>` public line.
 * Nothing is written to disk.
 */
export class Ssh2KeyPairGenerator implements KeyPairGenerator {
  private bits: number;
  private generateKey: RsaKeyFactory;

  constructor(options: Ssh2KeyPairGeneratorOptions = {}) {
    this.bits = options.bits ?? MIN_RSA_BITS;
    this.generateKey = options.generate ?? generateWithSsh2;

    if (!Number.isInteger(this.bits) || this.bits < MIN_RSA_BITS) {
      throw new KeyGenerationError(`RSA keys need at least ${MIN_RSA_BITS} bits, got ${this.bits}`);
    }
  }

  generate(user: string): EphemeralKeyPair {
    let material: RsaKeyMaterial;
    try {
      material = this.generateKey({ bits: this.bits, comment: user });
    } catch (error) {
      throw new KeyGenerationError('Failed to generate RSA keypair', { cause: error });
    }

    const [type, body] = material.public.trim().split(/\s+/);
    if (!type || !body) {
      throw new KeyGenerationError('Generated public key is not in OpenSSH format');
    }

    return {
      private_key: material.private,
      public_key: `${type} ${body} ${user}`,
      user,
      created_at: new Date(),
    };
  }
}
