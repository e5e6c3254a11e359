/**
 * Credential hashing
 *
 * The ledger only needs one-way hash/verify; ScryptCredentialHasher is the
 * default and any other implementation can be passed to openLedger.
 */

import * as crypto from 'crypto';

export interface CredentialHasher {
  hash(secret: string): Promise<string>;
  verify(secret: string, material: string): Promise<boolean>;
}

const KEY_LENGTH = 64;

export class ScryptCredentialHasher implements CredentialHasher {
  async hash(secret: string): Promise<string> {
    const salt = crypto.randomBytes(16).toString('hex');
    const derivedKey = await this.derive(secret, salt);
    return salt + ':' + derivedKey.toString('hex');
  }

  async verify(secret: string, material: string): Promise<boolean> {
    const [salt, key] = material.split(':');
    if (!salt || !key) {
      return false;
    }
    const expected = Buffer.from(key, 'hex');
    if (expected.length !== KEY_LENGTH) {
      return false;
    }
    const derivedKey = await this.derive(secret, salt);
    return crypto.timingSafeEqual(expected, derivedKey);
  }

  private derive(secret: string, salt: string): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      crypto.scrypt(secret, salt, KEY_LENGTH, (error, derivedKey) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(derivedKey);
      });
    });
  }
}
