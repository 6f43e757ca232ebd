// ============================================================================
// ipns-dataset-client — Encryption Keyring
// ============================================================================

import { hexToBytes } from '@noble/hashes/utils';
import { InvalidKeyError, MisconfiguredError } from './errors.js';
import { createLogger } from './logger.js';

/** Required symmetric key length in bytes (256 bits). */
export const KEY_LENGTH = 32;

const HEX_KEY_RX = /^[0-9a-fA-F]{64}$/;

const log = createLogger('keyring');

/**
 * Normalise a key given as raw bytes or as a 64-character hex string
 * (with or without `0x`).
 *
 * @throws {InvalidKeyError} For any other length or encoding.
 */
export function normalizeEncryptionKey(key: Uint8Array | string): Uint8Array {
  if (typeof key === 'string') {
    const clean = key.startsWith('0x') ? key.slice(2) : key;
    if (!HEX_KEY_RX.test(clean)) {
      throw new InvalidKeyError(
        `encryption key must be ${KEY_LENGTH} bytes (${KEY_LENGTH * 2} hex characters), got a ${clean.length}-character string`,
      );
    }
    return hexToBytes(clean);
  }

  if (key.length !== KEY_LENGTH) {
    throw new InvalidKeyError(`encryption key must be ${KEY_LENGTH} bytes, got ${key.length}`);
  }
  return new Uint8Array(key);
}

/**
 * Holds the 256-bit key used by chunk codecs.
 *
 * The key is meant to be provisioned once per process. Setting it again
 * rotates it; callers must let in-flight codec calls finish first.
 */
export class EncryptionKeyring {
  private key?: Uint8Array;

  /**
   * @param key - Optional initial key (32 bytes or 64 hex characters).
   */
  constructor(key?: Uint8Array | string) {
    if (key !== undefined) {
      this.key = normalizeEncryptionKey(key);
    }
  }

  get isSet(): boolean {
    return this.key !== undefined;
  }

  /**
   * Install the key, validating it first. The previous key is left in
   * place if validation fails.
   *
   * @throws {InvalidKeyError} If the key is not exactly 32 bytes.
   */
  set(key: Uint8Array | string): void {
    const bytes = normalizeEncryptionKey(key);
    if (this.key) {
      log.warn('replacing an already-provisioned encryption key');
      this.key.fill(0);
    }
    this.key = bytes;
  }

  /**
   * @throws {MisconfiguredError} If no key has been set.
   */
  require(): Uint8Array {
    if (!this.key) {
      throw new MisconfiguredError('encryption key must be set before encoding or decoding chunks');
    }
    return this.key;
  }

  /** Zero and forget the key. */
  clear(): void {
    this.key?.fill(0);
    this.key = undefined;
  }
}

/** Process-wide keyring behind {@link ChunkCodec.setEncryptionKey}. */
export const defaultKeyring = new EncryptionKeyring();
