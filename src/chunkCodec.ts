// ============================================================================
// ipns-dataset-client — Chunk Encryption Codec (XChaCha20-Poly1305)
// ============================================================================

import { randomBytes } from 'node:crypto';
import { xchacha20poly1305 } from '@noble/ciphers/chacha';
import { IntegrityError, MisconfiguredError } from './errors.js';
import { defaultKeyring, type EncryptionKeyring } from './keyring.js';
import { createLogger } from './logger.js';
import type { ChunkTransform, CodecConfig } from './types.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Identifier the codec is registered under in chunk pipeline configuration. */
export const XCHACHA20POLY1305_CODEC_ID = 'xchacha20poly1305';

/** Associated data used when the configuration names no header. */
export const DEFAULT_CODEC_HEADER = 'dClimate-Zarr';

/** XChaCha20 nonce length in bytes (192 bits). */
export const NONCE_LENGTH = 24;

/** Poly1305 authentication tag length in bytes. */
export const TAG_LENGTH = 16;

/** Configuration fields that would carry a secret and are never read. */
const SECRET_CONFIG_FIELDS = ['key', 'encryptionKey', 'encryption_key', 'secret'];

const encoder = new TextEncoder();
const log = createLogger('chunk-codec');

// ---------------------------------------------------------------------------
// ChunkCodec
// ---------------------------------------------------------------------------

export interface ChunkCodecOptions {
  /** Associated data bound into every tag. Defaults to {@link DEFAULT_CODEC_HEADER}. */
  header?: string;
  /** Key source. Defaults to the process-wide {@link defaultKeyring}. */
  keyring?: EncryptionKeyring;
}

/**
 * Authenticated encryption for individual storage chunks.
 *
 * Frame layout: `[nonce (24)] [tag (16)] [ciphertext]`.
 *
 * The header is authenticated but not encrypted, so a chunk copied from a
 * store using a different header fails to decode even when both stores share
 * a key. A fresh nonce is drawn from the CSPRNG on every call.
 *
 * @example
 * ```ts
 * ChunkCodec.setEncryptionKey(keyHex);
 * const codec = new ChunkCodec({ header: 'precip-v2' });
 * const frame = codec.encode(chunk);
 * const plain = codec.decode(frame);
 * ```
 */
export class ChunkCodec implements ChunkTransform {
  static readonly codecId = XCHACHA20POLY1305_CODEC_ID;

  readonly codecId = XCHACHA20POLY1305_CODEC_ID;
  readonly header: string;

  private readonly encodedHeader: Uint8Array;
  private readonly keyring: EncryptionKeyring;

  constructor(options: ChunkCodecOptions = {}) {
    this.header = options.header ?? DEFAULT_CODEC_HEADER;
    this.encodedHeader = encoder.encode(this.header);
    this.keyring = options.keyring ?? defaultKeyring;
  }

  /**
   * Provision the process-wide key used by codecs built without an explicit
   * keyring.
   *
   * @param key - 32 raw bytes, or 64 hex characters.
   * @throws {InvalidKeyError} For any other length.
   */
  static setEncryptionKey(key: Uint8Array | string): void {
    defaultKeyring.set(key);
  }

  /**
   * Build a codec from persisted pipeline configuration.
   *
   * Only `header` is read. A key present in the configuration is ignored:
   * keys are always provisioned out-of-band.
   *
   * @throws {MisconfiguredError} If `header` is present but not a string.
   */
  static fromConfig(config: Partial<CodecConfig>, keyring?: EncryptionKeyring): ChunkCodec {
    if (SECRET_CONFIG_FIELDS.some((field) => field in config)) {
      log.warn('ignoring key material found in codec configuration');
    }
    const { header } = config;
    if (header === undefined) return new ChunkCodec({ keyring });
    if (typeof header !== 'string') {
      throw new MisconfiguredError(`codec header must be a string, got ${typeof header}`);
    }
    return new ChunkCodec({ header, keyring });
  }

  /**
   * Encrypt one chunk.
   *
   * @param plaintext - Raw chunk bytes.
   * @returns nonce ‖ tag ‖ ciphertext.
   * @throws {MisconfiguredError} If no key is set.
   */
  encode(plaintext: Uint8Array): Uint8Array {
    const key = this.keyring.require();
    const nonce = new Uint8Array(randomBytes(NONCE_LENGTH));

    // noble emits ciphertext ‖ tag; the frame puts the tag first.
    const sealed = xchacha20poly1305(key, nonce, this.encodedHeader).encrypt(plaintext);
    const ciphertextLength = sealed.length - TAG_LENGTH;

    const frame = new Uint8Array(NONCE_LENGTH + sealed.length);
    frame.set(nonce, 0);
    frame.set(sealed.subarray(ciphertextLength), NONCE_LENGTH);
    frame.set(sealed.subarray(0, ciphertextLength), NONCE_LENGTH + TAG_LENGTH);
    return frame;
  }

  /**
   * Verify and decrypt one chunk.
   *
   * Nothing is written to `out` unless authentication succeeds.
   *
   * @param frame - nonce ‖ tag ‖ ciphertext, as produced by {@link encode}.
   * @param out - Optional destination; must be at least as long as the plaintext.
   * @returns The plaintext, or `out` when one was supplied.
   * @throws {MisconfiguredError} If no key is set.
   * @throws {IntegrityError} If the frame is truncated or fails authentication.
   */
  decode(frame: Uint8Array, out?: Uint8Array): Uint8Array {
    const key = this.keyring.require();

    if (frame.length < NONCE_LENGTH + TAG_LENGTH) {
      throw new IntegrityError(
        `encrypted chunk too short: expected at least ${NONCE_LENGTH + TAG_LENGTH} bytes, got ${frame.length}`,
      );
    }

    const nonce = frame.subarray(0, NONCE_LENGTH);
    const tag = frame.subarray(NONCE_LENGTH, NONCE_LENGTH + TAG_LENGTH);
    const ciphertext = frame.subarray(NONCE_LENGTH + TAG_LENGTH);

    const sealed = new Uint8Array(ciphertext.length + TAG_LENGTH);
    sealed.set(ciphertext, 0);
    sealed.set(tag, ciphertext.length);

    let plaintext: Uint8Array;
    try {
      plaintext = xchacha20poly1305(key, nonce, this.encodedHeader).decrypt(sealed);
    } catch {
      throw new IntegrityError('chunk authentication failed: wrong key, wrong header, or tampered data');
    }

    if (out === undefined) return plaintext;

    if (out.length < plaintext.length) {
      throw new RangeError(
        `DatasetClient: output buffer holds ${out.length} bytes, decoded chunk needs ${plaintext.length}`,
      );
    }
    out.set(plaintext);
    return out;
  }

  getConfig(): CodecConfig {
    return { id: this.codecId, header: this.header };
  }
}
