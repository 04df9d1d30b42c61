/**
 * Key material: random salt and secret, argon2id derivation, matching
 *
 * Only the derived key is ever persisted. The secret leaves this module once,
 * inside the encoded artifact, and comes back only as verification input.
 *
 * Hash: Argon2id, parallelism 1, raw output of algorithm.outputLen bytes
 */

import { argon2idAsync } from '@noble/hashes/argon2';
import { randomBytes, timingSafeEqual } from 'crypto';
import { logger } from '@clientkey/core';
import type { AlgorithmSpec } from './algorithm.js';
import { InsufficientEntropyError } from './errors.js';

const ARGON2_PARALLELISM = 1;

export const DEFAULT_SALT_LENGTH = 32;
export const DEFAULT_SECRET_LENGTH = 32;

/**
 * Source of cryptographically secure random bytes.
 * Returning fewer bytes than requested aborts generation.
 */
export type RandomSource = (size: number) => Uint8Array;

export interface KeyMaterialOptions {
  saltLength?: number;
  secretLength?: number;
  randomSource?: RandomSource;
}

export interface GeneratedKeyMaterial {
  /** Safe to store and to hand to the key holder */
  salt: Buffer;
  /** Bearer credential. Never persisted */
  secret: Buffer;
  /** What the store keeps */
  derivedKey: Buffer;
}

export class KeyMaterial {
  private readonly saltLength: number;
  private readonly secretLength: number;
  private readonly randomSource: RandomSource;

  constructor(options: KeyMaterialOptions = {}) {
    this.saltLength = options.saltLength ?? DEFAULT_SALT_LENGTH;
    this.secretLength = options.secretLength ?? DEFAULT_SECRET_LENGTH;
    this.randomSource = options.randomSource ?? randomBytes;
  }

  /**
   * Draw a fresh salt and secret and derive the storable key from them
   *
   * @throws InsufficientEntropyError if the random source returns short
   */
  async generate(algorithm: AlgorithmSpec): Promise<GeneratedKeyMaterial> {
    const salt = this.draw('salt', this.saltLength);
    const secret = this.draw('secret', this.secretLength);
    const derivedKey = await this.recover(secret, salt, algorithm);
    return { salt, secret, derivedKey };
  }

  /**
   * Re-run the derivation. Same inputs always give the same output.
   */
  async recover(secret: Uint8Array, salt: Uint8Array, algorithm: AlgorithmSpec): Promise<Buffer> {
    const derived = await argon2idAsync(secret, salt, {
      t: algorithm.timeCost,
      m: algorithm.memoryCostKiB,
      p: ARGON2_PARALLELISM,
      dkLen: algorithm.outputLen,
    });
    return Buffer.from(derived);
  }

  /**
   * Check a presented secret against a stored derived key
   *
   * Timing-safe: the candidate is always derived in full and compared with
   * crypto.timingSafeEqual. Any failure, including a derivation error, is false.
   */
  async match(
    presentedSecret: Uint8Array,
    storedDerivedKey: Uint8Array,
    salt: Uint8Array,
    algorithm: AlgorithmSpec
  ): Promise<boolean> {
    let candidate: Buffer;
    try {
      candidate = await this.recover(presentedSecret, salt, algorithm);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.debug(`[keys] Derivation failed during match: ${reason}`);
      return false;
    }

    if (candidate.length !== storedDerivedKey.length) {
      return false;
    }
    return timingSafeEqual(candidate, storedDerivedKey);
  }

  private draw(what: 'salt' | 'secret', size: number): Buffer {
    const bytes = this.randomSource(size);
    if (bytes.length !== size) {
      throw new InsufficientEntropyError(what, bytes.length, size);
    }
    return Buffer.from(bytes);
  }
}
