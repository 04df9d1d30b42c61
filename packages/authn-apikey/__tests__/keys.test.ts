/**
 * Key material tests
 *
 * Tests random generation, argon2id derivation determinism and the
 * constant-time match. Uses the cheapest legal parameters to keep runs short.
 */

import { describe, it, expect, vi } from 'vitest';
import { KeyMaterial } from '../src/keys.js';
import { parseAlgorithm } from '../src/algorithm.js';
import { InsufficientEntropyError } from '../src/errors.js';

const FAST = parseAlgorithm('argon2id:1 16MB 16');

function fixedBytes(fill: number) {
  return (size: number) => Buffer.alloc(size, fill);
}

function flipFirstByte(bytes: Buffer): Buffer {
  const copy = Buffer.from(bytes);
  copy[0] = (copy[0] ?? 0) ^ 0xff;
  return copy;
}

describe('Key generation', () => {
  it('should draw a 32 byte salt and secret and derive outputLen bytes', async () => {
    const keys = new KeyMaterial();
    const { salt, secret, derivedKey } = await keys.generate(FAST);

    expect(salt).toHaveLength(32);
    expect(secret).toHaveLength(32);
    expect(derivedKey).toHaveLength(16);
  });

  it('should generate different salt and secret on every call', async () => {
    const keys = new KeyMaterial();
    const first = await keys.generate(FAST);
    const second = await keys.generate(FAST);

    expect(first.salt.equals(second.salt)).toBe(false);
    expect(first.secret.equals(second.secret)).toBe(false);
    expect(first.salt.equals(first.secret)).toBe(false);
  });

  it('should draw salt first, then secret, at the configured lengths', async () => {
    const randomSource = vi.fn(fixedBytes(7));
    const keys = new KeyMaterial({ saltLength: 16, secretLength: 24, randomSource });

    const { salt, secret } = await keys.generate(FAST);

    expect(randomSource).toHaveBeenNthCalledWith(1, 16);
    expect(randomSource).toHaveBeenNthCalledWith(2, 24);
    expect(salt).toEqual(Buffer.alloc(16, 7));
    expect(secret).toEqual(Buffer.alloc(24, 7));
  });

  it('should fail with InsufficientEntropyError on a short read', async () => {
    const keys = new KeyMaterial({ randomSource: size => Buffer.alloc(size - 1) });

    await expect(keys.generate(FAST)).rejects.toBeInstanceOf(InsufficientEntropyError);
  });

  it('should not retry after a short secret read', async () => {
    const randomSource = vi
      .fn<(size: number) => Uint8Array>()
      .mockReturnValueOnce(Buffer.alloc(32, 1))
      .mockReturnValueOnce(Buffer.alloc(8, 2));
    const keys = new KeyMaterial({ randomSource });

    await expect(keys.generate(FAST)).rejects.toMatchObject({
      code: 'insufficient_entropy',
      details: { what: 'secret', got: 8, want: 32 },
    });
    expect(randomSource).toHaveBeenCalledTimes(2);
  });

  it('should propagate random source failures', async () => {
    const keys = new KeyMaterial({
      randomSource: () => {
        throw new Error('entropy pool closed');
      },
    });

    await expect(keys.generate(FAST)).rejects.toThrow('entropy pool closed');
  });
});

describe('Key derivation', () => {
  const secret = Buffer.alloc(32, 0x11);
  const salt = Buffer.alloc(32, 0x22);
  const keys = new KeyMaterial();

  it('should be deterministic', async () => {
    const first = await keys.recover(secret, salt, FAST);
    const second = await keys.recover(secret, salt, FAST);

    expect(first.equals(second)).toBe(true);
  });

  it('should reproduce the key derived at generation time', async () => {
    const generated = await new KeyMaterial({ randomSource: fixedBytes(0x33) }).generate(FAST);

    const recovered = await keys.recover(generated.secret, generated.salt, FAST);

    expect(recovered.equals(generated.derivedKey)).toBe(true);
  });

  it('should change when one byte of the secret changes', async () => {
    const base = await keys.recover(secret, salt, FAST);
    const changed = await keys.recover(flipFirstByte(secret), salt, FAST);

    expect(base.equals(changed)).toBe(false);
  });

  it('should change when one byte of the salt changes', async () => {
    const base = await keys.recover(secret, salt, FAST);
    const changed = await keys.recover(secret, flipFirstByte(salt), FAST);

    expect(base.equals(changed)).toBe(false);
  });

  it.each(['argon2id:2 16MB 16', 'argon2id:1 17MB 16'])(
    'should change with the algorithm parameters (%s)',
    async descriptor => {
      const base = await keys.recover(secret, salt, FAST);
      const changed = await keys.recover(secret, salt, parseAlgorithm(descriptor));

      expect(base.equals(changed)).toBe(false);
    }
  );

  it('should derive at the minimum time cost of 1', async () => {
    const derived = await keys.recover(secret, salt, parseAlgorithm('argon2id:1 16MB 16'));
    const again = await keys.recover(secret, salt, parseAlgorithm('argon2id:1 16MB 16'));

    expect(derived).toHaveLength(16);
    expect(derived.equals(again)).toBe(true);
    expect(derived.equals(Buffer.alloc(16))).toBe(false);
  });

  it('should produce outputLen bytes', async () => {
    const derived = await keys.recover(secret, salt, parseAlgorithm('argon2id:1 16MB 48'));

    expect(derived).toHaveLength(48);
  });
});

describe('Key matching', () => {
  const keys = new KeyMaterial();

  it('should match the secret the key was derived from', async () => {
    const { salt, secret, derivedKey } = await keys.generate(FAST);

    await expect(keys.match(secret, derivedKey, salt, FAST)).resolves.toBe(true);
  });

  it('should match a key generated at time cost 1', async () => {
    const minimal = parseAlgorithm('argon2id:1 16MB 16');
    const { salt, secret, derivedKey } = await keys.generate(minimal);

    await expect(keys.match(secret, derivedKey, salt, minimal)).resolves.toBe(true);
  });

  it('should not match a different secret', async () => {
    const { salt, secret, derivedKey } = await keys.generate(FAST);

    await expect(keys.match(flipFirstByte(secret), derivedKey, salt, FAST)).resolves.toBe(false);
  });

  it('should not match an empty secret', async () => {
    const { salt, derivedKey } = await keys.generate(FAST);

    await expect(keys.match(Buffer.alloc(0), derivedKey, salt, FAST)).resolves.toBe(false);
  });

  it('should not match under different parameters', async () => {
    const { salt, secret, derivedKey } = await keys.generate(FAST);

    await expect(
      keys.match(secret, derivedKey, salt, parseAlgorithm('argon2id:2 16MB 16'))
    ).resolves.toBe(false);
  });

  it('should return false rather than throw on a length mismatch', async () => {
    const { salt, secret, derivedKey } = await keys.generate(FAST);

    await expect(keys.match(secret, derivedKey.subarray(0, 8), salt, FAST)).resolves.toBe(false);
  });

  it('should return false when derivation fails', async () => {
    const failing = new KeyMaterial();
    vi.spyOn(failing, 'recover').mockRejectedValue(new Error('argon2 failure'));

    await expect(
      failing.match(Buffer.alloc(32), Buffer.alloc(16), Buffer.alloc(32), FAST)
    ).resolves.toBe(false);
  });
});
