import { describe, it, expect } from 'vitest';
import {
  generateIdentity,
  identityFromSecretKey,
  publicKeyHex,
  sign,
  verify,
  verifyHex,
} from '../src/identity/keys.js';
import { canonicalize } from '../src/identity/serialize.js';

describe('identity', () => {
  it('generates a keypair', () => {
    const id = generateIdentity();
    expect(id.publicKey).toBeInstanceOf(Uint8Array);
    expect(id.publicKey).toHaveLength(32);
    expect(id.secretKey).toHaveLength(32);
    expect(publicKeyHex(id)).toMatch(/^[\da-f]{64}$/);
  });

  it('rebuilds the same identity from its secret key', () => {
    const id = generateIdentity();
    expect(identityFromSecretKey(id.secretKey).publicKey).toEqual(id.publicKey);
  });

  it('sign and verify', () => {
    const id = generateIdentity();
    const message = new TextEncoder().encode('hello mesh');
    expect(verify(sign(message, id.secretKey), message, id.publicKey)).toBe(true);
  });

  it('verify rejects a wrong key and a tampered message', () => {
    const id1 = generateIdentity();
    const id2 = generateIdentity();
    const message = new TextEncoder().encode('original');
    const signature = sign(message, id1.secretKey);
    expect(verify(signature, message, id2.publicKey)).toBe(false);
    expect(verify(signature, new TextEncoder().encode('tampered'), id1.publicKey)).toBe(false);
  });

  it('verifyHex rejects malformed hex instead of throwing', () => {
    const id = generateIdentity();
    const message = new TextEncoder().encode('x');
    expect(verifyHex('zz', message, publicKeyHex(id))).toBe(false);
    expect(verifyHex('00', message, 'not-hex')).toBe(false);
  });
});

describe('canonical serialization', () => {
  it('is deterministic', () => {
    const a = canonicalize({ z: 1, a: 2 });
    expect(a).toEqual(canonicalize({ a: 2, z: 1 }));
    expect(new TextDecoder().decode(a)).toBe('{"a":2,"z":1}');
  });

  it('sorts nested objects, including inside arrays', () => {
    const result = canonicalize({ b: { d: 1, c: 2 }, items: [{ z: 1, a: 2 }], a: 3 });
    expect(new TextDecoder().decode(result)).toBe('{"a":3,"b":{"c":2,"d":1},"items":[{"a":2,"z":1}]}');
  });
});
