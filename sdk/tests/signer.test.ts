import { describe, it, expect } from 'vitest';
import {
  PrivateKey,
  keyList,
  leafKeys,
  publicKeyToString,
  thresholdKey,
  verifySignature,
} from '../src/keys.js';
import { Keyring, isKeySatisfied, signForKey } from '../src/signer.js';
import { LedgerError, LedgerErrorCode } from '../src/errors.js';
import { testEcdsaKey, testEd25519Key } from './helpers/fake-network.js';

const message = new TextEncoder().encode('body bytes');

function missingKeysOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    if (error instanceof LedgerError && error.code === LedgerErrorCode.MISSING_KEY_MATERIAL) {
      return error.context?.missingKeys;
    }
    throw error;
  }
  throw new Error('expected MISSING_KEY_MATERIAL');
}

describe('Keys', () => {
  describe('PrivateKey', () => {
    it('should sign and verify with Ed25519', () => {
      const key = testEd25519Key();
      const signature = key.sign(message);

      expect(key.publicKey.bytes.length).toBe(32);
      expect(signature.length).toBe(64);
      expect(verifySignature(key.publicKey, message, signature)).toBe(true);
    });

    it('should sign and verify with ECDSA over the keccak-256 digest', () => {
      const key = testEcdsaKey();
      const signature = key.sign(message);

      expect(key.publicKey.bytes.length).toBe(33);
      expect(signature.length).toBe(64);
      expect(verifySignature(key.publicKey, message, signature)).toBe(true);
    });

    it('should produce the same Ed25519 signature every time', () => {
      const key = testEd25519Key();
      expect(key.sign(message)).toEqual(key.sign(message));
    });

    it('should fail verification for another message or key', () => {
      const key = testEd25519Key();
      const signature = key.sign(message);

      expect(verifySignature(key.publicKey, new TextEncoder().encode('other'), signature)).toBe(false);
      expect(verifySignature(testEd25519Key(9).publicKey, message, signature)).toBe(false);
    });

    it('should report malformed public keys as not verifying', () => {
      expect(verifySignature({ kind: 'ecdsaSecp256k1', bytes: new Uint8Array(3) }, message, new Uint8Array(64))).toBe(false);
    });

    it('should reject seeds that are not 32 bytes', () => {
      expect(() => PrivateKey.fromBytesEd25519(new Uint8Array(31))).toThrow(
        expect.objectContaining({ code: LedgerErrorCode.INVALID_ARGUMENT })
      );
    });
  });

  describe('key structures', () => {
    const a = testEd25519Key(1);
    const b = testEd25519Key(2);
    const c = testEcdsaKey(3);

    it('should list leaves depth first', () => {
      const key = keyList([a.publicKey, thresholdKey(1, [b.publicKey, c.publicKey])]);
      expect(leafKeys(key).map(publicKeyToString)).toEqual(
        [a.publicKey, b.publicKey, c.publicKey].map(publicKeyToString)
      );
    });

    it('should reject thresholds outside 1..n', () => {
      expect(() => thresholdKey(0, [a.publicKey])).toThrow(
        expect.objectContaining({ code: LedgerErrorCode.INVALID_ARGUMENT })
      );
      expect(() => thresholdKey(2, [a.publicKey])).toThrow(
        expect.objectContaining({ code: LedgerErrorCode.INVALID_ARGUMENT })
      );
    });

    it('should require every child of a key list', () => {
      const key = keyList([a.publicKey, b.publicKey]);
      expect(isKeySatisfied(key, [a.publicKey])).toBe(false);
      expect(isKeySatisfied(key, [a.publicKey, b.publicKey])).toBe(true);
    });

    it('should require threshold children of a threshold key', () => {
      const key = thresholdKey(2, [a.publicKey, b.publicKey, c.publicKey]);
      expect(isKeySatisfied(key, [c.publicKey])).toBe(false);
      expect(isKeySatisfied(key, [a.publicKey, c.publicKey])).toBe(true);
    });

    it('should treat an empty key list as satisfied', () => {
      expect(isKeySatisfied(keyList([]), [])).toBe(true);
    });
  });
});

describe('Signer', () => {
  const a = testEd25519Key(1);
  const b = testEd25519Key(2);
  const c = testEcdsaKey(3);

  describe('Keyring', () => {
    it('should find held keys for the leaves of a structure', () => {
      const keyring = new Keyring([a, c]);
      const found = keyring.availableKeysFor(keyList([a.publicKey, b.publicKey, c.publicKey]));

      expect(keyring.size).toBe(2);
      expect(keyring.has(b.publicKey)).toBe(false);
      expect(found).toEqual([a, c]);
    });
  });

  describe('signForKey', () => {
    it('should sign once for a single key', () => {
      const pairs = signForKey(message, a.publicKey, new Keyring([a, b]));

      expect(pairs).toHaveLength(1);
      expect(pairs[0].publicKey).toEqual(a.publicKey);
      expect(verifySignature(a.publicKey, message, pairs[0].signature)).toBe(true);
    });

    it('should sign once per distinct leaf when a key appears twice', () => {
      const key = keyList([a.publicKey, keyList([a.publicKey, c.publicKey])]);
      const pairs = signForKey(message, key, new Keyring([a, c]));

      expect(pairs.map(pair => publicKeyToString(pair.publicKey))).toEqual([
        publicKeyToString(a.publicKey),
        publicKeyToString(c.publicKey),
      ]);
    });

    it('should satisfy a threshold with a subset of keys', () => {
      const key = thresholdKey(2, [a.publicKey, b.publicKey, c.publicKey]);
      const pairs = signForKey(message, key, new Keyring([b, c]));
      expect(pairs).toHaveLength(2);
    });

    it('should name the unsigned leaves when key material is missing', () => {
      const key = keyList([a.publicKey, b.publicKey]);
      expect(missingKeysOf(() => signForKey(message, key, new Keyring([a])))).toEqual([
        publicKeyToString(b.publicKey),
      ]);
    });

    it('should ignore held keys that are not part of the structure', () => {
      const provider = { availableKeysFor: () => [a, b] };
      const pairs = signForKey(message, b.publicKey, provider);
      expect(pairs.map(pair => pair.publicKey)).toEqual([b.publicKey]);
    });
  });
});
