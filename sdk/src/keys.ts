import { ed25519 } from '@noble/curves/ed25519';
import { secp256k1 } from '@noble/curves/secp256k1';
import { keccak_256 } from '@noble/hashes/sha3';
import { LedgerError } from './errors.js';
import type { Key, KeyKind, PublicKey } from './types.js';
import { bytesEqual, bytesToHex } from './utils.js';

const PRIVATE_KEY_LENGTH = 32;

/**
 * Private signing material for a single Ed25519 or ECDSA(secp256k1) key.
 *
 * Ed25519 signs the message bytes directly. ECDSA signs the keccak-256 digest
 * of the message and produces the 64-byte compact `r || s` form.
 */
export class PrivateKey {
  readonly kind: KeyKind;
  readonly publicKey: PublicKey;
  private readonly secret: Uint8Array;

  private constructor(kind: KeyKind, secret: Uint8Array) {
    if (secret.length !== PRIVATE_KEY_LENGTH) {
      throw LedgerError.invalidArgument(`Private key must be ${PRIVATE_KEY_LENGTH} bytes`, { length: secret.length });
    }
    this.kind = kind;
    this.secret = Uint8Array.from(secret);
    this.publicKey = {
      kind,
      bytes: kind === 'ed25519'
        ? ed25519.getPublicKey(this.secret)
        : secp256k1.getPublicKey(this.secret, true),
    };
  }

  static fromBytesEd25519(bytes: Uint8Array): PrivateKey {
    return new PrivateKey('ed25519', bytes);
  }

  static fromBytesEcdsa(bytes: Uint8Array): PrivateKey {
    return new PrivateKey('ecdsaSecp256k1', bytes);
  }

  sign(message: Uint8Array): Uint8Array {
    if (this.kind === 'ed25519') {
      return ed25519.sign(message, this.secret);
    }
    return secp256k1.sign(keccak_256(message), this.secret).toCompactRawBytes();
  }

  toString(): string {
    return `PrivateKey(${this.kind}, ${bytesToHex(this.publicKey.bytes)})`;
  }
}

export function verifySignature(publicKey: PublicKey, message: Uint8Array, signature: Uint8Array): boolean {
  try {
    if (publicKey.kind === 'ed25519') {
      return ed25519.verify(signature, message, publicKey.bytes);
    }
    return secp256k1.verify(signature, keccak_256(message), publicKey.bytes);
  } catch {
    // malformed points and signatures simply fail verification
    return false;
  }
}

// ==========================================================================
// Key tree helpers
// ==========================================================================

export function ed25519Key(bytes: Uint8Array): PublicKey {
  return { kind: 'ed25519', bytes };
}

export function ecdsaKey(bytes: Uint8Array): PublicKey {
  return { kind: 'ecdsaSecp256k1', bytes };
}

export function keyList(keys: Key[]): Key {
  return { kind: 'keyList', keys };
}

export function thresholdKey(threshold: number, keys: Key[]): Key {
  if (!Number.isInteger(threshold) || threshold < 1 || threshold > keys.length) {
    throw LedgerError.invalidArgument('Threshold must be between 1 and the number of keys', {
      threshold,
      keys: keys.length,
    });
  }
  return { kind: 'thresholdKey', threshold, keys };
}

export function isPublicKey(key: Key): key is PublicKey {
  return key.kind === 'ed25519' || key.kind === 'ecdsaSecp256k1';
}

/**
 * Leaf keys in depth-first order, duplicates included
 */
export function leafKeys(key: Key): PublicKey[] {
  if (isPublicKey(key)) return [key];
  return key.keys.flatMap(leafKeys);
}

export function publicKeyEquals(a: PublicKey, b: PublicKey): boolean {
  return a.kind === b.kind && bytesEqual(a.bytes, b.bytes);
}

export function publicKeyToString(key: PublicKey): string {
  return `${key.kind}:${bytesToHex(key.bytes)}`;
}
