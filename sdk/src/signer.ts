import { LedgerError } from './errors.js';
import { isPublicKey, leafKeys, publicKeyEquals, publicKeyToString } from './keys.js';
import type { PrivateKey } from './keys.js';
import type { Key, PublicKey, SignaturePair } from './types.js';

/**
 * Supplies the private keys a caller holds for a given key structure
 */
export interface KeyMaterialProvider {
  availableKeysFor(key: Key): PrivateKey[];
}

/**
 * In-memory key material, looked up by public key
 */
export class Keyring implements KeyMaterialProvider {
  private readonly keys = new Map<string, PrivateKey>();

  constructor(keys: Iterable<PrivateKey> = []) {
    for (const key of keys) {
      this.add(key);
    }
  }

  add(key: PrivateKey): this {
    this.keys.set(publicKeyToString(key.publicKey), key);
    return this;
  }

  has(publicKey: PublicKey): boolean {
    return this.keys.has(publicKeyToString(publicKey));
  }

  get size(): number {
    return this.keys.size;
  }

  availableKeysFor(key: Key): PrivateKey[] {
    const found: PrivateKey[] = [];
    for (const leaf of distinctLeaves(key)) {
      const privateKey = this.keys.get(publicKeyToString(leaf));
      if (privateKey) found.push(privateKey);
    }
    return found;
  }
}

function distinctLeaves(key: Key): PublicKey[] {
  const leaves: PublicKey[] = [];
  for (const leaf of leafKeys(key)) {
    if (!leaves.some(existing => publicKeyEquals(existing, leaf))) {
      leaves.push(leaf);
    }
  }
  return leaves;
}

/**
 * Whether signatures from `signers` satisfy `key`: a key list needs every
 * child, a threshold key needs at least `threshold` children.
 */
export function isKeySatisfied(key: Key, signers: readonly PublicKey[]): boolean {
  if (isPublicKey(key)) {
    return signers.some(signer => publicKeyEquals(signer, key));
  }
  const satisfied = key.keys.filter(child => isKeySatisfied(child, signers)).length;
  const required = key.kind === 'keyList' ? key.keys.length : key.threshold;
  return satisfied >= required;
}

/**
 * Sign `bytes` with every private key the provider holds for `key`, once per
 * distinct leaf.
 *
 * @throws LedgerError MISSING_KEY_MATERIAL when the resulting signatures do
 * not satisfy the key, listing the leaves that were not signed
 */
export function signForKey(bytes: Uint8Array, key: Key, provider: KeyMaterialProvider): SignaturePair[] {
  const leaves = distinctLeaves(key);
  const pairs: SignaturePair[] = [];

  for (const privateKey of provider.availableKeysFor(key)) {
    const publicKey = privateKey.publicKey;
    const isLeaf = leaves.some(leaf => publicKeyEquals(leaf, publicKey));
    const alreadySigned = pairs.some(pair => publicKeyEquals(pair.publicKey, publicKey));
    if (!isLeaf || alreadySigned) continue;

    pairs.push({ publicKey, signature: privateKey.sign(bytes) });
  }

  const signers = pairs.map(pair => pair.publicKey);
  if (!isKeySatisfied(key, signers)) {
    const missing = leaves
      .filter(leaf => !signers.some(signer => publicKeyEquals(signer, leaf)))
      .map(publicKeyToString);
    throw LedgerError.missingKeyMaterial(missing);
  }

  return pairs;
}
