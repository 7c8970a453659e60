import { decodeTransactionBody, encodeTransactionBody } from './codec/body.js';
import {
  decodeSignedTransaction,
  decodeTransaction,
  decodeTransactionList,
  encodeSignedTransaction,
  encodeTransaction,
  encodeTransactionList,
} from './codec/envelope.js';
import {
  DEFAULT_MAX_TRANSACTION_FEE,
  DEFAULT_TRANSACTION_VALID_DURATION,
  MAX_MEMO_BYTES,
  SERVICE_METHODS,
} from './constants.js';
import { entityIdEquals, entityIdToString } from './entity-id.js';
import type { AccountId } from './entity-id.js';
import { LedgerError } from './errors.js';
import { publicKeyEquals, verifySignature } from './keys.js';
import type { PrivateKey } from './keys.js';
import { signForKey } from './signer.js';
import type { KeyMaterialProvider } from './signer.js';
import { transactionIdToString, validateTransactionId } from './transaction-id.js';
import type {
  CustomFeeLimit,
  Key,
  PublicKey,
  SignaturePair,
  TransactionBody,
  TransactionData,
  TransactionId,
  TransactionKind,
} from './types.js';
import { bytesEqual, sha384 } from './utils.js';

/**
 * Lifecycle of a transaction. Transitions only move forward.
 *
 * - `Unbuilt`: fields are being set
 * - `Assembled`: operation, transaction id and candidate nodes are fixed
 * - `Serialized`: one canonical body per candidate node has been encoded
 * - `Signed`: at least one signature is attached to every body
 * - `Sealed`: immutable, ready to transmit
 */
export enum TransactionState {
  Unbuilt = 'unbuilt',
  Assembled = 'assembled',
  Serialized = 'serialized',
  Signed = 'signed',
  Sealed = 'sealed',
}

const STATE_ORDER: readonly TransactionState[] = [
  TransactionState.Unbuilt,
  TransactionState.Assembled,
  TransactionState.Serialized,
  TransactionState.Signed,
  TransactionState.Sealed,
];

function stateAtLeast(state: TransactionState, min: TransactionState): boolean {
  return STATE_ORDER.indexOf(state) >= STATE_ORDER.indexOf(min);
}

/**
 * Canonical body bytes for one candidate node and the signatures over them
 */
interface SignedChunk {
  nodeAccountId: AccountId;
  bodyBytes: Uint8Array;
  sigPairs: SignaturePair[];
}

export interface SealedChunk {
  nodeAccountId: AccountId;
  /** Encoded `Transaction` message, as sent to the node */
  transactionBytes: Uint8Array;
  /** SHA-384 of the signed transaction bytes */
  transactionHash: Uint8Array;
}

/**
 * An immutable, fully signed transaction with one pre-signed chunk per
 * candidate node
 */
export interface SealedTransaction {
  readonly transactionId: TransactionId;
  readonly kind: TransactionKind;
  readonly method: string;
  readonly chunks: readonly SealedChunk[];
}

export interface FreezeOptions {
  transactionId?: TransactionId;
  nodeAccountIds?: AccountId[];
  transactionFee?: bigint;
}

const textEncoder = new TextEncoder();

function frozenCopy(id: TransactionId): TransactionId {
  const copy = structuredClone(id);
  Object.freeze(copy.accountId);
  Object.freeze(copy.validStart);
  return Object.freeze(copy);
}

/**
 * Builds, serializes, signs and seals a single transaction.
 *
 * Node ids are fixed before serialization because each one is part of the
 * signed body; the transaction holds one signed body per candidate node so
 * failover never requires re-signing.
 *
 * ```typescript
 * const tx = new Transaction({ kind: 'nodeDelete', nodeId: 4n })
 *   .setMemo('retire node 4')
 *   .freeze({ transactionId, nodeAccountIds: [accountId(3)] })
 *   .sign(operatorKey);
 * const sealed = tx.seal();
 * ```
 */
export class Transaction {
  private currentState = TransactionState.Unbuilt;
  private operation?: TransactionData;
  private id?: TransactionId;
  private nodes: AccountId[] = [];
  private fee?: bigint;
  private validDurationSeconds = DEFAULT_TRANSACTION_VALID_DURATION;
  private memoText = '';
  private customFeeLimits: CustomFeeLimit[] = [];
  private chunks: SignedChunk[] = [];
  private sealed?: SealedTransaction;
  private regenerate?: boolean;

  constructor(data?: TransactionData) {
    if (data !== undefined) {
      this.operation = structuredClone(data);
    }
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  get state(): TransactionState {
    return this.currentState;
  }

  get frozen(): boolean {
    return stateAtLeast(this.currentState, TransactionState.Serialized);
  }

  get data(): TransactionData | undefined {
    return this.operation === undefined ? undefined : structuredClone(this.operation);
  }

  get kind(): TransactionKind | undefined {
    return this.operation?.kind;
  }

  get transactionId(): TransactionId | undefined {
    return this.id === undefined ? undefined : structuredClone(this.id);
  }

  get nodeAccountIds(): readonly AccountId[] {
    return [...this.nodes];
  }

  get transactionFee(): bigint | undefined {
    return this.fee;
  }

  get validDuration(): number {
    return this.validDurationSeconds;
  }

  get memo(): string {
    return this.memoText;
  }

  get maxCustomFees(): CustomFeeLimit[] {
    return structuredClone(this.customFeeLimits);
  }

  /** Unset means the client's setting applies */
  get regenerateTransactionId(): boolean | undefined {
    return this.regenerate;
  }

  // ==========================================================================
  // Setters (Unbuilt and Assembled only)
  // ==========================================================================

  private assertMutable(field: string): void {
    if (this.frozen) {
      throw LedgerError.frozenTransaction(this.currentState, field);
    }
  }

  setData(data: TransactionData): this {
    this.assertMutable('data');
    this.operation = structuredClone(data);
    return this;
  }

  setTransactionId(transactionId: TransactionId): this {
    this.assertMutable('transactionId');
    this.id = validateTransactionId(transactionId);
    return this;
  }

  setNodeAccountIds(nodeAccountIds: AccountId[]): this {
    this.assertMutable('nodeAccountIds');
    if (nodeAccountIds.length === 0) {
      throw LedgerError.invalidArgument('At least one node account id is required');
    }
    const unique: AccountId[] = [];
    for (const node of nodeAccountIds) {
      if (unique.some(existing => entityIdEquals(existing, node))) {
        throw LedgerError.invalidArgument(`Duplicate node account id ${entityIdToString(node)}`);
      }
      unique.push(node);
    }
    this.nodes = unique;
    return this;
  }

  setTransactionFee(fee: bigint): this {
    this.assertMutable('transactionFee');
    if (fee < 0n) {
      throw LedgerError.invalidArgument('Transaction fee cannot be negative', { fee });
    }
    this.fee = fee;
    return this;
  }

  setValidDuration(seconds: number): this {
    this.assertMutable('validDuration');
    if (!Number.isSafeInteger(seconds) || seconds <= 0) {
      throw LedgerError.invalidArgument('Valid duration must be a positive number of seconds', { seconds });
    }
    this.validDurationSeconds = seconds;
    return this;
  }

  setMemo(memo: string): this {
    this.assertMutable('memo');
    const size = textEncoder.encode(memo).length;
    if (size > MAX_MEMO_BYTES) {
      throw LedgerError.invalidArgument(`Memo exceeds ${MAX_MEMO_BYTES} bytes`, { size });
    }
    this.memoText = memo;
    return this;
  }

  setMaxCustomFees(limits: CustomFeeLimit[]): this {
    this.assertMutable('maxCustomFees');
    this.customFeeLimits = structuredClone(limits);
    return this;
  }

  /**
   * Whether a client may replace the transaction id it generated for this
   * transaction when a node reports it expired
   */
  setRegenerateTransactionId(regenerate: boolean): this {
    this.assertMutable('regenerateTransactionId');
    this.regenerate = regenerate;
    return this;
  }

  // ==========================================================================
  // Transitions
  // ==========================================================================

  /**
   * Fill in anything not set explicitly and move to `Assembled`. Calling it
   * again after serialization is a no-op, unless options are passed.
   */
  freeze(options: FreezeOptions = {}): this {
    if (this.frozen) {
      const { transactionId, nodeAccountIds, transactionFee } = options;
      if (transactionId !== undefined || nodeAccountIds !== undefined || transactionFee !== undefined) {
        throw LedgerError.frozenTransaction(this.currentState, 'freeze options');
      }
      return this;
    }

    if (this.id === undefined && options.transactionId !== undefined) {
      this.setTransactionId(options.transactionId);
    }
    if (this.nodes.length === 0 && options.nodeAccountIds !== undefined) {
      this.setNodeAccountIds(options.nodeAccountIds);
    }
    if (this.fee === undefined) {
      this.setTransactionFee(options.transactionFee ?? DEFAULT_MAX_TRANSACTION_FEE);
    }

    if (this.operation === undefined) {
      throw LedgerError.invalidState('freeze', this.currentState, ['a transaction with an operation']);
    }
    if (this.id === undefined) {
      throw LedgerError.invalidArgument('Cannot freeze without a transaction id');
    }
    if (this.nodes.length === 0) {
      throw LedgerError.invalidArgument('Cannot freeze without node account ids');
    }

    this.currentState = TransactionState.Assembled;
    return this;
  }

  private requireState(operation: string, allowed: TransactionState[]): void {
    if (!allowed.includes(this.currentState)) {
      throw LedgerError.invalidState(operation, this.currentState, allowed);
    }
  }

  private bodyFor(nodeAccountId: AccountId): TransactionBody {
    if (this.operation === undefined) {
      throw LedgerError.invalidState('serialize', this.currentState, [TransactionState.Assembled]);
    }
    return {
      transactionId: this.id,
      nodeAccountId,
      transactionFee: this.fee ?? DEFAULT_MAX_TRANSACTION_FEE,
      transactionValidDuration: { seconds: this.validDurationSeconds },
      memo: this.memoText,
      maxCustomFees: this.customFeeLimits,
      data: this.operation,
    };
  }

  /**
   * Encode one canonical body per candidate node. The bytes never change
   * after this point.
   */
  serialize(): this {
    this.requireState('serialize', [TransactionState.Assembled]);
    this.chunks = this.nodes.map(nodeAccountId => ({
      nodeAccountId,
      bodyBytes: encodeTransactionBody(this.bodyFor(nodeAccountId)),
      sigPairs: [],
    }));
    this.currentState = TransactionState.Serialized;
    return this;
  }

  private prepareForSigning(operation: string): void {
    if (this.currentState === TransactionState.Assembled) {
      this.serialize();
    }
    this.requireState(operation, [TransactionState.Serialized, TransactionState.Signed]);
  }

  private attach(chunk: SignedChunk, pair: SignaturePair): void {
    if (chunk.sigPairs.some(existing => publicKeyEquals(existing.publicKey, pair.publicKey))) {
      return;
    }
    chunk.sigPairs.push(pair);
  }

  /**
   * Sign every chunk with `privateKey`. Signing twice with the same key is a
   * no-op.
   */
  sign(privateKey: PrivateKey): this {
    this.prepareForSigning('sign');
    for (const chunk of this.chunks) {
      this.attach(chunk, { publicKey: privateKey.publicKey, signature: privateKey.sign(chunk.bodyBytes) });
    }
    this.currentState = TransactionState.Signed;
    return this;
  }

  /**
   * Sign every chunk for `key` with whatever material `provider` holds.
   *
   * @throws LedgerError MISSING_KEY_MATERIAL before any signature is attached
   * when the provider cannot satisfy `key`
   */
  signWith(key: Key, provider: KeyMaterialProvider): this {
    this.prepareForSigning('sign');
    const signed = this.chunks.map(chunk => signForKey(chunk.bodyBytes, key, provider));
    this.chunks.forEach((chunk, i) => {
      for (const pair of signed[i]) this.attach(chunk, pair);
    });
    this.currentState = TransactionState.Signed;
    return this;
  }

  /**
   * Attach a signature produced elsewhere. Only valid for a transaction
   * frozen for a single node, since the signature covers that node's body.
   */
  addSignature(publicKey: PublicKey, signature: Uint8Array): this {
    this.prepareForSigning('add a signature');
    if (this.chunks.length !== 1) {
      throw LedgerError.invalidArgument('addSignature requires a transaction frozen for exactly one node', {
        nodes: this.chunks.length,
      });
    }
    const [chunk] = this.chunks;
    if (!verifySignature(publicKey, chunk.bodyBytes, signature)) {
      throw LedgerError.invalidArgument('Signature does not verify against the transaction body');
    }
    this.attach(chunk, { publicKey, signature });
    this.currentState = TransactionState.Signed;
    return this;
  }

  /**
   * Freeze the signature set and produce the wire bytes for every node
   */
  seal(): SealedTransaction {
    if (this.sealed !== undefined) return this.sealed;

    if (this.currentState === TransactionState.Assembled || this.currentState === TransactionState.Serialized) {
      throw LedgerError.missingKeyMaterial([]);
    }
    this.requireState('seal', [TransactionState.Signed]);

    const { id, operation } = this;
    if (id === undefined || operation === undefined) {
      throw LedgerError.invalidState('seal', this.currentState, [TransactionState.Signed]);
    }

    this.sealed = {
      transactionId: frozenCopy(id),
      kind: operation.kind,
      method: SERVICE_METHODS[operation.kind],
      chunks: this.chunks.map(chunk => {
        const signedTransactionBytes = encodeSignedTransaction(chunk);
        return {
          nodeAccountId: chunk.nodeAccountId,
          transactionBytes: encodeTransaction(signedTransactionBytes),
          transactionHash: sha384(signedTransactionBytes),
        };
      }),
    };
    this.currentState = TransactionState.Sealed;
    return this.sealed;
  }

  /**
   * Copy the operation and settings into a new, unsigned transaction under
   * `transactionId`, assembled for the same nodes. Signatures are not carried
   * over since they cover the old id.
   */
  withTransactionId(transactionId: TransactionId): Transaction {
    this.requireSerialized('copy under a new transaction id');
    const copy = new Transaction(this.operation)
      .setTransactionId(transactionId)
      .setNodeAccountIds(this.nodes)
      .setValidDuration(this.validDurationSeconds)
      .setMemo(this.memoText)
      .setMaxCustomFees(this.customFeeLimits);
    if (this.fee !== undefined) copy.setTransactionFee(this.fee);
    copy.regenerate = this.regenerate;
    return copy.freeze();
  }

  // ==========================================================================
  // Inspection
  // ==========================================================================

  private requireSerialized(operation: string): void {
    if (!this.frozen) {
      throw LedgerError.invalidState(operation, this.currentState, [
        TransactionState.Serialized,
        TransactionState.Signed,
        TransactionState.Sealed,
      ]);
    }
  }

  /**
   * Canonical body bytes for a node, or for the first node when none is given
   */
  getBodyBytes(nodeAccountId?: AccountId): Uint8Array {
    this.requireSerialized('read body bytes');
    const chunk = nodeAccountId === undefined
      ? this.chunks[0]
      : this.chunks.find(c => entityIdEquals(c.nodeAccountId, nodeAccountId));
    if (chunk === undefined) {
      throw LedgerError.invalidArgument('Transaction was not frozen for this node', {
        nodeAccountId: nodeAccountId === undefined ? undefined : entityIdToString(nodeAccountId),
      });
    }
    return Uint8Array.from(chunk.bodyBytes);
  }

  getSignatures(): Map<string, SignaturePair[]> {
    this.requireSerialized('read signatures');
    return new Map(
      this.chunks.map(chunk => [entityIdToString(chunk.nodeAccountId), chunk.sigPairs.map(pair => ({ ...pair }))])
    );
  }

  /**
   * SHA-384 of the first node's signed transaction bytes. Changes whenever a
   * signature is added.
   */
  getTransactionHash(): Uint8Array {
    this.requireSerialized('hash');
    return sha384(encodeSignedTransaction(this.chunks[0]));
  }

  getTransactionHashPerNode(): Map<string, Uint8Array> {
    this.requireSerialized('hash');
    return new Map(
      this.chunks.map(chunk => [entityIdToString(chunk.nodeAccountId), sha384(encodeSignedTransaction(chunk))])
    );
  }

  toString(): string {
    const id = this.id === undefined ? 'no id' : transactionIdToString(this.id);
    return `Transaction(${this.operation?.kind ?? 'empty'}, ${id}, ${this.currentState})`;
  }

  // ==========================================================================
  // Serialization of the whole transaction
  // ==========================================================================

  /**
   * Encode as a `TransactionList` with one entry per node. The body bytes and
   * signatures are carried over exactly.
   */
  toBytes(): Uint8Array {
    this.requireSerialized('convert to bytes');
    return encodeTransactionList(
      this.chunks.map(chunk => encodeTransaction(encodeSignedTransaction(chunk)))
    );
  }

  /**
   * Rebuild a transaction from `toBytes` output. The result is `Serialized`
   * or `Signed`, and keeps the original body bytes.
   *
   * @throws LedgerError MALFORMED_ENCODING when the entries disagree on
   * anything but the node, or carry different signer sets
   */
  static fromBytes(bytes: Uint8Array): Transaction {
    const entries = decodeTransactionList(bytes).map(entry => decodeSignedTransaction(decodeTransaction(entry)));
    if (entries.length === 0) {
      throw LedgerError.malformedEncoding('transaction list is empty');
    }

    const bodies = entries.map(entry => decodeTransactionBody(entry.bodyBytes));
    const [first] = bodies;
    const { transactionId } = first;
    if (transactionId === undefined) {
      throw LedgerError.malformedEncoding('transaction body has no transaction id');
    }

    const shared = encodeTransactionBody({ ...first, nodeAccountId: undefined });
    const nodes: AccountId[] = [];
    bodies.forEach((body, i) => {
      if (body.nodeAccountId === undefined) {
        throw LedgerError.malformedEncoding('transaction body has no node account id', { index: i });
      }
      if (!bytesEqual(encodeTransactionBody({ ...body, nodeAccountId: undefined }), shared)) {
        throw LedgerError.malformedEncoding('transaction list entries describe different transactions', { index: i });
      }
      nodes.push(body.nodeAccountId);
    });

    const signers = entries[0].sigPairs.map(pair => pair.publicKey);
    entries.forEach((entry, i) => {
      const same = entry.sigPairs.length === signers.length &&
        entry.sigPairs.every((pair, j) => publicKeyEquals(pair.publicKey, signers[j]));
      if (!same) {
        throw LedgerError.malformedEncoding('transaction list entries carry different signature sets', { index: i });
      }
    });

    const tx = new Transaction(first.data)
      .setTransactionId(transactionId)
      .setNodeAccountIds(nodes)
      .setTransactionFee(first.transactionFee)
      .setMaxCustomFees(first.maxCustomFees);
    tx.memoText = first.memo;
    if (first.transactionValidDuration !== undefined) {
      tx.validDurationSeconds = first.transactionValidDuration.seconds;
    }
    tx.chunks = entries.map((entry, i) => ({
      nodeAccountId: nodes[i],
      bodyBytes: entry.bodyBytes,
      sigPairs: entry.sigPairs,
    }));
    tx.currentState = signers.length > 0 ? TransactionState.Signed : TransactionState.Serialized;
    return tx;
  }
}
