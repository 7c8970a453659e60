import type { AccountId, EntityId, TokenId, TopicId } from './entity-id.js';
import type { Status } from './status.js';

/**
 * Type definitions for transaction bodies, keys and execution results
 */

export interface Timestamp {
  seconds: number;
  nanos: number;
}

export interface Duration {
  seconds: number;
}

/**
 * Identifies one logical transaction. Every retry of the same transaction
 * reuses the same id so the network can detect duplicates.
 */
export interface TransactionId {
  accountId: AccountId;
  validStart: Timestamp;
  scheduled: boolean;
  /** Positive when present; absent for ordinary transactions */
  nonce?: number;
}

/**
 * How to reach a node: a 4-byte IPv4 address or a domain name, plus a port
 */
export type ServiceEndpoint =
  | { ipAddressV4: Uint8Array; domainName?: undefined; port: number }
  | { domainName: string; ipAddressV4?: undefined; port: number };

// ==========================================================================
// Keys
// ==========================================================================

export type KeyKind = 'ed25519' | 'ecdsaSecp256k1';

/**
 * A single public key
 */
export interface PublicKey {
  kind: KeyKind;
  bytes: Uint8Array;
}

/**
 * Recursive key structure. Composite keys own their children.
 */
export type Key =
  | PublicKey
  | { kind: 'keyList'; keys: Key[] }
  | { kind: 'thresholdKey'; threshold: number; keys: Key[] };

export interface SignaturePair {
  publicKey: PublicKey;
  signature: Uint8Array;
}

// ==========================================================================
// Fees
// ==========================================================================

/**
 * An amount of hbar (no token) or of a fungible token
 */
export interface FixedFee {
  amount: bigint;
  denominatingTokenId?: TokenId;
}

export interface CustomFixedFee extends FixedFee {
  feeCollectorAccountId?: AccountId;
}

/**
 * The most a payer will pay in custom fees to one collector
 */
export interface CustomFeeLimit {
  accountId?: AccountId;
  fees: FixedFee[];
}

// ==========================================================================
// Operation bodies
// ==========================================================================

export interface NodeCreateData {
  kind: 'nodeCreate';
  accountId?: AccountId;
  description: string;
  gossipEndpoints: ServiceEndpoint[];
  serviceEndpoints: ServiceEndpoint[];
  gossipCaCertificate: Uint8Array;
  grpcCertificateHash: Uint8Array;
  adminKey?: Key;
  declineReward: boolean;
  grpcWebProxyEndpoint?: ServiceEndpoint;
}

/**
 * Fields left `undefined` are not changed by the network and are omitted from
 * the encoding entirely.
 */
export interface NodeUpdateData {
  kind: 'nodeUpdate';
  nodeId: bigint;
  accountId?: AccountId;
  description?: string;
  gossipEndpoints: ServiceEndpoint[];
  serviceEndpoints: ServiceEndpoint[];
  gossipCaCertificate?: Uint8Array;
  grpcCertificateHash?: Uint8Array;
  adminKey?: Key;
  declineReward?: boolean;
  grpcWebProxyEndpoint?: ServiceEndpoint;
}

export interface NodeDeleteData {
  kind: 'nodeDelete';
  nodeId: bigint;
}

export interface AccountAmount {
  accountId: AccountId;
  /** Tinybars; negative for the sending side */
  amount: bigint;
  isApproval: boolean;
}

export interface CryptoTransferData {
  kind: 'cryptoTransfer';
  transfers: AccountAmount[];
}

export interface TopicCreateData {
  kind: 'topicCreate';
  memo: string;
  adminKey?: Key;
  submitKey?: Key;
  autoRenewPeriod?: Duration;
  autoRenewAccountId?: AccountId;
  feeScheduleKey?: Key;
  feeExemptKeys: Key[];
  customFees: CustomFixedFee[];
}

export interface TopicUpdateData {
  kind: 'topicUpdate';
  topicId?: TopicId;
  memo?: string;
  expirationTime?: Timestamp;
  adminKey?: Key;
  submitKey?: Key;
  autoRenewPeriod?: Duration;
  autoRenewAccountId?: AccountId;
  feeScheduleKey?: Key;
  /** `[]` clears the list; `undefined` leaves it unchanged */
  feeExemptKeys?: Key[];
  customFees?: CustomFixedFee[];
}

export type TransactionData =
  | NodeCreateData
  | NodeUpdateData
  | NodeDeleteData
  | CryptoTransferData
  | TopicCreateData
  | TopicUpdateData;

export type TransactionKind = TransactionData['kind'];

/**
 * The canonical, signed part of a transaction
 */
export interface TransactionBody {
  transactionId?: TransactionId;
  nodeAccountId?: AccountId;
  /** Fee cap in tinybars */
  transactionFee: bigint;
  transactionValidDuration?: Duration;
  memo: string;
  maxCustomFees: CustomFeeLimit[];
  data: TransactionData;
}

// ==========================================================================
// Responses and receipts
// ==========================================================================

export interface TransactionResponseMessage {
  precheckStatus: Status;
  /** Fee estimate in tinybars, only set on INSUFFICIENT_TX_FEE */
  cost: bigint;
}

export interface TransactionReceipt {
  status: Status;
  accountId?: AccountId;
  topicId?: TopicId;
  topicSequenceNumber: bigint;
  nodeId: bigint;
}

export interface ReceiptResponseMessage {
  precheckStatus: Status;
  receipt?: TransactionReceipt;
}

// ==========================================================================
// Nodes
// ==========================================================================

export interface AddressBookEntry {
  nodeAccountId: AccountId;
  endpoints: ServiceEndpoint[];
}

export type NodeHealth = 'healthy' | 'cooling' | 'removed';

export type NodeOutcome = 'success' | 'transientFailure' | 'fatalFailure';

export interface NodeState {
  nodeAccountId: AccountId;
  endpoints: ServiceEndpoint[];
  consecutiveFailures: number;
  lastFailureAt?: number;
  /** Epoch ms after which a cooling node is eligible again */
  readmitAt: number;
  health: NodeHealth;
}

// ==========================================================================
// Execution
// ==========================================================================

export interface ExecutionPolicy {
  maxAttempts: number;
  attemptTimeoutMs: number;
  minBackoffMs: number;
  maxBackoffMs: number;
  retryableStatuses: ReadonlySet<Status>;
  successStatuses: ReadonlySet<Status>;
}

export interface ReceiptPollPolicy {
  timeoutMs: number;
  attemptTimeoutMs: number;
  minIntervalMs: number;
  maxIntervalMs: number;
  /** Precheck statuses that mean "ask again later" */
  retryableStatuses: ReadonlySet<Status>;
  /** Receipt statuses that mean "not reached consensus yet" */
  pendingStatuses: ReadonlySet<Status>;
}

interface ExecutionResultBase {
  transactionId: TransactionId;
  attempts: number;
}

export type ExecutionResult =
  | (ExecutionResultBase & {
      kind: 'success';
      nodeAccountId: AccountId;
      status: Status;
      transactionHash: Uint8Array;
      raw: Uint8Array;
    })
  | (ExecutionResultBase & {
      kind: 'fatal';
      nodeAccountId: AccountId;
      status: Status;
      cost: bigint;
      raw: Uint8Array;
    })
  | (ExecutionResultBase & {
      kind: 'maxRetriesExceeded';
      nodeAccountId?: AccountId;
      lastStatus?: Status;
      lastError?: Error;
    })
  | (ExecutionResultBase & {
      kind: 'cancelled';
      nodeAccountId?: AccountId;
    });

export type ReceiptOutcome =
  | { kind: 'success'; receipt: TransactionReceipt; polls: number }
  | { kind: 'failure'; status: Status; receipt?: TransactionReceipt; polls: number }
  | { kind: 'unknown'; polls: number }
  | { kind: 'timeout'; lastStatus?: Status; polls: number }
  | { kind: 'cancelled'; polls: number };

/**
 * Returned by a successful submission; enough to look the receipt up later
 */
export interface TransactionResponse {
  transactionId: TransactionId;
  nodeAccountId: AccountId;
  transactionHash: Uint8Array;
}

export type { AccountId, EntityId, TokenId, TopicId };
