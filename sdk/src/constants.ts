import { Status } from './status.js';
import type { ExecutionPolicy, ReceiptPollPolicy, TransactionKind } from './types.js';

/**
 * Default validity window for a transaction (seconds)
 */
export const DEFAULT_TRANSACTION_VALID_DURATION = 120;

/**
 * Default fee cap: 2 hbar, in tinybars
 */
export const DEFAULT_MAX_TRANSACTION_FEE = 200_000_000n;

/**
 * Memo limit, in UTF-8 bytes
 */
export const MAX_MEMO_BYTES = 100;

/**
 * How many nodes a transaction is pre-signed for when none are set explicitly
 */
export const DEFAULT_MAX_NODES_PER_TRANSACTION = 3;

/**
 * Cooldown applied to a node after a transient failure: the first failure
 * waits the base, each further consecutive failure doubles it up to the cap.
 */
export const NODE_COOLDOWN_BASE_MS = 8_000;
export const NODE_COOLDOWN_MAX_MS = 60 * 60 * 1000;

/**
 * Precheck statuses that mean "try again, possibly elsewhere"
 */
export const RETRYABLE_STATUSES: ReadonlySet<Status> = new Set([
  Status.BUSY,
  Status.PLATFORM_TRANSACTION_NOT_CREATED,
  Status.PLATFORM_NOT_ACTIVE,
  Status.INVALID_NODE_ACCOUNT,
]);

export const DEFAULT_EXECUTION_POLICY: Readonly<ExecutionPolicy> = {
  maxAttempts: 10,
  attemptTimeoutMs: 10_000,
  minBackoffMs: 250,
  maxBackoffMs: 8_000,
  retryableStatuses: RETRYABLE_STATUSES,
  successStatuses: new Set([Status.OK]),
};

export const DEFAULT_RECEIPT_POLICY: Readonly<ReceiptPollPolicy> = {
  timeoutMs: 120_000,
  attemptTimeoutMs: 10_000,
  minIntervalMs: 250,
  maxIntervalMs: 8_000,
  retryableStatuses: new Set([Status.BUSY, Status.PLATFORM_NOT_ACTIVE]),
  pendingStatuses: new Set([Status.UNKNOWN]),
};

/**
 * gRPC method path each operation is submitted to
 */
export const SERVICE_METHODS: Readonly<Record<TransactionKind, string>> = {
  nodeCreate: '/proto.AddressBookService/createNode',
  nodeUpdate: '/proto.AddressBookService/updateNode',
  nodeDelete: '/proto.AddressBookService/deleteNode',
  cryptoTransfer: '/proto.CryptoService/cryptoTransfer',
  topicCreate: '/proto.ConsensusService/createTopic',
  topicUpdate: '/proto.ConsensusService/updateTopic',
};

export const RECEIPT_QUERY_METHOD = '/proto.CryptoService/getTransactionReceipts';

/**
 * Environment variable read by `makeLogger` for the default level
 */
export const LOG_LEVEL_ENV = 'LEDGER_SDK_LOG_LEVEL';
