/**
 * @ledger-exec/sdk
 *
 * Transaction execution engine for a ledger network: canonical encoding,
 * signing, failover submission and receipt resolution
 *
 * Usage:
 * ```typescript
 * import { LedgerClient, PrivateKey, Transaction, accountId } from '@ledger-exec/sdk';
 *
 * const client = new LedgerClient({
 *   transport,
 *   addressBook: [{ nodeAccountId: accountId(3), endpoints: [parseServiceEndpoint('127.0.0.1:50211')] }],
 *   operator: { accountId: accountId(1001), privateKey: PrivateKey.fromBytesEd25519(seed) },
 * });
 *
 * // Transfer 1 hbar and wait for consensus
 * const receipt = await client.executeAndWait(
 *   new Transaction({
 *     kind: 'cryptoTransfer',
 *     transfers: [
 *       { accountId: accountId(1001), amount: -100_000_000n, isApproval: false },
 *       { accountId: accountId(1002), amount: 100_000_000n, isApproval: false },
 *     ],
 *   })
 * );
 * ```
 */

// Main client
export { LedgerClient } from './client.js';
export type { ClientConfig, ExecuteAllOptions, Operator, ReceiptOptions, SubmitOptions } from './client.js';

// Transactions
export { Transaction, TransactionState } from './transaction.js';
export type { FreezeOptions, SealedChunk, SealedTransaction } from './transaction.js';
export {
  generateTransactionId,
  parseTransactionId,
  transactionIdEquals,
  transactionIdToString,
  transactionIdWithValidStart,
  validateTransactionId,
} from './transaction-id.js';

// Keys and signing
export {
  PrivateKey,
  ecdsaKey,
  ed25519Key,
  isPublicKey,
  keyList,
  leafKeys,
  publicKeyEquals,
  publicKeyToString,
  thresholdKey,
  verifySignature,
} from './keys.js';
export { Keyring, isKeySatisfied, signForKey } from './signer.js';
export type { KeyMaterialProvider } from './signer.js';

// Nodes and execution
export { NodeRegistry } from './node-registry.js';
export type { NodeRegistryOptions, NodeSelection, RefreshSummary } from './node-registry.js';
export { ExecutionDispatcher, resolveExecutionPolicy } from './dispatcher.js';
export type { DispatcherOptions, ExecuteOptions } from './dispatcher.js';
export { ReceiptResolver, resolveReceiptPolicy } from './receipt-resolver.js';
export type { AwaitReceiptOptions, ReceiptResolverOptions } from './receipt-resolver.js';
export { StaticAddressBook, parseServiceEndpoint, serviceEndpointToString } from './address-book.js';
export type { AddressBookSource } from './address-book.js';
export type { Transport, TransportRequest } from './transport.js';

// Ids and statuses
export { accountId, entityId, entityIdEquals, entityIdToString, parseEntityId } from './entity-id.js';
export { Status, statusName } from './status.js';

// Types
export type {
  AccountAmount,
  AccountId,
  AddressBookEntry,
  CryptoTransferData,
  CustomFeeLimit,
  CustomFixedFee,
  Duration,
  EntityId,
  ExecutionPolicy,
  ExecutionResult,
  FixedFee,
  Key,
  KeyKind,
  NodeCreateData,
  NodeDeleteData,
  NodeHealth,
  NodeOutcome,
  NodeState,
  NodeUpdateData,
  PublicKey,
  ReceiptOutcome,
  ReceiptPollPolicy,
  ServiceEndpoint,
  SignaturePair,
  Timestamp,
  TokenId,
  TopicCreateData,
  TopicId,
  TopicUpdateData,
  TransactionBody,
  TransactionData,
  TransactionId,
  TransactionKind,
  TransactionReceipt,
  TransactionResponse,
} from './types.js';

// Constants
export {
  DEFAULT_EXECUTION_POLICY,
  DEFAULT_MAX_NODES_PER_TRANSACTION,
  DEFAULT_MAX_TRANSACTION_FEE,
  DEFAULT_RECEIPT_POLICY,
  DEFAULT_TRANSACTION_VALID_DURATION,
  MAX_MEMO_BYTES,
  RECEIPT_QUERY_METHOD,
  RETRYABLE_STATUSES,
  SERVICE_METHODS,
} from './constants.js';

// Codec (for advanced usage)
export * from './codec/index.js';

// Errors, logging and utilities
export { LedgerError, LedgerErrorCode, isLedgerError, toTransportError } from './errors.js';
export { makeLogger } from './logger.js';
export type { LogLevel, SdkLogger } from './logger.js';
export { bytesToHex, hexToBytes, concatBytes, sha384, sleep, backoffDelay } from './utils.js';
