import { StaticAddressBook } from './address-book.js';
import type { AddressBookSource } from './address-book.js';
import { DEFAULT_MAX_NODES_PER_TRANSACTION, DEFAULT_MAX_TRANSACTION_FEE } from './constants.js';
import { ExecutionDispatcher, resolveExecutionPolicy } from './dispatcher.js';
import { entityIdToString } from './entity-id.js';
import type { AccountId } from './entity-id.js';
import { LedgerError } from './errors.js';
import { publicKeyEquals } from './keys.js';
import type { PrivateKey } from './keys.js';
import { makeLogger } from './logger.js';
import type { SdkLogger } from './logger.js';
import { NodeRegistry } from './node-registry.js';
import type { NodeRegistryOptions, RefreshSummary } from './node-registry.js';
import { ReceiptResolver, resolveReceiptPolicy } from './receipt-resolver.js';
import { Status, statusName } from './status.js';
import { TransactionState } from './transaction.js';
import type { SealedTransaction, Transaction } from './transaction.js';
import { generateTransactionId, transactionIdToString } from './transaction-id.js';
import type { Transport } from './transport.js';
import type {
  AddressBookEntry,
  ExecutionPolicy,
  ExecutionResult,
  ReceiptOutcome,
  ReceiptPollPolicy,
  TransactionReceipt,
  TransactionResponse,
} from './types.js';

/**
 * The account that pays for transactions and the key that signs for it
 */
export interface Operator {
  accountId: AccountId;
  privateKey: PrivateKey;
}

export interface ClientConfig {
  transport: Transport;
  /** Static list of nodes, or a source `refreshAddressBook` reads from */
  addressBook: AddressBookSource | AddressBookEntry[];
  operator?: Operator;
  executionPolicy?: Partial<ExecutionPolicy>;
  receiptPolicy?: Partial<ReceiptPollPolicy>;
  /** Fee cap applied by `freeze` when a transaction sets none (tinybars) */
  defaultMaxTransactionFee?: bigint;
  /** How many nodes each transaction is pre-signed for */
  maxNodesPerTransaction?: number;
  registry?: Omit<NodeRegistryOptions, 'logger'>;
  /**
   * Replace a transaction id this client generated, and sign again, when a
   * node answers TRANSACTION_EXPIRED. Transactions can override it. Off by
   * default.
   */
  regenerateTransactionId?: boolean;
  /** Jitter source for retry backoff */
  random?: () => number;
  logger?: SdkLogger;
}

export interface SubmitOptions {
  signal?: AbortSignal;
  /** Overrides for this call only */
  policy?: Partial<ExecutionPolicy>;
}

export interface ReceiptOptions {
  signal?: AbortSignal;
  policy?: Partial<ReceiptPollPolicy>;
}

export interface ExecuteAllOptions extends SubmitOptions {
  /** Wait for each receipt to succeed before sending the next; default true */
  waitForReceipts?: boolean;
  receipt?: ReceiptOptions;
}

/**
 * LedgerClient - entry point that wires the registry, dispatcher and receipt
 * resolver together around an operator account
 */
export class LedgerClient {
  readonly registry: NodeRegistry;
  readonly executionPolicy: ExecutionPolicy;
  readonly receiptPolicy: ReceiptPollPolicy;
  readonly operator?: Operator;

  private readonly addressBook: AddressBookSource;
  private readonly dispatcher: ExecutionDispatcher;
  private readonly resolver: ReceiptResolver;
  private readonly logger: SdkLogger;
  private readonly defaultMaxTransactionFee: bigint;
  private readonly maxNodesPerTransaction: number;
  private readonly regenerateTransactionId: boolean;
  /** Transactions whose id this client generated */
  private readonly generatedIds = new WeakSet<Transaction>();

  /**
   * Create a client. With an `AddressBookSource`, the registry is empty until
   * `refreshAddressBook` runs; prefer `LedgerClient.connect`.
   */
  constructor(config: ClientConfig) {
    this.logger = config.logger ?? makeLogger();
    this.operator = config.operator;
    this.executionPolicy = resolveExecutionPolicy(config.executionPolicy);
    this.receiptPolicy = resolveReceiptPolicy(config.receiptPolicy);
    this.defaultMaxTransactionFee = config.defaultMaxTransactionFee ?? DEFAULT_MAX_TRANSACTION_FEE;
    this.maxNodesPerTransaction = config.maxNodesPerTransaction ?? DEFAULT_MAX_NODES_PER_TRANSACTION;
    this.regenerateTransactionId = config.regenerateTransactionId ?? false;
    if (!Number.isInteger(this.maxNodesPerTransaction) || this.maxNodesPerTransaction < 1) {
      throw LedgerError.invalidArgument('maxNodesPerTransaction must be a positive integer', {
        maxNodesPerTransaction: this.maxNodesPerTransaction,
      });
    }

    const initialNodes = Array.isArray(config.addressBook) ? config.addressBook : [];
    this.addressBook = Array.isArray(config.addressBook)
      ? new StaticAddressBook(config.addressBook)
      : config.addressBook;
    this.registry = new NodeRegistry(initialNodes, { ...config.registry, logger: this.logger });
    this.dispatcher = new ExecutionDispatcher({
      registry: this.registry,
      transport: config.transport,
      logger: this.logger,
      random: config.random,
      now: config.registry?.now,
    });
    this.resolver = new ReceiptResolver({
      registry: this.registry,
      transport: config.transport,
      logger: this.logger,
      now: config.registry?.now,
    });
  }

  /**
   * Create a client and load its address book
   */
  static async connect(config: ClientConfig): Promise<LedgerClient> {
    const client = new LedgerClient(config);
    await client.refreshAddressBook();
    return client;
  }

  async refreshAddressBook(): Promise<RefreshSummary> {
    const entries = await this.addressBook.listNodes();
    return this.registry.refresh(entries);
  }

  // ==========================================================================
  // Preparing transactions
  // ==========================================================================

  private requireOperator(operation: string): Operator {
    if (this.operator === undefined) {
      throw LedgerError.invalidArgument(`${operation} requires an operator or explicit values`);
    }
    return this.operator;
  }

  /**
   * Freeze `tx`, filling in a fresh operator-paid transaction id, candidate
   * nodes from the registry and the default fee cap where unset
   */
  freeze(tx: Transaction): Transaction {
    if (tx.frozen) return tx;
    let { transactionId } = tx;
    if (transactionId === undefined) {
      transactionId = generateTransactionId(this.requireOperator('Generating a transaction id').accountId);
      this.generatedIds.add(tx);
    }
    return tx.freeze({
      transactionId,
      nodeAccountIds: tx.nodeAccountIds.length > 0 ? undefined : this.registry.pickNodes(this.maxNodesPerTransaction),
      transactionFee: this.defaultMaxTransactionFee,
    });
  }

  signWithOperator(tx: Transaction): Transaction {
    const { privateKey } = this.requireOperator('Signing with the operator');
    return this.freeze(tx).sign(privateKey);
  }

  private seal(tx: Transaction): SealedTransaction {
    if (tx.state !== TransactionState.Sealed) {
      this.freeze(tx);
      if (this.operator !== undefined) {
        tx.sign(this.operator.privateKey);
      }
    }
    return tx.seal();
  }

  // ==========================================================================
  // Submission
  // ==========================================================================

  /**
   * An expired id may be replaced only when this client generated it and the
   * operator is the sole signer, since no other signature can be redone
   */
  private mayRegenerate(tx: Transaction): boolean {
    if (!(tx.regenerateTransactionId ?? this.regenerateTransactionId)) return false;
    if (this.operator === undefined || !this.generatedIds.has(tx)) return false;
    const { publicKey } = this.operator.privateKey;
    return [...tx.getSignatures().values()].every(pairs =>
      pairs.every(pair => publicKeyEquals(pair.publicKey, publicKey))
    );
  }

  private regenerate(tx: Transaction): Transaction {
    const { accountId } = this.requireOperator('Regenerating a transaction id');
    const next = tx.withTransactionId(generateTransactionId(accountId));
    this.generatedIds.add(next);
    this.logger.warn(
      { expired: tx.toString(), txId: next.transactionId === undefined ? undefined : transactionIdToString(next.transactionId) },
      'transaction id expired, regenerating'
    );
    return next;
  }

  /**
   * Sign with the operator if needed, seal and submit. Never throws for
   * network or precheck outcomes; they are reported in the result.
   *
   * With regeneration enabled, a TRANSACTION_EXPIRED answer for an id this
   * client generated is retried under a fresh id; the result then carries
   * the new id, and attempts count across every id tried.
   */
  async submit(tx: Transaction, options: SubmitOptions = {}): Promise<ExecutionResult> {
    const { signal } = options;
    const policy = options.policy === undefined
      ? this.executionPolicy
      : resolveExecutionPolicy({ ...this.executionPolicy, ...options.policy });

    let current = tx;
    let result = await this.dispatcher.execute(this.seal(current), policy, { signal });
    let attempts = result.attempts;
    while (
      result.kind === 'fatal' &&
      result.status === Status.TRANSACTION_EXPIRED &&
      attempts < policy.maxAttempts &&
      this.mayRegenerate(current)
    ) {
      current = this.regenerate(current);
      const remaining = { ...policy, maxAttempts: policy.maxAttempts - attempts };
      result = await this.dispatcher.execute(this.seal(current), remaining, { signal });
      attempts += result.attempts;
    }
    return { ...result, attempts };
  }

  /**
   * Submit and return the response needed to fetch the receipt.
   *
   * @throws LedgerError PRECHECK_FAILED, MAX_RETRIES_EXCEEDED or CANCELLED,
   * each with the attempted node, attempt count and transaction id
   */
  async execute(tx: Transaction, options: SubmitOptions = {}): Promise<TransactionResponse> {
    const result = await this.submit(tx, options);
    const context = {
      transactionId: transactionIdToString(result.transactionId),
      nodeAccountId: result.nodeAccountId === undefined ? undefined : entityIdToString(result.nodeAccountId),
      attempts: result.attempts,
    };

    switch (result.kind) {
      case 'success':
        return {
          transactionId: result.transactionId,
          nodeAccountId: result.nodeAccountId,
          transactionHash: result.transactionHash,
        };
      case 'fatal':
        throw LedgerError.precheckFailed(statusName(result.status), { ...context, cost: result.cost });
      case 'maxRetriesExceeded':
        throw LedgerError.maxRetriesExceeded(
          result.attempts,
          { ...context, lastStatus: result.lastStatus === undefined ? undefined : statusName(result.lastStatus) },
          result.lastError
        );
      case 'cancelled':
        throw LedgerError.cancelled('execute', context);
    }
  }

  // ==========================================================================
  // Receipts
  // ==========================================================================

  /**
   * Poll the node that accepted the transaction; reports every outcome
   * without throwing
   */
  async resolveReceipt(response: TransactionResponse, options: ReceiptOptions = {}): Promise<ReceiptOutcome> {
    const policy = options.policy === undefined
      ? this.receiptPolicy
      : resolveReceiptPolicy({ ...this.receiptPolicy, ...options.policy });
    return this.resolver.awaitReceipt(response.transactionId, response.nodeAccountId, policy, {
      signal: options.signal,
    });
  }

  /**
   * @throws LedgerError RECEIPT_FAILED, RECEIPT_UNKNOWN, TIMEOUT or CANCELLED
   */
  async getReceipt(response: TransactionResponse, options: ReceiptOptions = {}): Promise<TransactionReceipt> {
    const outcome = await this.resolveReceipt(response, options);
    const transactionId = transactionIdToString(response.transactionId);
    const nodeAccountId = entityIdToString(response.nodeAccountId);

    switch (outcome.kind) {
      case 'success':
        return outcome.receipt;
      case 'failure':
        throw LedgerError.receiptFailed(statusName(outcome.status), transactionId);
      case 'unknown':
        throw LedgerError.receiptUnknown(transactionId, nodeAccountId);
      case 'timeout':
        throw LedgerError.timeout('receipt', options.policy?.timeoutMs ?? this.receiptPolicy.timeoutMs, {
          transactionId,
          nodeAccountId,
          polls: outcome.polls,
          lastStatus: outcome.lastStatus === undefined ? undefined : statusName(outcome.lastStatus),
        });
      case 'cancelled':
        throw LedgerError.cancelled('getReceipt', { transactionId, nodeAccountId, polls: outcome.polls });
    }
  }

  async executeAndWait(tx: Transaction, options: SubmitOptions & { receipt?: ReceiptOptions } = {}): Promise<TransactionReceipt> {
    const response = await this.execute(tx, options);
    this.logger.debug({ txId: transactionIdToString(response.transactionId) }, 'awaiting receipt');
    return this.getReceipt(response, { signal: options.signal, ...options.receipt });
  }

  /**
   * Execute `transactions` one at a time, in order, stopping at the first
   * that fails. Each is frozen only when its turn comes, so its generated id
   * is newer than the one before it.
   *
   * @throws LedgerError from `execute`, or from `getReceipt` while waiting
   * for receipts
   */
  async executeAll(transactions: readonly Transaction[], options: ExecuteAllOptions = {}): Promise<TransactionResponse[]> {
    const { waitForReceipts = true, receipt, ...submit } = options;
    const responses: TransactionResponse[] = [];
    for (const [index, tx] of transactions.entries()) {
      const response = await this.execute(tx, submit);
      if (waitForReceipts) {
        await this.getReceipt(response, { signal: submit.signal, ...receipt });
      }
      this.logger.debug({ txId: transactionIdToString(response.transactionId), index }, 'transaction in sequence done');
      responses.push(response);
    }
    return responses;
  }
}
