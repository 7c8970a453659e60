import { decodeTransactionResponse } from './codec/envelope.js';
import { DEFAULT_EXECUTION_POLICY } from './constants.js';
import { entityIdToString } from './entity-id.js';
import type { AccountId } from './entity-id.js';
import { LedgerError, LedgerErrorCode, isLedgerError, toTransportError } from './errors.js';
import { makeLogger } from './logger.js';
import type { SdkLogger } from './logger.js';
import type { NodeRegistry } from './node-registry.js';
import { statusName } from './status.js';
import type { Status } from './status.js';
import type { SealedChunk, SealedTransaction } from './transaction.js';
import { transactionIdToString } from './transaction-id.js';
import type { Transport } from './transport.js';
import type { ExecutionPolicy, ExecutionResult } from './types.js';
import { abortable, backoffDelay, linkedAbort, sleep } from './utils.js';

export interface DispatcherOptions {
  registry: NodeRegistry;
  transport: Transport;
  logger?: SdkLogger;
  /** Jitter source, in [0, 1) */
  random?: () => number;
  now?: () => number;
}

export interface ExecuteOptions {
  /** Aborting ends the retry loop with a `cancelled` result */
  signal?: AbortSignal;
}

/**
 * Merge overrides onto the default policy and check the result is usable
 */
export function resolveExecutionPolicy(overrides: Partial<ExecutionPolicy> = {}): ExecutionPolicy {
  const policy: ExecutionPolicy = { ...DEFAULT_EXECUTION_POLICY, ...overrides };
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw LedgerError.invalidArgument('maxAttempts must be a positive integer', { maxAttempts: policy.maxAttempts });
  }
  if (policy.attemptTimeoutMs <= 0) {
    throw LedgerError.invalidArgument('attemptTimeoutMs must be positive', { attemptTimeoutMs: policy.attemptTimeoutMs });
  }
  if (policy.minBackoffMs < 0 || policy.maxBackoffMs < policy.minBackoffMs) {
    throw LedgerError.invalidArgument('Backoff must satisfy 0 <= minBackoffMs <= maxBackoffMs', {
      minBackoffMs: policy.minBackoffMs,
      maxBackoffMs: policy.maxBackoffMs,
    });
  }
  for (const status of policy.successStatuses) {
    if (policy.retryableStatuses.has(status)) {
      throw LedgerError.invalidArgument(`${statusName(status)} cannot be both retryable and successful`);
    }
  }
  return policy;
}

/**
 * Submits sealed transactions, failing over between their pre-signed nodes.
 *
 * Each attempt goes to the best node the registry offers among those the
 * transaction was signed for, preferring nodes not yet tried in this
 * execution. Retryable statuses and transport failures cool the node down and
 * retry after a jittered exponential backoff; any status outside the
 * retryable and success sets ends execution at once.
 */
export class ExecutionDispatcher {
  private readonly registry: NodeRegistry;
  private readonly transport: Transport;
  private readonly logger: SdkLogger;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.transport = options.transport;
    this.logger = options.logger ?? makeLogger();
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  /**
   * Wait, returning `false` instead of throwing when `signal` aborts
   */
  private async pause(ms: number, signal: AbortSignal | undefined): Promise<boolean> {
    try {
      await sleep(ms, signal);
      return true;
    } catch (error) {
      if (isLedgerError(error, LedgerErrorCode.CANCELLED)) return false;
      throw error;
    }
  }

  async execute(
    sealed: SealedTransaction,
    policy: ExecutionPolicy = DEFAULT_EXECUTION_POLICY,
    options: ExecuteOptions = {}
  ): Promise<ExecutionResult> {
    const { signal } = options;
    const { transactionId } = sealed;
    const txId = transactionIdToString(transactionId);
    const candidates = sealed.chunks.map(chunk => chunk.nodeAccountId);
    const chunks = new Map<string, SealedChunk>(
      sealed.chunks.map(chunk => [entityIdToString(chunk.nodeAccountId), chunk])
    );
    const tried = new Set<string>();

    let attempts = 0;
    let lastNode: AccountId | undefined;
    let lastStatus: Status | undefined;
    let lastError: Error | undefined;

    const cancelled = (): ExecutionResult => {
      this.logger.debug({ txId, attempts }, 'execution cancelled');
      return { kind: 'cancelled', transactionId, attempts, nodeAccountId: lastNode };
    };

    while (attempts < policy.maxAttempts) {
      if (signal?.aborted) return cancelled();

      let selection = this.registry.selectNode(candidates, tried);
      if (selection === undefined && tried.size > 0) {
        // every candidate has been tried once; start another round
        tried.clear();
        selection = this.registry.selectNode(candidates, tried);
      }
      if (selection === undefined) {
        lastError = LedgerError.noAvailableNodes(candidates.map(entityIdToString));
        break;
      }
      if (selection.readyAt > this.now()) {
        // untried nodes are only preferred; a recovered tried node beats one still cooling
        const ready = this.registry.selectNode(candidates);
        if (ready !== undefined && ready.readyAt < selection.readyAt) selection = ready;
      }

      const { nodeAccountId } = selection;
      const node = entityIdToString(nodeAccountId);
      const chunk = chunks.get(node);
      if (chunk === undefined) {
        throw LedgerError.invalidArgument(`Registry selected ${node}, which the transaction was not signed for`);
      }

      const wait = Math.min(selection.readyAt - this.now(), policy.maxBackoffMs);
      if (wait > 0) {
        this.logger.debug({ txId, node, wait }, 'all candidate nodes cooling, waiting');
        if (!(await this.pause(wait, signal))) return cancelled();
      }

      attempts += 1;
      lastNode = nodeAccountId;
      tried.add(node);
      this.logger.debug({ txId, node, attempt: attempts }, 'submitting transaction');

      const sent = await this.send(sealed, chunk, nodeAccountId, policy, signal);
      if (sent.kind === 'failed') {
        if (signal?.aborted) return cancelled();

        const failure = toTransportError(sent.error, { node, txId, attempt: attempts });
        const transient = failure.code === LedgerErrorCode.TIMEOUT || failure.transient;
        this.registry.recordOutcome(nodeAccountId, transient ? 'transientFailure' : 'fatalFailure');
        lastError = failure;
        this.logger.warn({ txId, node, attempt: attempts, transient, err: failure.message }, 'transport failure');

        if (!(await this.backoff(attempts, policy, signal))) return cancelled();
        continue;
      }
      const { raw } = sent;

      let status: Status;
      let cost: bigint;
      try {
        ({ precheckStatus: status, cost } = decodeTransactionResponse(raw));
      } catch (error) {
        // an unreadable answer says nothing about the transaction; try elsewhere
        this.registry.recordOutcome(nodeAccountId, 'transientFailure');
        lastError = error instanceof Error ? error : new Error(String(error));
        this.logger.warn({ txId, node, err: lastError.message }, 'unreadable response from node');
        if (!(await this.backoff(attempts, policy, signal))) return cancelled();
        continue;
      }

      if (policy.successStatuses.has(status)) {
        this.registry.recordOutcome(nodeAccountId, 'success');
        this.logger.debug({ txId, node, attempts }, 'transaction accepted');
        return {
          kind: 'success',
          transactionId,
          attempts,
          nodeAccountId,
          status,
          transactionHash: chunk.transactionHash,
          raw,
        };
      }

      if (policy.retryableStatuses.has(status)) {
        this.registry.recordOutcome(nodeAccountId, 'transientFailure');
        lastStatus = status;
        this.logger.warn({ txId, node, attempt: attempts, status: statusName(status) }, 'retryable precheck status');
        if (!(await this.backoff(attempts, policy, signal))) return cancelled();
        continue;
      }

      // the node answered; the transaction itself is at fault
      this.registry.recordOutcome(nodeAccountId, 'success');
      this.logger.debug({ txId, node, status: statusName(status) }, 'fatal precheck status');
      return { kind: 'fatal', transactionId, attempts, nodeAccountId, status, cost, raw };
    }

    this.logger.warn(
      { txId, attempts, lastStatus: lastStatus === undefined ? undefined : statusName(lastStatus) },
      'giving up on transaction'
    );
    return { kind: 'maxRetriesExceeded', transactionId, attempts, nodeAccountId: lastNode, lastStatus, lastError };
  }

  /**
   * One transport round trip bounded by the per-attempt timeout
   */
  private async send(
    sealed: SealedTransaction,
    chunk: SealedChunk,
    nodeAccountId: AccountId,
    policy: ExecutionPolicy,
    signal: AbortSignal | undefined
  ): Promise<{ kind: 'received'; raw: Uint8Array } | { kind: 'failed'; error: unknown }> {
    const attempt = linkedAbort(signal, policy.attemptTimeoutMs);
    try {
      const request = this.transport.send(
        {
          node: this.registry.entryOf(nodeAccountId) ?? { nodeAccountId, endpoints: [] },
          method: sealed.method,
          payload: chunk.transactionBytes,
        },
        attempt.signal
      );
      return { kind: 'received', raw: await abortable(request, attempt.signal) };
    } catch (error) {
      return { kind: 'failed', error };
    } finally {
      attempt.dispose();
    }
  }

  private async backoff(attempt: number, policy: ExecutionPolicy, signal: AbortSignal | undefined): Promise<boolean> {
    if (attempt >= policy.maxAttempts) return !signal?.aborted;
    const delay = backoffDelay(attempt, {
      minDelayMs: policy.minBackoffMs,
      maxDelayMs: policy.maxBackoffMs,
      jitter: 'full',
      random: this.random,
    });
    return this.pause(delay, signal);
  }
}
