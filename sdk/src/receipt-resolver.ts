import { decodeReceiptResponse, encodeReceiptQuery } from './codec/receipt.js';
import { DEFAULT_RECEIPT_POLICY, RECEIPT_QUERY_METHOD } from './constants.js';
import { entityIdToString } from './entity-id.js';
import type { AccountId } from './entity-id.js';
import { LedgerError, LedgerErrorCode, isLedgerError } from './errors.js';
import { makeLogger } from './logger.js';
import type { SdkLogger } from './logger.js';
import type { NodeRegistry } from './node-registry.js';
import { Status, statusName } from './status.js';
import { transactionIdToString } from './transaction-id.js';
import type { Transport } from './transport.js';
import type { ReceiptOutcome, ReceiptPollPolicy, ReceiptResponseMessage, TransactionId } from './types.js';
import { abortable, backoffDelay, linkedAbort, sleep } from './utils.js';

export interface ReceiptResolverOptions {
  registry: NodeRegistry;
  transport: Transport;
  logger?: SdkLogger;
  now?: () => number;
}

export interface AwaitReceiptOptions {
  signal?: AbortSignal;
  includeDuplicates?: boolean;
  includeChildReceipts?: boolean;
}

export function resolveReceiptPolicy(overrides: Partial<ReceiptPollPolicy> = {}): ReceiptPollPolicy {
  const policy: ReceiptPollPolicy = { ...DEFAULT_RECEIPT_POLICY, ...overrides };
  if (policy.timeoutMs <= 0 || policy.attemptTimeoutMs <= 0) {
    throw LedgerError.invalidArgument('Receipt timeouts must be positive', {
      timeoutMs: policy.timeoutMs,
      attemptTimeoutMs: policy.attemptTimeoutMs,
    });
  }
  if (policy.minIntervalMs < 0 || policy.maxIntervalMs < policy.minIntervalMs) {
    throw LedgerError.invalidArgument('Polling must satisfy 0 <= minIntervalMs <= maxIntervalMs', {
      minIntervalMs: policy.minIntervalMs,
      maxIntervalMs: policy.maxIntervalMs,
    });
  }
  return policy;
}

type Poll =
  | { kind: 'response'; response: ReceiptResponseMessage }
  | { kind: 'error'; error: unknown };

/**
 * Polls one node for a transaction's receipt until it is final.
 *
 * "Receipt not found" ends polling with `unknown`: the node no longer
 * remembers the transaction, which is a different situation from running out
 * of time (`timeout`) and makes blind resubmission unsafe.
 */
export class ReceiptResolver {
  private readonly registry: NodeRegistry;
  private readonly transport: Transport;
  private readonly logger: SdkLogger;
  private readonly now: () => number;

  constructor(options: ReceiptResolverOptions) {
    this.registry = options.registry;
    this.transport = options.transport;
    this.logger = options.logger ?? makeLogger();
    this.now = options.now ?? Date.now;
  }

  async awaitReceipt(
    transactionId: TransactionId,
    nodeAccountId: AccountId,
    policy: ReceiptPollPolicy = DEFAULT_RECEIPT_POLICY,
    options: AwaitReceiptOptions = {}
  ): Promise<ReceiptOutcome> {
    const { signal } = options;
    const txId = transactionIdToString(transactionId);
    const node = entityIdToString(nodeAccountId);
    const deadline = this.now() + policy.timeoutMs;
    const payload = encodeReceiptQuery({
      transactionId,
      includeDuplicates: options.includeDuplicates ?? false,
      includeChildReceipts: options.includeChildReceipts ?? false,
    });

    let polls = 0;
    let lastStatus: Status | undefined;

    while (true) {
      if (signal?.aborted) return { kind: 'cancelled', polls };
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        this.logger.warn({ txId, node, polls }, 'gave up waiting for receipt');
        return { kind: 'timeout', lastStatus, polls };
      }

      polls += 1;
      const poll = await this.poll(nodeAccountId, payload, Math.min(policy.attemptTimeoutMs, remaining), signal);
      if (signal?.aborted) return { kind: 'cancelled', polls };

      if (poll.kind === 'error') {
        const message = poll.error instanceof Error ? poll.error.message : String(poll.error);
        this.logger.debug({ txId, node, poll: polls, err: message }, 'receipt poll failed, retrying');
      } else {
        const { precheckStatus, receipt } = poll.response;

        if (precheckStatus === Status.RECEIPT_NOT_FOUND) {
          this.logger.warn({ txId, node }, 'node has no record of the transaction');
          return { kind: 'unknown', polls };
        }

        if (precheckStatus !== Status.OK) {
          if (!policy.retryableStatuses.has(precheckStatus)) {
            return { kind: 'failure', status: precheckStatus, polls };
          }
          lastStatus = precheckStatus;
        } else if (receipt !== undefined && !policy.pendingStatuses.has(receipt.status)) {
          if (receipt.status === Status.SUCCESS) {
            this.logger.debug({ txId, node, polls }, 'receipt resolved');
            return { kind: 'success', receipt, polls };
          }
          return { kind: 'failure', status: receipt.status, receipt, polls };
        } else if (receipt !== undefined) {
          lastStatus = receipt.status;
        }

        this.logger.debug(
          { txId, node, poll: polls, status: lastStatus === undefined ? undefined : statusName(lastStatus) },
          'receipt not final yet'
        );
      }

      const interval = backoffDelay(polls, {
        minDelayMs: policy.minIntervalMs,
        maxDelayMs: policy.maxIntervalMs,
        jitter: 'none',
      });
      try {
        await sleep(Math.min(interval, Math.max(0, deadline - this.now())), signal);
      } catch (error) {
        if (isLedgerError(error, LedgerErrorCode.CANCELLED)) return { kind: 'cancelled', polls };
        throw error;
      }
    }
  }

  private async poll(
    nodeAccountId: AccountId,
    payload: Uint8Array,
    timeoutMs: number,
    signal: AbortSignal | undefined
  ): Promise<Poll> {
    const attempt = linkedAbort(signal, timeoutMs);
    try {
      const request = this.transport.send(
        {
          node: this.registry.entryOf(nodeAccountId) ?? { nodeAccountId, endpoints: [] },
          method: RECEIPT_QUERY_METHOD,
          payload,
        },
        attempt.signal
      );
      const raw = await abortable(request, attempt.signal);
      return { kind: 'response', response: decodeReceiptResponse(raw) };
    } catch (error) {
      return { kind: 'error', error };
    } finally {
      attempt.dispose();
    }
  }
}
