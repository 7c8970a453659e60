import { describe, it, expect, beforeEach } from 'vitest';
import { ExecutionDispatcher, resolveExecutionPolicy } from '../src/dispatcher.js';
import { encodeTransactionResponse } from '../src/codec/envelope.js';
import { accountId } from '../src/entity-id.js';
import { LedgerErrorCode, isLedgerError } from '../src/errors.js';
import { NodeRegistry } from '../src/node-registry.js';
import { Status } from '../src/status.js';
import { Transaction } from '../src/transaction.js';
import type { SealedTransaction } from '../src/transaction.js';
import { transactionIdWithValidStart } from '../src/transaction-id.js';
import type { Transport } from '../src/transport.js';
import { FakeTransport, addressBook, silentLogger, testEd25519Key } from './helpers/fake-network.js';

const n3 = accountId(3);
const n4 = accountId(4);
const n5 = accountId(5);

const policy = resolveExecutionPolicy({ maxAttempts: 4, attemptTimeoutMs: 1_000, minBackoffMs: 1, maxBackoffMs: 5 });

function sealedFor(nodes = [n3, n4, n5]): SealedTransaction {
  return new Transaction({ kind: 'nodeDelete', nodeId: 9n })
    .freeze({
      transactionId: transactionIdWithValidStart(accountId(1001), { seconds: 1_700_000_000, nanos: 0 }),
      nodeAccountIds: nodes,
    })
    .sign(testEd25519Key())
    .seal();
}

describe('ExecutionDispatcher', () => {
  let registry: NodeRegistry;
  let transport: FakeTransport;
  let dispatcher: ExecutionDispatcher;

  beforeEach(() => {
    registry = new NodeRegistry(addressBook(3, 4, 5), { logger: silentLogger });
    transport = new FakeTransport();
    dispatcher = new ExecutionDispatcher({ registry, transport, logger: silentLogger, random: () => 0 });
  });

  function healthOf(num: number) {
    return registry.snapshot().find(state => state.nodeAccountId.num === num);
  }

  describe('execute', () => {
    it('should succeed on the first node when it accepts', async () => {
      const sealed = sealedFor();
      const result = await dispatcher.execute(sealed, policy);

      expect(result).toMatchObject({ kind: 'success', attempts: 1, nodeAccountId: n3, status: Status.OK });
      expect(transport.calls).toHaveLength(1);
      expect(transport.calls[0].method).toBe('/proto.AddressBookService/deleteNode');
      expect(transport.calls[0].payload).toEqual(sealed.chunks[0].transactionBytes);
    });

    it('should fail over to the next node on a retryable status, reusing its pre-signed bytes', async () => {
      transport.onSubmit('0.0.3', { status: Status.BUSY });
      const sealed = sealedFor();

      const result = await dispatcher.execute(sealed, policy);

      expect(result.kind).toBe('success');
      if (result.kind !== 'success') return;
      expect(result.attempts).toBe(2);
      expect(result.nodeAccountId).toEqual(n4);
      expect(result.transactionHash).toEqual(sealed.chunks[1].transactionHash);
      expect(transport.calls.map(call => call.node)).toEqual(['0.0.3', '0.0.4']);
      expect(transport.calls[1].payload).toEqual(sealed.chunks[1].transactionBytes);
      expect(healthOf(3)).toMatchObject({ health: 'cooling', consecutiveFailures: 1 });
      expect(healthOf(4)).toMatchObject({ health: 'healthy', consecutiveFailures: 0 });
    });

    it('should stop at once on a non-retryable status', async () => {
      transport.onSubmit('0.0.3', { status: Status.INSUFFICIENT_PAYER_BALANCE, cost: 42n });

      const result = await dispatcher.execute(sealedFor(), policy);

      expect(result).toMatchObject({
        kind: 'fatal',
        attempts: 1,
        nodeAccountId: n3,
        status: Status.INSUFFICIENT_PAYER_BALANCE,
        cost: 42n,
      });
      expect(transport.calls).toHaveLength(1);
      expect(healthOf(3)).toMatchObject({ health: 'healthy', consecutiveFailures: 0 });
    });

    it('should give up after maxAttempts, cycling back to tried nodes', async () => {
      transport = new FakeTransport({ status: Status.BUSY });
      dispatcher = new ExecutionDispatcher({ registry, transport, logger: silentLogger, random: () => 0 });

      const result = await dispatcher.execute(sealedFor(), policy);

      expect(result).toMatchObject({ kind: 'maxRetriesExceeded', attempts: 4, lastStatus: Status.BUSY, nodeAccountId: n3 });
      expect(transport.calls.map(call => call.node)).toEqual(['0.0.3', '0.0.4', '0.0.5', '0.0.3']);
    });

    it('should return to a recovered node rather than one still cooling down', async () => {
      registry = new NodeRegistry(addressBook(3, 4), { logger: silentLogger, cooldownBaseMs: 1, cooldownMaxMs: 60_000 });
      for (let i = 0; i < 20; i++) registry.recordOutcome(n4, 'transientFailure');
      transport.onSubmit('0.0.3', { status: Status.BUSY });
      dispatcher = new ExecutionDispatcher({ registry, transport, logger: silentLogger, random: () => 0.99 });

      const result = await dispatcher.execute(sealedFor([n3, n4]), { ...policy, minBackoffMs: 30, maxBackoffMs: 30 });

      expect(result).toMatchObject({ kind: 'success', attempts: 2, nodeAccountId: n3 });
      expect(transport.calls.map(call => call.node)).toEqual(['0.0.3', '0.0.3']);
      expect(healthOf(4)).toMatchObject({ health: 'cooling', consecutiveFailures: 20 });
    });

    it('should remove a node that refuses connections and carry on', async () => {
      transport.onSubmit('0.0.3', { error: new Error('connect ECONNREFUSED 127.0.0.1:50003') });

      const result = await dispatcher.execute(sealedFor(), policy);

      expect(result).toMatchObject({ kind: 'success', attempts: 2, nodeAccountId: n4 });
      expect(healthOf(3)?.health).toBe('removed');
    });

    it('should cool a node down after a transient transport error', async () => {
      transport.onSubmit('0.0.3', { error: new Error('14 UNAVAILABLE: connection reset') });

      const result = await dispatcher.execute(sealedFor(), policy);

      expect(result).toMatchObject({ kind: 'success', nodeAccountId: n4 });
      expect(healthOf(3)?.health).toBe('cooling');
    });

    it('should abandon an attempt that exceeds its timeout', async () => {
      transport.onSubmit('0.0.3', { hang: true });

      const result = await dispatcher.execute(sealedFor(), { ...policy, attemptTimeoutMs: 20 });

      expect(result).toMatchObject({ kind: 'success', attempts: 2, nodeAccountId: n4 });
      expect(healthOf(3)?.health).toBe('cooling');
    });

    it('should report the last transport error when every attempt fails', async () => {
      transport = new FakeTransport({ error: new Error('14 UNAVAILABLE') });
      dispatcher = new ExecutionDispatcher({ registry, transport, logger: silentLogger, random: () => 0 });

      const result = await dispatcher.execute(sealedFor([n3]), { ...policy, maxAttempts: 2 });

      expect(result.kind).toBe('maxRetriesExceeded');
      if (result.kind !== 'maxRetriesExceeded') return;
      expect(result.attempts).toBe(2);
      expect(isLedgerError(result.lastError, LedgerErrorCode.TRANSPORT_FAILURE)).toBe(true);
    });

    it('should treat an unreadable response as a transient failure', async () => {
      let calls = 0;
      const junkFirst: Transport = {
        send: async () => {
          calls += 1;
          return calls === 1 ? Uint8Array.from([0x0b]) : encodeTransactionResponse({ precheckStatus: Status.OK, cost: 0n });
        },
      };
      dispatcher = new ExecutionDispatcher({ registry, transport: junkFirst, logger: silentLogger, random: () => 0 });

      const result = await dispatcher.execute(sealedFor(), policy);

      expect(result).toMatchObject({ kind: 'success', attempts: 2, nodeAccountId: n4 });
      expect(healthOf(3)?.health).toBe('cooling');
    });

    it('should report cancellation while a request is in flight', async () => {
      transport.onSubmit('0.0.3', { hang: true });
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);

      const result = await dispatcher.execute(sealedFor(), policy, { signal: controller.signal });

      expect(result).toMatchObject({ kind: 'cancelled', attempts: 1, nodeAccountId: n3 });
      expect(healthOf(3)).toMatchObject({ health: 'healthy', consecutiveFailures: 0 });
    });

    it('should not contact any node when already cancelled', async () => {
      const result = await dispatcher.execute(sealedFor(), policy, { signal: AbortSignal.abort() });

      expect(result).toMatchObject({ kind: 'cancelled', attempts: 0 });
      expect(transport.calls).toHaveLength(0);
    });

    it('should fail without attempts when every candidate is removed', async () => {
      registry.recordOutcome(n3, 'fatalFailure');
      registry.recordOutcome(n4, 'fatalFailure');

      const result = await dispatcher.execute(sealedFor([n3, n4]), policy);

      expect(result.kind).toBe('maxRetriesExceeded');
      if (result.kind !== 'maxRetriesExceeded') return;
      expect(result.attempts).toBe(0);
      expect(isLedgerError(result.lastError, LedgerErrorCode.NO_AVAILABLE_NODES)).toBe(true);
      expect(transport.calls).toHaveLength(0);
    });
  });

  describe('resolveExecutionPolicy', () => {
    it('should fill unset fields from the defaults', () => {
      expect(resolveExecutionPolicy({ maxAttempts: 2 })).toMatchObject({ maxAttempts: 2, attemptTimeoutMs: 10_000 });
    });

    it('should reject unusable policies', () => {
      const invalid = expect.objectContaining({ code: LedgerErrorCode.INVALID_ARGUMENT });
      expect(() => resolveExecutionPolicy({ maxAttempts: 0 })).toThrow(invalid);
      expect(() => resolveExecutionPolicy({ minBackoffMs: 10, maxBackoffMs: 5 })).toThrow(invalid);
      expect(() => resolveExecutionPolicy({ successStatuses: new Set([Status.BUSY]) })).toThrow(invalid);
    });
  });
});
