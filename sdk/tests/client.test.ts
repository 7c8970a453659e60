import { describe, it, expect, beforeEach } from 'vitest';
import { LedgerClient } from '../src/client.js';
import type { ClientConfig } from '../src/client.js';
import { StaticAddressBook } from '../src/address-book.js';
import { decodeTransactionBody } from '../src/codec/body.js';
import { decodeSignedTransaction, decodeTransaction } from '../src/codec/envelope.js';
import { DEFAULT_MAX_TRANSACTION_FEE, RECEIPT_QUERY_METHOD, SERVICE_METHODS } from '../src/constants.js';
import { accountId } from '../src/entity-id.js';
import { LedgerError, LedgerErrorCode } from '../src/errors.js';
import { verifySignature } from '../src/keys.js';
import { Status } from '../src/status.js';
import { Transaction } from '../src/transaction.js';
import { transactionIdWithValidStart } from '../src/transaction-id.js';
import type { NodeCreateData, NodeDeleteData } from '../src/types.js';
import {
  FakeTransport,
  addressBook,
  precheckOnlyReceiptReply,
  receiptReply,
  silentLogger,
  testEcdsaKey,
  testEd25519Key,
} from './helpers/fake-network.js';

const operatorKey = testEd25519Key();
const operator = { accountId: accountId(1001), privateKey: operatorKey };

const nodeCreate: NodeCreateData = {
  kind: 'nodeCreate',
  accountId: accountId(5006),
  description: 'test description',
  gossipEndpoints: [{ ipAddressV4: Uint8Array.from([127, 0, 0, 1]), port: 50111 }],
  serviceEndpoints: [{ domainName: 'node.example.com', port: 50211 }],
  gossipCaCertificate: Uint8Array.from([1, 2, 3, 4]),
  grpcCertificateHash: Uint8Array.from([5, 6, 7, 8]),
  adminKey: operatorKey.publicKey,
  declineReward: false,
};

async function rejection(promise: Promise<unknown>): Promise<LedgerError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof LedgerError) return error;
    throw error;
  }
  throw new Error('expected a LedgerError');
}

describe('LedgerClient', () => {
  let transport: FakeTransport;
  let config: ClientConfig;
  let client: LedgerClient;

  beforeEach(() => {
    transport = new FakeTransport();
    config = {
      transport,
      addressBook: addressBook(3, 4, 5),
      operator,
      executionPolicy: { minBackoffMs: 1, maxBackoffMs: 5 },
      receiptPolicy: { timeoutMs: 2_000, minIntervalMs: 1, maxIntervalMs: 5 },
      maxNodesPerTransaction: 2,
      registry: { random: () => 0 },
      random: () => 0,
      logger: silentLogger,
    };
    client = new LedgerClient(config);
  });

  describe('freeze', () => {
    it('should fill the payer, candidate nodes and default fee', () => {
      const tx = client.freeze(new Transaction(nodeCreate));

      expect(tx.transactionId?.accountId).toEqual(accountId(1001));
      expect(tx.nodeAccountIds).toEqual([accountId(4), accountId(5)]);
      expect(tx.transactionFee).toBe(DEFAULT_MAX_TRANSACTION_FEE);
    });

    it('should use the configured fee cap', () => {
      const custom = new LedgerClient({ ...config, defaultMaxTransactionFee: 5n });
      expect(custom.freeze(new Transaction(nodeCreate)).transactionFee).toBe(5n);
    });

    it('should keep values the caller already set', () => {
      const transactionId = transactionIdWithValidStart(accountId(2002), { seconds: 1_700_000_000, nanos: 0 });
      const tx = client.freeze(new Transaction(nodeCreate).setTransactionId(transactionId).setNodeAccountIds([accountId(3)]));

      expect(tx.transactionId).toEqual(transactionId);
      expect(tx.nodeAccountIds).toEqual([accountId(3)]);
    });

    it('should reject a bad node count', () => {
      expect(() => new LedgerClient({ ...config, maxNodesPerTransaction: 0 })).toThrow(
        expect.objectContaining({ code: LedgerErrorCode.INVALID_ARGUMENT })
      );
    });
  });

  describe('executeAndWait', () => {
    it('should submit a signed node create and return its receipt', async () => {
      const receipt = await client.executeAndWait(new Transaction(nodeCreate));

      expect(receipt).toEqual({ status: Status.SUCCESS, topicSequenceNumber: 0n, nodeId: 0n });
      expect(transport.calls.map(call => [call.node, call.method])).toEqual([
        ['0.0.4', SERVICE_METHODS.nodeCreate],
        ['0.0.4', RECEIPT_QUERY_METHOD],
      ]);

      const signed = decodeSignedTransaction(decodeTransaction(transport.calls[0].payload));
      const body = decodeTransactionBody(signed.bodyBytes);
      expect(body.nodeAccountId).toEqual(accountId(4));
      expect(body.transactionId?.accountId).toEqual(accountId(1001));
      expect(body.data).toEqual(nodeCreate);
      expect(signed.sigPairs).toHaveLength(1);
      expect(verifySignature(operatorKey.publicKey, signed.bodyBytes, signed.sigPairs[0].signature)).toBe(true);
    });

    it('should fail over to the second pre-signed node', async () => {
      transport.onSubmit('0.0.4', { status: Status.BUSY });

      await client.executeAndWait(new Transaction(nodeCreate));

      expect(transport.calls.map(call => call.node)).toEqual(['0.0.4', '0.0.5', '0.0.5']);
    });

    it('should throw RECEIPT_UNKNOWN when the node lost the transaction', async () => {
      transport.onReceipt('0.0.4', precheckOnlyReceiptReply(Status.RECEIPT_NOT_FOUND));

      const error = await rejection(client.executeAndWait(new Transaction(nodeCreate)));

      expect(error.code).toBe(LedgerErrorCode.RECEIPT_UNKNOWN);
      expect(error.context).toMatchObject({ nodeAccountId: '0.0.4' });
    });

    it('should throw RECEIPT_FAILED with the final status', async () => {
      transport.onReceipt('0.0.4', receiptReply(Status.INVALID_SIGNATURE));

      const error = await rejection(client.executeAndWait(new Transaction(nodeCreate)));

      expect(error.code).toBe(LedgerErrorCode.RECEIPT_FAILED);
      expect(error.context).toMatchObject({ status: 'INVALID_SIGNATURE' });
    });
  });

  describe('execute', () => {
    it('should throw PRECHECK_FAILED with the node and attempt count', async () => {
      transport.onSubmit('0.0.4', { status: Status.INSUFFICIENT_PAYER_BALANCE });

      const error = await rejection(client.execute(new Transaction(nodeCreate)));

      expect(error.code).toBe(LedgerErrorCode.PRECHECK_FAILED);
      expect(error.context).toMatchObject({ status: 'INSUFFICIENT_PAYER_BALANCE', nodeAccountId: '0.0.4', attempts: 1 });
    });

    it('should throw MAX_RETRIES_EXCEEDED with the last status', async () => {
      transport = new FakeTransport({ status: Status.BUSY });
      client = new LedgerClient({ ...config, transport, executionPolicy: { maxAttempts: 2, minBackoffMs: 1, maxBackoffMs: 5 } });

      const error = await rejection(client.execute(new Transaction(nodeCreate)));

      expect(error.code).toBe(LedgerErrorCode.MAX_RETRIES_EXCEEDED);
      expect(error.context).toMatchObject({ attempts: 2, lastStatus: 'BUSY' });
    });

    it('should throw CANCELLED when the signal is already aborted', async () => {
      const error = await rejection(client.execute(new Transaction(nodeCreate), { signal: AbortSignal.abort() }));
      expect(error.code).toBe(LedgerErrorCode.CANCELLED);
      expect(transport.calls).toHaveLength(0);
    });

    it('should return the response needed to look up the receipt', async () => {
      const tx = new Transaction(nodeCreate);
      const response = await client.execute(tx);

      expect(response.nodeAccountId).toEqual(accountId(4));
      expect(response.transactionId).toEqual(tx.transactionId);
      expect(response.transactionHash).toEqual(tx.seal().chunks[0].transactionHash);
    });
  });

  describe('transaction id regeneration', () => {
    let regenerating: LedgerClient;

    beforeEach(() => {
      regenerating = new LedgerClient({ ...config, regenerateTransactionId: true });
      transport.onSubmit('0.0.4', { status: Status.TRANSACTION_EXPIRED });
    });

    function submittedBodies() {
      return transport.calls.map(call => decodeSignedTransaction(decodeTransaction(call.payload)));
    }

    it('should replace an expired id it generated and sign again', async () => {
      const tx = new Transaction(nodeCreate);

      const result = await regenerating.submit(tx);

      expect(result).toMatchObject({ kind: 'success', attempts: 2, nodeAccountId: accountId(4) });
      expect(transport.calls.map(call => call.node)).toEqual(['0.0.4', '0.0.4']);

      const [expired, renewed] = submittedBodies();
      expect(decodeTransactionBody(expired.bodyBytes).transactionId).toEqual(tx.transactionId);
      const renewedBody = decodeTransactionBody(renewed.bodyBytes);
      expect(renewedBody.transactionId).toEqual(result.transactionId);
      expect(result.transactionId).not.toEqual(tx.transactionId);
      expect(renewedBody.data).toEqual(nodeCreate);
      expect(renewed.sigPairs).toHaveLength(1);
      expect(verifySignature(operatorKey.publicKey, renewed.bodyBytes, renewed.sigPairs[0].signature)).toBe(true);
    });

    it('should leave an expired id alone unless enabled', async () => {
      const error = await rejection(client.execute(new Transaction(nodeCreate)));

      expect(error.code).toBe(LedgerErrorCode.PRECHECK_FAILED);
      expect(error.context).toMatchObject({ status: 'TRANSACTION_EXPIRED', attempts: 1 });
      expect(transport.calls).toHaveLength(1);
    });

    it('should follow the transaction when it opts out', async () => {
      const tx = new Transaction(nodeCreate).setRegenerateTransactionId(false);

      const result = await regenerating.submit(tx);

      expect(result).toMatchObject({ kind: 'fatal', status: Status.TRANSACTION_EXPIRED });
    });

    it('should not replace an id the caller chose', async () => {
      const tx = new Transaction(nodeCreate).setTransactionId(
        transactionIdWithValidStart(accountId(1001), { seconds: 1_700_000_000, nanos: 0 })
      );

      const result = await regenerating.submit(tx);

      expect(result).toMatchObject({ kind: 'fatal', status: Status.TRANSACTION_EXPIRED, attempts: 1 });
    });

    it('should not replace the id when another key has signed', async () => {
      const tx = regenerating.freeze(new Transaction(nodeCreate)).sign(testEcdsaKey());

      const result = await regenerating.submit(tx);

      expect(result).toMatchObject({ kind: 'fatal', status: Status.TRANSACTION_EXPIRED });
      expect(transport.calls).toHaveLength(1);
    });

    it('should stay within the attempt budget', async () => {
      transport.onSubmit('0.0.4', { status: Status.TRANSACTION_EXPIRED });
      const limited = new LedgerClient({
        ...config,
        regenerateTransactionId: true,
        executionPolicy: { maxAttempts: 2, minBackoffMs: 1, maxBackoffMs: 5 },
      });

      const result = await limited.submit(new Transaction(nodeCreate));

      expect(result).toMatchObject({ kind: 'fatal', status: Status.TRANSACTION_EXPIRED, attempts: 2 });
      expect(transport.calls).toHaveLength(2);
    });
  });

  describe('executeAll', () => {
    const nodeDelete: NodeDeleteData = { kind: 'nodeDelete', nodeId: 2n };

    it('should run transactions in order, each after the previous receipt', async () => {
      const first = new Transaction(nodeCreate);
      const second = new Transaction(nodeDelete);

      const responses = await client.executeAll([first, second]);

      expect(transport.calls.map(call => [call.node, call.method])).toEqual([
        ['0.0.4', SERVICE_METHODS.nodeCreate],
        ['0.0.4', RECEIPT_QUERY_METHOD],
        ['0.0.4', SERVICE_METHODS.nodeDelete],
        ['0.0.4', RECEIPT_QUERY_METHOD],
      ]);
      expect(responses.map(response => response.transactionId)).toEqual([first.transactionId, second.transactionId]);
      expect(responses[0].transactionId).not.toEqual(responses[1].transactionId);
    });

    it('should skip the receipts when asked', async () => {
      await client.executeAll([new Transaction(nodeCreate), new Transaction(nodeDelete)], { waitForReceipts: false });

      expect(transport.callsFor(RECEIPT_QUERY_METHOD)).toHaveLength(0);
      expect(transport.calls).toHaveLength(2);
    });

    it('should stop at the first failed receipt', async () => {
      transport.onReceipt('0.0.4', receiptReply(Status.INVALID_SIGNATURE));

      const error = await rejection(client.executeAll([new Transaction(nodeCreate), new Transaction(nodeDelete)]));

      expect(error.code).toBe(LedgerErrorCode.RECEIPT_FAILED);
      expect(transport.calls).toHaveLength(2);
    });
  });

  describe('without an operator', () => {
    it('should refuse to generate a transaction id', async () => {
      const bare = new LedgerClient({ ...config, operator: undefined });
      const error = await rejection(bare.submit(new Transaction(nodeCreate)));
      expect(error.code).toBe(LedgerErrorCode.INVALID_ARGUMENT);
    });

    it('should submit a transaction the caller froze and signed', async () => {
      const bare = new LedgerClient({ ...config, operator: undefined });
      const tx = new Transaction({ kind: 'nodeDelete', nodeId: 2n })
        .freeze({
          transactionId: transactionIdWithValidStart(accountId(2002), { seconds: 1_700_000_000, nanos: 0 }),
          nodeAccountIds: [accountId(3)],
        })
        .sign(testEcdsaKey());

      const result = await bare.submit(tx);

      expect(result).toMatchObject({ kind: 'success', nodeAccountId: accountId(3) });
    });

    it('should refuse to submit an unsigned transaction', async () => {
      const bare = new LedgerClient({ ...config, operator: undefined });
      const tx = new Transaction({ kind: 'nodeDelete', nodeId: 2n }).freeze({
        transactionId: transactionIdWithValidStart(accountId(2002), { seconds: 1_700_000_000, nanos: 0 }),
        nodeAccountIds: [accountId(3)],
      });

      const error = await rejection(bare.submit(tx));
      expect(error.code).toBe(LedgerErrorCode.MISSING_KEY_MATERIAL);
    });
  });

  describe('connect', () => {
    it('should load the registry from an address book source', async () => {
      const connected = await LedgerClient.connect({
        ...config,
        addressBook: StaticAddressBook.fromRecord({
          '127.0.0.1:50211': '0.0.3',
          'node3.example.com:50211': '0.0.3',
          '127.0.0.2:50211': '0.0.4',
        }),
      });

      expect(connected.registry.size).toBe(2);
      expect(connected.registry.addressOf(accountId(3))).toEqual([
        { ipAddressV4: Uint8Array.from([127, 0, 0, 1]), port: 50211 },
        { domainName: 'node3.example.com', port: 50211 },
      ]);
    });
  });
});
