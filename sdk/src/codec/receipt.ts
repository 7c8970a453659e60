import { LedgerError } from '../errors.js';
import { Status } from '../status.js';
import type { ReceiptResponseMessage, TransactionId, TransactionReceipt } from '../types.js';
import { decodeEntityId, decodeTransactionId, encodeEntityId, encodeTransactionId } from './common.js';
import { ProtoWriter, readMessage } from './wire.js';

/**
 * Receipt query and response, wrapped in the `Query` / `Response` oneofs
 * at field 14
 */

const RECEIPT_FIELD = 14;

export interface ReceiptQuery {
  transactionId: TransactionId;
  includeDuplicates: boolean;
  includeChildReceipts: boolean;
}

export function encodeReceiptQuery(query: ReceiptQuery): Uint8Array {
  const inner = new ProtoWriter()
    .message(1, new Uint8Array(0))
    .message(2, encodeTransactionId(query.transactionId))
    .bool(3, query.includeDuplicates)
    .bool(4, query.includeChildReceipts)
    .finish();
  return new ProtoWriter().message(RECEIPT_FIELD, inner).finish();
}

export function decodeReceiptQuery(bytes: Uint8Array): ReceiptQuery {
  const query: Partial<ReceiptQuery> = {};
  let found = false;
  readMessage(bytes, (field, wireType, reader) => {
    if (field !== RECEIPT_FIELD) return false;
    found = true;
    readMessage(reader.bytes(wireType), (inner, innerWireType, innerReader) => {
      switch (inner) {
        case 2: query.transactionId = decodeTransactionId(innerReader.bytes(innerWireType)); return true;
        case 3: query.includeDuplicates = innerReader.bool(innerWireType); return true;
        case 4: query.includeChildReceipts = innerReader.bool(innerWireType); return true;
        default: return false;
      }
    });
    return true;
  });
  const { transactionId } = query;
  if (!found || transactionId === undefined) {
    throw LedgerError.malformedEncoding('query is not a receipt query');
  }
  return {
    transactionId,
    includeDuplicates: query.includeDuplicates ?? false,
    includeChildReceipts: query.includeChildReceipts ?? false,
  };
}

export function encodeTransactionReceipt(receipt: TransactionReceipt): Uint8Array {
  return new ProtoWriter()
    .int32(1, receipt.status)
    .optional(2, receipt.accountId, encodeEntityId)
    .optional(6, receipt.topicId, encodeEntityId)
    .uint64(7, receipt.topicSequenceNumber)
    .uint64(15, receipt.nodeId)
    .finish();
}

export function decodeTransactionReceipt(bytes: Uint8Array): TransactionReceipt {
  const receipt: TransactionReceipt = {
    status: Status.OK,
    topicSequenceNumber: 0n,
    nodeId: 0n,
  };
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1: receipt.status = reader.int32(wireType); return true;
      case 2: receipt.accountId = decodeEntityId(reader.bytes(wireType)); return true;
      case 6: receipt.topicId = decodeEntityId(reader.bytes(wireType)); return true;
      case 7: receipt.topicSequenceNumber = reader.uint64(wireType); return true;
      case 15: receipt.nodeId = reader.uint64(wireType); return true;
      default: return false;
    }
  });
  return receipt;
}

export function encodeReceiptResponse(response: ReceiptResponseMessage): Uint8Array {
  const header = new ProtoWriter().int32(1, response.precheckStatus).finish();
  const inner = new ProtoWriter()
    .message(1, header)
    .optional(2, response.receipt, encodeTransactionReceipt)
    .finish();
  return new ProtoWriter().message(RECEIPT_FIELD, inner).finish();
}

export function decodeReceiptResponse(bytes: Uint8Array): ReceiptResponseMessage {
  const response: ReceiptResponseMessage = { precheckStatus: Status.OK };
  let found = false;
  readMessage(bytes, (field, wireType, reader) => {
    if (field !== RECEIPT_FIELD) return false;
    found = true;
    readMessage(reader.bytes(wireType), (inner, innerWireType, innerReader) => {
      switch (inner) {
        case 1:
          readMessage(innerReader.bytes(innerWireType), (headerField, headerWireType, headerReader) => {
            if (headerField !== 1) return false;
            response.precheckStatus = headerReader.int32(headerWireType);
            return true;
          });
          return true;
        case 2:
          response.receipt = decodeTransactionReceipt(innerReader.bytes(innerWireType));
          return true;
        default:
          return false;
      }
    });
    return true;
  });
  if (!found) {
    throw LedgerError.malformedEncoding('response is not a receipt response');
  }
  return response;
}
