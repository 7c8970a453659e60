import { LedgerError } from '../errors.js';
import type {
  AccountAmount,
  CryptoTransferData,
  CustomFixedFee,
  Key,
  NodeCreateData,
  NodeDeleteData,
  NodeUpdateData,
  TopicCreateData,
  TopicUpdateData,
  TransactionBody,
  TransactionData,
  TransactionKind,
} from '../types.js';
import {
  decodeBoolValue,
  decodeBytesValue,
  decodeCustomFeeLimit,
  decodeCustomFixedFee,
  decodeDuration,
  decodeEntityId,
  decodeKey,
  decodeServiceEndpoint,
  decodeStringValue,
  decodeTimestamp,
  decodeTransactionId,
  encodeBoolValue,
  encodeBytesValue,
  encodeCustomFeeLimit,
  encodeCustomFixedFee,
  encodeDuration,
  encodeEntityId,
  encodeKey,
  encodeServiceEndpoint,
  encodeStringValue,
  encodeTimestamp,
  encodeTransactionId,
} from './common.js';
import { ProtoWriter, readMessage } from './wire.js';

/**
 * Field number of each operation inside the TransactionBody oneof
 */
export const BODY_FIELD: Readonly<Record<TransactionKind, number>> = {
  cryptoTransfer: 14,
  topicCreate: 24,
  topicUpdate: 25,
  nodeCreate: 54,
  nodeUpdate: 55,
  nodeDelete: 56,
};

const MAX_CUSTOM_FEES_FIELD = 1001;

// ==========================================================================
// Node operations
// ==========================================================================

function encodeNodeCreate(data: NodeCreateData): Uint8Array {
  return new ProtoWriter()
    .optional(1, data.accountId, encodeEntityId)
    .string(2, data.description)
    .repeated(3, data.gossipEndpoints, encodeServiceEndpoint)
    .repeated(4, data.serviceEndpoints, encodeServiceEndpoint)
    .bytes(5, data.gossipCaCertificate)
    .bytes(6, data.grpcCertificateHash)
    .optional(7, data.adminKey, encodeKey)
    .bool(8, data.declineReward)
    .optional(9, data.grpcWebProxyEndpoint, encodeServiceEndpoint)
    .finish();
}

function decodeNodeCreate(bytes: Uint8Array): NodeCreateData {
  const data: NodeCreateData = {
    kind: 'nodeCreate',
    description: '',
    gossipEndpoints: [],
    serviceEndpoints: [],
    gossipCaCertificate: new Uint8Array(0),
    grpcCertificateHash: new Uint8Array(0),
    declineReward: false,
  };
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1: data.accountId = decodeEntityId(reader.bytes(wireType)); return true;
      case 2: data.description = reader.string(wireType); return true;
      case 3: data.gossipEndpoints.push(decodeServiceEndpoint(reader.bytes(wireType))); return true;
      case 4: data.serviceEndpoints.push(decodeServiceEndpoint(reader.bytes(wireType))); return true;
      case 5: data.gossipCaCertificate = reader.bytes(wireType); return true;
      case 6: data.grpcCertificateHash = reader.bytes(wireType); return true;
      case 7: data.adminKey = decodeKey(reader.bytes(wireType)); return true;
      case 8: data.declineReward = reader.bool(wireType); return true;
      case 9: data.grpcWebProxyEndpoint = decodeServiceEndpoint(reader.bytes(wireType)); return true;
      default: return false;
    }
  });
  return data;
}

function encodeNodeUpdate(data: NodeUpdateData): Uint8Array {
  return new ProtoWriter()
    .uint64(1, data.nodeId)
    .optional(2, data.accountId, encodeEntityId)
    .optional(3, data.description, encodeStringValue)
    .repeated(4, data.gossipEndpoints, encodeServiceEndpoint)
    .repeated(5, data.serviceEndpoints, encodeServiceEndpoint)
    .optional(6, data.gossipCaCertificate, encodeBytesValue)
    .optional(7, data.grpcCertificateHash, encodeBytesValue)
    .optional(8, data.adminKey, encodeKey)
    .optional(9, data.declineReward, encodeBoolValue)
    .optional(10, data.grpcWebProxyEndpoint, encodeServiceEndpoint)
    .finish();
}

function decodeNodeUpdate(bytes: Uint8Array): NodeUpdateData {
  const data: NodeUpdateData = {
    kind: 'nodeUpdate',
    nodeId: 0n,
    gossipEndpoints: [],
    serviceEndpoints: [],
  };
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1: data.nodeId = reader.uint64(wireType); return true;
      case 2: data.accountId = decodeEntityId(reader.bytes(wireType)); return true;
      case 3: data.description = decodeStringValue(reader.bytes(wireType)); return true;
      case 4: data.gossipEndpoints.push(decodeServiceEndpoint(reader.bytes(wireType))); return true;
      case 5: data.serviceEndpoints.push(decodeServiceEndpoint(reader.bytes(wireType))); return true;
      case 6: data.gossipCaCertificate = decodeBytesValue(reader.bytes(wireType)); return true;
      case 7: data.grpcCertificateHash = decodeBytesValue(reader.bytes(wireType)); return true;
      case 8: data.adminKey = decodeKey(reader.bytes(wireType)); return true;
      case 9: data.declineReward = decodeBoolValue(reader.bytes(wireType)); return true;
      case 10: data.grpcWebProxyEndpoint = decodeServiceEndpoint(reader.bytes(wireType)); return true;
      default: return false;
    }
  });
  return data;
}

function encodeNodeDelete(data: NodeDeleteData): Uint8Array {
  return new ProtoWriter().uint64(1, data.nodeId).finish();
}

function decodeNodeDelete(bytes: Uint8Array): NodeDeleteData {
  const data: NodeDeleteData = { kind: 'nodeDelete', nodeId: 0n };
  readMessage(bytes, (field, wireType, reader) => {
    if (field !== 1) return false;
    data.nodeId = reader.uint64(wireType);
    return true;
  });
  return data;
}

// ==========================================================================
// Transfers
// ==========================================================================

function encodeAccountAmount(entry: AccountAmount): Uint8Array {
  return new ProtoWriter()
    .message(1, encodeEntityId(entry.accountId))
    .sint64(2, entry.amount)
    .bool(3, entry.isApproval)
    .finish();
}

function decodeAccountAmount(bytes: Uint8Array): AccountAmount {
  const entry: Partial<AccountAmount> & { amount: bigint; isApproval: boolean } = {
    amount: 0n,
    isApproval: false,
  };
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1: entry.accountId = decodeEntityId(reader.bytes(wireType)); return true;
      case 2: entry.amount = reader.sint64(wireType); return true;
      case 3: entry.isApproval = reader.bool(wireType); return true;
      default: return false;
    }
  });
  const { accountId } = entry;
  if (accountId === undefined) {
    throw LedgerError.malformedEncoding('transfer entry has no account');
  }
  return { accountId, amount: entry.amount, isApproval: entry.isApproval };
}

function encodeCryptoTransfer(data: CryptoTransferData): Uint8Array {
  const transferList = new ProtoWriter().repeated(1, data.transfers, encodeAccountAmount).finish();
  return new ProtoWriter().message(1, transferList).finish();
}

function decodeCryptoTransfer(bytes: Uint8Array): CryptoTransferData {
  const data: CryptoTransferData = { kind: 'cryptoTransfer', transfers: [] };
  readMessage(bytes, (field, wireType, reader) => {
    if (field !== 1) return false;
    readMessage(reader.bytes(wireType), (inner, innerWireType, innerReader) => {
      if (inner !== 1) return false;
      data.transfers.push(decodeAccountAmount(innerReader.bytes(innerWireType)));
      return true;
    });
    return true;
  });
  return data;
}

// ==========================================================================
// Topics
// ==========================================================================

function encodeTopicCreate(data: TopicCreateData): Uint8Array {
  return new ProtoWriter()
    .string(1, data.memo)
    .optional(2, data.adminKey, encodeKey)
    .optional(3, data.submitKey, encodeKey)
    .optional(6, data.autoRenewPeriod, encodeDuration)
    .optional(7, data.autoRenewAccountId, encodeEntityId)
    .optional(8, data.feeScheduleKey, encodeKey)
    .repeated(9, data.feeExemptKeys, encodeKey)
    .repeated(10, data.customFees, encodeCustomFixedFee)
    .finish();
}

function decodeTopicCreate(bytes: Uint8Array): TopicCreateData {
  const data: TopicCreateData = { kind: 'topicCreate', memo: '', feeExemptKeys: [], customFees: [] };
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1: data.memo = reader.string(wireType); return true;
      case 2: data.adminKey = decodeKey(reader.bytes(wireType)); return true;
      case 3: data.submitKey = decodeKey(reader.bytes(wireType)); return true;
      case 6: data.autoRenewPeriod = decodeDuration(reader.bytes(wireType)); return true;
      case 7: data.autoRenewAccountId = decodeEntityId(reader.bytes(wireType)); return true;
      case 8: data.feeScheduleKey = decodeKey(reader.bytes(wireType)); return true;
      case 9: data.feeExemptKeys.push(decodeKey(reader.bytes(wireType))); return true;
      case 10: data.customFees.push(decodeCustomFixedFee(reader.bytes(wireType))); return true;
      default: return false;
    }
  });
  return data;
}

function encodeKeys(keys: Key[]): Uint8Array {
  return new ProtoWriter().repeated(1, keys, encodeKey).finish();
}

function encodeFees(fees: CustomFixedFee[]): Uint8Array {
  return new ProtoWriter().repeated(1, fees, encodeCustomFixedFee).finish();
}

function decodeList<T>(bytes: Uint8Array, decode: (bytes: Uint8Array) => T): T[] {
  const items: T[] = [];
  readMessage(bytes, (field, wireType, reader) => {
    if (field !== 1) return false;
    items.push(decode(reader.bytes(wireType)));
    return true;
  });
  return items;
}

function encodeTopicUpdate(data: TopicUpdateData): Uint8Array {
  return new ProtoWriter()
    .optional(1, data.topicId, encodeEntityId)
    .optional(2, data.memo, encodeStringValue)
    .optional(4, data.expirationTime, encodeTimestamp)
    .optional(6, data.adminKey, encodeKey)
    .optional(7, data.submitKey, encodeKey)
    .optional(8, data.autoRenewPeriod, encodeDuration)
    .optional(9, data.autoRenewAccountId, encodeEntityId)
    .optional(10, data.feeScheduleKey, encodeKey)
    .optional(11, data.feeExemptKeys, encodeKeys)
    .optional(12, data.customFees, encodeFees)
    .finish();
}

function decodeTopicUpdate(bytes: Uint8Array): TopicUpdateData {
  const data: TopicUpdateData = { kind: 'topicUpdate' };
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1: data.topicId = decodeEntityId(reader.bytes(wireType)); return true;
      case 2: data.memo = decodeStringValue(reader.bytes(wireType)); return true;
      case 4: data.expirationTime = decodeTimestamp(reader.bytes(wireType)); return true;
      case 6: data.adminKey = decodeKey(reader.bytes(wireType)); return true;
      case 7: data.submitKey = decodeKey(reader.bytes(wireType)); return true;
      case 8: data.autoRenewPeriod = decodeDuration(reader.bytes(wireType)); return true;
      case 9: data.autoRenewAccountId = decodeEntityId(reader.bytes(wireType)); return true;
      case 10: data.feeScheduleKey = decodeKey(reader.bytes(wireType)); return true;
      case 11: data.feeExemptKeys = decodeList(reader.bytes(wireType), decodeKey); return true;
      case 12: data.customFees = decodeList(reader.bytes(wireType), decodeCustomFixedFee); return true;
      default: return false;
    }
  });
  return data;
}

// ==========================================================================
// Transaction body
// ==========================================================================

/**
 * Encode the operation-specific message, without its TransactionBody tag
 */
export function encodeTransactionData(data: TransactionData): Uint8Array {
  switch (data.kind) {
    case 'nodeCreate': return encodeNodeCreate(data);
    case 'nodeUpdate': return encodeNodeUpdate(data);
    case 'nodeDelete': return encodeNodeDelete(data);
    case 'cryptoTransfer': return encodeCryptoTransfer(data);
    case 'topicCreate': return encodeTopicCreate(data);
    case 'topicUpdate': return encodeTopicUpdate(data);
  }
}

const DATA_DECODERS: ReadonlyMap<number, (bytes: Uint8Array) => TransactionData> = new Map<
  number,
  (bytes: Uint8Array) => TransactionData
>([
  [BODY_FIELD.cryptoTransfer, decodeCryptoTransfer],
  [BODY_FIELD.topicCreate, decodeTopicCreate],
  [BODY_FIELD.topicUpdate, decodeTopicUpdate],
  [BODY_FIELD.nodeCreate, decodeNodeCreate],
  [BODY_FIELD.nodeUpdate, decodeNodeUpdate],
  [BODY_FIELD.nodeDelete, decodeNodeDelete],
]);

/**
 * Canonical encoding of a transaction body. Fields are written in ascending
 * field-number order and the output depends only on the input value.
 */
export function encodeTransactionBody(body: TransactionBody): Uint8Array {
  return new ProtoWriter()
    .optional(1, body.transactionId, encodeTransactionId)
    .optional(2, body.nodeAccountId, encodeEntityId)
    .uint64(3, body.transactionFee)
    .optional(4, body.transactionValidDuration, encodeDuration)
    .string(6, body.memo)
    .message(BODY_FIELD[body.data.kind], encodeTransactionData(body.data))
    .repeated(MAX_CUSTOM_FEES_FIELD, body.maxCustomFees, encodeCustomFeeLimit)
    .finish();
}

/**
 * Inverse of `encodeTransactionBody`. Throws `MALFORMED_ENCODING` when the
 * input is not a TransactionBody carrying one of the supported operations.
 */
export function decodeTransactionBody(bytes: Uint8Array): TransactionBody {
  const body: Omit<TransactionBody, 'data'> & { data?: TransactionData } = {
    transactionFee: 0n,
    memo: '',
    maxCustomFees: [],
  };

  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1: body.transactionId = decodeTransactionId(reader.bytes(wireType)); return true;
      case 2: body.nodeAccountId = decodeEntityId(reader.bytes(wireType)); return true;
      case 3: body.transactionFee = reader.uint64(wireType); return true;
      case 4: body.transactionValidDuration = decodeDuration(reader.bytes(wireType)); return true;
      case 6: body.memo = reader.string(wireType); return true;
      case MAX_CUSTOM_FEES_FIELD:
        body.maxCustomFees.push(decodeCustomFeeLimit(reader.bytes(wireType)));
        return true;
    }
    const decodeData = DATA_DECODERS.get(field);
    if (decodeData === undefined) return false;
    body.data = decodeData(reader.bytes(wireType));
    return true;
  });

  const { data, ...shared } = body;
  if (data === undefined) {
    throw LedgerError.malformedEncoding('transaction body has no supported operation');
  }
  return { ...shared, data };
}
