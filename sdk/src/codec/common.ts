import { entityId } from '../entity-id.js';
import type { EntityId } from '../entity-id.js';
import { LedgerError } from '../errors.js';
import type {
  CustomFeeLimit,
  CustomFixedFee,
  Duration,
  FixedFee,
  Key,
  ServiceEndpoint,
  Timestamp,
  TransactionId,
} from '../types.js';
import { ProtoReader, ProtoWriter, WireType, readMessage } from './wire.js';

/**
 * Shared messages: ids, time, endpoints, keys and fees
 */

// ==========================================================================
// Entity ids
// ==========================================================================

export function encodeEntityId(id: EntityId): Uint8Array {
  return new ProtoWriter()
    .int64(1, id.shard)
    .int64(2, id.realm)
    .int64(3, id.num)
    .finish();
}

export function decodeEntityId(bytes: Uint8Array): EntityId {
  let shard = 0;
  let realm = 0;
  let num = 0;
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1: shard = reader.safeInteger(wireType); return true;
      case 2: realm = reader.safeInteger(wireType); return true;
      case 3: num = reader.safeInteger(wireType); return true;
      default: return false;
    }
  });
  if (shard < 0 || realm < 0 || num < 0) {
    throw LedgerError.malformedEncoding('negative entity id component', { shard, realm, num });
  }
  return entityId(shard, realm, num);
}

// ==========================================================================
// Time
// ==========================================================================

export function encodeTimestamp(ts: Timestamp): Uint8Array {
  return new ProtoWriter().int64(1, ts.seconds).int32(2, ts.nanos).finish();
}

export function decodeTimestamp(bytes: Uint8Array): Timestamp {
  const ts: Timestamp = { seconds: 0, nanos: 0 };
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1: ts.seconds = reader.safeInteger(wireType); return true;
      case 2: ts.nanos = reader.int32(wireType); return true;
      default: return false;
    }
  });
  return ts;
}

export function encodeDuration(duration: Duration): Uint8Array {
  return new ProtoWriter().int64(1, duration.seconds).finish();
}

export function decodeDuration(bytes: Uint8Array): Duration {
  const duration: Duration = { seconds: 0 };
  readMessage(bytes, (field, wireType, reader) => {
    if (field !== 1) return false;
    duration.seconds = reader.safeInteger(wireType);
    return true;
  });
  return duration;
}

// ==========================================================================
// Transaction id
// ==========================================================================

export function encodeTransactionId(id: TransactionId): Uint8Array {
  return new ProtoWriter()
    .message(1, encodeTimestamp(id.validStart))
    .message(2, encodeEntityId(id.accountId))
    .bool(3, id.scheduled)
    .int32(4, id.nonce ?? 0)
    .finish();
}

export function decodeTransactionId(bytes: Uint8Array): TransactionId {
  let validStart: Timestamp = { seconds: 0, nanos: 0 };
  let accountId: EntityId | undefined;
  let scheduled = false;
  let nonce: number | undefined;
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1: validStart = decodeTimestamp(reader.bytes(wireType)); return true;
      case 2: accountId = decodeEntityId(reader.bytes(wireType)); return true;
      case 3: scheduled = reader.bool(wireType); return true;
      case 4: nonce = reader.int32(wireType); return true;
      default: return false;
    }
  });
  if (accountId === undefined) {
    throw LedgerError.malformedEncoding('transaction id has no payer account');
  }
  const id: TransactionId = { accountId, validStart, scheduled };
  if (nonce !== undefined && nonce !== 0) {
    id.nonce = nonce;
  }
  return id;
}

// ==========================================================================
// Endpoints
// ==========================================================================

export function encodeServiceEndpoint(endpoint: ServiceEndpoint): Uint8Array {
  const writer = new ProtoWriter();
  if (endpoint.ipAddressV4 !== undefined) {
    writer.bytes(1, endpoint.ipAddressV4);
  }
  writer.int32(2, endpoint.port);
  if (endpoint.domainName !== undefined) {
    writer.string(3, endpoint.domainName);
  }
  return writer.finish();
}

export function decodeServiceEndpoint(bytes: Uint8Array): ServiceEndpoint {
  let ip: Uint8Array = new Uint8Array(0);
  let port = 0;
  let domainName = '';
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1: ip = reader.bytes(wireType); return true;
      case 2: port = reader.int32(wireType); return true;
      case 3: domainName = reader.string(wireType); return true;
      default: return false;
    }
  });
  return domainName.length > 0 ? { domainName, port } : { ipAddressV4: ip, port };
}

// ==========================================================================
// Keys
// ==========================================================================

function encodeKeyList(keys: readonly Key[]): Uint8Array {
  return new ProtoWriter().repeated(1, keys, encodeKey).finish();
}

function decodeKeyList(bytes: Uint8Array): Key[] {
  const keys: Key[] = [];
  readMessage(bytes, (field, wireType, reader) => {
    if (field !== 1) return false;
    keys.push(decodeKey(reader.bytes(wireType)));
    return true;
  });
  return keys;
}

/**
 * Oneof members are written even when empty so the variant survives a round trip
 */
export function encodeKey(key: Key): Uint8Array {
  const writer = new ProtoWriter();
  switch (key.kind) {
    case 'ed25519':
      return writer.message(2, key.bytes).finish();
    case 'thresholdKey': {
      const threshold = new ProtoWriter()
        .uint64(1, key.threshold)
        .message(2, encodeKeyList(key.keys))
        .finish();
      return writer.message(5, threshold).finish();
    }
    case 'keyList':
      return writer.message(6, encodeKeyList(key.keys)).finish();
    case 'ecdsaSecp256k1':
      return writer.message(7, key.bytes).finish();
  }
}

function decodeThresholdKey(bytes: Uint8Array): Key {
  let threshold = 0;
  let keys: Key[] = [];
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1: threshold = reader.uint32(wireType); return true;
      case 2: keys = decodeKeyList(reader.bytes(wireType)); return true;
      default: return false;
    }
  });
  return { kind: 'thresholdKey', threshold, keys };
}

export function decodeKey(bytes: Uint8Array): Key {
  let key: Key | undefined;
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 2: key = { kind: 'ed25519', bytes: reader.bytes(wireType) }; return true;
      case 5: key = decodeThresholdKey(reader.bytes(wireType)); return true;
      case 6: key = { kind: 'keyList', keys: decodeKeyList(reader.bytes(wireType)) }; return true;
      case 7: key = { kind: 'ecdsaSecp256k1', bytes: reader.bytes(wireType) }; return true;
      default: return false;
    }
  });
  if (key === undefined) {
    throw LedgerError.malformedEncoding('key has no supported variant');
  }
  return key;
}

// ==========================================================================
// Fees
// ==========================================================================

export function encodeFixedFee(fee: FixedFee): Uint8Array {
  return new ProtoWriter()
    .int64(1, fee.amount)
    .optional(2, fee.denominatingTokenId, encodeEntityId)
    .finish();
}

export function decodeFixedFee(bytes: Uint8Array): FixedFee {
  const fee: FixedFee = { amount: 0n };
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1: fee.amount = reader.int64(wireType); return true;
      case 2: fee.denominatingTokenId = decodeEntityId(reader.bytes(wireType)); return true;
      default: return false;
    }
  });
  return fee;
}

export function encodeCustomFixedFee(fee: CustomFixedFee): Uint8Array {
  return new ProtoWriter()
    .message(1, encodeFixedFee(fee))
    .optional(2, fee.feeCollectorAccountId, encodeEntityId)
    .finish();
}

export function decodeCustomFixedFee(bytes: Uint8Array): CustomFixedFee {
  let fee: CustomFixedFee = { amount: 0n };
  let collector: EntityId | undefined;
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1: fee = decodeFixedFee(reader.bytes(wireType)); return true;
      case 2: collector = decodeEntityId(reader.bytes(wireType)); return true;
      default: return false;
    }
  });
  if (collector !== undefined) {
    fee.feeCollectorAccountId = collector;
  }
  return fee;
}

export function encodeCustomFeeLimit(limit: CustomFeeLimit): Uint8Array {
  return new ProtoWriter()
    .optional(1, limit.accountId, encodeEntityId)
    .repeated(2, limit.fees, encodeFixedFee)
    .finish();
}

export function decodeCustomFeeLimit(bytes: Uint8Array): CustomFeeLimit {
  const limit: CustomFeeLimit = { fees: [] };
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1: limit.accountId = decodeEntityId(reader.bytes(wireType)); return true;
      case 2: limit.fees.push(decodeFixedFee(reader.bytes(wireType))); return true;
      default: return false;
    }
  });
  return limit;
}

// ==========================================================================
// Wrapper values
// ==========================================================================

export function encodeStringValue(value: string): Uint8Array {
  return new ProtoWriter().string(1, value).finish();
}

export function encodeBytesValue(value: Uint8Array): Uint8Array {
  return new ProtoWriter().bytes(1, value).finish();
}

export function encodeBoolValue(value: boolean): Uint8Array {
  return new ProtoWriter().bool(1, value).finish();
}

function readWrapper<T>(bytes: Uint8Array, initial: T, read: (reader: ProtoReader, wireType: WireType) => T): T {
  let value = initial;
  readMessage(bytes, (field, wireType, reader) => {
    if (field !== 1) return false;
    value = read(reader, wireType);
    return true;
  });
  return value;
}

export function decodeStringValue(bytes: Uint8Array): string {
  return readWrapper(bytes, '', (reader, wireType) => reader.string(wireType));
}

export function decodeBytesValue(bytes: Uint8Array): Uint8Array {
  return readWrapper<Uint8Array>(bytes, new Uint8Array(0), (reader, wireType) => reader.bytes(wireType));
}

export function decodeBoolValue(bytes: Uint8Array): boolean {
  return readWrapper(bytes, false, (reader, wireType) => reader.bool(wireType));
}
