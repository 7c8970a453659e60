import { LedgerError } from '../errors.js';
import { Status } from '../status.js';
import type { KeyKind, SignaturePair, TransactionResponseMessage } from '../types.js';
import { ProtoWriter, readMessage } from './wire.js';

/**
 * Envelope messages around the body: signatures, the signed transaction, the
 * transaction itself, lists of per-node transactions, and the submit response.
 */

export interface SignedTransactionMessage {
  bodyBytes: Uint8Array;
  sigPairs: SignaturePair[];
}

const SIGNATURE_FIELD: Readonly<Record<KeyKind, number>> = {
  ed25519: 3,
  ecdsaSecp256k1: 6,
};

export function encodeSignaturePair(pair: SignaturePair): Uint8Array {
  return new ProtoWriter()
    .bytes(1, pair.publicKey.bytes)
    .message(SIGNATURE_FIELD[pair.publicKey.kind], pair.signature)
    .finish();
}

export function decodeSignaturePair(bytes: Uint8Array): SignaturePair {
  let prefix: Uint8Array = new Uint8Array(0);
  const found: { kind?: KeyKind; signature?: Uint8Array } = {};
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1:
        prefix = reader.bytes(wireType);
        return true;
      case SIGNATURE_FIELD.ed25519:
        found.kind = 'ed25519';
        found.signature = reader.bytes(wireType);
        return true;
      case SIGNATURE_FIELD.ecdsaSecp256k1:
        found.kind = 'ecdsaSecp256k1';
        found.signature = reader.bytes(wireType);
        return true;
      default:
        return false;
    }
  });
  if (found.kind === undefined || found.signature === undefined) {
    throw LedgerError.malformedEncoding('signature pair has no supported signature');
  }
  return { publicKey: { kind: found.kind, bytes: prefix }, signature: found.signature };
}

export function encodeSignedTransaction(message: SignedTransactionMessage): Uint8Array {
  const sigMap = new ProtoWriter().repeated(1, message.sigPairs, encodeSignaturePair).finish();
  return new ProtoWriter()
    .bytes(1, message.bodyBytes)
    .message(2, sigMap)
    .finish();
}

export function decodeSignedTransaction(bytes: Uint8Array): SignedTransactionMessage {
  const message: SignedTransactionMessage = { bodyBytes: new Uint8Array(0), sigPairs: [] };
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1:
        message.bodyBytes = reader.bytes(wireType);
        return true;
      case 2:
        readMessage(reader.bytes(wireType), (inner, innerWireType, innerReader) => {
          if (inner !== 1) return false;
          message.sigPairs.push(decodeSignaturePair(innerReader.bytes(innerWireType)));
          return true;
        });
        return true;
      default:
        return false;
    }
  });
  return message;
}

/**
 * `Transaction` carrying only `signedTransactionBytes` (field 5)
 */
export function encodeTransaction(signedTransactionBytes: Uint8Array): Uint8Array {
  return new ProtoWriter().bytes(5, signedTransactionBytes).finish();
}

export function decodeTransaction(bytes: Uint8Array): Uint8Array {
  let signed: Uint8Array | undefined;
  readMessage(bytes, (field, wireType, reader) => {
    if (field !== 5) return false;
    signed = reader.bytes(wireType);
    return true;
  });
  if (signed === undefined) {
    throw LedgerError.malformedEncoding('transaction has no signed transaction bytes');
  }
  return signed;
}

export function encodeTransactionList(transactions: readonly Uint8Array[]): Uint8Array {
  return new ProtoWriter().repeated(1, transactions, tx => tx).finish();
}

export function decodeTransactionList(bytes: Uint8Array): Uint8Array[] {
  const transactions: Uint8Array[] = [];
  readMessage(bytes, (field, wireType, reader) => {
    if (field !== 1) return false;
    transactions.push(reader.bytes(wireType));
    return true;
  });
  return transactions;
}

export function encodeTransactionResponse(response: TransactionResponseMessage): Uint8Array {
  return new ProtoWriter()
    .int32(1, response.precheckStatus)
    .uint64(2, response.cost)
    .finish();
}

export function decodeTransactionResponse(bytes: Uint8Array): TransactionResponseMessage {
  let precheckStatus: Status = Status.OK;
  let cost = 0n;
  readMessage(bytes, (field, wireType, reader) => {
    switch (field) {
      case 1: precheckStatus = reader.int32(wireType); return true;
      case 2: cost = reader.uint64(wireType); return true;
      default: return false;
    }
  });
  return { precheckStatus, cost };
}
