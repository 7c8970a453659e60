export { ProtoReader, ProtoWriter, WireType, readMessage } from './wire.js';
export type { FieldTag } from './wire.js';
export {
  decodeEntityId,
  decodeKey,
  decodeServiceEndpoint,
  decodeTransactionId,
  encodeEntityId,
  encodeKey,
  encodeServiceEndpoint,
  encodeTransactionId,
} from './common.js';
export { BODY_FIELD, decodeTransactionBody, encodeTransactionBody } from './body.js';
export {
  decodeSignedTransaction,
  decodeTransaction,
  decodeTransactionList,
  decodeTransactionResponse,
  encodeSignedTransaction,
  encodeTransaction,
  encodeTransactionList,
  encodeTransactionResponse,
} from './envelope.js';
export type { SignedTransactionMessage } from './envelope.js';
export {
  decodeReceiptQuery,
  decodeReceiptResponse,
  decodeTransactionReceipt,
  encodeReceiptQuery,
  encodeReceiptResponse,
  encodeTransactionReceipt,
} from './receipt.js';
export type { ReceiptQuery } from './receipt.js';
