import { entityIdEquals, entityIdToString, parseEntityId } from './entity-id.js';
import type { AccountId } from './entity-id.js';
import { LedgerError } from './errors.js';
import type { Timestamp, TransactionId } from './types.js';

/**
 * How far generated valid-start times are pushed into the past, so a node
 * whose clock runs slightly behind ours still accepts the transaction.
 */
export const VALID_START_BACKDATE_MS = 10_000;

const NANOS_PER_SECOND = 1_000_000_000n;

let lastIssuedNanos = 0n;

function timestampToNanos(ts: Timestamp): bigint {
  return BigInt(ts.seconds) * NANOS_PER_SECOND + BigInt(ts.nanos);
}

function nanosToTimestamp(nanos: bigint): Timestamp {
  return {
    seconds: Number(nanos / NANOS_PER_SECOND),
    nanos: Number(nanos % NANOS_PER_SECOND),
  };
}

/**
 * Generate a fresh transaction id for `payer`.
 *
 * Ids issued by this process are strictly increasing in valid start, so two
 * calls in the same millisecond never collide.
 */
export function generateTransactionId(payer: AccountId, nowMs: number = Date.now()): TransactionId {
  let nanos = BigInt(nowMs - VALID_START_BACKDATE_MS) * 1_000_000n;
  if (nanos <= lastIssuedNanos) {
    nanos = lastIssuedNanos + 1n;
  }
  lastIssuedNanos = nanos;

  return {
    accountId: payer,
    validStart: nanosToTimestamp(nanos),
    scheduled: false,
  };
}

/**
 * Build a transaction id with an explicit valid start
 */
export function transactionIdWithValidStart(payer: AccountId, validStart: Timestamp): TransactionId {
  if (!Number.isSafeInteger(validStart.seconds) || validStart.seconds < 0) {
    throw LedgerError.invalidArgument('Valid start seconds must be a non-negative integer', { seconds: validStart.seconds });
  }
  if (!Number.isInteger(validStart.nanos) || validStart.nanos < 0 || validStart.nanos >= 1_000_000_000) {
    throw LedgerError.invalidArgument('Valid start nanos must be in [0, 1e9)', { nanos: validStart.nanos });
  }
  return { accountId: { ...payer }, validStart: { ...validStart }, scheduled: false };
}

/**
 * Check an id built elsewhere and return a detached copy of it. A nonce, when
 * present, must be a positive int32: zero is the same as no nonce on the wire.
 */
export function validateTransactionId(id: TransactionId): TransactionId {
  const copy = transactionIdWithValidStart(id.accountId, id.validStart);
  copy.scheduled = id.scheduled;
  if (id.nonce !== undefined) {
    if (!Number.isInteger(id.nonce) || id.nonce < 1 || id.nonce > 0x7fffffff) {
      throw LedgerError.invalidArgument('Nonce must be a positive 32-bit integer', { nonce: id.nonce });
    }
    copy.nonce = id.nonce;
  }
  return copy;
}

/**
 * Format as `shard.realm.num@seconds.nanos`, with `?scheduled` and `/nonce`
 * suffixes when set
 */
export function transactionIdToString(id: TransactionId): string {
  const nanos = id.validStart.nanos.toString().padStart(9, '0');
  let str = `${entityIdToString(id.accountId)}@${id.validStart.seconds}.${nanos}`;
  if (id.scheduled) str += '?scheduled';
  if (id.nonce !== undefined) str += `/${id.nonce}`;
  return str;
}

export function parseTransactionId(text: string): TransactionId {
  const match = /^(\d+\.\d+\.\d+)@(\d+)\.(\d{1,9})(\?scheduled)?(?:\/(\d+))?$/.exec(text.trim());
  if (!match) {
    throw LedgerError.invalidArgument(`Invalid transaction id "${text}"`);
  }

  const [, account, seconds, nanos, scheduled, nonce] = match;
  return validateTransactionId({
    accountId: parseEntityId(account),
    validStart: { seconds: Number(seconds), nanos: Number(nanos.padEnd(9, '0')) },
    scheduled: scheduled !== undefined,
    nonce: nonce === undefined ? undefined : Number(nonce),
  });
}

export function transactionIdEquals(a: TransactionId, b: TransactionId): boolean {
  return (
    entityIdEquals(a.accountId, b.accountId) &&
    timestampToNanos(a.validStart) === timestampToNanos(b.validStart) &&
    a.scheduled === b.scheduled &&
    a.nonce === b.nonce
  );
}
