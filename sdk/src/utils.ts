/**
 * Byte, timing and backoff helpers shared by the codec, dispatcher and resolver
 */

import { sha384 as nobleSha384 } from '@noble/hashes/sha512';
import { LedgerError } from './errors.js';

/**
 * SHA-384 digest, used for transaction hashes
 */
export function sha384(data: Uint8Array): Uint8Array {
  return nobleSha384(data);
}

/**
 * Convert bytes to hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Convert hex string to bytes
 */
export function hexToBytes(hex: string): Uint8Array {
  const cleanHex = hex.startsWith('0x') ? hex.slice(2) : hex;
  if (cleanHex.length % 2 !== 0) {
    throw LedgerError.invalidArgument('Invalid hex string length', { length: cleanHex.length });
  }
  if (!/^[0-9a-fA-F]*$/.test(cleanHex)) {
    throw LedgerError.invalidArgument('Invalid hex string');
  }
  const bytes = new Uint8Array(cleanHex.length / 2);
  for (let i = 0; i < cleanHex.length; i += 2) {
    bytes[i / 2] = parseInt(cleanHex.substring(i, i + 2), 16);
  }
  return bytes;
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Byte-wise equality
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;

  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }

  return true;
}

/**
 * Sleep for a given number of milliseconds.
 * Rejects with a `CANCELLED` error as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(LedgerError.cancelled('sleep'));
  }
  if (ms <= 0) return Promise.resolve();

  return new Promise((resolve, reject) => {
    const timer = setTimeout(done, ms);
    function done() {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }
    function onAbort() {
      clearTimeout(timer);
      reject(LedgerError.cancelled('sleep'));
    }
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface BackoffOptions {
  /** Delay before the first retry (ms) */
  minDelayMs: number;
  /** Cap for any single delay (ms) */
  maxDelayMs: number;
  /** 'full' draws uniformly from [0, base]; 'none' returns base */
  jitter?: 'none' | 'full';
  /** Source of randomness in [0, 1) */
  random?: () => number;
}

/**
 * Exponential backoff delay for a 1-based attempt number
 */
export function backoffDelay(attempt: number, opts: BackoffOptions): number {
  const exponent = Math.min(Math.max(0, attempt - 1), 30);
  const base = Math.min(opts.maxDelayMs, Math.floor(opts.minDelayMs * 2 ** exponent));
  if (opts.jitter === 'none') return base;
  const random = opts.random ?? Math.random;
  return Math.floor(random() * (base + 1));
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * An AbortController that follows `parent` and optionally aborts itself after `timeoutMs`.
 * `dispose` detaches it from the parent and clears the timer.
 */
export function linkedAbort(
  parent: AbortSignal | undefined,
  timeoutMs?: number
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer = timeoutMs !== undefined && timeoutMs > 0
    ? setTimeout(() => controller.abort(LedgerError.timeout('attempt', timeoutMs)), timeoutMs)
    : undefined;

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer !== undefined) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Race a promise against an abort signal
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason instanceof Error ? signal.reason : LedgerError.cancelled('request'));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(signal.reason instanceof Error ? signal.reason : LedgerError.cancelled('request'));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
