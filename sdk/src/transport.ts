import type { AddressBookEntry } from './types.js';

export interface TransportRequest {
  /** Node being contacted, with every endpoint it is reachable on */
  node: AddressBookEntry;
  /** gRPC method path, e.g. `/proto.CryptoService/cryptoTransfer` */
  method: string;
  /** Encoded request message */
  payload: Uint8Array;
}

/**
 * A unary request/response channel to ledger nodes.
 *
 * Implementations own connection setup and TLS. They must reject when
 * `signal` aborts and should reject with an error whose message names the
 * failure (`ECONNREFUSED`, `UNAVAILABLE`, ...) so it can be classified.
 */
export interface Transport {
  send(request: TransportRequest, signal: AbortSignal): Promise<Uint8Array>;
}
