import { entityIdToString, parseEntityId } from './entity-id.js';
import { LedgerError } from './errors.js';
import type { AddressBookEntry, ServiceEndpoint } from './types.js';

/**
 * Supplies the current list of nodes and how to reach them
 */
export interface AddressBookSource {
  listNodes(): Promise<AddressBookEntry[]>;
}

const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

/**
 * Parse `host:port`. Dotted-quad hosts become an IPv4 endpoint, anything
 * else a domain name.
 */
export function parseServiceEndpoint(text: string): ServiceEndpoint {
  const separator = text.lastIndexOf(':');
  if (separator <= 0 || separator === text.length - 1) {
    throw LedgerError.invalidArgument(`Invalid endpoint "${text}", expected host:port`);
  }

  const host = text.slice(0, separator);
  const portText = text.slice(separator + 1);
  const port = Number(portText);
  if (!/^\d+$/.test(portText) || port < 1 || port > 65535) {
    throw LedgerError.invalidArgument(`Invalid port in endpoint "${text}"`);
  }

  const ipv4 = IPV4_PATTERN.exec(host);
  if (ipv4) {
    const octets = ipv4.slice(1).map(Number);
    if (octets.some(octet => octet > 255)) {
      throw LedgerError.invalidArgument(`Invalid IPv4 address in endpoint "${text}"`);
    }
    return { ipAddressV4: Uint8Array.from(octets), port };
  }
  return { domainName: host, port };
}

export function serviceEndpointToString(endpoint: ServiceEndpoint): string {
  const host = endpoint.ipAddressV4 !== undefined ? Array.from(endpoint.ipAddressV4).join('.') : endpoint.domainName;
  return `${host}:${endpoint.port}`;
}

/**
 * A fixed address book
 */
export class StaticAddressBook implements AddressBookSource {
  private readonly entries: AddressBookEntry[];

  constructor(entries: AddressBookEntry[]) {
    this.entries = entries.map(entry => ({ ...entry, endpoints: [...entry.endpoints] }));
  }

  /**
   * Build from a `{ "host:port": "shard.realm.num" }` map. Several endpoints
   * may point at the same node.
   */
  static fromRecord(network: Record<string, string>): StaticAddressBook {
    const byNode = new Map<string, AddressBookEntry>();
    for (const [address, node] of Object.entries(network)) {
      const nodeAccountId = parseEntityId(node);
      const key = entityIdToString(nodeAccountId);
      const entry = byNode.get(key) ?? { nodeAccountId, endpoints: [] };
      entry.endpoints.push(parseServiceEndpoint(address));
      byNode.set(key, entry);
    }
    return new StaticAddressBook([...byNode.values()]);
  }

  async listNodes(): Promise<AddressBookEntry[]> {
    return this.entries.map(entry => ({ ...entry, endpoints: [...entry.endpoints] }));
  }
}
