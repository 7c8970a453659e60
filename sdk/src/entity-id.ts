import { LedgerError } from './errors.js';

/**
 * Network-wide address of an account, topic, token or node account:
 * `shard.realm.num`. Values are frozen once constructed.
 */
export interface EntityId {
  readonly shard: number;
  readonly realm: number;
  readonly num: number;
}

export type AccountId = EntityId;
export type TopicId = EntityId;
export type TokenId = EntityId;

function assertComponent(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw LedgerError.invalidArgument(`Entity id ${name} must be a non-negative safe integer`, { [name]: value });
  }
}

export function entityId(shard: number, realm: number, num: number): EntityId {
  assertComponent(shard, 'shard');
  assertComponent(realm, 'realm');
  assertComponent(num, 'num');
  return Object.freeze({ shard, realm, num });
}

/**
 * Shorthand for an id in shard 0, realm 0
 */
export function accountId(num: number): AccountId {
  return entityId(0, 0, num);
}

export function parseEntityId(text: string): EntityId {
  const match = /^(\d+)\.(\d+)\.(\d+)$/.exec(text.trim());
  if (!match) {
    throw LedgerError.invalidArgument(`Invalid entity id "${text}", expected shard.realm.num`);
  }
  return entityId(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function entityIdToString(id: EntityId): string {
  return `${id.shard}.${id.realm}.${id.num}`;
}

export function entityIdEquals(a: EntityId, b: EntityId): boolean {
  return a.shard === b.shard && a.realm === b.realm && a.num === b.num;
}
