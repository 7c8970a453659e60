import { NODE_COOLDOWN_BASE_MS, NODE_COOLDOWN_MAX_MS } from './constants.js';
import { entityIdToString } from './entity-id.js';
import type { AccountId } from './entity-id.js';
import { LedgerError } from './errors.js';
import { makeLogger } from './logger.js';
import type { SdkLogger } from './logger.js';
import type { AddressBookEntry, NodeHealth, NodeOutcome, NodeState, ServiceEndpoint } from './types.js';
import { shuffle } from './utils.js';

export interface NodeRegistryOptions {
  cooldownBaseMs?: number;
  cooldownMaxMs?: number;
  /** Clock, epoch ms */
  now?: () => number;
  /** Randomness for `pickNodes`, in [0, 1) */
  random?: () => number;
  logger?: SdkLogger;
}

export interface NodeSelection {
  nodeAccountId: AccountId;
  /** Epoch ms at which the node may be contacted; at or before now when ready */
  readyAt: number;
}

export interface RefreshSummary {
  added: string[];
  reinstated: string[];
  dropped: string[];
}

/**
 * Health and failure history of every known node.
 *
 * State is a map of per-node records. Every update is a synchronous write to
 * one record and no await happens while one is held, so concurrent
 * executions never block each other on the registry.
 */
export class NodeRegistry {
  private readonly nodes = new Map<string, NodeState>();
  private readonly cooldownBaseMs: number;
  private readonly cooldownMaxMs: number;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly logger: SdkLogger;

  constructor(entries: readonly AddressBookEntry[] = [], options: NodeRegistryOptions = {}) {
    this.cooldownBaseMs = options.cooldownBaseMs ?? NODE_COOLDOWN_BASE_MS;
    this.cooldownMaxMs = options.cooldownMaxMs ?? NODE_COOLDOWN_MAX_MS;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? makeLogger();
    if (this.cooldownBaseMs <= 0 || this.cooldownMaxMs < this.cooldownBaseMs) {
      throw LedgerError.invalidArgument('Cooldown base must be positive and no larger than the cap', {
        cooldownBaseMs: this.cooldownBaseMs,
        cooldownMaxMs: this.cooldownMaxMs,
      });
    }
    this.refresh(entries);
  }

  get size(): number {
    return this.nodes.size;
  }

  /**
   * Replace the known node set with a fresh address book. Known nodes keep
   * their failure history; removed nodes that are listed again are
   * reinstated; nodes no longer listed are dropped.
   */
  refresh(entries: readonly AddressBookEntry[]): RefreshSummary {
    const summary: RefreshSummary = { added: [], reinstated: [], dropped: [] };
    const listed = new Set<string>();

    for (const entry of entries) {
      const key = entityIdToString(entry.nodeAccountId);
      listed.add(key);
      const existing = this.nodes.get(key);

      if (existing === undefined) {
        this.nodes.set(key, {
          nodeAccountId: entry.nodeAccountId,
          endpoints: [...entry.endpoints],
          consecutiveFailures: 0,
          readmitAt: 0,
          health: 'healthy',
        });
        summary.added.push(key);
        continue;
      }

      existing.endpoints = [...entry.endpoints];
      if (existing.health === 'removed') {
        existing.health = 'healthy';
        existing.consecutiveFailures = 0;
        existing.readmitAt = 0;
        summary.reinstated.push(key);
      }
    }

    for (const key of [...this.nodes.keys()]) {
      if (!listed.has(key)) {
        this.nodes.delete(key);
        summary.dropped.push(key);
      }
    }

    this.logger.debug({ ...summary, total: this.nodes.size }, 'address book refreshed');
    return summary;
  }

  private healthOf(state: NodeState, now: number): NodeHealth {
    if (state.health === 'cooling' && state.readmitAt <= now) return 'healthy';
    return state.health;
  }

  cooldownFor(consecutiveFailures: number): number {
    if (consecutiveFailures <= 0) return 0;
    const exponent = Math.min(consecutiveFailures - 1, 30);
    return Math.min(this.cooldownMaxMs, this.cooldownBaseMs * 2 ** exponent);
  }

  /**
   * Choose a node from `candidates` (in preference order), skipping ids in
   * `excluding`.
   *
   * Ready nodes win, fewest consecutive failures first. A cooling node is
   * returned only when no ready candidate remains, and then the one that
   * becomes ready soonest. Removed and unknown nodes are never returned.
   */
  selectNode(
    candidates: readonly AccountId[],
    excluding: ReadonlySet<string> = new Set()
  ): NodeSelection | undefined {
    const now = this.now();
    let bestReady: NodeState | undefined;
    let soonestCooling: NodeState | undefined;

    for (const candidate of candidates) {
      const key = entityIdToString(candidate);
      if (excluding.has(key)) continue;
      const state = this.nodes.get(key);
      if (state === undefined) continue;

      const health = this.healthOf(state, now);
      if (health === 'healthy') {
        if (bestReady === undefined || state.consecutiveFailures < bestReady.consecutiveFailures) {
          bestReady = state;
        }
      } else if (health === 'cooling') {
        if (soonestCooling === undefined || state.readmitAt < soonestCooling.readmitAt) {
          soonestCooling = state;
        }
      }
    }

    if (bestReady !== undefined) {
      return { nodeAccountId: bestReady.nodeAccountId, readyAt: now };
    }
    if (soonestCooling !== undefined) {
      return { nodeAccountId: soonestCooling.nodeAccountId, readyAt: soonestCooling.readmitAt };
    }
    return undefined;
  }

  recordOutcome(nodeAccountId: AccountId, outcome: NodeOutcome): void {
    const key = entityIdToString(nodeAccountId);
    const state = this.nodes.get(key);
    if (state === undefined) return;

    switch (outcome) {
      case 'success':
        state.consecutiveFailures = 0;
        state.readmitAt = 0;
        if (state.health === 'cooling') state.health = 'healthy';
        return;
      case 'transientFailure': {
        const now = this.now();
        state.consecutiveFailures += 1;
        state.lastFailureAt = now;
        state.readmitAt = now + this.cooldownFor(state.consecutiveFailures);
        if (state.health !== 'removed') state.health = 'cooling';
        this.logger.debug(
          { node: key, failures: state.consecutiveFailures, readmitAt: state.readmitAt },
          'node cooling down'
        );
        return;
      }
      case 'fatalFailure':
        state.consecutiveFailures += 1;
        state.lastFailureAt = this.now();
        state.health = 'removed';
        this.logger.warn({ node: key }, 'node removed from rotation until the next address book refresh');
        return;
    }
  }

  /**
   * Pick up to `count` usable nodes for a new transaction: ready nodes first
   * in random order, then cooling nodes by readiness
   */
  pickNodes(count: number): AccountId[] {
    const now = this.now();
    const ready: NodeState[] = [];
    const cooling: NodeState[] = [];
    for (const state of this.nodes.values()) {
      const health = this.healthOf(state, now);
      if (health === 'healthy') ready.push(state);
      else if (health === 'cooling') cooling.push(state);
    }
    cooling.sort((a, b) => a.readmitAt - b.readmitAt);

    const picked = [...shuffle(ready, this.random), ...cooling].slice(0, Math.max(0, count));
    if (picked.length === 0) {
      throw LedgerError.noAvailableNodes([]);
    }
    return picked.map(state => state.nodeAccountId);
  }

  addressOf(nodeAccountId: AccountId): ServiceEndpoint[] | undefined {
    const state = this.nodes.get(entityIdToString(nodeAccountId));
    return state === undefined ? undefined : [...state.endpoints];
  }

  entryOf(nodeAccountId: AccountId): AddressBookEntry | undefined {
    const endpoints = this.addressOf(nodeAccountId);
    return endpoints === undefined ? undefined : { nodeAccountId, endpoints };
  }

  /**
   * Copy of every node's state, with cooldowns that have elapsed reported as
   * healthy
   */
  snapshot(): NodeState[] {
    const now = this.now();
    return [...this.nodes.values()].map(state => ({
      ...state,
      endpoints: [...state.endpoints],
      health: this.healthOf(state, now),
    }));
  }
}
