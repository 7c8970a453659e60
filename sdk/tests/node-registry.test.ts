import { describe, it, expect, beforeEach } from 'vitest';
import { NodeRegistry } from '../src/node-registry.js';
import { accountId } from '../src/entity-id.js';
import { LedgerErrorCode } from '../src/errors.js';
import { FakeClock, addressBook, silentLogger } from './helpers/fake-network.js';

const n3 = accountId(3);
const n4 = accountId(4);
const n5 = accountId(5);

describe('NodeRegistry', () => {
  let clock: FakeClock;
  let registry: NodeRegistry;

  beforeEach(() => {
    clock = new FakeClock();
    registry = new NodeRegistry(addressBook(3, 4, 5), {
      cooldownBaseMs: 1_000,
      cooldownMaxMs: 5_000,
      now: clock.now,
      random: () => 0,
      logger: silentLogger,
    });
  });

  function stateOf(num: number) {
    return registry.snapshot().find(state => state.nodeAccountId.num === num);
  }

  describe('cooldown', () => {
    it('should double the cooldown per consecutive transient failure', () => {
      registry.recordOutcome(n3, 'transientFailure');
      expect(stateOf(3)?.readmitAt).toBe(clock.time + 1_000);

      registry.recordOutcome(n3, 'transientFailure');
      registry.recordOutcome(n3, 'transientFailure');

      expect(stateOf(3)).toMatchObject({ health: 'cooling', consecutiveFailures: 3, readmitAt: clock.time + 4_000 });
    });

    it('should cap the cooldown', () => {
      for (let i = 0; i < 6; i++) registry.recordOutcome(n3, 'transientFailure');
      expect(stateOf(3)?.readmitAt).toBe(clock.time + 5_000);
      expect(registry.cooldownFor(40)).toBe(5_000);
    });

    it('should report a node as healthy once its cooldown has passed', () => {
      registry.recordOutcome(n3, 'transientFailure');
      clock.advance(999);
      expect(stateOf(3)?.health).toBe('cooling');
      clock.advance(1);
      expect(stateOf(3)?.health).toBe('healthy');
    });

    it('should reset the failure count on success', () => {
      registry.recordOutcome(n3, 'transientFailure');
      registry.recordOutcome(n3, 'transientFailure');
      registry.recordOutcome(n3, 'success');

      expect(stateOf(3)).toMatchObject({ health: 'healthy', consecutiveFailures: 0, readmitAt: 0 });
      registry.recordOutcome(n3, 'transientFailure');
      expect(stateOf(3)?.readmitAt).toBe(clock.time + 1_000);
    });

    it('should reject a cap below the base', () => {
      expect(() => new NodeRegistry([], { cooldownBaseMs: 10, cooldownMaxMs: 5, logger: silentLogger })).toThrow(
        expect.objectContaining({ code: LedgerErrorCode.INVALID_ARGUMENT })
      );
    });
  });

  describe('selectNode', () => {
    it('should prefer ready nodes in candidate order', () => {
      expect(registry.selectNode([n4, n3])).toEqual({ nodeAccountId: n4, readyAt: clock.time });
    });

    it('should skip cooling and excluded nodes', () => {
      registry.recordOutcome(n3, 'transientFailure');
      expect(registry.selectNode([n3, n4, n5], new Set(['0.0.4']))?.nodeAccountId).toEqual(n5);
    });

    it('should prefer the node with fewer failures once both are ready', () => {
      registry.recordOutcome(n3, 'transientFailure');
      clock.advance(1_000);
      expect(registry.selectNode([n3, n4])?.nodeAccountId).toEqual(n4);
    });

    it('should fall back to the cooling node that is ready soonest', () => {
      registry.recordOutcome(n3, 'transientFailure');
      registry.recordOutcome(n3, 'transientFailure');
      registry.recordOutcome(n4, 'transientFailure');

      expect(registry.selectNode([n3, n4])).toEqual({ nodeAccountId: n4, readyAt: clock.time + 1_000 });
    });

    it('should never return removed or unknown nodes', () => {
      registry.recordOutcome(n3, 'fatalFailure');
      expect(registry.selectNode([n3, accountId(99)])).toBeUndefined();
    });
  });

  describe('refresh', () => {
    it('should reinstate removed nodes that are listed again', () => {
      registry.recordOutcome(n3, 'fatalFailure');
      expect(stateOf(3)?.health).toBe('removed');

      const summary = registry.refresh(addressBook(3, 4, 5));

      expect(summary).toEqual({ added: [], reinstated: ['0.0.3'], dropped: [] });
      expect(stateOf(3)).toMatchObject({ health: 'healthy', consecutiveFailures: 0 });
    });

    it('should keep the history of nodes still listed', () => {
      registry.recordOutcome(n4, 'transientFailure');
      registry.refresh(addressBook(3, 4, 5));
      expect(stateOf(4)?.consecutiveFailures).toBe(1);
    });

    it('should add new nodes and drop unlisted ones', () => {
      const summary = registry.refresh(addressBook(4, 6));

      expect(summary).toEqual({ added: ['0.0.6'], reinstated: [], dropped: ['0.0.3', '0.0.5'] });
      expect(registry.size).toBe(2);
      expect(registry.addressOf(n3)).toBeUndefined();
      expect(registry.entryOf(accountId(6))).toEqual(addressBook(6)[0]);
    });
  });

  describe('pickNodes', () => {
    it('should pick ready nodes in shuffled order', () => {
      expect(registry.pickNodes(2)).toEqual([n4, n5]);
    });

    it('should put cooling nodes after ready ones', () => {
      registry.recordOutcome(n3, 'transientFailure');
      expect(registry.pickNodes(3)).toEqual([n5, n4, n3]);
    });

    it('should leave out removed nodes', () => {
      registry.recordOutcome(n4, 'fatalFailure');
      expect(registry.pickNodes(5)).toEqual([n5, n3]);
    });

    it('should fail when no node is usable', () => {
      const empty = new NodeRegistry([], { logger: silentLogger });
      expect(() => empty.pickNodes(3)).toThrow(expect.objectContaining({ code: LedgerErrorCode.NO_AVAILABLE_NODES }));
    });
  });
});
