/**
 * TicketLockProtocol Tests
 *
 * Two-participant walkthrough, every contract violation, debug
 * assertions, logging and metrics.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fc from 'fast-check';
import type { Logger } from 'pino';
import { createCounterOrder } from '../domain/ticket-order.js';
import { enabledAction } from '../harness/driver.js';
import { contractViolations, queueDepth, ticketsIssued } from '../metrics.js';
import { checkStateInvariants } from '../protocol/invariants.js';
import {
  createProtocolState,
  TicketLockProtocol,
  type ProtocolState,
} from '../protocol/state-machine.js';
import {
  InvariantViolationError,
  ProtocolContractViolation,
  TicketDomainExhaustedError,
  TicketLockErrorCode,
  type ParticipantId,
} from '../types.js';

// Mock logger
const createMockLogger = (): Logger => {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(() => logger),
  } as unknown as Logger;
  return logger;
};

const order = createCounterOrder();

function captureViolation(run: () => unknown): ProtocolContractViolation {
  try {
    run();
  } catch (error) {
    if (error instanceof ProtocolContractViolation) return error;
    throw error;
  }
  throw new Error('expected a contract violation');
}

function applyEnabled(protocol: TicketLockProtocol<bigint>, participant: ParticipantId): void {
  const ticket = protocol.ticketOf(participant);
  switch (enabledAction(protocol, participant)) {
    case 'request':
      protocol.requestTicket(participant);
      break;
    case 'wait':
      protocol.wait(participant, ticket);
      break;
    case 'enter':
      protocol.enter(participant, ticket);
      break;
    case 'exit':
      protocol.exit(participant);
      break;
  }
}

/** Step every busy participant until all are idle */
function drain(protocol: TicketLockProtocol<bigint>, participants: readonly ParticipantId[]): void {
  while (protocol.queueDepth > 0) {
    for (const id of participants) {
      if (protocol.phaseOf(id) !== 'idle') applyEnabled(protocol, id);
    }
  }
}

describe('TicketLockProtocol', () => {
  let state: ProtocolState<bigint>;
  let protocol: TicketLockProtocol<bigint>;

  beforeEach(() => {
    state = createProtocolState(order, ['A', 'B']);
    protocol = new TicketLockProtocol({ state, checkInvariants: true, metrics: false });
  });

  // ===========================================================================
  // Two-participant walkthrough
  // ===========================================================================

  describe('two participants', () => {
    it('admits the first requester immediately', () => {
      expect(protocol.serving).toBe(0n);
      expect(protocol.nextTicket).toBe(0n);

      const handle = protocol.requestTicket('A');

      expect(handle.participant).toBe('A');
      expect(handle.ticket).toBe(0n);
      expect(protocol.phaseOf('A')).toBe('awaiting');
      expect(protocol.nextTicket).toBe(1n);

      protocol.enter('A', 0n);
      expect(protocol.phaseOf('A')).toBe('critical');
    });

    it('queues a second requester until the first exits', () => {
      protocol.requestTicket('A');
      protocol.enter('A', 0n);

      const b = protocol.requestTicket('B');
      expect(b.ticket).toBe(1n);
      expect(protocol.nextTicket).toBe(2n);
      expect(protocol.isAdmissible('B')).toBe(false);
      protocol.wait('B', 1n);

      const refused = captureViolation(() => protocol.enter('B', 1n));
      expect(refused.action).toBe('enter');
      expect(refused.participant).toBe('B');
      expect(refused.code).toBe(TicketLockErrorCode.CONTRACT_VIOLATION);
      expect(refused.message).toBe('B holds 1 but serving is 0');
      expect(protocol.phaseOf('B')).toBe('awaiting');

      expect(protocol.exit('A')).toBe(0n);
      expect(protocol.serving).toBe(1n);
      expect(protocol.phaseOf('A')).toBe('idle');
      expect(protocol.ticketOf('A')).toBe(0n);

      protocol.enter('B', 1n);
      expect(protocol.phaseOf('B')).toBe('critical');

      protocol.exit('B');
      expect(protocol.serving).toBe(2n);
      expect(protocol.nextTicket).toBe(2n);
      expect(protocol.phaseOf('A')).toBe('idle');
      expect(protocol.phaseOf('B')).toBe('idle');
      expect(checkStateInvariants(order, protocol.snapshot())).toEqual([]);
    });

    it('keeps the serving/next gap across an uninterrupted cycle', () => {
      protocol.requestTicket('B');
      protocol.enter('B', 0n);
      protocol.exit('B');
      const gapBefore = protocol.nextTicket - protocol.serving;

      const { ticket } = protocol.requestTicket('A');
      protocol.enter('A', ticket);
      expect(protocol.exit('A')).toBe(1n);

      expect(protocol.nextTicket - protocol.serving).toBe(gapBefore);
      expect(protocol.serving).toBe(2n);
      expect(protocol.nextTicket).toBe(2n);
    });

    it('keeps the gap for a lone cycle after any drained history', () => {
      const participants = ['A', 'B', 'C'];

      fc.assert(
        fc.property(
          fc.array(fc.constantFrom(...participants), { maxLength: 40 }),
          fc.constantFrom(...participants),
          (prefix, who) => {
            const p = new TicketLockProtocol({
              state: createProtocolState(order, participants),
              checkInvariants: true,
              metrics: false,
            });
            for (const id of prefix) applyEnabled(p, id);
            drain(p, participants);

            const serving = p.serving;
            const next = p.nextTicket;

            const { ticket } = p.requestTicket(who);
            p.enter(who, ticket);
            expect(p.exit(who)).toBe(ticket);

            expect(ticket).toBe(next);
            expect(p.serving).toBe(serving + 1n);
            expect(p.nextTicket).toBe(next + 1n);
            expect(p.nextTicket - p.serving).toBe(next - serving);
            expect(p.phaseOf(who)).toBe('idle');
          }
        ),
        { numRuns: 100 }
      );
    });
  });

  // ===========================================================================
  // Contract violations
  // ===========================================================================

  describe('contract violations', () => {
    it('refuses a request from a participant that is not idle', () => {
      protocol.requestTicket('A');

      const error = captureViolation(() => protocol.requestTicket('A'));

      expect(error.message).toBe('A is awaiting, not idle');
      expect(protocol.nextTicket).toBe(1n);
    });

    it('refuses wait from the holder of the serving ticket', () => {
      protocol.requestTicket('A');

      expect(captureViolation(() => protocol.wait('A', 0n)).message).toBe('A holds the serving ticket 0');
    });

    it('refuses a ticket the participant does not hold', () => {
      protocol.requestTicket('A');
      protocol.requestTicket('B');

      expect(captureViolation(() => protocol.wait('B', 5n)).message).toBe('B presented 5 but holds 1');
      // B cannot borrow A's serving ticket
      expect(captureViolation(() => protocol.enter('B', 0n)).message).toBe('B presented 0 but holds 1');
    });

    it('refuses enter from an unknown participant', () => {
      const error = captureViolation(() => protocol.enter('C', 0n));

      expect(error.message).toBe('C is idle, not awaiting');
      expect(error.details).toEqual({ action: 'enter', participant: 'C', ticket: '0', serving: '0' });
    });

    it('refuses exit outside the critical section', () => {
      expect(captureViolation(() => protocol.exit('A')).message).toBe('A is idle, not critical');

      protocol.requestTicket('A');
      expect(captureViolation(() => protocol.exit('A')).message).toBe('A is awaiting, not critical');
      expect(protocol.serving).toBe(0n);
    });
  });

  // ===========================================================================
  // Participants and domain
  // ===========================================================================

  it('accepts participants that were never registered', () => {
    const handle = protocol.requestTicket('late');

    expect(handle.ticket).toBe(0n);
    expect(protocol.snapshot().participants.get('late')).toEqual({ phase: 'awaiting', ticket: 0n });
  });

  it('propagates domain exhaustion without changing state', () => {
    const tiny = new TicketLockProtocol({
      state: createProtocolState(createCounterOrder({ max: 1n }), ['A', 'B']),
      checkInvariants: true,
      metrics: false,
    });
    tiny.requestTicket('A');

    expect(() => tiny.requestTicket('B')).toThrow(TicketDomainExhaustedError);
    expect(tiny.phaseOf('B')).toBe('idle');
    expect(tiny.nextTicket).toBe(1n);
  });

  it('returns frozen handles and snapshots', () => {
    const handle = protocol.requestTicket('A');
    const snapshot = protocol.snapshot();
    protocol.enter('A', 0n);

    expect(Object.isFrozen(handle)).toBe(true);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot.participants.get('A')?.phase).toBe('awaiting');
  });

  it('clones into an independent protocol', () => {
    protocol.requestTicket('A');
    const copy = protocol.clone();

    copy.enter('A', 0n);
    copy.exit('A');

    expect(protocol.phaseOf('A')).toBe('awaiting');
    expect(protocol.serving).toBe(0n);
    expect(copy.serving).toBe(1n);
    expect(copy.checksInvariants).toBe(false);
  });

  // ===========================================================================
  // Debug assertions
  // ===========================================================================

  describe('invariant assertions', () => {
    it('refuses to start from a state that breaks an invariant', () => {
      const corrupt = createProtocolState(order, ['A']);
      corrupt.registry.set('A', 'awaiting', 5n);

      expect(() => new TicketLockProtocol({ state: corrupt, checkInvariants: true, metrics: false })).toThrow(
        InvariantViolationError
      );

      try {
        new TicketLockProtocol({ state: corrupt, checkInvariants: true, metrics: false });
      } catch (error) {
        expect(error).toBeInstanceOf(InvariantViolationError);
        if (error instanceof InvariantViolationError) {
          expect(error.violations).toEqual([
            { invariant: 'outstanding-range', message: 'A holds 5 outside [0, 0)', participants: ['A'] },
          ]);
        }
      }
    });

    it('detects state corrupted behind its back', () => {
      protocol.requestTicket('A');
      protocol.enter('A', 0n);
      state.registry.set('B', 'critical', 0n);

      let caught: unknown;
      try {
        protocol.exit('A');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvariantViolationError);
      if (caught instanceof InvariantViolationError) {
        expect(caught.violations.map((v) => v.invariant)).toEqual(['outstanding-range', 'critical-holds-serving']);
      }
    });

    it('skips checks when assertions are off', () => {
      const unchecked = new TicketLockProtocol({ state, checkInvariants: false, metrics: false });
      state.registry.set('B', 'critical', 7n);

      expect(unchecked.checksInvariants).toBe(false);
      expect(() => unchecked.requestTicket('A')).not.toThrow();
    });

    describe('default', () => {
      afterEach(() => {
        vi.unstubAllEnvs();
      });

      it('is on outside production', () => {
        vi.stubEnv('NODE_ENV', 'test');
        vi.stubEnv('TICKET_LOCK_CHECK_INVARIANTS', '');

        expect(new TicketLockProtocol({ state, metrics: false }).checksInvariants).toBe(true);
      });

      it('is off in production', () => {
        vi.stubEnv('NODE_ENV', 'production');
        vi.stubEnv('TICKET_LOCK_CHECK_INVARIANTS', '');

        const unchecked = new TicketLockProtocol({ state, metrics: false });
        state.registry.set('B', 'critical', 7n);

        expect(unchecked.checksInvariants).toBe(false);
        expect(() => unchecked.requestTicket('A')).not.toThrow();
      });

      it('follows TICKET_LOCK_CHECK_INVARIANTS in production', () => {
        vi.stubEnv('NODE_ENV', 'production');
        vi.stubEnv('TICKET_LOCK_CHECK_INVARIANTS', '1');

        const checked = new TicketLockProtocol({ state, metrics: false });
        state.registry.set('B', 'critical', 7n);

        expect(checked.checksInvariants).toBe(true);
        expect(() => checked.requestTicket('A')).toThrow(InvariantViolationError);
      });
    });
  });

  // ===========================================================================
  // Starting state
  // ===========================================================================

  describe('starting state', () => {
    it('counts participants already in the queue', () => {
      const resumed = createProtocolState(order, ['A', 'B', 'C']);
      resumed.dispenser.issue();
      resumed.dispenser.issue();
      resumed.registry.set('A', 'awaiting', 0n);
      resumed.registry.set('B', 'awaiting', 1n);

      const p = new TicketLockProtocol({ state: resumed, checkInvariants: true, metrics: false });
      expect(p.queueDepth).toBe(2);

      p.enter('A', 0n);
      p.exit('A');
      expect(p.queueDepth).toBe(1);
    });

    it('starts empty when everyone is idle', () => {
      expect(protocol.queueDepth).toBe(0);
    });
  });

  // ===========================================================================
  // Logging and metrics
  // ===========================================================================

  describe('observability', () => {
    it('logs contract violations as warnings', () => {
      const logger = createMockLogger();
      const logged = new TicketLockProtocol({ state, logger, metrics: false });

      expect(() => logged.exit('A')).toThrow(ProtocolContractViolation);
      expect(logger.warn).toHaveBeenCalledWith(
        { participant: 'A', action: 'exit', ticket: '0' },
        'Contract violation'
      );
      expect(logger.child).toHaveBeenCalledWith({ component: 'TicketLockProtocol', lock: 'ticket-lock' });
    });

    it('records issuance, violations and queue depth per lock', async () => {
      const measured = new TicketLockProtocol({
        state: createProtocolState(order),
        name: 'state-machine-metrics',
      });

      measured.requestTicket('A');
      measured.requestTicket('B');
      expect(() => measured.enter('B', 1n)).toThrow(ProtocolContractViolation);
      measured.enter('A', 0n);
      measured.exit('A');

      const lock = 'state-machine-metrics';
      const issued = await ticketsIssued.get();
      const violations = await contractViolations.get();
      const depth = await queueDepth.get();

      expect(issued.values.find((v) => v.labels.lock === lock)?.value).toBe(2);
      expect(violations.values.find((v) => v.labels.lock === lock && v.labels.action === 'enter')?.value).toBe(1);
      expect(depth.values.find((v) => v.labels.lock === lock)?.value).toBe(1);
    });
  });
});
