/**
 * Invariant Battery
 *
 * State invariants hold for every reachable snapshot. Together with the
 * strengthening invariants (idle-holds-zero, critical-holds-serving,
 * outstanding-range, queue-coverage) they are inductive: any action
 * applied to a state satisfying all of them yields a state that does too.
 *
 * Transition checks relate two consecutive snapshots and the step that
 * connects them.
 *
 * Invariants:
 *   phase-partition        every participant is in exactly one phase
 *   single-ownership       every participant holds exactly one ticket value
 *   mutual-exclusion       at most one participant is critical
 *   serving-bound          serving <= nextTicket
 *   unique-tickets         no ticket is held by two non-idle participants
 *   idle-holds-zero        idle participants hold the zero sentinel
 *   critical-holds-serving the critical participant holds serving
 *   outstanding-range      non-idle tickets lie in [serving, nextTicket)
 *   queue-coverage         every ticket in [serving, nextTicket) has a holder
 *
 * @module packages/ticket-lock/protocol/invariants
 */

import { precedes, sameTicket, type TicketOrder } from '../domain/ticket-order.js';
import {
  PHASES,
  VALID_PHASE_TRANSITIONS,
  type InvariantViolation,
  type ParticipantId,
  type ParticipantRecord,
  type Phase,
  type ProtocolAction,
  type ProtocolSnapshot,
} from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * The step connecting two snapshots
 */
export interface ObservedStep<T> {
  participant: ParticipantId;
  action: ProtocolAction;
  /** Ticket presented (wait/enter), issued (request) or released (exit) */
  ticket: T;
  /** False when the action was rejected with a contract violation */
  accepted: boolean;
}

/** Phase an accepted action moves its participant into */
const TARGET_PHASE: Record<ProtocolAction, Phase | null> = {
  request: 'awaiting',
  wait: null,
  enter: 'critical',
  exit: 'idle',
};

// =============================================================================
// State Invariants
// =============================================================================

/**
 * Check every state invariant against a snapshot
 */
export function checkStateInvariants<T>(
  order: TicketOrder<T>,
  snapshot: ProtocolSnapshot<T>
): InvariantViolation[] {
  const violations: InvariantViolation[] = [];
  const { serving, nextTicket } = snapshot;
  const fmt = (ticket: T) => order.format(ticket);

  const critical: ParticipantId[] = [];
  const nonIdle: ParticipantId[] = [];
  const holders = new Map<string, ParticipantId[]>();

  for (const [id, record] of snapshot.participants) {
    const phases = PHASES.filter((phase) => record.phase === phase);
    if (phases.length !== 1) {
      violations.push({
        invariant: 'phase-partition',
        message: `${id} is in ${phases.length} phases (${String(record.phase)})`,
        participants: [id],
      });
      continue;
    }

    if (record.ticket === undefined || !order.le(record.ticket, record.ticket)) {
      violations.push({
        invariant: 'single-ownership',
        message: `${id} does not hold exactly one ticket`,
        participants: [id],
      });
      continue;
    }

    if (record.phase === 'idle') {
      if (!sameTicket(order, record.ticket, order.zero)) {
        violations.push({
          invariant: 'idle-holds-zero',
          message: `idle ${id} holds ${fmt(record.ticket)}`,
          participants: [id],
        });
      }
      continue;
    }

    nonIdle.push(id);
    const key = fmt(record.ticket);
    holders.set(key, [...(holders.get(key) ?? []), id]);

    if (!order.le(serving, record.ticket) || !precedes(order, record.ticket, nextTicket)) {
      violations.push({
        invariant: 'outstanding-range',
        message: `${id} holds ${key} outside [${fmt(serving)}, ${fmt(nextTicket)})`,
        participants: [id],
      });
    }

    if (record.phase === 'critical') {
      critical.push(id);
      if (!sameTicket(order, record.ticket, serving)) {
        violations.push({
          invariant: 'critical-holds-serving',
          message: `critical ${id} holds ${key} while serving is ${fmt(serving)}`,
          participants: [id],
        });
      }
    }
  }

  if (critical.length > 1) {
    violations.push({
      invariant: 'mutual-exclusion',
      message: `${critical.length} participants are critical: ${critical.join(', ')}`,
      participants: critical,
    });
  }

  if (!order.le(serving, nextTicket)) {
    violations.push({
      invariant: 'serving-bound',
      message: `serving ${fmt(serving)} exceeds nextTicket ${fmt(nextTicket)}`,
    });
  }

  for (const [ticket, ids] of holders) {
    if (ids.length > 1) {
      violations.push({
        invariant: 'unique-tickets',
        message: `ticket ${ticket} held by ${ids.join(', ')}`,
        participants: ids,
      });
    }
  }

  // Walk [serving, nextTicket); each outstanding ticket needs a distinct
  // non-idle holder, so the walk is bounded by the non-idle count.
  if (order.le(serving, nextTicket)) {
    let ticket = serving;
    let walked = 0;
    while (precedes(order, ticket, nextTicket)) {
      if (walked >= nonIdle.length) {
        violations.push({
          invariant: 'queue-coverage',
          message: `more outstanding tickets than the ${nonIdle.length} non-idle participants`,
        });
        break;
      }
      if (!holders.has(fmt(ticket))) {
        violations.push({
          invariant: 'queue-coverage',
          message: `outstanding ticket ${fmt(ticket)} has no holder`,
        });
      }
      ticket = order.successor(ticket);
      walked++;
    }
  }

  return violations;
}

// =============================================================================
// Transition Checks
// =============================================================================

function sameRecord<T>(
  order: TicketOrder<T>,
  a: Readonly<ParticipantRecord<T>>,
  b: Readonly<ParticipantRecord<T>>
): boolean {
  return a.phase === b.phase && sameTicket(order, a.ticket, b.ticket);
}

function recordOf<T>(
  order: TicketOrder<T>,
  snapshot: ProtocolSnapshot<T>,
  participant: ParticipantId
): Readonly<ParticipantRecord<T>> {
  return snapshot.participants.get(participant) ?? { phase: 'idle', ticket: order.zero };
}

/**
 * Check a single step against the snapshots on either side of it.
 *
 * @param highestIssued - Greatest ticket issued before this step, if any
 */
export function checkTransition<T>(
  order: TicketOrder<T>,
  before: ProtocolSnapshot<T>,
  step: ObservedStep<T>,
  after: ProtocolSnapshot<T>,
  highestIssued?: T
): InvariantViolation[] {
  const violations: InvariantViolation[] = [];
  const fmt = (ticket: T) => order.format(ticket);
  const { participant, action } = step;
  const prior = recordOf(order, before, participant);
  const next = recordOf(order, after, participant);

  // -- counters-monotonic ----------------------------------------------------
  const issued = step.accepted && action === 'request';
  const released = step.accepted && action === 'exit';
  const expectedNext = issued ? order.successor(before.nextTicket) : before.nextTicket;
  const expectedServing = released ? order.successor(before.serving) : before.serving;

  if (!sameTicket(order, after.nextTicket, expectedNext)) {
    violations.push({
      invariant: 'counters-monotonic',
      message: `${action} moved nextTicket ${fmt(before.nextTicket)} -> ${fmt(after.nextTicket)}`,
      participants: [participant],
    });
  }
  if (!sameTicket(order, after.serving, expectedServing)) {
    violations.push({
      invariant: 'counters-monotonic',
      message: `${action} moved serving ${fmt(before.serving)} -> ${fmt(after.serving)}`,
      participants: [participant],
    });
  }

  // -- issuance-monotonic ----------------------------------------------------
  if (issued) {
    const fresh = sameTicket(order, step.ticket, before.nextTicket)
      && (highestIssued === undefined || precedes(order, highestIssued, step.ticket));
    if (!fresh || !sameTicket(order, next.ticket, step.ticket)) {
      violations.push({
        invariant: 'issuance-monotonic',
        message: `${participant} was issued ${fmt(step.ticket)}, `
          + `expected a ticket after ${highestIssued === undefined ? 'none' : fmt(highestIssued)}`,
        participants: [participant],
      });
    }
  }

  // -- admission-correct -----------------------------------------------------
  if (action === 'enter') {
    const admissible = prior.phase === 'awaiting'
      && sameTicket(order, prior.ticket, step.ticket)
      && sameTicket(order, step.ticket, before.serving);
    if (step.accepted !== admissible) {
      violations.push({
        invariant: 'admission-correct',
        message: step.accepted
          ? `${participant} entered with ${fmt(step.ticket)} while serving ${fmt(before.serving)}`
          : `${participant} was refused with ${fmt(step.ticket)} equal to serving`,
        participants: [participant],
      });
    }
  }

  // -- frame -----------------------------------------------------------------
  for (const [id, record] of after.participants) {
    if (id === participant) continue;
    const earlier = before.participants.get(id);
    if (!earlier || !sameRecord(order, earlier, record)) {
      violations.push({
        invariant: 'frame',
        message: `${action} by ${participant} changed ${id}`,
        participants: [participant, id],
      });
    }
  }
  for (const id of before.participants.keys()) {
    if (!after.participants.has(id)) {
      violations.push({
        invariant: 'frame',
        message: `${action} by ${participant} dropped ${id}`,
        participants: [participant, id],
      });
    }
  }

  const target = step.accepted ? TARGET_PHASE[action] : null;
  if (target === null) {
    if (!sameRecord(order, prior, next)) {
      violations.push({
        invariant: 'frame',
        message: `${step.accepted ? action : `rejected ${action}`} changed ${participant}`,
        participants: [participant],
      });
    }
  } else if (next.phase !== target || !VALID_PHASE_TRANSITIONS[prior.phase].includes(next.phase)) {
    violations.push({
      invariant: 'frame',
      message: `${action} moved ${participant} ${prior.phase} -> ${next.phase}`,
      participants: [participant],
    });
  }

  return violations;
}

// =============================================================================
// Verifier
// =============================================================================

/**
 * Stateful checker: remembers the highest ticket issued so far so that
 * issuance monotonicity is judged against the whole history.
 */
export class ProtocolVerifier<T> {
  private highest: T | undefined;

  constructor(private readonly order: TicketOrder<T>) {}

  get highestIssued(): T | undefined {
    return this.highest;
  }

  checkState(snapshot: ProtocolSnapshot<T>): InvariantViolation[] {
    return checkStateInvariants(this.order, snapshot);
  }

  /**
   * Check a step and the state it produced, then fold it into history
   */
  observe(
    before: ProtocolSnapshot<T>,
    step: ObservedStep<T>,
    after: ProtocolSnapshot<T>
  ): InvariantViolation[] {
    const violations = [
      ...checkTransition(this.order, before, step, after, this.highest),
      ...checkStateInvariants(this.order, after),
    ];

    if (step.accepted && step.action === 'request') {
      if (this.highest === undefined || precedes(this.order, this.highest, step.ticket)) {
        this.highest = step.ticket;
      }
    }

    return violations;
  }

  clone(): ProtocolVerifier<T> {
    const copy = new ProtocolVerifier(this.order);
    copy.highest = this.highest;
    return copy;
  }
}
