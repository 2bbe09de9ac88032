/**
 * Ticket Lock Protocol State Machine
 *
 * Per participant: idle → awaiting → critical → idle.
 *
 * Actions:
 *   request(p)   p idle                                 → issued a ticket, awaiting
 *   wait(p, k)   p awaiting, holds k, k != serving      → no change
 *   enter(p, k)  p awaiting, holds k, k == serving      → critical
 *   exit(p)      p critical                             → serving advances, idle
 *
 * Every action body is synchronous and never yields, so the event loop is
 * the single mutual exclusion primitive guarding {nextTicket, serving,
 * registry}: no other action can observe a half-applied step.
 *
 * @module packages/ticket-lock/protocol/state-machine
 */

import type { Logger } from 'pino';
import { TicketDispenser } from '../domain/dispenser.js';
import { ParticipantRegistry } from '../domain/registry.js';
import { sameTicket, type TicketOrder } from '../domain/ticket-order.js';
import { defaultCheckInvariants } from '../config.js';
import { createSilentLogger } from '../logger.js';
import { recordAction, recordContractViolation, updateQueueDepth } from '../metrics.js';
import {
  InvariantViolationError,
  ProtocolContractViolation,
  type ParticipantId,
  type ParticipantRecord,
  type Phase,
  type ProtocolAction,
  type ProtocolSnapshot,
  type TicketHandle,
} from '../types.js';
import { ProtocolVerifier, type ObservedStep } from './invariants.js';

// =============================================================================
// Shared State
// =============================================================================

/**
 * The whole mutable protocol state, passed explicitly to the machine
 */
export interface ProtocolState<T> {
  readonly order: TicketOrder<T>;
  readonly dispenser: TicketDispenser<T>;
  readonly registry: ParticipantRegistry<T>;
}

export function createProtocolState<T>(
  order: TicketOrder<T>,
  participants: Iterable<ParticipantId> = []
): ProtocolState<T> {
  return {
    order,
    dispenser: new TicketDispenser(order),
    registry: new ParticipantRegistry(order, participants),
  };
}

export function cloneProtocolState<T>(state: ProtocolState<T>): ProtocolState<T> {
  return {
    order: state.order,
    dispenser: state.dispenser.clone(),
    registry: state.registry.clone(),
  };
}

/**
 * Frozen copy of the state; later actions do not show through it
 */
export function snapshotOf<T>(state: ProtocolState<T>): ProtocolSnapshot<T> {
  const participants = new Map<ParticipantId, Readonly<ParticipantRecord<T>>>();
  for (const [id, record] of state.registry.entries()) {
    participants.set(id, Object.freeze({ ...record }));
  }
  return Object.freeze({
    nextTicket: state.dispenser.nextTicket,
    serving: state.dispenser.serving,
    participants,
  });
}

// =============================================================================
// Configuration
// =============================================================================

export interface TicketLockProtocolConfig<T> {
  /** Shared state; create with createProtocolState */
  state: ProtocolState<T>;

  /** Label used in logs and metrics */
  name?: string;

  /**
   * Re-check every invariant after each action and throw
   * InvariantViolationError on failure.
   * @default true unless NODE_ENV is production; see defaultCheckInvariants
   */
  checkInvariants?: boolean;

  /** Record prom-client metrics. @default true */
  metrics?: boolean;

  logger?: Logger;
}

const DEFAULT_NAME = 'ticket-lock';

// =============================================================================
// TicketLockProtocol
// =============================================================================

export class TicketLockProtocol<T> {
  readonly name: string;
  private readonly state: ProtocolState<T>;
  private readonly baseLogger: Logger;
  private readonly logger: Logger;
  private readonly metrics: boolean;
  private readonly verifier: ProtocolVerifier<T> | null;
  private outstanding: number;

  constructor(config: TicketLockProtocolConfig<T>) {
    this.state = config.state;
    this.name = config.name ?? DEFAULT_NAME;
    this.metrics = config.metrics ?? true;
    this.baseLogger = config.logger ?? createSilentLogger();
    this.logger = this.baseLogger.child({
      component: 'TicketLockProtocol',
      lock: this.name,
    });
    const checkInvariants = config.checkInvariants ?? defaultCheckInvariants();
    this.verifier = checkInvariants ? new ProtocolVerifier(this.state.order) : null;
    this.outstanding = this.state.registry.size - this.state.registry.inPhase('idle').length;

    if (this.verifier) {
      const violations = this.verifier.checkState(this.snapshot());
      if (violations.length > 0) {
        throw new InvariantViolationError(violations);
      }
    }
  }

  get order(): TicketOrder<T> {
    return this.state.order;
  }

  get checksInvariants(): boolean {
    return this.verifier !== null;
  }

  /** Tickets issued but not yet released */
  get queueDepth(): number {
    return this.outstanding;
  }

  get serving(): T {
    return this.state.dispenser.serving;
  }

  get nextTicket(): T {
    return this.state.dispenser.nextTicket;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  phaseOf(participant: ParticipantId): Phase {
    return this.state.registry.get(participant).phase;
  }

  ticketOf(participant: ParticipantId): T {
    return this.state.registry.get(participant).ticket;
  }

  /** Awaiting and holding the serving ticket */
  isAdmissible(participant: ParticipantId): boolean {
    const record = this.state.registry.get(participant);
    return record.phase === 'awaiting' && this.state.dispenser.isCurrent(record.ticket);
  }

  snapshot(): ProtocolSnapshot<T> {
    return snapshotOf(this.state);
  }

  // ===========================================================================
  // Actions
  // ===========================================================================

  /**
   * Draw the next ticket and start awaiting
   *
   * @throws ProtocolContractViolation if the participant is not idle
   * @throws TicketDomainExhaustedError if the domain has no successor left
   */
  requestTicket(participant: ParticipantId): TicketHandle<T> {
    const record = this.state.registry.get(participant);
    if (record.phase !== 'idle') {
      this.reject('request', participant, record.ticket, `${participant} is ${record.phase}, not idle`);
    }

    const before = this.verifier ? this.snapshot() : null;
    const ticket = this.state.dispenser.issue();
    this.state.registry.set(participant, 'awaiting', ticket);
    this.outstanding++;

    this.settle(before, { participant, action: 'request', ticket, accepted: true });
    this.logger.debug({ participant, ticket: this.fmt(ticket) }, 'Ticket issued');

    return Object.freeze({ participant, ticket, issuedAt: Date.now() });
  }

  /**
   * Non-admission check: succeeds only while the participant must keep waiting
   *
   * @throws ProtocolContractViolation if not awaiting, not holding `ticket`,
   *   or `ticket` is already being served
   */
  wait(participant: ParticipantId, ticket: T): void {
    this.requireHolder('wait', participant, ticket);
    if (this.state.dispenser.isCurrent(ticket)) {
      this.reject('wait', participant, ticket, `${participant} holds the serving ticket ${this.fmt(ticket)}`);
    }

    const before = this.verifier ? this.snapshot() : null;
    this.settle(before, { participant, action: 'wait', ticket, accepted: true });
  }

  /**
   * Admission: the only way into the critical section
   *
   * @throws ProtocolContractViolation if not awaiting, not holding `ticket`,
   *   or `ticket` is not the serving ticket
   */
  enter(participant: ParticipantId, ticket: T): void {
    this.requireHolder('enter', participant, ticket);
    if (!this.state.dispenser.isCurrent(ticket)) {
      this.reject(
        'enter',
        participant,
        ticket,
        `${participant} holds ${this.fmt(ticket)} but serving is ${this.fmt(this.state.dispenser.serving)}`
      );
    }

    const before = this.verifier ? this.snapshot() : null;
    this.state.registry.set(participant, 'critical', ticket);

    this.settle(before, { participant, action: 'enter', ticket, accepted: true });
    this.logger.debug({ participant, ticket: this.fmt(ticket) }, 'Entered critical section');
  }

  /**
   * Leave the critical section and pass the turn on
   *
   * @returns The ticket that was released
   * @throws ProtocolContractViolation if the participant is not critical
   */
  exit(participant: ParticipantId): T {
    const record = this.state.registry.get(participant);
    if (record.phase !== 'critical') {
      this.reject('exit', participant, record.ticket, `${participant} is ${record.phase}, not critical`);
    }

    const before = this.verifier ? this.snapshot() : null;
    const ticket = record.ticket;
    this.state.dispenser.advanceServing();
    this.state.registry.set(participant, 'idle', this.state.order.zero);
    this.outstanding--;

    this.settle(before, { participant, action: 'exit', ticket, accepted: true });
    this.logger.debug(
      { participant, ticket: this.fmt(ticket), serving: this.fmt(this.state.dispenser.serving) },
      'Left critical section'
    );

    return ticket;
  }

  /**
   * Independent copy for exploration; never records metrics
   */
  clone(): TicketLockProtocol<T> {
    return new TicketLockProtocol<T>({
      state: cloneProtocolState(this.state),
      name: this.name,
      checkInvariants: false,
      metrics: false,
      logger: this.baseLogger,
    });
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private fmt(ticket: T): string {
    return this.state.order.format(ticket);
  }

  private requireHolder(action: ProtocolAction, participant: ParticipantId, ticket: T): void {
    const record = this.state.registry.get(participant);
    if (record.phase !== 'awaiting') {
      this.reject(action, participant, ticket, `${participant} is ${record.phase}, not awaiting`);
    }
    if (!sameTicket(this.state.order, record.ticket, ticket)) {
      this.reject(
        action,
        participant,
        ticket,
        `${participant} presented ${this.fmt(ticket)} but holds ${this.fmt(record.ticket)}`
      );
    }
  }

  private reject(action: ProtocolAction, participant: ParticipantId, ticket: T, message: string): never {
    if (this.metrics) recordContractViolation(this.name, action);
    this.logger.warn({ participant, action, ticket: this.fmt(ticket) }, 'Contract violation');

    if (this.verifier) {
      // A rejection must leave the state exactly as it was
      const snapshot = this.snapshot();
      const violations = this.verifier.observe(snapshot, { participant, action, ticket, accepted: false }, snapshot);
      if (violations.length > 0) {
        throw new InvariantViolationError(violations);
      }
    }

    throw new ProtocolContractViolation(action, participant, message, {
      ticket: this.fmt(ticket),
      serving: this.fmt(this.state.dispenser.serving),
    });
  }

  private settle(before: ProtocolSnapshot<T> | null, step: ObservedStep<T>): void {
    if (this.metrics) {
      recordAction(this.name, step.action);
      if (step.action !== 'wait') updateQueueDepth(this.name, this.outstanding);
    }

    if (this.verifier && before) {
      const violations = this.verifier.observe(before, step, this.snapshot());
      if (violations.length > 0) {
        this.logger.error({ violations, step: { ...step, ticket: this.fmt(step.ticket) } }, 'Invariant violated');
        throw new InvariantViolationError(violations);
      }
    }
  }
}
