/**
 * Protocol Drivers
 *
 * A driver applies "the next enabled action" for a chosen participant.
 * Exactly one action is enabled per participant at any time:
 *
 *   idle      → request
 *   awaiting  → enter when holding the serving ticket, otherwise wait
 *   critical  → exit
 *
 * so a schedule (a sequence of participants) fully determines a run.
 *
 * @module packages/ticket-lock/harness/driver
 */

import { ProtocolVerifier } from '../protocol/invariants.js';
import type { TicketLockProtocol } from '../protocol/state-machine.js';
import {
  InvariantViolationError,
  ProtocolContractViolation,
  type InvariantViolation,
  type ParticipantId,
  type ProtocolAction,
  type ProtocolSnapshot,
} from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * One applied step, with the state on either side
 */
export interface StepRecord<T> {
  index: number;
  participant: ParticipantId;
  action: ProtocolAction;
  ticket: T;
  before: ProtocolSnapshot<T>;
  after: ProtocolSnapshot<T>;
  /** Violations found after this step (empty when all invariants hold) */
  violations: InvariantViolation[];
}

/**
 * Anything that can apply the next enabled action for a participant
 */
export interface ProtocolDriver<T> {
  step(participant: ParticipantId): StepRecord<T>;
}

export interface VerifyingDriverOptions {
  /**
   * On every wait step also attempt an enter and require it to be
   * refused with a contract violation.
   * @default false
   */
  probeAdmission?: boolean;
}

/**
 * The single action enabled for a participant in the current state
 */
export function enabledAction<T>(protocol: TicketLockProtocol<T>, participant: ParticipantId): ProtocolAction {
  switch (protocol.phaseOf(participant)) {
    case 'idle':
      return 'request';
    case 'awaiting':
      return protocol.isAdmissible(participant) ? 'enter' : 'wait';
    case 'critical':
      return 'exit';
  }
}

// =============================================================================
// VerifyingDriver
// =============================================================================

/**
 * Applies enabled actions and checks the full invariant battery after
 * each one. Violations are recorded on the step rather than thrown.
 */
export class VerifyingDriver<T> implements ProtocolDriver<T> {
  private readonly verifier: ProtocolVerifier<T>;
  private readonly probeAdmission: boolean;
  private applied = 0;

  constructor(
    private readonly protocol: TicketLockProtocol<T>,
    options: VerifyingDriverOptions = {},
    verifier?: ProtocolVerifier<T>
  ) {
    this.verifier = verifier ?? new ProtocolVerifier(protocol.order);
    this.probeAdmission = options.probeAdmission ?? false;
  }

  get steps(): number {
    return this.applied;
  }

  snapshot(): ProtocolSnapshot<T> {
    return this.protocol.snapshot();
  }

  /** Invariants of the current state, without stepping */
  checkState(): InvariantViolation[] {
    return this.verifier.checkState(this.protocol.snapshot());
  }

  step(participant: ParticipantId): StepRecord<T> {
    const before = this.protocol.snapshot();
    const action = enabledAction(this.protocol, participant);
    const violations: InvariantViolation[] = [];
    let ticket = this.protocol.ticketOf(participant);

    try {
      switch (action) {
        case 'request':
          ticket = this.protocol.requestTicket(participant).ticket;
          break;
        case 'wait':
          this.protocol.wait(participant, ticket);
          break;
        case 'enter':
          this.protocol.enter(participant, ticket);
          break;
        case 'exit':
          ticket = this.protocol.exit(participant);
          break;
      }
    } catch (error) {
      // Raised by the protocol's own assertions when they are enabled
      if (!(error instanceof InvariantViolationError)) throw error;
      violations.push(...error.violations);
    }

    const after = this.protocol.snapshot();
    violations.push(...this.verifier.observe(before, { participant, action, ticket, accepted: true }, after));

    if (this.probeAdmission && action === 'wait' && violations.length === 0) {
      violations.push(...this.tryRefusedEnter(participant, ticket));
    }

    return { index: this.applied++, participant, action, ticket, before, after, violations };
  }

  clone(): VerifyingDriver<T> {
    const copy = new VerifyingDriver(
      this.protocol.clone(),
      { probeAdmission: this.probeAdmission },
      this.verifier.clone()
    );
    copy.applied = this.applied;
    return copy;
  }

  /**
   * A waiting participant must be refused entry, and the refusal must not
   * change anything.
   */
  private tryRefusedEnter(participant: ParticipantId, ticket: T): InvariantViolation[] {
    const before = this.protocol.snapshot();
    let accepted = true;
    try {
      this.protocol.enter(participant, ticket);
    } catch (error) {
      if (!(error instanceof ProtocolContractViolation)) throw error;
      accepted = false;
    }
    const after = this.protocol.snapshot();
    return this.verifier.observe(before, { participant, action: 'enter', ticket, accepted }, after);
  }
}
