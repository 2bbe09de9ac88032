/**
 * Ticket Lock Types - shared type definitions
 *
 * @module packages/ticket-lock/types
 */

// =============================================================================
// Participants
// =============================================================================

/**
 * Opaque identity of a contender (task, worker, simulated thread)
 */
export type ParticipantId = string;

/**
 * Participant lifecycle phase
 *
 * Phase transitions:
 * - Idle → Awaiting (request)
 * - Awaiting → Critical (enter, only while holding the serving ticket)
 * - Critical → Idle (exit)
 */
export type Phase = 'idle' | 'awaiting' | 'critical';

export const PHASES: readonly Phase[] = ['idle', 'awaiting', 'critical'];

/**
 * Valid phase transitions
 */
export const VALID_PHASE_TRANSITIONS: Record<Phase, Phase[]> = {
  idle: ['awaiting'],
  awaiting: ['critical'],
  critical: ['idle'],
};

/**
 * Per-participant record held by the registry
 */
export interface ParticipantRecord<T> {
  /** Current lifecycle phase */
  phase: Phase;
  /** Held ticket; the domain's zero while idle */
  ticket: T;
}

// =============================================================================
// Protocol Actions
// =============================================================================

/**
 * The four admissible protocol actions
 */
export type ProtocolAction = 'request' | 'wait' | 'enter' | 'exit';

/**
 * Ticket handed back by a request.
 *
 * Handles are frozen; `TicketLock` only accepts handles it issued itself.
 */
export interface TicketHandle<T> {
  readonly participant: ParticipantId;
  readonly ticket: T;
  /** Epoch millis at issuance */
  readonly issuedAt: number;
}

/**
 * Immutable view of the whole protocol state
 */
export interface ProtocolSnapshot<T> {
  readonly nextTicket: T;
  readonly serving: T;
  readonly participants: ReadonlyMap<ParticipantId, Readonly<ParticipantRecord<T>>>;
}

// =============================================================================
// Invariants
// =============================================================================

/**
 * State invariants checked against a single snapshot
 */
export type StateInvariantId =
  | 'phase-partition'
  | 'single-ownership'
  | 'mutual-exclusion'
  | 'serving-bound'
  | 'unique-tickets'
  | 'idle-holds-zero'
  | 'critical-holds-serving'
  | 'outstanding-range'
  | 'queue-coverage';

/**
 * Transition checks over a (before, step, after) triple
 */
export type TransitionInvariantId =
  | 'issuance-monotonic'
  | 'admission-correct'
  | 'counters-monotonic'
  | 'frame';

export type InvariantId = StateInvariantId | TransitionInvariantId;

/**
 * A single violated invariant
 */
export interface InvariantViolation {
  invariant: InvariantId;
  message: string;
  /** Participants implicated in the violation */
  participants?: ParticipantId[];
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Ticket lock error codes
 */
export enum TicketLockErrorCode {
  /** Action precondition did not hold (caller misuse) */
  CONTRACT_VIOLATION = 'TICKET_LOCK_001',
  /** Ticket domain has no successor left */
  DOMAIN_EXHAUSTED = 'TICKET_LOCK_002',
  /** An invariant failed after an action */
  INVARIANT_VIOLATED = 'TICKET_LOCK_003',
  /** Environment configuration is invalid */
  CONFIG_INVALID = 'TICKET_LOCK_004',
}

/**
 * Base error for the ticket lock package
 */
export class TicketLockError extends Error {
  constructor(
    public readonly code: TicketLockErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TicketLockError';
  }
}

/**
 * Raised when an action is applied while its precondition does not hold.
 * Always a programming error; never retried.
 */
export class ProtocolContractViolation extends TicketLockError {
  constructor(
    public readonly action: ProtocolAction,
    public readonly participant: ParticipantId,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(TicketLockErrorCode.CONTRACT_VIOLATION, message, { action, participant, ...details });
    this.name = 'ProtocolContractViolation';
  }
}

/**
 * Raised when the ticket domain cannot produce a successor.
 * Treated as a fatal configuration error.
 */
export class TicketDomainExhaustedError extends TicketLockError {
  constructor(last: string) {
    super(
      TicketLockErrorCode.DOMAIN_EXHAUSTED,
      `Ticket domain exhausted: ${last} has no successor`,
      { last }
    );
    this.name = 'TicketDomainExhaustedError';
  }
}

/**
 * Raised by debug assertions when one or more invariants fail
 */
export class InvariantViolationError extends TicketLockError {
  constructor(public readonly violations: InvariantViolation[]) {
    super(
      TicketLockErrorCode.INVARIANT_VIOLATED,
      `Invariant violated: ${violations.map((v) => v.invariant).join(', ')}`,
      { violations }
    );
    this.name = 'InvariantViolationError';
  }
}

/**
 * Raised by loadConfig when the environment fails validation
 */
export class ConfigValidationError extends TicketLockError {
  constructor(public readonly issues: string[]) {
    super(
      TicketLockErrorCode.CONFIG_INVALID,
      `Configuration validation failed:\n${issues.join('\n')}`,
      { issues }
    );
    this.name = 'ConfigValidationError';
  }
}
