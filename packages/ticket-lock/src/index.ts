/**
 * Ticket Lock Package
 *
 * Ticket-based mutual exclusion: contenders draw increasing tickets and
 * are admitted strictly in ticket order. Provides the protocol state
 * machine, its invariant battery, an interleaving harness for checking
 * the invariants over arbitrary schedules, and an async lock API.
 *
 * @module @turnstile/ticket-lock
 */

// =============================================================================
// Type Exports
// =============================================================================

export type {
  ParticipantId,
  Phase,
  ParticipantRecord,
  ProtocolAction,
  TicketHandle,
  ProtocolSnapshot,
  StateInvariantId,
  TransitionInvariantId,
  InvariantId,
  InvariantViolation,
} from './types.js';

export {
  PHASES,
  VALID_PHASE_TRANSITIONS,
  TicketLockErrorCode,
  TicketLockError,
  ProtocolContractViolation,
  TicketDomainExhaustedError,
  InvariantViolationError,
  ConfigValidationError,
} from './types.js';

// =============================================================================
// Domain Exports
// =============================================================================

export {
  createCounterOrder,
  verifyTicketOrder,
  precedes,
  sameTicket,
  DEFAULT_MAX_TICKET,
  TicketDispenser,
  ParticipantRegistry,
} from './domain/index.js';

export type {
  TicketOrder,
  CounterOrderOptions,
  OrderAxiom,
  OrderAxiomViolation,
} from './domain/index.js';

// =============================================================================
// Protocol Exports
// =============================================================================

export {
  TicketLockProtocol,
  createProtocolState,
  cloneProtocolState,
  snapshotOf,
  checkStateInvariants,
  checkTransition,
  ProtocolVerifier,
} from './protocol/index.js';

export type { ProtocolState, TicketLockProtocolConfig, ObservedStep } from './protocol/index.js';

// =============================================================================
// Harness Exports
// =============================================================================

export {
  VerifyingDriver,
  enabledAction,
  runSchedule,
  stressTest,
  participantIds,
  createVerifyingDriver,
  toTraceEntry,
  exploreInterleavings,
  stateKey,
} from './harness/index.js';

export type {
  ProtocolDriver,
  StepRecord,
  VerifyingDriverOptions,
  SimulationOptions,
  SimulationReport,
  StressOptions,
  StressReport,
  TraceEntry,
  ExploreOptions,
  ExploreReport,
} from './harness/index.js';

// =============================================================================
// Lock Exports
// =============================================================================

export { TicketLock } from './lock/ticket-lock.js';
export type { TicketLockConfig, TicketLockStats } from './lock/ticket-lock.js';

// =============================================================================
// Ambient Exports
// =============================================================================

export { loadConfig, defaultCheckInvariants } from './config.js';
export type { Config } from './config.js';
export { createLogger, createSilentLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';
export {
  ticketLockRegistry,
  ticketsIssued,
  admissions,
  releases,
  contractViolations,
  queueDepth,
  waitDuration,
  recordAction,
  recordContractViolation,
  updateQueueDepth,
  recordWait,
} from './metrics.js';
