/**
 * Interleaving Simulation
 *
 * Replays schedules against a fresh protocol with full verification,
 * and searches random schedules with fast-check.
 *
 * @module packages/ticket-lock/harness/simulation
 */

import fc from 'fast-check';
import type { Logger } from 'pino';
import type { TicketOrder } from '../domain/ticket-order.js';
import { createSilentLogger } from '../logger.js';
import { createProtocolState, TicketLockProtocol } from '../protocol/state-machine.js';
import type { InvariantViolation, ParticipantId, ProtocolAction, ProtocolSnapshot } from '../types.js';
import { VerifyingDriver, type StepRecord } from './driver.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Printable step, tickets already formatted
 */
export interface TraceEntry {
  participant: ParticipantId;
  action: ProtocolAction;
  ticket: string;
}

export interface SimulationOptions<T> {
  order: TicketOrder<T>;

  /** Number of participants, named p0..p(n-1) */
  participants: number;

  /** Participant indexes; taken modulo the participant count */
  schedule: readonly number[];

  /** @see VerifyingDriverOptions.probeAdmission */
  probeAdmission?: boolean;
}

export interface SimulationReport<T> {
  ok: boolean;
  steps: number;
  admissions: number;
  releases: number;
  trace: TraceEntry[];
  /** First violating step, if any; the run stops there */
  failure?: {
    step: StepRecord<T>;
    violations: InvariantViolation[];
  };
  final: ProtocolSnapshot<T>;
}

export interface StressOptions<T> {
  order: TicketOrder<T>;
  participants: number;
  /** Longest schedule generated */
  steps: number;
  runs: number;
  /** Reproduce a previous run */
  seed?: number;
  probeAdmission?: boolean;
  logger?: Logger;
}

export interface StressReport<T> {
  ok: boolean;
  runs: number;
  seed: number;
  /** Shrunk failing schedule and its replay */
  counterexample?: {
    schedule: number[];
    report: SimulationReport<T>;
  };
}

// =============================================================================
// Helpers
// =============================================================================

export function participantIds(count: number): ParticipantId[] {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`participant count must be a positive integer, got ${count}`);
  }
  return Array.from({ length: count }, (_, i) => `p${i}`);
}

/**
 * A driver over a fresh protocol with every participant registered idle
 */
export function createVerifyingDriver<T>(
  order: TicketOrder<T>,
  participants: readonly ParticipantId[],
  probeAdmission = false
): VerifyingDriver<T> {
  const protocol = new TicketLockProtocol({
    state: createProtocolState(order, participants),
    name: 'harness',
    // The driver runs its own verifier
    checkInvariants: false,
    metrics: false,
  });
  return new VerifyingDriver(protocol, { probeAdmission });
}

export function toTraceEntry<T>(order: TicketOrder<T>, step: StepRecord<T>): TraceEntry {
  return { participant: step.participant, action: step.action, ticket: order.format(step.ticket) };
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Deterministically replay a schedule, stopping at the first violation
 */
export function runSchedule<T>(options: SimulationOptions<T>): SimulationReport<T> {
  const ids = participantIds(options.participants);
  const driver = createVerifyingDriver(options.order, ids, options.probeAdmission);
  const trace: TraceEntry[] = [];
  let admissions = 0;
  let releases = 0;

  const initial = driver.checkState();
  if (initial.length > 0) {
    return { ok: false, steps: 0, admissions, releases, trace, final: driver.snapshot() };
  }

  for (const index of options.schedule) {
    const participant = ids[Math.abs(index) % ids.length];
    if (participant === undefined) {
      throw new RangeError(`invalid schedule entry ${index}`);
    }
    const step = driver.step(participant);
    trace.push(toTraceEntry(options.order, step));

    if (step.action === 'enter') admissions++;
    if (step.action === 'exit') releases++;

    if (step.violations.length > 0) {
      return {
        ok: false,
        steps: trace.length,
        admissions,
        releases,
        trace,
        failure: { step, violations: step.violations },
        final: step.after,
      };
    }
  }

  return { ok: true, steps: trace.length, admissions, releases, trace, final: driver.snapshot() };
}

/**
 * Randomized interleavings. fast-check generates schedules and shrinks
 * any failing one to a minimal counterexample.
 */
export function stressTest<T>(options: StressOptions<T>): StressReport<T> {
  const logger = (options.logger ?? createSilentLogger()).child({ component: 'stressTest' });
  const replay = (schedule: readonly number[]) =>
    runSchedule({
      order: options.order,
      participants: options.participants,
      schedule,
      probeAdmission: options.probeAdmission,
    });

  const property = fc.property(
    fc.array(fc.nat({ max: options.participants - 1 }), { minLength: 1, maxLength: options.steps }),
    (schedule) => replay(schedule).ok
  );

  const details = fc.check(property, {
    numRuns: options.runs,
    ...(options.seed !== undefined ? { seed: options.seed } : {}),
  });

  logger.info(
    { runs: details.numRuns, seed: details.seed, failed: details.failed, shrinks: details.numShrinks },
    'Stress run finished'
  );

  if (details.failed && details.counterexample) {
    const [schedule] = details.counterexample;
    return {
      ok: false,
      runs: details.numRuns,
      seed: details.seed,
      counterexample: { schedule, report: replay(schedule) },
    };
  }

  return { ok: true, runs: details.numRuns, seed: details.seed };
}
