/**
 * Exhaustive Interleaving Explorer
 *
 * Breadth-first search over every schedule of `participants` participants
 * up to `maxDepth` steps. States already seen at a shallower depth are not
 * expanded again, so each distinct state is checked once. Breadth-first
 * order makes the reported counterexample a shortest one.
 *
 * @module packages/ticket-lock/harness/explorer
 */

import type { Logger } from 'pino';
import type { TicketOrder } from '../domain/ticket-order.js';
import { createSilentLogger } from '../logger.js';
import type { InvariantViolation, ProtocolSnapshot } from '../types.js';
import type { VerifyingDriver } from './driver.js';
import { createVerifyingDriver, participantIds, toTraceEntry, type TraceEntry } from './simulation.js';

export interface ExploreOptions<T> {
  order: TicketOrder<T>;
  participants: number;
  maxDepth: number;
  probeAdmission?: boolean;
  /**
   * Stop expanding once this many distinct states were seen.
   * @default 250_000
   */
  maxStates?: number;
  logger?: Logger;
}

export interface ExploreReport {
  ok: boolean;
  statesVisited: number;
  transitions: number;
  depthReached: number;
  /** True when maxStates cut the search short */
  truncated: boolean;
  /** Most tickets outstanding at once in any visited state */
  maxQueueDepth: number;
  violation?: {
    trace: TraceEntry[];
    violations: InvariantViolation[];
  };
}

interface Node<T> {
  driver: VerifyingDriver<T>;
  depth: number;
  trace: TraceEntry[];
}

const DEFAULT_MAX_STATES = 250_000;

/**
 * Canonical key of a state: both counters plus every participant record
 */
export function stateKey<T>(order: TicketOrder<T>, snapshot: ProtocolSnapshot<T>): string {
  const parts = [order.format(snapshot.nextTicket), order.format(snapshot.serving)];
  for (const [id, record] of snapshot.participants) {
    parts.push(`${id}:${record.phase}:${order.format(record.ticket)}`);
  }
  return parts.join('|');
}

function outstanding<T>(snapshot: ProtocolSnapshot<T>): number {
  let count = 0;
  for (const record of snapshot.participants.values()) {
    if (record.phase !== 'idle') count++;
  }
  return count;
}

export function exploreInterleavings<T>(options: ExploreOptions<T>): ExploreReport {
  const logger = (options.logger ?? createSilentLogger()).child({ component: 'exploreInterleavings' });
  const { order, maxDepth } = options;
  const maxStates = options.maxStates ?? DEFAULT_MAX_STATES;
  const ids = participantIds(options.participants);
  const root = createVerifyingDriver(order, ids, options.probeAdmission);

  const report: ExploreReport = {
    ok: true,
    statesVisited: 1,
    transitions: 0,
    depthReached: 0,
    truncated: false,
    maxQueueDepth: 0,
  };

  const initial = root.checkState();
  if (initial.length > 0) {
    return { ...report, ok: false, violation: { trace: [], violations: initial } };
  }

  const visited = new Set<string>([stateKey(order, root.snapshot())]);
  const queue: (Node<T> | undefined)[] = [{ driver: root, depth: 0, trace: [] }];

  search: for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    if (!node || node.depth >= maxDepth) continue;

    for (const id of ids) {
      const driver = node.driver.clone();
      const step = driver.step(id);
      const trace = [...node.trace, toTraceEntry(order, step)];
      report.transitions++;

      if (step.violations.length > 0) {
        report.ok = false;
        report.violation = { trace, violations: step.violations };
        break search;
      }

      const key = stateKey(order, step.after);
      if (visited.has(key)) continue;

      visited.add(key);
      report.depthReached = Math.max(report.depthReached, node.depth + 1);
      report.maxQueueDepth = Math.max(report.maxQueueDepth, outstanding(step.after));

      if (visited.size >= maxStates) {
        report.truncated = true;
        break search;
      }
      queue.push({ driver, depth: node.depth + 1, trace });
    }

    // Expanded nodes are never revisited
    queue[head] = undefined;
  }

  report.statesVisited = visited.size;

  logger.info(
    {
      participants: options.participants,
      maxDepth,
      states: report.statesVisited,
      transitions: report.transitions,
      ok: report.ok,
      truncated: report.truncated,
    },
    'Exploration finished'
  );

  return report;
}
