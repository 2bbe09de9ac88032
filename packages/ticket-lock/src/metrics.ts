/**
 * Ticket Lock Metrics
 *
 * Prometheus-compatible metrics for protocol actions. Every series is
 * labelled with the lock name so several locks can share one process.
 *
 * Can be merged with an application registry:
 * ```typescript
 * import { register } from 'prom-client';
 * import { ticketLockRegistry } from '@turnstile/ticket-lock';
 * register.merge(ticketLockRegistry);
 * ```
 *
 * @module packages/ticket-lock/metrics
 */

import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { ProtocolAction } from './types.js';

// =============================================================================
// Registry
// =============================================================================

export const ticketLockRegistry = new Registry();

// =============================================================================
// Protocol Metrics
// =============================================================================

export const ticketsIssued = new Counter({
  name: 'ticket_lock_tickets_issued_total',
  help: 'Tickets handed out by the dispenser',
  labelNames: ['lock'] as const,
  registers: [ticketLockRegistry],
});

export const admissions = new Counter({
  name: 'ticket_lock_admissions_total',
  help: 'Participants admitted to the critical section',
  labelNames: ['lock'] as const,
  registers: [ticketLockRegistry],
});

export const releases = new Counter({
  name: 'ticket_lock_releases_total',
  help: 'Critical section exits',
  labelNames: ['lock'] as const,
  registers: [ticketLockRegistry],
});

export const contractViolations = new Counter({
  name: 'ticket_lock_contract_violations_total',
  help: 'Actions rejected because their precondition did not hold',
  labelNames: ['lock', 'action'] as const,
  registers: [ticketLockRegistry],
});

export const queueDepth = new Gauge({
  name: 'ticket_lock_queue_depth',
  help: 'Tickets issued but not yet served',
  labelNames: ['lock'] as const,
  registers: [ticketLockRegistry],
});

export const waitDuration = new Histogram({
  name: 'ticket_lock_wait_duration_seconds',
  help: 'Time from ticket request to admission',
  labelNames: ['lock'] as const,
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [ticketLockRegistry],
});

// =============================================================================
// Recording Helpers
// =============================================================================

export function recordAction(lock: string, action: ProtocolAction): void {
  switch (action) {
    case 'request':
      ticketsIssued.inc({ lock });
      break;
    case 'enter':
      admissions.inc({ lock });
      break;
    case 'exit':
      releases.inc({ lock });
      break;
    case 'wait':
      break;
  }
}

export function recordContractViolation(lock: string, action: ProtocolAction): void {
  contractViolations.inc({ lock, action });
}

export function updateQueueDepth(lock: string, depth: number): void {
  queueDepth.set({ lock }, depth);
}

export function recordWait(lock: string, seconds: number): void {
  waitDuration.observe({ lock }, seconds);
}
