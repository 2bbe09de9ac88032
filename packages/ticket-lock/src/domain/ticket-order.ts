/**
 * Ordered Ticket Domain
 *
 * A totally ordered value type with a least element and an immediate
 * successor. The protocol only ever talks to tickets through this
 * contract, so the domain's axioms can be checked on their own before
 * they are composed with the protocol invariants.
 *
 * @module packages/ticket-lock/domain/ticket-order
 */

import { TicketDomainExhaustedError } from '../types.js';

// =============================================================================
// Contract
// =============================================================================

/**
 * Totally ordered ticket domain
 */
export interface TicketOrder<T> {
  /** Least element: `le(zero, x)` for every ticket */
  readonly zero: T;

  /** Reflexive, transitive, antisymmetric and total */
  le(a: T, b: T): boolean;

  /**
   * Immediate successor: strictly follows `x`, and nothing lies
   * strictly between `x` and the result.
   *
   * @throws TicketDomainExhaustedError when `x` is the last value
   */
  successor(x: T): T;

  /** Stable rendering, also used as a map key */
  format(x: T): string;
}

/** `a` strictly precedes `b` */
export function precedes<T>(order: TicketOrder<T>, a: T, b: T): boolean {
  return !order.le(b, a);
}

export function sameTicket<T>(order: TicketOrder<T>, a: T, b: T): boolean {
  return order.le(a, b) && order.le(b, a);
}

// =============================================================================
// Counter Implementation
// =============================================================================

/** 2^64 - 1 */
export const DEFAULT_MAX_TICKET = 18_446_744_073_709_551_615n;

export interface CounterOrderOptions {
  /**
   * Largest representable ticket.
   * @default DEFAULT_MAX_TICKET
   */
  max?: bigint;
}

/**
 * Unsigned counter domain over `[0n, max]`.
 * `successor(max)` throws instead of wrapping.
 */
export function createCounterOrder(options: CounterOrderOptions = {}): TicketOrder<bigint> {
  const max = options.max ?? DEFAULT_MAX_TICKET;
  if (max < 1n) {
    throw new RangeError(`max ticket must be at least 1, got ${max}`);
  }

  return {
    zero: 0n,
    le: (a, b) => a <= b,
    successor: (x) => {
      if (x >= max) {
        throw new TicketDomainExhaustedError(x.toString());
      }
      return x + 1n;
    },
    format: (x) => x.toString(),
  };
}

// =============================================================================
// Axiom Checks
// =============================================================================

export type OrderAxiom =
  | 'reflexive'
  | 'antisymmetric'
  | 'transitive'
  | 'total'
  | 'zero-minimum'
  | 'successor-follows'
  | 'successor-immediate';

export interface OrderAxiomViolation {
  axiom: OrderAxiom;
  /** Formatted witnesses */
  witnesses: string[];
}

/**
 * Check the order axioms over a finite sample of tickets.
 *
 * Antisymmetry is checked through `format`: two tickets that are mutually
 * `le` must render identically. Tickets whose successor is out of domain
 * are skipped for the successor axioms.
 */
export function verifyTicketOrder<T>(order: TicketOrder<T>, samples: readonly T[]): OrderAxiomViolation[] {
  const violations: OrderAxiomViolation[] = [];
  const report = (axiom: OrderAxiom, ...values: T[]) => {
    violations.push({ axiom, witnesses: values.map((v) => order.format(v)) });
  };

  for (const a of samples) {
    if (!order.le(a, a)) report('reflexive', a);
    if (!order.le(order.zero, a)) report('zero-minimum', a);

    for (const b of samples) {
      if (!order.le(a, b) && !order.le(b, a)) report('total', a, b);
      if (order.le(a, b) && order.le(b, a) && order.format(a) !== order.format(b)) {
        report('antisymmetric', a, b);
      }
      for (const c of samples) {
        if (order.le(a, b) && order.le(b, c) && !order.le(a, c)) report('transitive', a, b, c);
      }
    }

    let next: T;
    try {
      next = order.successor(a);
    } catch (error) {
      if (error instanceof TicketDomainExhaustedError) continue;
      throw error;
    }

    if (!precedes(order, a, next)) report('successor-follows', a, next);
    for (const b of samples) {
      // Nothing strictly between a and successor(a)
      if (precedes(order, a, b) && precedes(order, b, next)) report('successor-immediate', a, b, next);
    }
  }

  return violations;
}
