/**
 * Ticket Dispenser - global issuance state
 *
 * @module packages/ticket-lock/domain/dispenser
 */

import { sameTicket, type TicketOrder } from './ticket-order.js';

export class TicketDispenser<T> {
  private next: T;
  private current: T;

  constructor(
    private readonly order: TicketOrder<T>,
    initial?: { nextTicket: T; serving: T }
  ) {
    this.next = initial?.nextTicket ?? order.zero;
    this.current = initial?.serving ?? order.zero;
  }

  /** Next value to hand out */
  get nextTicket(): T {
    return this.next;
  }

  /** Ticket currently allowed into the protected region */
  get serving(): T {
    return this.current;
  }

  /**
   * Hand out the next ticket and advance the counter.
   * The successor is computed first, so an exhausted domain leaves
   * the dispenser untouched.
   */
  issue(): T {
    const ticket = this.next;
    this.next = this.order.successor(ticket);
    return ticket;
  }

  /** Called only when the critical section is left */
  advanceServing(): void {
    this.current = this.order.successor(this.current);
  }

  isCurrent(ticket: T): boolean {
    return sameTicket(this.order, ticket, this.current);
  }

  clone(): TicketDispenser<T> {
    return new TicketDispenser(this.order, { nextTicket: this.next, serving: this.current });
  }
}
