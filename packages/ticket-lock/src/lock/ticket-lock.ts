/**
 * TicketLock - FIFO async mutex on top of the ticket protocol
 *
 * acquire() performs request → (wait)* → enter and resolves once the
 * caller holds the serving ticket; release() performs exit and wakes the
 * holder of the next ticket. Contenders are admitted strictly in the order
 * they called acquire().
 *
 * @example
 * ```typescript
 * const lock = new TicketLock({ name: 'ledger' });
 *
 * // Automatic release
 * const total = await lock.withLock(async () => {
 *   return await applyTransfer();
 * });
 *
 * // Manual management
 * const handle = await lock.acquire('worker-1');
 * try {
 *   // Do work
 * } finally {
 *   lock.release(handle);
 * }
 * ```
 *
 * There is no timeout or cancellation: a caller that never releases
 * holds up every later ticket.
 *
 * @module packages/ticket-lock/lock/ticket-lock
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { Config } from '../config.js';
import { createCounterOrder } from '../domain/ticket-order.js';
import { createSilentLogger } from '../logger.js';
import { recordWait } from '../metrics.js';
import { createProtocolState, TicketLockProtocol } from '../protocol/state-machine.js';
import { ProtocolContractViolation, type ParticipantId, type TicketHandle } from '../types.js';

// =============================================================================
// Types
// =============================================================================

export interface TicketLockConfig {
  /** Label for logs and metrics. @default 'ticket-lock' */
  name?: string;

  /** Largest ticket; see createCounterOrder */
  maxTicket?: bigint;

  /** Debug assertions after every protocol action. @default true unless NODE_ENV is production */
  checkInvariants?: boolean;

  /** Record prom-client metrics. @default true */
  metrics?: boolean;

  logger?: Logger;
}

export interface TicketLockStats {
  name: string;
  /** Ticket allowed in (or about to be) */
  serving: bigint;
  nextTicket: bigint;
  /** Tickets issued but not released */
  queueDepth: number;
  /** Participant inside the critical section */
  holder: ParticipantId | null;
}

// =============================================================================
// TicketLock
// =============================================================================

export class TicketLock {
  private readonly protocol: TicketLockProtocol<bigint>;
  private readonly logger: Logger;
  private readonly recordMetrics: boolean;

  /** Handles this lock issued and that are still live */
  private readonly live = new WeakSet<TicketHandle<bigint>>();

  /** Parked acquirers keyed by the ticket they wait for */
  private readonly waiters = new Map<bigint, () => void>();

  private holder: ParticipantId | null = null;

  constructor(config: TicketLockConfig = {}) {
    const logger = config.logger ?? createSilentLogger();
    this.recordMetrics = config.metrics ?? true;
    this.protocol = new TicketLockProtocol({
      state: createProtocolState(createCounterOrder({ max: config.maxTicket })),
      name: config.name,
      checkInvariants: config.checkInvariants,
      metrics: this.recordMetrics,
      logger,
    });
    this.logger = logger.child({ component: 'TicketLock', lock: this.protocol.name });
  }

  /**
   * Build a lock from validated environment configuration
   */
  static fromConfig(config: Config, options: Pick<TicketLockConfig, 'name' | 'logger'> = {}): TicketLock {
    return new TicketLock({
      ...options,
      maxTicket: config.maxTicket,
      checkInvariants: config.checkInvariants,
    });
  }

  get name(): string {
    return this.protocol.name;
  }

  isHeld(): boolean {
    return this.holder !== null;
  }

  stats(): TicketLockStats {
    return {
      name: this.protocol.name,
      serving: this.protocol.serving,
      nextTicket: this.protocol.nextTicket,
      queueDepth: this.protocol.queueDepth,
      holder: this.holder,
    };
  }

  // ===========================================================================
  // Core Operations
  // ===========================================================================

  /**
   * Take a ticket and resolve once admitted
   *
   * @param participant - Caller identity; a fresh one is generated if omitted.
   *   The same identity may not contend twice at once.
   * @returns Handle to pass to release()
   * @throws ProtocolContractViolation if `participant` is already contending
   */
  async acquire(participant: ParticipantId = `task-${nanoid(10)}`): Promise<TicketHandle<bigint>> {
    const startedAt = Date.now();
    const handle = this.protocol.requestTicket(participant);

    while (!this.protocol.isAdmissible(participant)) {
      this.protocol.wait(participant, handle.ticket);
      await new Promise<void>((resolve) => {
        this.waiters.set(handle.ticket, () => resolve());
      });
    }

    this.protocol.enter(participant, handle.ticket);
    this.holder = participant;
    this.live.add(handle);

    const waitedMs = Date.now() - startedAt;
    if (this.recordMetrics) recordWait(this.protocol.name, waitedMs / 1000);
    this.logger.debug({ participant, ticket: handle.ticket.toString(), waitedMs }, 'Lock acquired');

    return handle;
  }

  /**
   * Release the lock held through `handle`
   *
   * @throws ProtocolContractViolation if the handle is not the live handle
   *   of the current holder (forged, from another lock, or already released)
   */
  release(handle: TicketHandle<bigint>): void {
    if (!this.live.has(handle) || handle.participant !== this.holder) {
      throw new ProtocolContractViolation(
        'exit',
        handle.participant,
        `Handle for ${handle.participant} does not hold lock ${this.protocol.name}`,
        { ticket: String(handle.ticket) }
      );
    }

    this.live.delete(handle);
    this.holder = null;
    this.protocol.exit(handle.participant);

    const wake = this.waiters.get(this.protocol.serving);
    if (wake) {
      this.waiters.delete(this.protocol.serving);
      wake();
    }

    this.logger.debug({ participant: handle.participant, ticket: handle.ticket.toString() }, 'Lock released');
  }

  /**
   * Run `operation` while holding the lock; always releases
   */
  async withLock<R>(operation: () => Promise<R> | R, participant?: ParticipantId): Promise<R> {
    const handle = await this.acquire(participant);
    try {
      return await operation();
    } finally {
      this.release(handle);
    }
  }
}
