/**
 * Participant Registry
 *
 * Per-participant phase and held ticket. Policy lives in the state
 * machine; the registry only guarantees one ticket value per participant.
 * A participant never seen before reads as idle holding zero.
 *
 * @module packages/ticket-lock/domain/registry
 */

import type { ParticipantId, ParticipantRecord, Phase } from '../types.js';
import type { TicketOrder } from './ticket-order.js';

export class ParticipantRegistry<T> {
  private readonly records = new Map<ParticipantId, ParticipantRecord<T>>();

  constructor(
    private readonly order: TicketOrder<T>,
    participants: Iterable<ParticipantId> = []
  ) {
    for (const participant of participants) {
      this.register(participant);
    }
  }

  has(participant: ParticipantId): boolean {
    return this.records.has(participant);
  }

  /**
   * Add an idle participant. Registering a known participant is a no-op.
   */
  register(participant: ParticipantId): void {
    if (!this.records.has(participant)) {
      this.records.set(participant, { phase: 'idle', ticket: this.order.zero });
    }
  }

  get(participant: ParticipantId): Readonly<ParticipantRecord<T>> {
    return this.records.get(participant) ?? { phase: 'idle', ticket: this.order.zero };
  }

  set(participant: ParticipantId, phase: Phase, ticket: T): void {
    this.records.set(participant, { phase, ticket });
  }

  get size(): number {
    return this.records.size;
  }

  *entries(): IterableIterator<[ParticipantId, Readonly<ParticipantRecord<T>>]> {
    yield* this.records.entries();
  }

  /** Participants in the given phase, in registration order */
  inPhase(phase: Phase): ParticipantId[] {
    const ids: ParticipantId[] = [];
    for (const [id, record] of this.records) {
      if (record.phase === phase) ids.push(id);
    }
    return ids;
  }

  clone(): ParticipantRegistry<T> {
    const copy = new ParticipantRegistry<T>(this.order);
    for (const [id, record] of this.records) {
      copy.records.set(id, { ...record });
    }
    return copy;
  }
}
