import { describe, it, expect } from 'vitest';
import { TicketDispenser } from '../domain/dispenser.js';
import { ParticipantRegistry } from '../domain/registry.js';
import { createCounterOrder } from '../domain/ticket-order.js';
import { TicketDomainExhaustedError } from '../types.js';

const order = createCounterOrder();

describe('TicketDispenser', () => {
  it('starts with nextTicket and serving at zero', () => {
    const dispenser = new TicketDispenser(order);

    expect(dispenser.nextTicket).toBe(0n);
    expect(dispenser.serving).toBe(0n);
    expect(dispenser.isCurrent(0n)).toBe(true);
  });

  it('issues consecutive tickets', () => {
    const dispenser = new TicketDispenser(order);

    expect([dispenser.issue(), dispenser.issue(), dispenser.issue()]).toEqual([0n, 1n, 2n]);
    expect(dispenser.nextTicket).toBe(3n);
    expect(dispenser.serving).toBe(0n);
  });

  it('advances serving independently of issuance', () => {
    const dispenser = new TicketDispenser(order);
    dispenser.issue();
    dispenser.issue();

    dispenser.advanceServing();

    expect(dispenser.serving).toBe(1n);
    expect(dispenser.isCurrent(0n)).toBe(false);
    expect(dispenser.isCurrent(1n)).toBe(true);
  });

  it('leaves state untouched when the domain is exhausted', () => {
    const dispenser = new TicketDispenser(createCounterOrder({ max: 1n }));
    expect(dispenser.issue()).toBe(0n);

    expect(() => dispenser.issue()).toThrow(TicketDomainExhaustedError);
    expect(dispenser.nextTicket).toBe(1n);
  });

  it('clones into an independent copy', () => {
    const dispenser = new TicketDispenser(order);
    dispenser.issue();

    const copy = dispenser.clone();
    copy.issue();
    copy.advanceServing();

    expect(dispenser.nextTicket).toBe(1n);
    expect(dispenser.serving).toBe(0n);
    expect(copy.nextTicket).toBe(2n);
    expect(copy.serving).toBe(1n);
  });
});

describe('ParticipantRegistry', () => {
  it('registers participants idle holding zero', () => {
    const registry = new ParticipantRegistry(order, ['a', 'b']);

    expect(registry.size).toBe(2);
    expect(registry.get('a')).toEqual({ phase: 'idle', ticket: 0n });
    expect(registry.inPhase('idle')).toEqual(['a', 'b']);
  });

  it('reads unknown participants as idle without recording them', () => {
    const registry = new ParticipantRegistry(order);

    expect(registry.get('ghost')).toEqual({ phase: 'idle', ticket: 0n });
    expect(registry.has('ghost')).toBe(false);
  });

  it('keeps an existing record when registering again', () => {
    const registry = new ParticipantRegistry(order, ['a']);
    registry.set('a', 'awaiting', 4n);

    registry.register('a');

    expect(registry.get('a')).toEqual({ phase: 'awaiting', ticket: 4n });
  });

  it('groups participants by phase', () => {
    const registry = new ParticipantRegistry(order, ['a', 'b', 'c']);
    registry.set('b', 'critical', 0n);
    registry.set('c', 'awaiting', 1n);

    expect(registry.inPhase('critical')).toEqual(['b']);
    expect(registry.inPhase('awaiting')).toEqual(['c']);
    expect(registry.inPhase('idle')).toEqual(['a']);
  });

  it('clones records by value', () => {
    const registry = new ParticipantRegistry(order, ['a']);
    const copy = registry.clone();

    copy.set('a', 'awaiting', 0n);
    copy.register('b');

    expect(registry.get('a').phase).toBe('idle');
    expect(registry.has('b')).toBe(false);
    expect([...copy.entries()].map(([id]) => id)).toEqual(['a', 'b']);
  });
});
