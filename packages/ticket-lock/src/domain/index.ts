export {
  createCounterOrder,
  verifyTicketOrder,
  precedes,
  sameTicket,
  DEFAULT_MAX_TICKET,
} from './ticket-order.js';
export type {
  TicketOrder,
  CounterOrderOptions,
  OrderAxiom,
  OrderAxiomViolation,
} from './ticket-order.js';
export { TicketDispenser } from './dispenser.js';
export { ParticipantRegistry } from './registry.js';
