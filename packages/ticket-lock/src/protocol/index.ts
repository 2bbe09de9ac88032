export {
  TicketLockProtocol,
  createProtocolState,
  cloneProtocolState,
  snapshotOf,
} from './state-machine.js';
export type { ProtocolState, TicketLockProtocolConfig } from './state-machine.js';
export { checkStateInvariants, checkTransition, ProtocolVerifier } from './invariants.js';
export type { ObservedStep } from './invariants.js';
