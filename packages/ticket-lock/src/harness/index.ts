export { VerifyingDriver, enabledAction } from './driver.js';
export type { ProtocolDriver, StepRecord, VerifyingDriverOptions } from './driver.js';
export {
  runSchedule,
  stressTest,
  participantIds,
  createVerifyingDriver,
  toTraceEntry,
} from './simulation.js';
export type {
  SimulationOptions,
  SimulationReport,
  StressOptions,
  StressReport,
  TraceEntry,
} from './simulation.js';
export { exploreInterleavings, stateKey } from './explorer.js';
export type { ExploreOptions, ExploreReport } from './explorer.js';
