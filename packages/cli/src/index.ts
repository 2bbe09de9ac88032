/**
 * turnstile CLI
 *
 * Command line front end for the ticket lock harness.
 *
 * @module @turnstile/cli
 */

// =============================================================================
// Command Exports
// =============================================================================

export { registerCommands, createVerifyCommand } from './commands/index.js';

export {
  runVerify,
  resolveVerifyOptions,
  checkDomain,
  domainSamples,
  runStress,
  summaryRows,
  formatTrace,
  formatViolations,
  formatAxiomViolations,
  commandLogLevel,
  phaseLabel,
  verifyCommand,
} from './commands/verify.js';

export type {
  VerifyOptions,
  VerifyCommandOptions,
  VerifyReport,
  VerifyPhase,
  RunVerifyContext,
  DomainResult,
  StressResult,
  SummaryRow,
} from './commands/verify.js';

// =============================================================================
// Utility Exports
// =============================================================================

export {
  shouldUseColor,
  isInteractive,
  parsePositiveInt,
  parseSeed,
  parseTicketCeiling,
  handleError,
  exitCodeFor,
  ExitCodes,
} from './commands/utils.js';

export type { ExitCode } from './commands/utils.js';
