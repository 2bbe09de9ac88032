/**
 * Verify Command - turnstile verify
 *
 * Checks the ticket order axioms, explores every interleaving up to a
 * depth bound, then runs randomized schedules. Exits non-zero on the
 * first violation found by any phase.
 *
 * @module packages/cli/commands/verify
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { OptionValues } from 'commander';
import ora, { type Ora } from 'ora';
import pino, { type LevelWithSilent, type Logger } from 'pino';
import {
  createCounterOrder,
  createLogger,
  createSilentLogger,
  exploreInterleavings,
  loadConfig,
  stressTest,
  verifyTicketOrder,
  type Config,
  type ExploreReport,
  type InvariantViolation,
  type OrderAxiomViolation,
  type TicketOrder,
  type TraceEntry,
} from '@turnstile/ticket-lock';
import { ExitCodes, handleError, isInteractive } from './utils.js';

// =============================================================================
// Types
// =============================================================================

export interface VerifyOptions {
  participants: number;
  depth: number;
  steps: number;
  runs: number;
  seed?: number;
  maxTicket: bigint;
  /** Try a refused enter on every wait step */
  probeAdmission: boolean;
}

export interface VerifyCommandOptions extends VerifyOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
}

export interface DomainResult {
  ok: boolean;
  samples: string[];
  violations: OrderAxiomViolation[];
}

export interface StressResult {
  ok: boolean;
  runs: number;
  seed: number;
  counterexample?: {
    schedule: number[];
    trace: TraceEntry[];
    violations: InvariantViolation[];
  };
}

export interface VerifyReport {
  ok: boolean;
  options: {
    participants: number;
    depth: number;
    steps: number;
    runs: number;
    maxTicket: string;
  };
  domain: DomainResult;
  exploration: ExploreReport;
  stress: StressResult;
}

export interface SummaryRow {
  check: string;
  ok: boolean;
  detail: string;
}

// =============================================================================
// Option Resolution
// =============================================================================

/**
 * Merge command line values over configuration defaults
 */
export function resolveVerifyOptions(raw: OptionValues, config: Config): VerifyCommandOptions {
  const int = (value: unknown, fallback: number) => (typeof value === 'number' ? value : fallback);

  return {
    participants: int(raw.participants, config.harness.participants),
    depth: int(raw.depth, config.harness.depth),
    steps: int(raw.steps, config.harness.steps),
    runs: int(raw.runs, config.harness.runs),
    seed: typeof raw.seed === 'number' ? raw.seed : undefined,
    maxTicket: typeof raw.maxTicket === 'bigint' ? raw.maxTicket : config.maxTicket,
    probeAdmission: raw.probe !== false,
    json: raw.json === true,
    quiet: raw.quiet === true,
    verbose: raw.verbose === true,
  };
}

// =============================================================================
// Phases
// =============================================================================

/**
 * Boundary samples of [0, max]: both ends and their neighbours
 */
export function domainSamples(max: bigint): bigint[] {
  const candidates = [0n, 1n, 2n, max - 1n, max];
  return [...new Set(candidates.filter((t) => t >= 0n && t <= max))].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function checkDomain(order: TicketOrder<bigint>, max: bigint): DomainResult {
  const samples = domainSamples(max);
  const violations = verifyTicketOrder(order, samples);
  return { ok: violations.length === 0, samples: samples.map(String), violations };
}

export function runStress(order: TicketOrder<bigint>, options: VerifyOptions, logger: Logger): StressResult {
  const report = stressTest({
    order,
    participants: options.participants,
    steps: options.steps,
    runs: options.runs,
    seed: options.seed,
    probeAdmission: options.probeAdmission,
    logger,
  });

  if (!report.counterexample) {
    return { ok: report.ok, runs: report.runs, seed: report.seed };
  }

  const replay = report.counterexample.report;
  return {
    ok: false,
    runs: report.runs,
    seed: report.seed,
    counterexample: {
      schedule: report.counterexample.schedule,
      trace: replay.trace,
      violations: replay.failure?.violations ?? [],
    },
  };
}

export type VerifyPhase = 'domain' | 'exploration' | 'stress';

export interface RunVerifyContext {
  logger?: Logger;
  /** Defaults to a counter order bounded by options.maxTicket */
  order?: TicketOrder<bigint>;
  /** Called before each phase starts */
  onPhase?: (phase: VerifyPhase) => void;
}

/**
 * Run all three phases; later phases run even when an earlier one failed
 */
export function runVerify(options: VerifyOptions, context: RunVerifyContext = {}): VerifyReport {
  const logger = context.logger ?? createSilentLogger();
  const order = context.order ?? createCounterOrder({ max: options.maxTicket });

  context.onPhase?.('domain');
  const domain = checkDomain(order, options.maxTicket);

  context.onPhase?.('exploration');
  const exploration = exploreInterleavings({
    order,
    participants: options.participants,
    maxDepth: options.depth,
    probeAdmission: options.probeAdmission,
    logger,
  });

  context.onPhase?.('stress');
  const stress = runStress(order, options, logger);

  return {
    ok: domain.ok && exploration.ok && stress.ok,
    options: {
      participants: options.participants,
      depth: options.depth,
      steps: options.steps,
      runs: options.runs,
      maxTicket: options.maxTicket.toString(),
    },
    domain,
    exploration,
    stress,
  };
}

// =============================================================================
// Formatting
// =============================================================================

export function summaryRows(report: VerifyReport): SummaryRow[] {
  const { domain, exploration, stress } = report;
  return [
    {
      check: 'Ticket order',
      ok: domain.ok,
      detail: domain.ok
        ? `${domain.samples.length} samples`
        : `${domain.violations.length} axiom violation(s)`,
    },
    {
      check: 'Exploration',
      ok: exploration.ok,
      detail:
        `${exploration.statesVisited} states, ${exploration.transitions} transitions, depth ${exploration.depthReached}`
        + (exploration.truncated ? ' (truncated)' : ''),
    },
    {
      check: 'Stress',
      ok: stress.ok,
      detail: stress.counterexample
        ? `failed, ${stress.counterexample.schedule.length}-step counterexample (seed ${stress.seed})`
        : `${stress.runs} runs (seed ${stress.seed})`,
    },
  ];
}

export function formatTrace(trace: readonly TraceEntry[]): string[] {
  return trace.map((entry, i) => `${String(i + 1).padStart(3)}. ${entry.participant} ${entry.action} ${entry.ticket}`);
}

export function formatViolations(violations: readonly InvariantViolation[]): string[] {
  return violations.map((v) => `[${v.invariant}] ${v.message}`);
}

export function formatAxiomViolations(violations: readonly OrderAxiomViolation[]): string[] {
  return violations.map((v) => `[${v.axiom}] ${v.witnesses.join(', ')}`);
}

function displayTerminalReport(report: VerifyReport): void {
  console.log();
  console.log(chalk.bold('Ticket Lock Verification'));
  console.log(
    chalk.dim(
      `${report.options.participants} participants, depth ${report.options.depth}, `
        + `${report.options.runs} runs of up to ${report.options.steps} steps`
    )
  );
  console.log(chalk.dim('─'.repeat(50)));

  const table = new Table({
    head: ['Check', 'Result', 'Detail'],
    style: { head: [], border: [] },
  });
  for (const row of summaryRows(report)) {
    table.push([chalk.bold(row.check), row.ok ? chalk.green('✓ pass') : chalk.red('✗ fail'), row.detail]);
  }
  console.log(table.toString());

  if (!report.domain.ok) {
    console.log();
    console.log(chalk.bold.red('Ticket order axioms'));
    for (const line of formatAxiomViolations(report.domain.violations)) console.log(`  ${line}`);
  }

  const explored = report.exploration.violation;
  if (explored) {
    console.log();
    console.log(chalk.bold.red('Shortest violating schedule'));
    for (const line of formatTrace(explored.trace)) console.log(chalk.cyan(line));
    for (const line of formatViolations(explored.violations)) console.log(`  ${chalk.red(line)}`);
  }

  const counterexample = report.stress.counterexample;
  if (counterexample) {
    console.log();
    console.log(chalk.bold.red(`Shrunk counterexample (schedule ${counterexample.schedule.join(',')})`));
    for (const line of formatTrace(counterexample.trace)) console.log(chalk.cyan(line));
    for (const line of formatViolations(counterexample.violations)) console.log(`  ${chalk.red(line)}`);
  }

  console.log();
  console.log(chalk.bold('Overall: ') + (report.ok ? chalk.green('PASS') : chalk.red('FAIL')));
}

// =============================================================================
// Command
// =============================================================================

/**
 * Log level for a run: --verbose and --quiet win over LOG_LEVEL
 */
export function commandLogLevel(options: Pick<VerifyCommandOptions, 'verbose' | 'quiet'>, config: Config): LevelWithSilent {
  if (options.verbose) return 'debug';
  if (options.quiet) return 'silent';
  return config.logLevel;
}

export function phaseLabel(phase: VerifyPhase, options: VerifyOptions): string {
  switch (phase) {
    case 'domain':
      return 'Checking ticket order axioms...';
    case 'exploration':
      return `Exploring interleavings of ${options.participants} participants...`;
    case 'stress':
      return `Running ${options.runs} random schedules...`;
  }
}

/**
 * Executes the verify command
 */
export async function verifyCommand(raw: OptionValues): Promise<void> {
  const json = raw.json === true;
  let spinner: Ora | null = null;

  try {
    const config = loadConfig();
    const options = resolveVerifyOptions(raw, config);
    // stdout carries the report; logs go to stderr
    const logger = createLogger({
      level: commandLogLevel(options, config),
      base: { env: config.nodeEnv },
      destination: pino.destination(2),
    });

    spinner = !options.json && !options.quiet && isInteractive() ? ora().start() : null;
    const report = runVerify(options, {
      logger,
      onPhase: (phase) => {
        if (!spinner) return;
        spinner.text = phaseLabel(phase, options);
        // Phases run synchronously, so the spinner's timer never fires between them
        spinner.render();
      },
    });

    if (report.ok) {
      spinner?.succeed('All invariants hold');
    } else {
      spinner?.fail('Invariant violation found');
    }

    if (options.json) {
      console.log(JSON.stringify({ success: report.ok, ...report }, null, 2));
    } else if (!options.quiet || !report.ok) {
      displayTerminalReport(report);
    }

    process.exitCode = report.ok ? ExitCodes.SUCCESS : ExitCodes.VIOLATION_FOUND;
  } catch (error) {
    spinner?.fail('Verification aborted');
    handleError(error, json);
  }
}
