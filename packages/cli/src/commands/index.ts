/**
 * CLI Commands Registry
 *
 * Registers all commands with the main program.
 *
 * @module packages/cli/commands
 */

import { Command, type OptionValues } from 'commander';
import chalk from 'chalk';
import { parsePositiveInt, parseSeed, parseTicketCeiling, shouldUseColor } from './utils.js';

/**
 * Creates the verify command
 */
export function createVerifyCommand(): Command {
  return new Command('verify')
    .description('Check the ticket lock invariants over explored and random interleavings')
    .option('-p, --participants <n>', 'Number of participants (default: TICKET_LOCK_HARNESS_PARTICIPANTS or 3)', parsePositiveInt)
    .option('-d, --depth <n>', 'Exhaustive exploration depth (default: TICKET_LOCK_HARNESS_DEPTH or 12)', parsePositiveInt)
    .option('-s, --steps <n>', 'Longest random schedule (default: TICKET_LOCK_HARNESS_STEPS or 60)', parsePositiveInt)
    .option('-r, --runs <n>', 'Random schedules to try (default: TICKET_LOCK_HARNESS_RUNS or 200)', parsePositiveInt)
    .option('--seed <n>', 'Seed for reproducing a random run', parseSeed)
    .option('--max-ticket <n>', 'Largest ticket in the domain', parseTicketCeiling)
    .option('--no-probe', 'Skip the refused-enter probe on wait steps')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Log harness progress to stdout')
    .action(async (options: OptionValues, command: Command) => {
      const { verifyCommand } = await import('./verify.js');
      // Merge global options (quiet) with command options
      await verifyCommand({ ...options, quiet: command.optsWithGlobals().quiet });
    });
}

/**
 * Registers all commands with the program
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  program
    .option('--no-color', 'Disable colored output')
    .option('-q, --quiet', 'Suppress non-essential output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.optsWithGlobals();
      // Disable colors if --no-color flag, NO_COLOR env, TERM=dumb, or non-TTY
      if (opts.color === false || !shouldUseColor()) {
        chalk.level = 0;
      }
    })
    .addHelpText(
      'after',
      `
Examples:
  $ turnstile verify                          Defaults from the environment
  $ turnstile verify -p 4 -d 16               Four participants, sixteen steps deep
  $ turnstile verify --runs 5000 --seed 42    Reproducible stress run
  $ turnstile verify --max-ticket 5           Small domain: exits 4 once a schedule outgrows it
  $ turnstile verify --json                   Machine-readable report
`
    );

  program.addCommand(createVerifyCommand());
}
