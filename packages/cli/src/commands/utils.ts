/**
 * CLI Utilities
 *
 * Terminal detection, argument parsing and error reporting shared by
 * turnstile commands.
 *
 * @module packages/cli/commands/utils
 */

import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { TicketLockError, TicketLockErrorCode } from '@turnstile/ticket-lock';

// =============================================================================
// Terminal Detection
// =============================================================================

/**
 * Whether colored output is appropriate
 *
 * Off when NO_COLOR is set, TERM is dumb, or stdout is not a TTY.
 */
export function shouldUseColor(): boolean {
  if (process.env.NO_COLOR !== undefined) return false;
  if (process.env.TERM === 'dumb') return false;
  if (!process.stdout.isTTY) return false;
  return true;
}

/**
 * Whether spinners make sense
 */
export function isInteractive(): boolean {
  return process.stdout.isTTY === true;
}

// =============================================================================
// Argument Parsing
// =============================================================================

/**
 * Commander parser for positive integer options
 */
export function parsePositiveInt(value: string): number {
  if (!/^[1-9][0-9]*$/.test(value)) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parseInt(value, 10);
}

/**
 * Commander parser for the ticket ceiling; kept exact as a bigint
 */
export function parseTicketCeiling(value: string): bigint {
  if (!/^[1-9][0-9]*$/.test(value)) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return BigInt(value);
}

/**
 * Commander parser for a fast-check seed (any 32-bit integer)
 */
export function parseSeed(value: string): number {
  if (!/^-?[0-9]+$/.test(value)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  const seed = parseInt(value, 10);
  if (seed < -0x80000000 || seed > 0xffffffff) {
    throw new InvalidArgumentError('Seed must fit in 32 bits.');
  }
  return seed;
}

// =============================================================================
// Error Handling
// =============================================================================

/**
 * Exit statuses
 */
export const ExitCodes = {
  SUCCESS: 0,
  VIOLATION_FOUND: 1,
  UNEXPECTED_ERROR: 2,
  CONFIG_ERROR: 4,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Exit status for an error raised while running a command
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof TicketLockError) {
    switch (error.code) {
      case TicketLockErrorCode.CONFIG_INVALID:
      case TicketLockErrorCode.DOMAIN_EXHAUSTED:
        return ExitCodes.CONFIG_ERROR;
      case TicketLockErrorCode.CONTRACT_VIOLATION:
      case TicketLockErrorCode.INVARIANT_VIOLATED:
        return ExitCodes.VIOLATION_FOUND;
    }
  }
  return ExitCodes.UNEXPECTED_ERROR;
}

/**
 * Report an error and exit
 *
 * @param json - Print a JSON envelope on stdout instead of text on stderr
 */
export function handleError(error: unknown, json: boolean = false): never {
  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof TicketLockError ? error.code : undefined;

  if (json) {
    console.log(
      JSON.stringify(
        {
          success: false,
          error: {
            message,
            code: code ?? 'UNKNOWN',
          },
        },
        null,
        2
      )
    );
  } else {
    console.error(chalk.red(`Error: ${message}`));
    if (code) {
      console.error(chalk.dim(`Code: ${code}`));
    }
  }

  process.exit(exitCodeFor(error));
}
