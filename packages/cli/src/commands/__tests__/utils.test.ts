/**
 * CLI Utilities Tests
 *
 * Color detection, argument parsers, exit codes and error output.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { InvalidArgumentError } from 'commander';
import {
  ConfigValidationError,
  InvariantViolationError,
  ProtocolContractViolation,
  TicketDomainExhaustedError,
} from '@turnstile/ticket-lock';
import {
  ExitCodes,
  exitCodeFor,
  handleError,
  parsePositiveInt,
  parseSeed,
  parseTicketCeiling,
  shouldUseColor,
} from '../utils.js';

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

// =============================================================================
// Color Control
// =============================================================================

describe('shouldUseColor', () => {
  it('is off when NO_COLOR is set', () => {
    vi.stubEnv('NO_COLOR', '1');

    expect(shouldUseColor()).toBe(false);
  });

  it('is off for dumb terminals', () => {
    vi.stubEnv('TERM', 'dumb');

    expect(shouldUseColor()).toBe(false);
  });
});

// =============================================================================
// Argument Parsers
// =============================================================================

describe('parsePositiveInt', () => {
  it('parses positive integers', () => {
    expect(parsePositiveInt('3')).toBe(3);
    expect(parsePositiveInt('250')).toBe(250);
  });

  it('rejects zero, negatives and non-numbers', () => {
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('-1')).toThrow('Not a positive integer.');
    expect(() => parsePositiveInt('2.5')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('many')).toThrow(InvalidArgumentError);
  });
});

describe('parseTicketCeiling', () => {
  it('keeps large ceilings exact', () => {
    expect(parseTicketCeiling('18446744073709551615')).toBe(18446744073709551615n);
  });

  it('rejects zero', () => {
    expect(() => parseTicketCeiling('0')).toThrow(InvalidArgumentError);
  });
});

describe('parseSeed', () => {
  it('accepts signed 32-bit integers', () => {
    expect(parseSeed('42')).toBe(42);
    expect(parseSeed('-7')).toBe(-7);
  });

  it('rejects fractions and oversized values', () => {
    expect(() => parseSeed('1.5')).toThrow('Not an integer.');
    expect(() => parseSeed('99999999999')).toThrow('Seed must fit in 32 bits.');
  });
});

// =============================================================================
// Exit Codes
// =============================================================================

describe('exitCodeFor', () => {
  it('maps configuration problems to CONFIG_ERROR', () => {
    expect(exitCodeFor(new ConfigValidationError(['maxTicket: bad']))).toBe(ExitCodes.CONFIG_ERROR);
    expect(exitCodeFor(new TicketDomainExhaustedError('5'))).toBe(ExitCodes.CONFIG_ERROR);
  });

  it('maps protocol failures to VIOLATION_FOUND', () => {
    expect(exitCodeFor(new ProtocolContractViolation('exit', 'p0', 'p0 is idle, not critical'))).toBe(
      ExitCodes.VIOLATION_FOUND
    );
    expect(exitCodeFor(new InvariantViolationError([]))).toBe(ExitCodes.VIOLATION_FOUND);
  });

  it('maps anything else to UNEXPECTED_ERROR', () => {
    expect(exitCodeFor(new Error('boom'))).toBe(ExitCodes.UNEXPECTED_ERROR);
    expect(exitCodeFor('boom')).toBe(ExitCodes.UNEXPECTED_ERROR);
  });
});

// =============================================================================
// Error Output
// =============================================================================

describe('handleError', () => {
  const stubExit = () =>
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

  it('prints a JSON envelope with the error code', () => {
    const exit = stubExit();
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    expect(() => handleError(new ConfigValidationError(['maxTicket: bad']), true)).toThrow('exit 4');

    expect(exit).toHaveBeenCalledWith(4);
    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual({
      success: false,
      error: {
        message: 'Configuration validation failed:\nmaxTicket: bad',
        code: 'TICKET_LOCK_004',
      },
    });
  });

  it('prints plain errors to stderr', () => {
    stubExit();
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(() => handleError(new Error('boom'))).toThrow('exit 2');

    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0]?.[0])).toContain('Error: boom');
  });
});
