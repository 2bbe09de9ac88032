import { z } from 'zod';
import { ConfigValidationError } from './types.js';

const positiveInt = (name: string) =>
  z.number({ invalid_type_error: `${name} must be a number` }).int().min(1);

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Environment
  nodeEnv: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Ticket domain
  maxTicket: z
    .string()
    .regex(/^[1-9][0-9]*$/, 'TICKET_LOCK_MAX_TICKET must be a positive integer')
    .transform((value) => BigInt(value)),

  // Debug assertions (invariants re-checked after every action)
  checkInvariants: z.boolean(),

  // Harness defaults
  harness: z.object({
    participants: positiveInt('TICKET_LOCK_HARNESS_PARTICIPANTS').max(8),
    depth: positiveInt('TICKET_LOCK_HARNESS_DEPTH').max(64),
    steps: positiveInt('TICKET_LOCK_HARNESS_STEPS').max(10_000),
    runs: positiveInt('TICKET_LOCK_HARNESS_RUNS').max(100_000),
  }),
});

export type Config = z.infer<typeof configSchema>;

function parseIntOr(value: string | undefined, fallback: number): number {
  return value ? parseInt(value, 10) : fallback;
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return value === 'true' || value === '1';
}

/**
 * Whether debug assertions are on when nothing says otherwise
 *
 * TICKET_LOCK_CHECK_INVARIANTS wins; without it assertions run everywhere
 * except production.
 */
export function defaultCheckInvariants(env: NodeJS.ProcessEnv = process.env): boolean {
  const nodeEnv = env['NODE_ENV'] || 'development';
  return parseFlag(env['TICKET_LOCK_CHECK_INVARIANTS'], nodeEnv !== 'production');
}

/**
 * Parse environment variables into configuration
 *
 * @throws ConfigValidationError listing every failing field
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const nodeEnv = env['NODE_ENV'] || 'development';

  const raw = {
    nodeEnv,
    logLevel: env['LOG_LEVEL'] || 'info',
    maxTicket: env['TICKET_LOCK_MAX_TICKET'] || '18446744073709551615',
    checkInvariants: defaultCheckInvariants(env),
    harness: {
      participants: parseIntOr(env['TICKET_LOCK_HARNESS_PARTICIPANTS'], 3),
      depth: parseIntOr(env['TICKET_LOCK_HARNESS_DEPTH'], 12),
      steps: parseIntOr(env['TICKET_LOCK_HARNESS_STEPS'], 60),
      runs: parseIntOr(env['TICKET_LOCK_HARNESS_RUNS'], 200),
    },
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigValidationError(errors);
  }

  return result.data;
}
