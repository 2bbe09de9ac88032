#!/usr/bin/env tsx
/**
 * turnstile CLI
 *
 * Entry point for the `turnstile` command.
 *
 * @module packages/cli/bin/turnstile
 */

import { Command } from 'commander';
import { registerCommands } from '../commands/index.js';

const program = new Command();

program
  .name('turnstile')
  .description('Explore and stress-test the ticket lock protocol')
  .version('0.1.0');

registerCommands(program);

await program.parseAsync();
