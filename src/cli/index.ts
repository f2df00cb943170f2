#!/usr/bin/env node
import { CommanderError } from 'commander';
import { createProgram } from './program';
import { EXIT_CONFIGURATION, EXIT_FAILED } from '../harness/ReportAggregator';
import { errorMessage } from '../common/errors';

async function main(): Promise<void> {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    process.stderr.write('interrupted, cancelling run...\n');
    controller.abort(new Error('interrupted'));
  });

  const program = createProgram({ signal: controller.signal });
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version exit through here with code 0
      process.exitCode = error.exitCode === 0 ? 0 : EXIT_CONFIGURATION;
      return;
    }
    process.stderr.write(`fatal: ${errorMessage(error)}\n`);
    process.exitCode = EXIT_FAILED;
  }
}

void main();
