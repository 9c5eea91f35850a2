#!/usr/bin/env tsx

/**
 * CLI entry point for the barlens command
 */

import chalk from 'chalk';
import { isBarLensError } from '@barlens/contracts';
import { createProgram } from './program.js';

/** Exit code for a failed analysis */
const EXIT_FAILURE = 2;

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (isBarLensError(error)) {
      process.stderr.write(`${chalk.red(`barlens: ${error.message}`)} ${chalk.gray(`[${error.code}]`)}\n`);
    } else {
      process.stderr.write(`${chalk.red(`barlens: ${error instanceof Error ? error.message : String(error)}`)}\n`);
    }
    process.exitCode = EXIT_FAILURE;
  });
