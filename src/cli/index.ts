#!/usr/bin/env node
/**
 * zklink CLI
 * Command-line interface for ZKTeco terminals.
 */

import { isZkError } from '@zklink/sdk';
import { createProgram } from './program.js';

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(isZkError(err) ? `Error [${err.code}]: ${message}` : `Error: ${message}`);
    process.exitCode = 1;
  });
