#!/usr/bin/env node
/**
 * venuelink executable entry point.
 */

import { createProgram } from './cli.js';

const program = createProgram();

// Show help if no command
if (process.argv.length <= 2) {
  program.outputHelp();
} else {
  await program.parseAsync(process.argv);
}
