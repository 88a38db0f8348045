#!/usr/bin/env node
import { createProgram } from './cli.js';
import { handleError } from './errors.js';

const program = createProgram();

// Global error handling
process.on('uncaughtException', handleError);
process.on('unhandledRejection', (reason) => {
  handleError(reason instanceof Error ? reason : new Error(String(reason)));
});

// Parse and execute
program.parseAsync(process.argv).catch(handleError);
