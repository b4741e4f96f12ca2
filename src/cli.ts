#!/usr/bin/env node

// Thin orchestrator: real logic in ./cli/commands & ./cli/utils
import { createCli } from './cli/program.js';
import { handleError } from './cli/utils/errors.js';

process.on('unhandledRejection', (err) => {
  handleError(err);
  process.exit(1);
});
process.on('uncaughtException', (err) => {
  handleError(err);
  process.exit(1);
});

createCli()
  .parseAsync(process.argv)
  .then(() => process.exit(process.exitCode ?? 0))
  .catch((err: unknown) => {
    handleError(err);
    process.exit(1);
  });
