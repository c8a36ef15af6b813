#!/usr/bin/env node

// Thin entrypoint: commands live in ./cli/commands
import { createCli } from './cli/program.js';
import { handleError } from './cli/utils/errors.js';

createCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    handleError(err);
    process.exitCode = 1;
  });
