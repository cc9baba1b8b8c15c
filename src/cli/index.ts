#!/usr/bin/env node
import { CommanderError } from 'commander';
import { buildProgram } from './program.js';
import { closeDb } from '../db/client.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    // help and --version arrive here through exitOverride
    if (err instanceof CommanderError) {
      process.exitCode = err.exitCode;
      return;
    }
    console.error(err);
    process.exitCode = 1;
  })
  .finally(closeDb);
