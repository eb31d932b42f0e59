#!/usr/bin/env node

import { errorMessage } from '../error/index.js';
import { processOutput } from './output.js';
import { createProgram } from './program.js';

createProgram({ env: process.env, output: processOutput })
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    processOutput.err(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
