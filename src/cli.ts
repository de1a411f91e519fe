#!/usr/bin/env node
import 'dotenv/config';
import { createProgram } from './cli/program.js';
import { theme } from './library/ui.js';
import { errorMessage } from './library/errors.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(theme.error(`Error: ${errorMessage(error)}`));
    process.exitCode = 1;
  });
