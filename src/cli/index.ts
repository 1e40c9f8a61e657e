#!/usr/bin/env node

import { createProgram } from './program.js';
import { describeError } from '../errors.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`Error: ${describeError(err)}`);
    process.exit(1);
  });
