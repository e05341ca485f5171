#!/usr/bin/env node

import { createProgram } from './program';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('Oh no! A catastrophic error occurred:', error);
    process.exit(1);
  });
