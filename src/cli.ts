#!/usr/bin/env node

import { runCli } from './cli/run.js';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
