#!/usr/bin/env node
import chalk from 'chalk';
import { run } from './cli/index.js';

run().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : 'Unknown error'));
  process.exitCode = 1;
});
