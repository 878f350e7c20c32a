#!/usr/bin/env node
import chalk from 'chalk';
import { run } from '../src/index.js';
import { errorMessage } from '../src/errors.js';

run(process.argv).catch((err: unknown) => {
  console.error(chalk.red(errorMessage(err)));
  process.exit(1);
});
