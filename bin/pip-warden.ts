#!/usr/bin/env node

import chalk from 'chalk';
import { buildProgram } from '../src/cli';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const msg = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`Error: ${msg}`));
    process.exit(1);
  });
