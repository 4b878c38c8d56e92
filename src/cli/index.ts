#!/usr/bin/env node

import chalk from 'chalk';
import { AdvisoryCLI } from './commands';

const cli = new AdvisoryCLI();
cli.installSignalHandlers();

cli.run(process.argv).catch((error: unknown) => {
  console.error(chalk.red('❌ CLI error:'), error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
