#!/usr/bin/env node
import chalk from 'chalk';
import { createTodoProgram } from './cli.js';

createTodoProgram()
  .parseAsync(process.argv)
  .catch(error => {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
