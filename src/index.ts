#!/usr/bin/env node
import 'dotenv/config';
import { createProgram, reportError } from './cli.js';

createProgram()
  .parseAsync(process.argv)
  .catch(error => {
    reportError(error);
    process.exit(1);
  });
