#!/usr/bin/env node
import chalk from 'chalk';
import { buildProgram } from './program';

buildProgram()
  .parseAsync(process.argv)
  .catch(error => {
    console.error(chalk.red('kvsecrets failed:'), error);
    process.exit(1);
  });
