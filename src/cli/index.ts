#!/usr/bin/env node

/**
 * code-health CLI
 */

import { Command } from 'commander';
import { analyzeCommand } from './commands/analyze.js';
import { extractCommand } from './commands/extract.js';

const program = new Command();

program
  .name('code-health')
  .description('Cohesion, complexity and coupling metrics with cross-metric diagnostics')
  .version('1.0.0');

// Register commands
program.addCommand(analyzeCommand);
program.addCommand(extractCommand);

program.parse(process.argv);
