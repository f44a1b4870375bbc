#!/usr/bin/env node
/**
 * Pageviews CLI
 *
 * Hourly Wikipedia pageviews of tracked companies: download the dump, keep
 * the company pages, load them into PostgreSQL and rank the companies.
 */

import { Command } from 'commander';
import {
  extractCommand,
  fetchCommand,
  filterCommand,
  loadCommand,
  reportCommand,
  runCommand,
} from './cli/index.js';

const program = new Command()
  .name('pageviews')
  .description('Track Wikipedia pageviews of company pages, hour by hour')
  .version('0.1.0');

// Register commands
program.addCommand(fetchCommand);
program.addCommand(extractCommand);
program.addCommand(filterCommand);
program.addCommand(loadCommand);
program.addCommand(reportCommand);
program.addCommand(runCommand);

// Parse arguments
await program.parseAsync();
