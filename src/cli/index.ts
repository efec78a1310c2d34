#!/usr/bin/env node

/**
 * corpus-sync CLI - fetch public test corpora.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createRequire } from 'node:module';
import { errorMessage } from '../errors.js';
import { registerDatasetsCommand } from './commands/datasets.js';
import { registerFetchCommand } from './commands/fetch.js';
import { loadCatalog } from './utils/catalog-path.js';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('corpus-sync')
  .description('Download public test corpora with bounded parallelism and resumable runs')
  .version(pkg.version);

try {
  const catalog = loadCatalog();

  registerDatasetsCommand(program, catalog);
  for (const dataset of catalog.list()) {
    registerFetchCommand(program, dataset, { tiers: catalog.tiers(dataset.id) });
  }

  await program.parseAsync();
} catch (error) {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exitCode = 1;
}
