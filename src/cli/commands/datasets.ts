/**
 * corpus-sync datasets - list the dataset families in the catalog.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { DatasetCatalog } from '../../catalog/dataset-catalog.js';
import type { DatasetDefinition } from '../../catalog/types.js';

/** Catalog listing grouped by dataset group, in catalog order */
export function renderDatasets(datasets: readonly DatasetDefinition[]): string[] {
  const groups = new Map<string, DatasetDefinition[]>();
  for (const dataset of datasets) {
    const members = groups.get(dataset.group) ?? [];
    members.push(dataset);
    groups.set(dataset.group, members);
  }

  const width = Math.max(0, ...datasets.map((d) => d.id.length));
  const lines: string[] = [];
  for (const [group, members] of groups) {
    lines.push(`${group}:`);
    for (const dataset of members) {
      const tiers = dataset.tiers.length > 0 ? ` [${dataset.tiers.map((t) => t.name).join(', ')}]` : '';
      const size = dataset.approxSizeLabel ? ` (${dataset.approxSizeLabel})` : '';
      lines.push(`  ${dataset.id.padEnd(width)}  ${dataset.title}${size}${tiers}`);
    }
    lines.push('');
  }
  return lines;
}

export function registerDatasetsCommand(program: Command, catalog: DatasetCatalog): void {
  program
    .command('datasets')
    .description('List available datasets')
    .action(() => {
      const datasets = catalog.list();
      if (datasets.length === 0) {
        console.log('No datasets in catalog.');
        return;
      }
      console.log(chalk.bold('Datasets:\n'));
      for (const line of renderDatasets(datasets)) {
        console.log(line);
      }
      console.log('Run "corpus-sync <dataset> --list" to see size tiers.');
    });
}
