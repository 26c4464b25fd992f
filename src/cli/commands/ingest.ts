/**
 * `ontoreason ingest <files...>`: validate and load CSV files, then print the ingestion report.
 */

import { Command } from 'commander';
import { loadFiles, openReasoner, parseInteger, printJson, withInterrupt, type CommonOptions } from '../runtime.js';
import { addCommonOptions } from './common.js';

interface IngestOptions extends CommonOptions {
  workers?: number;
  batchSize?: number;
}

export function createIngestCommand(): Command {
  const cmd = new Command('ingest');

  addCommonOptions(cmd)
    .description('Load ontology CSV files and report what was accepted')
    .argument('<files...>', 'CSV files (entity or relationship records)')
    .option('--workers <count>', 'Concurrent ingestion workers', parseInteger)
    .option('--batch-size <count>', 'Records per storage write', parseInteger)
    .action(async (files: string[], options: IngestOptions) => {
      await executeIngest(files, options);
    });

  return cmd;
}

async function executeIngest(files: string[], options: IngestOptions): Promise<void> {
  const reasoner = await openReasoner(options, {
    ingestion: { workers: options.workers, batchSize: options.batchSize },
  });
  const report = await withInterrupt(signal => loadFiles(reasoner, files, signal));
  printJson(report);
}
