/**
 * Shared start-up for CLI commands: load configuration, install the process
 * logger, then load the reasoner modules so their component loggers derive
 * from the configured one.
 */

import { resolve } from 'path';
import { InvalidArgumentError } from 'commander';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger } from '../core/logger.js';
import type { ReasonerConfigInput } from '../core/types.js';
import type { Reasoner } from '../reasoner/factory.js';
import type { RawRecord } from '../ingestion/records.js';
import type { IngestionReport } from '../ingestion/pipeline.js';

export interface CommonOptions {
  dir: string;
  logLevel?: string;
  pretty?: boolean;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}"`);
  }
  return parsed;
}

/** A reasoner over fresh in-memory storage, configured from the project directory. */
export async function openReasoner(options: CommonOptions, overrides?: ReasonerConfigInput): Promise<Reasoner> {
  const config = new ConfigManager({ projectDir: resolve(options.dir) }).load(overrides);
  setLogger(createLogger('ontoreason', {
    level: options.logLevel ?? config.logging.level,
    pretty: options.pretty ?? config.logging.pretty,
  }));

  const [{ createReasoner }, { InMemoryStorage }] = await Promise.all([
    import('../reasoner/factory.js'),
    import('../storage/memory-store.js'),
  ]);
  return createReasoner({ storage: new InMemoryStorage(), config });
}

/** Ingest every CSV file in order as one run. */
export async function loadFiles(
  reasoner: Reasoner,
  files: readonly string[],
  signal?: AbortSignal,
): Promise<IngestionReport> {
  const { csvFileSource } = await import('../ingestion/sources.js');
  const batchSize = reasoner.config.ingestion.batchSize;

  async function* source(): AsyncGenerator<RawRecord[]> {
    for (const file of files) {
      yield* csvFileSource(resolve(file), batchSize);
    }
  }

  return reasoner.ingestion.run(source(), { signal });
}

/** Abort on Ctrl-C for the duration of `fn`. */
export async function withInterrupt<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    return await fn(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
