/**
 * Record sources. The pipeline consumes any lazy sequence of raw-record
 * batches; these helpers adapt CSV text, files and pushed streams to it.
 */

import { createReadStream } from 'fs';
import { createInterface } from 'readline';
import { BoundedChannel } from './channel.js';
import type { RawRecord } from './records.js';

export type RecordSource = AsyncIterable<readonly RawRecord[]> | Iterable<readonly RawRecord[]>;

/** Header of the canonical relationship stream */
export const RELATIONSHIP_CSV_HEADER = 'HEAD_ENTITY,TAIL_ENTITY,EDGE_TYPE,CONFIDENCE';

/**
 * Group items into arrays of at most `size`, pulling from the input only as
 * the consumer asks for the next group.
 */
export async function* batched<T>(items: AsyncIterable<T> | Iterable<T>, size: number): AsyncGenerator<T[]> {
  if (size < 1) throw new Error('Batch size must be at least 1');
  let batch: T[] = [];
  for await (const item of items) {
    batch.push(item);
    if (batch.length >= size) {
      yield batch;
      batch = [];
    }
  }
  if (batch.length > 0) yield batch;
}

/**
 * Split one CSV line into fields. Supports double-quoted fields with embedded
 * commas and `""` escapes; unquoted fields are trimmed.
 */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else if (ch === '"' && current.trim() === '') {
      inQuotes = true;
      quoted = true;
      current = '';
    } else if (ch === ',') {
      fields.push(quoted ? current : current.trim());
      current = '';
      quoted = false;
    } else {
      current += ch;
    }
  }
  fields.push(quoted ? current : current.trim());
  return fields;
}

/** `HEAD_ENTITY` and `Head Entity` both become `head_entity`. */
export function normalizeHeader(name: string): string {
  return name.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

/**
 * Turn CSV lines into raw records keyed by the header row. Blank lines are
 * skipped; short rows simply lack the trailing fields.
 */
export async function* parseCsvLines(lines: AsyncIterable<string> | Iterable<string>): AsyncGenerator<RawRecord> {
  let header: string[] | null = null;

  for await (const line of lines) {
    if (line.trim() === '') continue;
    const fields = parseCsvLine(line.replace(/^\uFEFF/, ''));

    if (!header) {
      header = fields.map(normalizeHeader);
      continue;
    }

    const record: RawRecord = {};
    header.forEach((key, idx) => {
      if (key !== '' && idx < fields.length) record[key] = fields[idx];
    });
    yield record;
  }
}

/** Stream a CSV file as batches of raw records without reading it whole. */
export function csvFileSource(path: string, batchSize: number): AsyncIterable<RawRecord[]> {
  return {
    [Symbol.asyncIterator]() {
      const lines = createInterface({
        input: createReadStream(path, { encoding: 'utf-8' }),
        crlfDelay: Infinity,
      });
      return batched(parseCsvLines(lines), batchSize)[Symbol.asyncIterator]();
    },
  };
}

/**
 * RecordStream: an open-ended source fed by pushes (a queue consumer, a
 * socket). `write` waits while `bufferBatches` batches are pending, so the
 * pushing side slows to the pipeline's pace.
 */
export class RecordStream implements AsyncIterable<readonly RawRecord[]> {
  private channel: BoundedChannel<readonly RawRecord[]>;

  constructor(bufferBatches = 16) {
    this.channel = new BoundedChannel(bufferBatches);
  }

  write(records: readonly RawRecord[]): Promise<void> {
    return this.channel.send(records);
  }

  /** No more writes; the consumer sees the end after draining pending batches. */
  end(): void {
    this.channel.close();
  }

  get pending(): number {
    return this.channel.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<readonly RawRecord[]> {
    return this.channel[Symbol.asyncIterator]();
  }
}
