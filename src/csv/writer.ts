import { createWriteStream, WriteStream } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';
import type { AbundanceLabel, ClassificationResult } from '../types/index.js';

export interface CsvRow {
  date: string;
  comment: string;
  surge_level: AbundanceLabel;
  source_url: string;
  page_number: number;
}

export const CSV_HEADER = ['date', 'comment', 'surge_level', 'source_url', 'page_number'] as const satisfies ReadonlyArray<
  keyof CsvRow
>;

const BOM = '\uFEFF';

export function resultToRow(result: ClassificationResult): CsvRow {
  return {
    date: result.comment.postedAt,
    comment: result.comment.text,
    surge_level: result.label,
    source_url: result.comment.sourceUrl,
    page_number: result.comment.pageIndex,
  };
}

export class CsvStreamWriter {
  private failure: Error | undefined;

  private constructor(
    private readonly destination: string,
    private readonly stream: WriteStream,
  ) {
    stream.on('error', (error) => {
      this.failure ??= error;
    });
  }

  /** Creates (or truncates) the file and writes the BOM and header line. */
  static async create(destination: string): Promise<CsvStreamWriter> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const stream = createWriteStream(destination, { encoding: 'utf8' });
    stream.write(`${BOM}${CSV_HEADER.join(',')}\n`);
    return new CsvStreamWriter(destination, stream);
  }

  /** Rejects with the stream's error once opening or writing the file has failed. */
  async writeRow(row: CsvRow): Promise<void> {
    this.throwIfFailed();
    if (!this.stream.write(`${formatCsvLine(row)}\n`)) {
      await onceDrain(this.stream);
    }
    this.throwIfFailed();
  }

  async close(): Promise<void> {
    if (this.failure) {
      this.stream.destroy();
      throw this.failure;
    }
    this.stream.end();
    await finished(this.stream);
  }

  get path(): string {
    return this.destination;
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}

/** Writes a whole file at once. */
export async function writeCsv(destination: string, rows: Iterable<CsvRow>): Promise<void> {
  const writer = await CsvStreamWriter.create(destination);
  try {
    for (const row of rows) {
      await writer.writeRow(row);
    }
  } finally {
    await writer.close();
  }
}

export function formatCsvLine(row: CsvRow): string {
  return CSV_HEADER.map((key) => csvEscape(String(row[key]))).join(',');
}

async function onceDrain(stream: WriteStream): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const onDrain = () => {
      stream.off('error', onError);
      resolve();
    };
    const onError = (error: Error) => {
      stream.off('drain', onDrain);
      reject(error);
    };
    stream.once('drain', onDrain);
    stream.once('error', onError);
  });
}

export function csvEscape(value: string): string {
  const needsQuotes = value.includes(',') || /[\r\n]/.test(value) || value.includes('"');
  const sanitized = value.replace(/\r?\n|\r/g, ' ').replace(/"/g, '""');
  return needsQuotes ? `"${sanitized}"` : sanitized;
}
