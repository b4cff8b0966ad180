import { open, type FileHandle } from "node:fs/promises";
import { SinkWriteError } from "./errors.js";
import { COLUMNS, rowValues } from "./schema.js";
import type { UnifiedRow } from "./types.js";

export interface RowSink {
  append(line: string): Promise<void>;
  close(): Promise<void>;
}

export class FileSink implements RowSink {
  private handle: FileHandle | null = null;

  constructor(readonly filePath: string) {}

  async append(line: string): Promise<void> {
    if (!this.handle) {
      this.handle = await open(this.filePath, "a");
    }
    await this.handle.appendFile(line, "utf8");
  }

  async close(): Promise<void> {
    if (this.handle) {
      const handle = this.handle;
      this.handle = null;
      await handle.close();
    }
  }
}

export interface RowWriterOptions {
  precision: number;
  separator: string;
}

export function formatNumber(value: number, precision: number): string {
  if (!Number.isFinite(value)) {
    return "NaN";
  }
  return value.toFixed(precision);
}

export function quoteField(value: string, separator: string): string {
  if (value.includes(separator) || value.includes("\"") || value.includes("\n") || value.includes("\r")) {
    return `"${value.replaceAll("\"", "\"\"")}"`;
  }
  return value;
}

export function formatRow(row: UnifiedRow, options: RowWriterOptions): string {
  const fields = rowValues(row).map((value, index) => {
    if (typeof value === "string") {
      return quoteField(value, options.separator);
    }
    // deviceid is an integer column
    if (index === 2) {
      return Number.isFinite(value) ? String(Math.trunc(value)) : "NaN";
    }
    return formatNumber(value, options.precision);
  });
  return fields.join(options.separator);
}

export function formatHeader(separator: string): string {
  return COLUMNS.join(separator);
}

/**
 * Serialises rows onto one write chain so that file order equals call order.
 * The first sink failure poisons the writer: later writes reject with it.
 */
export class RowWriter {
  private tail: Promise<void> = Promise.resolve();
  private failure: SinkWriteError | null = null;
  private pending = 0;
  private written = 0;

  constructor(
    private readonly sink: RowSink,
    private readonly options: RowWriterOptions,
  ) {}

  get rowsWritten(): number {
    return this.written;
  }

  get backlog(): number {
    return this.pending;
  }

  writeHeader(): Promise<void> {
    return this.enqueue(formatHeader(this.options.separator), false);
  }

  write(row: UnifiedRow): Promise<void> {
    return this.enqueue(formatRow(row, this.options), true);
  }

  flush(): Promise<void> {
    return this.tail.then(() => {
      if (this.failure) {
        throw this.failure;
      }
    });
  }

  private enqueue(line: string, countsAsRow: boolean): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    this.pending += 1;
    const result = this.tail.then(async () => {
      if (this.failure) {
        throw this.failure;
      }
      try {
        await this.sink.append(`${line}\n`);
      } catch (error) {
        this.failure = new SinkWriteError("Failed to append row to output sink", { cause: error });
        throw this.failure;
      } finally {
        this.pending -= 1;
      }
      if (countsAsRow) {
        this.written += 1;
      }
    });
    this.tail = result.catch(() => undefined);
    return result;
  }
}
