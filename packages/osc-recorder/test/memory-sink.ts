import type { RowSink } from "../src/row-writer.js";

export class MemorySink implements RowSink {
  lines: string[] = [];
  closeCount = 0;

  async append(line: string): Promise<void> {
    this.lines.push(line.replace(/\n$/, ""));
  }

  async close(): Promise<void> {
    this.closeCount += 1;
  }

  fields(index: number, separator = ","): string[] {
    return (this.lines[index] ?? "").split(separator);
  }
}

export class FailingSink extends MemorySink {
  constructor(private readonly failAfter: number) {
    super();
  }

  override async append(line: string): Promise<void> {
    if (this.lines.length >= this.failAfter) {
      throw new Error("disk full");
    }
    await super.append(line);
  }
}
