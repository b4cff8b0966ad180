import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { SinkWriteError } from "../src/errors.js";
import { normalize } from "../src/normalizer.js";
import { FileSink, RowWriter, formatHeader, formatNumber, formatRow, quoteField } from "../src/row-writer.js";
import { COLUMNS, emptyRow } from "../src/schema.js";
import { FailingSink, MemorySink } from "./memory-sink.js";

const options = { precision: 10, separator: "," };

describe("formatting", () => {
  it("formats numbers with fixed precision and NaN for missing values", () => {
    expect(formatNumber(1, 10)).toBe("1.0000000000");
    expect(formatNumber(-0.3, 3)).toBe("-0.300");
    expect(formatNumber(Number.NaN, 10)).toBe("NaN");
    expect(formatNumber(Number.POSITIVE_INFINITY, 10)).toBe("NaN");
  });

  it("quotes text only when it needs quoting", () => {
    expect(quoteField("condition_A_start", ",")).toBe("condition_A_start");
    expect(quoteField("a,b", ",")).toBe("\"a,b\"");
    expect(quoteField("say \"hi\"", ",")).toBe("\"say \"\"hi\"\"\"");
    expect(quoteField("a,b", "\t")).toBe("a,b");
  });

  it("formats a headset row in column order", () => {
    const row = {
      ...normalize("/HMD", [3, 100.5, 0.1, 1.2, -0.3, 0, 0, 0, 1], "quaternion"),
      timeLocal: 50,
      relTimeProtocol: 0,
      relTimeLocal: 0,
    };

    const fields = formatRow(row, options).split(",");

    expect(fields).toHaveLength(COLUMNS.length);
    expect(fields.slice(0, 14)).toEqual([
      "HMD",
      "",
      "3",
      "100.5000000000",
      "50.0000000000",
      "0.0000000000",
      "0.0000000000",
      "0.1000000000",
      "1.2000000000",
      "-0.3000000000",
      "0.0000000000",
      "0.0000000000",
      "0.0000000000",
      "1.0000000000",
    ]);
    expect(fields.slice(14).every((field) => field === "NaN")).toBe(true);
  });

  it("writes the header with the configured separator", () => {
    const header = formatHeader("\t").split("\t");

    expect(header).toEqual(COLUMNS);
    expect(header.slice(0, 7)).toEqual(["device", "message", "deviceid", "time_ovr", "time_sys", "rtime_ovr", "rtime_sys"]);
    expect(header[13]).toBe("rotW");
    expect(header[14]).toBe("button1");
    expect(header[27]).toBe("button14");
    expect(header[28]).toBe("axis1X");
    expect(header[38]).toBe("thumb0_posX");
    expect(header[header.length - 1]).toBe("pinky4_rotW");
    expect(header).toHaveLength(206);
  });
});

describe("RowWriter", () => {
  it("appends rows in call order", async () => {
    const sink = new MemorySink();
    const writer = new RowWriter(sink, options);

    void writer.writeHeader();
    void writer.write(emptyRow("first"));
    await writer.write(emptyRow("second"));

    expect(sink.lines.map((line) => line.split(",")[0])).toEqual(["device", "first", "second"]);
    expect(writer.rowsWritten).toBe(2);
  });

  it("surfaces sink failures and rejects every later write", async () => {
    const sink = new FailingSink(1);
    const writer = new RowWriter(sink, options);

    await writer.writeHeader();
    const error = await writer.write(emptyRow("lost")).catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(SinkWriteError);
    const cause = error instanceof SinkWriteError ? error.cause : undefined;
    expect(cause instanceof Error ? cause.message : cause).toBe("disk full");
    await expect(writer.write(emptyRow("after"))).rejects.toBeInstanceOf(SinkWriteError);
    await expect(writer.flush()).rejects.toBeInstanceOf(SinkWriteError);
    expect(sink.lines).toHaveLength(1);
    expect(writer.rowsWritten).toBe(0);
  });
});

describe("FileSink", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it("appends UTF-8 lines to the file", async () => {
    dir = await mkdtemp(path.join(tmpdir(), "osc-recorder-"));
    const filePath = path.join(dir, "out.csv");
    const sink = new FileSink(filePath);

    await sink.append("a,b\n");
    await sink.append("ü,c\n");
    await sink.close();
    await sink.close();

    expect(await readFile(filePath, "utf8")).toBe("a,b\nü,c\n");
  });
});
