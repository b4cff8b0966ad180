import type { RecorderStatus } from "@vrlog/osc-recorder-contracts";
import { RecorderClosedError, SinkWriteError } from "./errors.js";
import { buildMessageRow } from "./event-log.js";
import { RotationFormatRegistry } from "./format-registry.js";
import type { Logger } from "./logger.js";
import { normalize } from "./normalizer.js";
import { RowWriter, type RowSink } from "./row-writer.js";
import { deviceClassOf, expectedPayloadLength } from "./schema.js";
import { SessionClock, localNowSeconds } from "./session-clock.js";
import type { PayloadValue, RotationFormat, UnifiedRow } from "./types.js";

export interface RecorderOptions {
  sink: RowSink;
  logger: Logger;
  logFile?: string;
  precision?: number;
  separator?: string;
  autoRecord?: boolean;
  verbose?: boolean;
  onError?: (error: SinkWriteError) => void;
  now?: () => number;
}

type DataWaiter = (received: boolean) => void;

/**
 * Session controller around the ingestion pipeline: packets and log messages
 * go in, rows come out on the sink in call order.
 */
export class OscRecorder {
  private readonly clock = new SessionClock();
  private readonly formats = new RotationFormatRegistry();
  private readonly writer: RowWriter;
  private readonly sink: RowSink;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly warnedAddresses = new Set<string>();
  private readonly dataWaiters = new Set<DataWaiter>();
  private recording: boolean;
  private packetsReceived = 0;
  private malformedPackets = 0;
  private failed = false;
  private closing: Promise<void> | null = null;

  constructor(private readonly options: RecorderOptions) {
    this.sink = options.sink;
    this.logger = options.logger;
    this.now = options.now ?? localNowSeconds;
    this.recording = options.autoRecord ?? true;
    this.writer = new RowWriter(options.sink, {
      precision: options.precision ?? 10,
      separator: options.separator ?? ",",
    });
  }

  get isRecording(): boolean {
    return this.recording;
  }

  get samplesReceived(): boolean {
    return this.clock.initialised;
  }

  startSession(): Promise<void> {
    this.clock.reset();
    this.formats.reset();
    this.warnedAddresses.clear();
    if (this.options.logFile) {
      this.logger.info({ logFile: this.options.logFile }, "recording to log file");
    }
    return this.track(this.writer.writeHeader());
  }

  handlePacket(address: string, payload: PayloadValue[], timeLocal = this.now()): void {
    if (this.closing) {
      return;
    }
    this.packetsReceived += 1;

    const format = this.formats.detect(address, payload);
    const normalized = normalize(address, payload, format);
    const wasInitialised = this.clock.initialised;
    const row: UnifiedRow = { ...normalized, ...this.clock.sync(normalized.timeProtocol, timeLocal) };
    if (!wasInitialised) {
      this.notifyDataWaiters(true);
    }

    if (!this.recording) {
      return;
    }

    this.checkLayout(address, payload, format);
    if (this.options.verbose) {
      this.logger.info({
        rtime: row.relTimeLocal,
        device: row.device,
        position: row.position,
        rotation: row.rotation,
      }, "sample");
    }
    // Sink failures reach the controller through onError.
    this.track(this.writer.write(row)).catch(() => undefined);
  }

  logMessage(text: string, device?: string): Promise<void> {
    if (this.closing) {
      return Promise.reject(new RecorderClosedError());
    }
    const row = buildMessageRow({ text, timeLocal: this.now() }, this.clock, device);
    this.logger.info({ device: row.device }, `LogMessage: ${text}`);
    return this.track(this.writer.write(row));
  }

  startRecording(): void {
    this.recording = true;
    this.logger.info("sample recording started");
  }

  stopRecording(): void {
    this.recording = false;
    this.logger.info("sample recording stopped");
  }

  waitForData(timeoutMs = 30_000): Promise<boolean> {
    if (this.clock.initialised) {
      return Promise.resolve(true);
    }
    if (this.closing) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      const waiter: DataWaiter = (received) => {
        clearTimeout(timer);
        this.dataWaiters.delete(waiter);
        resolve(received);
      };
      const timer = setTimeout(() => {
        this.logger.warn({ timeoutMs }, "timeout while waiting for first OSC sample");
        waiter(false);
      }, timeoutMs);
      this.dataWaiters.add(waiter);
    });
  }

  rotationFormat(address: string): RotationFormat | undefined {
    return this.formats.get(address);
  }

  status(): RecorderStatus {
    return {
      logFile: this.options.logFile ?? "",
      recording: this.recording,
      samplesReceived: this.clock.initialised,
      packetsReceived: this.packetsReceived,
      rowsWritten: this.writer.rowsWritten,
      malformedPackets: this.malformedPackets,
      formats: this.formats.snapshot(),
      closed: this.closing !== null,
    };
  }

  /** Stops recording, drains queued rows and closes the sink. Safe to call repeatedly. */
  shutdown(): Promise<void> {
    if (!this.closing) {
      this.closing = this.close();
    }
    return this.closing;
  }

  private async close(): Promise<void> {
    if (this.recording) {
      this.stopRecording();
    }
    this.notifyDataWaiters(false);

    const backlog = this.writer.backlog;
    if (backlog > 100) {
      this.logger.info({ backlog }, "saving remaining samples to log file");
    }
    try {
      await this.writer.flush();
    } finally {
      await this.sink.close();
      this.logger.info("log file closed");
    }
  }

  private checkLayout(address: string, payload: PayloadValue[], format: RotationFormat): void {
    const expected = expectedPayloadLength(deviceClassOf(address), format);
    if (expected === payload.length) {
      return;
    }

    this.malformedPackets += 1;
    if (this.warnedAddresses.has(address)) {
      return;
    }
    this.warnedAddresses.add(address);
    if (format === "unknown") {
      this.logger.warn({ address, fields: payload.length }, "unknown rotation format, rotation fields left empty");
    } else {
      this.logger.warn(
        { address, format, fields: payload.length, expected },
        "payload does not match device layout, missing fields left empty",
      );
    }
  }

  private notifyDataWaiters(received: boolean): void {
    for (const waiter of [...this.dataWaiters]) {
      waiter(received);
    }
  }

  private track(write: Promise<void>): Promise<void> {
    return write.catch((error: unknown) => {
      if (error instanceof SinkWriteError && !this.failed) {
        this.failed = true;
        this.logger.error({ err: error }, "failed to write row to log file");
        this.options.onError?.(error);
      }
      throw error;
    });
  }
}
