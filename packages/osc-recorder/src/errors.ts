export class SinkWriteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SinkWriteError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class RecorderClosedError extends Error {
  constructor() {
    super("Recorder is shut down");
    this.name = "RecorderClosedError";
  }
}
