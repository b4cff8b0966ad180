import type {
  HealthResponse,
  LogMessageRequest,
  RecorderStatus,
  RecordingStateResponse,
} from "@vrlog/osc-recorder-contracts";
import {
  ErrorResponseSchema,
  HealthResponseSchema,
  LogMessageResponseSchema,
  RecorderStatusSchema,
  RecordingStateResponseSchema,
} from "@vrlog/osc-recorder-contracts";
import type { ZodType } from "zod";

export interface RecorderControlClientOptions {
  baseUrl: string;
  authToken?: string;
  fetch?: typeof fetch;
}

function describeFailure(statusCode: number, body: unknown): string {
  const parsed = ErrorResponseSchema.safeParse(body);
  const reason = parsed.success ? `: ${parsed.data.error}` : "";
  return `Recorder control request failed with status ${statusCode}${reason}`;
}

export class RecorderRequestError extends Error {
  constructor(
    readonly statusCode: number,
    readonly body: unknown,
  ) {
    super(describeFailure(statusCode, body));
    this.name = "RecorderRequestError";
  }
}

/**
 * Talks to a running recorder's control server, e.g. from experiment code
 * that marks condition boundaries in the motion log.
 */
export class RecorderControlClient {
  private readonly baseUrl: URL;
  private readonly authToken: string | undefined;
  private readonly fetchImpl: typeof fetch;

  constructor(options: RecorderControlClientOptions) {
    this.baseUrl = new URL(options.baseUrl.endsWith("/") ? options.baseUrl : `${options.baseUrl}/`);
    this.authToken = options.authToken;
    this.fetchImpl = options.fetch ?? fetch;
  }

  health(): Promise<HealthResponse> {
    return this.request("GET", "/health", HealthResponseSchema);
  }

  status(): Promise<RecorderStatus> {
    return this.request("GET", "/status", RecorderStatusSchema);
  }

  async logMessage(text: string, device?: string): Promise<void> {
    const body: LogMessageRequest = device ? { text, device } : { text };
    await this.request("POST", "/messages", LogMessageResponseSchema, body);
  }

  startRecording(): Promise<RecordingStateResponse> {
    return this.request("POST", "/recording/start", RecordingStateResponseSchema);
  }

  stopRecording(): Promise<RecordingStateResponse> {
    return this.request("POST", "/recording/stop", RecordingStateResponseSchema);
  }

  private async request<T>(method: "GET" | "POST", path: string, schema: ZodType<T>, body?: unknown): Promise<T> {
    const headers: Record<string, string> = {};
    if (this.authToken) {
      headers.authorization = `Bearer ${this.authToken}`;
    }
    if (body !== undefined) {
      headers["content-type"] = "application/json";
    }

    const response = await this.fetchImpl(new URL(path.replace(/^\//, ""), this.baseUrl), {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    let parsed: unknown;
    try {
      parsed = await response.json();
    } catch {
      parsed = undefined;
    }

    if (!response.ok) {
      throw new RecorderRequestError(response.status, parsed);
    }
    return schema.parse(parsed);
  }
}
