import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import { LogMessageRequestSchema, type ErrorResponse, type LogMessageResponse } from "@vrlog/osc-recorder-contracts";
import { assertControlAuth } from "./auth.js";
import type { AppConfig } from "./config.js";
import { RecorderClosedError, SinkWriteError } from "./errors.js";
import { loggerOptions } from "./logger.js";
import type { OscRecorder } from "./recorder.js";

type ControlConfig = Pick<AppConfig, "controlAuthToken" | "logLevel">;

/**
 * HTTP surface for study-control code running outside this process:
 * condition markers, recording on/off and status.
 */
export async function buildServer(config: ControlConfig, recorder: OscRecorder): Promise<FastifyInstance> {
  const app = Fastify({
    bodyLimit: 64_000,
    logger: loggerOptions(config.logLevel),
  });

  function authorized(request: FastifyRequest, reply: FastifyReply): boolean {
    try {
      assertControlAuth(request.headers.authorization, config.controlAuthToken);
      return true;
    } catch {
      reply.code(401).send({ error: "unauthorized" } satisfies ErrorResponse);
      return false;
    }
  }

  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  app.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error }, "unhandled request error");
    reply.code(500).send({ error: "internal_error", requestId: request.id } satisfies ErrorResponse);
  });

  app.get("/health", async () => ({ ok: true, ts: Date.now() }));

  app.get("/status", async () => recorder.status());

  app.post("/messages", async (request, reply) => {
    if (!authorized(request, reply)) {
      return reply;
    }

    const parsed = LogMessageRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }

    try {
      await recorder.logMessage(parsed.data.text, parsed.data.device);
    } catch (error) {
      if (error instanceof SinkWriteError) {
        request.log.error({ err: error }, "log message lost");
        return reply.code(500).send({ error: "sink_write_failed", requestId: request.id } satisfies ErrorResponse);
      }
      if (error instanceof RecorderClosedError) {
        return reply.code(409).send({ error: "recorder_closed" } satisfies ErrorResponse);
      }
      throw error;
    }
    return reply.send({ ok: true } satisfies LogMessageResponse);
  });

  app.post("/recording/start", async (request, reply) => {
    if (!authorized(request, reply)) {
      return reply;
    }
    recorder.startRecording();
    return reply.send({ ok: true, recording: recorder.isRecording });
  });

  app.post("/recording/stop", async (request, reply) => {
    if (!authorized(request, reply)) {
      return reply;
    }
    recorder.stopRecording();
    return reply.send({ ok: true, recording: recorder.isRecording });
  });

  return app;
}
