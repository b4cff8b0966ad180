import { z } from "zod";

export const KNOWN_DEVICE_ADDRESSES = [
  "/HMD",
  "/TrackingReference",
  "/DisplayRedirect",
  "/Controller",
  "/GenericTracker",
  "/Hand_L",
  "/Hand_R",
] as const;

export const DEFAULT_DEVICE_ADDRESSES = ["/HMD", "/Controller", "/Hand_L", "/Hand_R"] as const;

export const LOG_MESSAGE_DEVICE = "LogMessage";

export const DeviceAddressSchema = z.enum(KNOWN_DEVICE_ADDRESSES);

export const RotationFormatSchema = z.enum(["quaternion", "euler", "unknown"]);

export const LogMessageRequestSchema = z.object({
  text: z.string(),
  device: z.string().min(1).optional(),
});

export const LogMessageResponseSchema = z.object({
  ok: z.literal(true),
});

export const RecordingStateResponseSchema = z.object({
  ok: z.literal(true),
  recording: z.boolean(),
});

export const HealthResponseSchema = z.object({
  ok: z.boolean(),
  ts: z.number().int().nonnegative(),
});

export const RecorderStatusSchema = z.object({
  logFile: z.string(),
  recording: z.boolean(),
  samplesReceived: z.boolean(),
  packetsReceived: z.number().int().nonnegative(),
  rowsWritten: z.number().int().nonnegative(),
  malformedPackets: z.number().int().nonnegative(),
  formats: z.record(RotationFormatSchema),
  closed: z.boolean(),
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
  requestId: z.string().optional(),
});

export type RotationFormat = z.infer<typeof RotationFormatSchema>;
export type LogMessageRequest = z.infer<typeof LogMessageRequestSchema>;
export type LogMessageResponse = z.infer<typeof LogMessageResponseSchema>;
export type RecordingStateResponse = z.infer<typeof RecordingStateResponseSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
export type RecorderStatus = z.infer<typeof RecorderStatusSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
