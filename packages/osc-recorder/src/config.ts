import { DEFAULT_DEVICE_ADDRESSES } from "@vrlog/osc-recorder-contracts";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const AppConfigSchema = z.object({
  logFile: z.string().min(1),
  addresses: z.array(z.string().startsWith("/")).min(1),
  durationSec: z.number().positive().optional(),
  oscHost: z.string().min(1),
  oscPort: z.number().int().min(1).max(65535),
  verbose: z.boolean(),
  precision: z.number().int().min(0).max(20),
  separator: z.string().min(1),
  autoRecord: z.boolean(),
  controlHost: z.string().min(1),
  controlPort: z.number().int().min(0).max(65535),
  controlAuthToken: z.string().min(1).optional(),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

function stringEnv(name: string, fallback: string): string {
  return process.env[name] || fallback;
}

function numberEnv(name: string, fallback: number): number {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Invalid numeric env var ${name}: ${value}`);
  }
  return parsed;
}

function optionalNumberEnv(name: string): number | undefined {
  return process.env[name] ? numberEnv(name, 0) : undefined;
}

function booleanEnv(name: string, fallback: boolean): boolean {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

function listEnv(name: string): string[] | undefined {
  const value = process.env[name];
  if (!value) {
    return undefined;
  }
  return value.split(",").map((entry) => entry.trim()).filter((entry) => entry.length > 0);
}

export function validateConfig(input: unknown): AppConfig {
  const parsed = AppConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration (${issues.join("; ")})`);
  }
  return parsed.data;
}

export function loadConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  const fromEnv = {
    logFile: stringEnv("OSC_LOG_FILE", "openvr_data.csv"),
    addresses: listEnv("OSC_ADDRESSES") ?? [...DEFAULT_DEVICE_ADDRESSES],
    durationSec: optionalNumberEnv("OSC_DURATION_SEC"),
    oscHost: stringEnv("OSC_HOST", "127.0.0.1"),
    oscPort: numberEnv("OSC_PORT", 7775),
    verbose: booleanEnv("OSC_VERBOSE", false),
    precision: numberEnv("OSC_PRECISION", 10),
    separator: stringEnv("OSC_SEPARATOR", ","),
    autoRecord: booleanEnv("OSC_AUTO_RECORD", true),
    controlHost: stringEnv("CONTROL_HOST", "127.0.0.1"),
    controlPort: numberEnv("CONTROL_PORT", 0),
    controlAuthToken: process.env.CONTROL_AUTH_TOKEN || undefined,
    logLevel: stringEnv("LOG_LEVEL", "info"),
  };

  const merged: Record<string, unknown> = { ...fromEnv };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return validateConfig(merged);
}
