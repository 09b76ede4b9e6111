import dotenv from "dotenv";
import type { AppConfig } from "./types.js";

dotenv.config();

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function oneOf<T extends string>(
  key: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const val = process.env[key] || fallback;
  const match = allowed.find((candidate) => candidate === val);
  if (match === undefined) {
    throw new Error(
      `Invalid value for ${key}: "${val}". Must be one of: ${allowed.join(", ")}`,
    );
  }
  return match;
}

function flag(key: string, fallback = false): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === "true" || val === "1";
}

function integer(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = Number(val);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid integer for ${key}: "${val}"`);
  }
  return parsed;
}

function path(key: string, fallback: string): string {
  const val = optional(key, fallback);
  if (!val.startsWith("/")) {
    throw new Error(`Invalid path for ${key}: "${val}". Must start with "/"`);
  }
  return val;
}

export function loadConfig(): AppConfig {
  const port = integer("PORT", 8080);
  if (port < 0 || port > 65535) {
    throw new Error(`Invalid port for PORT: ${port}`);
  }

  const sampleRate = integer("SAMPLE_RATE", 16000);
  if (sampleRate <= 0) {
    throw new Error(`Invalid sample rate for SAMPLE_RATE: ${sampleRate}`);
  }

  return {
    port,
    host: optional("HOST", "0.0.0.0"),
    wsPath: path("WS_PATH", "/walkie"),
    healthPath: path("HEALTH_PATH", "/health"),
    talkPolicy: oneOf("TALK_POLICY", ["open", "exclusive"] as const, "open"),
    recording: {
      enabled: flag("RECORDING_ENABLED"),
      directory: optional("RECORDINGS_DIR", "recordings"),
      sampleRate,
    },
  };
}
