import "dotenv/config";
import os from "node:os";
import path from "node:path";
import { parseLogLevel, type LogLevel } from "./logger";

export const DEFAULT_CALLBACK_PORT = 3000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export interface AppConfig {
  /** Used when no client id override file is present. */
  defaultClientId: string;
  defaultClientSecret: string;
  dataDir: string;
  callbackPort: number;
  requestTimeoutMs: number;
  logLevel: LogLevel;
}

function optionalEnv(env: NodeJS.ProcessEnv, name: string): string {
  return env[name]?.trim() ?? "";
}

function parseIntegerEnv(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number, max: number): number {
  const raw = optionalEnv(env, name);
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name} must be an integer between ${min} and ${max}`);
  }

  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = optionalEnv(env, "SPOTIFY_DATA_DIR") || path.join(os.homedir(), ".spotify-library-link");

  return {
    defaultClientId: optionalEnv(env, "SPOTIFY_CLIENT_ID"),
    defaultClientSecret: optionalEnv(env, "SPOTIFY_CLIENT_SECRET"),
    dataDir: path.resolve(dataDir),
    callbackPort: parseIntegerEnv(env, "SPOTIFY_CALLBACK_PORT", DEFAULT_CALLBACK_PORT, 0, 65535),
    requestTimeoutMs: parseIntegerEnv(env, "SPOTIFY_REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS, 1, 600000),
    logLevel: parseLogLevel(env.LOG_LEVEL)
  };
}
