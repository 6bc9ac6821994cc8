/**
 * Telemetry Core — Centralized Configuration Loader
 * --------------------------------------------------------------
 * Consolidates every environment variable the ingest service reads and
 * exposes them as one typed object with defaults for local development.
 * Missing critical values are surfaced early on startup.
 */

import dotenv from "dotenv";

// Load .env file in local development (the platform injects env vars in prod)
dotenv.config();

function int(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function float(name: string, fallback: number): number {
  const parsed = parseFloat(process.env[name] || "");
  return Number.isNaN(parsed) ? fallback : parsed;
}

export type RateLimitBackend = "memory" | "postgres";

function rateLimitBackend(): RateLimitBackend {
  return process.env.RATE_LIMIT_BACKEND === "postgres" ? "postgres" : "memory";
}

export const cfg = {
  // 🔐 Security
  CORE_API_KEY: process.env.CORE_API_KEY || "",
  CORE_JWT_SECRET: process.env.CORE_JWT_SECRET || "",
  CORE_JWT_ISS: process.env.CORE_JWT_ISS || "telemetry.dashboard",
  CORE_JWT_AUD: process.env.CORE_JWT_AUD || "telemetry.core",
  AUTH_REQUIRED: (process.env.AUTH_REQUIRED || "true") === "true",

  // 🗄 Database
  DATABASE_URL: process.env.DATABASE_URL || "",
  DB_MAX_CONNECTIONS: int("DB_MAX_CONNECTIONS", 10),

  // 🔑 Device credentials
  CREDENTIAL_HASH_ROUNDS: int("CREDENTIAL_HASH_ROUNDS", 10),
  CREDENTIAL_TTL_DAYS: int("CREDENTIAL_TTL_DAYS", 365),
  KEY_ROTATION_LIMIT: int("KEY_ROTATION_LIMIT", 5),
  KEY_ROTATION_WINDOW_SECONDS: int("KEY_ROTATION_WINDOW_SECONDS", 3600),

  // 🚦 Ingest throttling (fixed window)
  RATE_LIMIT_CAPACITY: int("RATE_LIMIT_CAPACITY", 60),
  RATE_LIMIT_WINDOW_SECONDS: int("RATE_LIMIT_WINDOW_SECONDS", 60),
  RATE_LIMIT_BACKEND: rateLimitBackend(),

  // 📦 Storage quota: cached usage may lag by up to this many minutes
  STORAGE_USAGE_MAX_STALENESS_MINUTES: int("STORAGE_USAGE_MAX_STALENESS_MINUTES", 15),

  // 🌡 Accepted physical ranges
  TEMP_MIN_C: float("TEMP_MIN_C", -40),
  TEMP_MAX_C: float("TEMP_MAX_C", 85),
  SETPOINT_MIN_C: float("SETPOINT_MIN_C", 5),
  SETPOINT_MAX_C: float("SETPOINT_MAX_C", 35),
  HYSTERESIS_MIN_C: float("HYSTERESIS_MIN_C", 0.1),
  HYSTERESIS_MAX_C: float("HYSTERESIS_MAX_C", 5),

  // 📨 Notifications
  NOTIFY_WEBHOOK_URL: process.env.NOTIFY_WEBHOOK_URL || "",
  NOTIFY_TIMEOUT_MS: int("NOTIFY_TIMEOUT_MS", 5000),
  NOTIFY_FROM: process.env.NOTIFY_FROM || "alerts@telemetry.local",

  // 🧠 Environment + misc
  NODE_ENV: process.env.NODE_ENV || "development",
  PORT: int("PORT", 8080),
  LOG_LEVEL: process.env.LOG_LEVEL || "info",
  ENABLE_CRON: (process.env.ENABLE_CRON || "true") === "true",
  SERVICE_NAME: process.env.SERVICE_NAME || "device-telemetry-core",
};

export type Config = typeof cfg;

export default cfg;
