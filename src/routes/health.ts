import express from "express";
import { cfg } from "../config";
import { errorMessage } from "../errors";
import { route, type HttpReply } from "../utils/http";
import { createLogger } from "../utils/logger";

const log = createLogger("health");

/** Resolves with the database clock, or rejects when the database is unreachable. */
export type DbPing = () => Promise<Date>;

export async function handleHealth(ping: DbPing): Promise<HttpReply> {
  try {
    const dbTime = await ping();
    return {
      status: 200,
      body: {
        status: "ok",
        service: cfg.SERVICE_NAME,
        db_connected: true,
        db_time: dbTime.toISOString(),
        uptime_seconds: process.uptime(),
        timestamp: new Date().toISOString(),
      },
    };
  } catch (err) {
    log.error({ err: errorMessage(err) }, "Health check failed");
    return {
      status: 503,
      body: { status: "error", db_connected: false, message: errorMessage(err) },
    };
  }
}

export function createHealthRouter(ping: DbPing) {
  const router = express.Router();
  router.get("/", route(() => handleHealth(ping)));
  return router;
}
