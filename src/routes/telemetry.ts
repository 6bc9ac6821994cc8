import express from "express";
import type { DeviceRepository } from "../db/devices";
import type { TelemetryStore } from "../db/telemetry";
import { ValidationFailure } from "../errors";
import { requireAuth } from "../middleware/auth";
import type { TelemetrySample } from "../types";
import { notFound, ok, route, type HttpReply } from "../utils/http";
import { RangeQuery, RecentQuery, toFieldIssues } from "../validators";

export interface TelemetryQueryDeps {
  devices: DeviceRepository;
  store: TelemetryStore;
}

export function serializeSample(s: TelemetrySample) {
  return {
    id: s.id,
    device_id: s.deviceSerial,
    mode: s.mode,
    setpoint_c: s.setpointC,
    temp_inside_c: s.tempInsideC,
    temp_outside_c: s.tempOutsideC,
    humidity_percent: s.humidityPercent,
    hysteresis_c: s.hysteresisC,
    output: s.output,
    device_ts: s.deviceTs.toISOString(),
    server_ts: s.receivedAt.toISOString(),
    raw_payload: s.rawPayload,
  };
}

/** Samples received in [start, end), oldest first. */
export async function handleRange(deps: TelemetryQueryDeps, serial: string, query: unknown): Promise<HttpReply> {
  const parsed = RangeQuery.safeParse(query);
  if (!parsed.success) throw new ValidationFailure(toFieldIssues(parsed.error), "Invalid query parameters");

  const device = await deps.devices.findBySerial(serial);
  if (!device) return notFound("Device not found");

  const samples = await deps.store.range(serial, new Date(parsed.data.start), new Date(parsed.data.end));
  return ok({ device_id: serial, count: samples.length, results: samples.map(serializeSample) });
}

/** The newest N samples, newest first. */
export async function handleRecent(deps: TelemetryQueryDeps, serial: string, query: unknown): Promise<HttpReply> {
  const parsed = RecentQuery.safeParse(query);
  if (!parsed.success) throw new ValidationFailure(toFieldIssues(parsed.error), "Invalid query parameters");

  const device = await deps.devices.findBySerial(serial);
  if (!device) return notFound("Device not found");

  const samples = await deps.store.recent(serial, parsed.data.limit);
  return ok({ device_id: serial, count: samples.length, results: samples.map(serializeSample) });
}

/**
 * GET /telemetry/:serial?start=&end=
 * GET /telemetry/:serial/recent?limit=
 * Read-only views for the dashboard and export collaborators.
 */
export function createTelemetryRouter(deps: TelemetryQueryDeps) {
  const router = express.Router();

  router.get("/:serial/recent", requireAuth, route((req) => handleRecent(deps, req.params.serial, req.query)));
  router.get("/:serial", requireAuth, route((req) => handleRange(deps, req.params.serial, req.query)));

  return router;
}
