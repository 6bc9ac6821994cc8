import express from "express";
import type { DeviceRepository } from "../db/devices";
import { ValidationFailure } from "../errors";
import { requireAuth } from "../middleware/auth";
import { summarizeStorage } from "../pipeline/quotaEnforcer";
import { notFound, ok, route, type HttpReply } from "../utils/http";
import { createLogger } from "../utils/logger";
import { DeleteTelemetryQuery, SetPlanBody, toFieldIssues } from "../validators";
import { recomputeOwnerUsage, type StorageUsageDeps } from "../workers/storageUsageWorker";

const log = createLogger("storage");

export interface StorageRouteDeps extends StorageUsageDeps {
  devices: DeviceRepository;
}

export async function handleGetStorage(deps: StorageRouteDeps, ownerId: string): Promise<HttpReply> {
  const profile = await deps.profiles.getOrCreate(ownerId);
  return ok(summarizeStorage(profile));
}

export async function handleRecompute(deps: StorageRouteDeps, ownerId: string, now = new Date()): Promise<HttpReply> {
  await deps.profiles.getOrCreate(ownerId);
  const profile = await recomputeOwnerUsage(deps, ownerId, now);
  log.info({ ownerId, bytes: profile.cachedUsageBytes }, "Usage recomputed on request");
  return ok(summarizeStorage(profile));
}

export async function handleSetPlan(deps: StorageRouteDeps, ownerId: string, body: unknown): Promise<HttpReply> {
  const parsed = SetPlanBody.safeParse(body);
  if (!parsed.success) throw new ValidationFailure(toFieldIssues(parsed.error));

  const profile = await deps.profiles.setPlan(ownerId, parsed.data.plan);
  log.info({ ownerId, plan: profile.plan }, "Storage plan changed");
  return ok(summarizeStorage(profile));
}

/**
 * Deletes an owner's samples, optionally narrowed to one device and a
 * `[start, end)` window on receipt time, then recomputes the cached usage so
 * a full quota frees up at once.
 */
export async function handleDeleteTelemetry(
  deps: StorageRouteDeps,
  ownerId: string,
  query: unknown,
  now = new Date()
): Promise<HttpReply> {
  const parsed = DeleteTelemetryQuery.safeParse(query);
  if (!parsed.success) throw new ValidationFailure(toFieldIssues(parsed.error));

  const { serial, start, end } = parsed.data;
  if (serial !== undefined) {
    const device = await deps.devices.findBySerial(serial);
    if (!device || device.ownerId !== ownerId) return notFound("Device not found");
  }

  const deleted = await deps.store.deleteSamples({
    ownerId,
    serial,
    start: start === undefined ? undefined : new Date(start),
    end: end === undefined ? undefined : new Date(end),
  });
  const profile = await recomputeOwnerUsage(deps, ownerId, now);
  log.info({ ownerId, serial, deleted, bytes: profile.cachedUsageBytes }, "Telemetry deleted");

  return ok({ deleted, storage: summarizeStorage(profile) });
}

/**
 * GET    /storage/:ownerId
 * POST   /storage/:ownerId/recompute
 * PUT    /storage/:ownerId/plan
 * DELETE /storage/:ownerId/telemetry?serial=&start=&end=
 */
export function createStorageRouter(deps: StorageRouteDeps) {
  const router = express.Router();

  router.get("/:ownerId", requireAuth, route((req) => handleGetStorage(deps, req.params.ownerId)));
  router.post("/:ownerId/recompute", requireAuth, route((req) => handleRecompute(deps, req.params.ownerId)));
  router.put("/:ownerId/plan", requireAuth, route((req) => handleSetPlan(deps, req.params.ownerId, req.body)));
  router.delete(
    "/:ownerId/telemetry",
    requireAuth,
    route((req) => handleDeleteTelemetry(deps, req.params.ownerId, req.query))
  );

  return router;
}
