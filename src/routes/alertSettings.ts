import express from "express";
import type { AlertSettingsRepository } from "../db/alerts";
import type { DeviceRepository } from "../db/devices";
import { ValidationFailure } from "../errors";
import { requireAuth } from "../middleware/auth";
import type { AlertEvaluator, DirectionState } from "../pipeline/alertEvaluator";
import { DEFAULT_ALERT_SETTINGS, type AlertDirection, type AlertSettings } from "../types";
import { notFound, ok, route, type HttpReply } from "../utils/http";
import { AlertSettingsBody, toFieldIssues } from "../validators";

export interface AlertSettingsDeps {
  devices: DeviceRepository;
  alertSettings: AlertSettingsRepository;
  alerts: AlertEvaluator;
  clock?: () => Date;
}

function serializeSettings(s: AlertSettings, state: Record<AlertDirection, DirectionState>) {
  return {
    device_id: s.deviceSerial,
    alerts_enabled: s.alertsEnabled,
    high_enabled: s.highEnabled,
    high_threshold_c: s.highThresholdC,
    low_enabled: s.lowEnabled,
    low_threshold_c: s.lowThresholdC,
    cooldown_minutes: s.cooldownMinutes,
    recipient_email: s.recipientEmail,
    state,
  };
}

export async function handleGetAlertSettings(deps: AlertSettingsDeps, serial: string): Promise<HttpReply> {
  const device = await deps.devices.findBySerial(serial);
  if (!device) return notFound("Device not found");

  const settings = (await deps.alertSettings.get(serial)) ?? { ...DEFAULT_ALERT_SETTINGS, deviceSerial: serial };
  const state = await deps.alerts.describe(serial, (deps.clock ?? (() => new Date()))());
  return ok(serializeSettings(settings, state));
}

export async function handlePutAlertSettings(deps: AlertSettingsDeps, serial: string, body: unknown): Promise<HttpReply> {
  const parsed = AlertSettingsBody.safeParse(body);
  if (!parsed.success) throw new ValidationFailure(toFieldIssues(parsed.error));

  const device = await deps.devices.findBySerial(serial);
  if (!device) return notFound("Device not found");

  const b = parsed.data;
  const saved = await deps.alertSettings.save({
    deviceSerial: serial,
    alertsEnabled: b.alerts_enabled,
    highEnabled: b.high_enabled,
    highThresholdC: b.high_threshold_c,
    lowEnabled: b.low_enabled,
    lowThresholdC: b.low_threshold_c,
    cooldownMinutes: b.cooldown_minutes,
    recipientEmail: b.recipient_email ?? null,
  });
  const state = await deps.alerts.describe(serial, (deps.clock ?? (() => new Date()))());
  return ok(serializeSettings(saved, state));
}

/**
 * GET /devices/:serial/alert-settings
 * PUT /devices/:serial/alert-settings
 */
export function createAlertSettingsRouter(deps: AlertSettingsDeps) {
  const router = express.Router();

  router.get("/:serial/alert-settings", requireAuth, route((req) => handleGetAlertSettings(deps, req.params.serial)));
  router.put(
    "/:serial/alert-settings",
    requireAuth,
    route((req) => handlePutAlertSettings(deps, req.params.serial, req.body))
  );

  return router;
}
