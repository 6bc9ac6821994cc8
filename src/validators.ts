import { z } from "zod";
import { cfg } from "./config";
import { THERMOSTAT_MODES, OUTPUT_STATES, STORAGE_PLANS } from "./types";
import type { FieldIssue } from "./errors";

const temperature = z.number().finite().min(cfg.TEMP_MIN_C).max(cfg.TEMP_MAX_C);

export const TelemetryBody = z.object({
  mode: z.enum(THERMOSTAT_MODES),
  setpoint_c: z.number().finite().min(cfg.SETPOINT_MIN_C).max(cfg.SETPOINT_MAX_C),
  temp_inside_c: temperature,
  temp_outside_c: temperature.nullable().optional(),
  humidity_percent: z.number().finite().min(0).max(100).nullable().optional(),
  hysteresis_c: z.number().finite().min(cfg.HYSTERESIS_MIN_C).max(cfg.HYSTERESIS_MAX_C).default(0.5),
  output: z.enum(OUTPUT_STATES),
  device_ip: z.string().ip().optional(),
  timestamp: z.string().datetime({ offset: true }),
});

export const AlertSettingsBody = z
  .object({
    alerts_enabled: z.boolean(),
    high_enabled: z.boolean(),
    high_threshold_c: temperature,
    low_enabled: z.boolean(),
    low_threshold_c: temperature,
    cooldown_minutes: z.number().int().min(1).max(24 * 60),
    recipient_email: z.string().email().max(254).nullable().optional(),
  })
  .refine((s) => !(s.high_enabled && s.low_enabled) || s.low_threshold_c < s.high_threshold_c, {
    message: "low_threshold_c must be below high_threshold_c",
    path: ["low_threshold_c"],
  });

export const RegisterDeviceBody = z.object({
  serial_number: z.string().trim().min(1).max(64),
  owner_id: z.string().trim().min(1),
  owner_email: z.string().trim().email().optional(),
  name: z.string().trim().max(100).optional(),
});

export const RenameDeviceBody = z.object({
  name: z.string().trim().max(100),
});

export const SetPlanBody = z.object({
  plan: z.enum(STORAGE_PLANS),
});

export const RangeQuery = z
  .object({
    start: z.string().datetime({ offset: true }),
    end: z.string().datetime({ offset: true }),
  })
  .refine((q) => Date.parse(q.start) < Date.parse(q.end), {
    message: "start must be before end",
    path: ["start"],
  });

/** Every bound is optional: no bounds means all of the owner's samples. */
export const DeleteTelemetryQuery = z
  .object({
    serial: z.string().trim().min(1).max(64).optional(),
    start: z.string().datetime({ offset: true }).optional(),
    end: z.string().datetime({ offset: true }).optional(),
  })
  .refine((q) => q.start === undefined || q.end === undefined || Date.parse(q.start) < Date.parse(q.end), {
    message: "start must be before end",
    path: ["start"],
  });

export const RecentQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(20),
});

export function toFieldIssues(error: z.ZodError): FieldIssue[] {
  return error.errors.map((e) => ({
    field: e.path.join("."),
    message: e.message,
  }));
}
