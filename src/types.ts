// Domain records shared by the repositories, the ingest pipeline and routes.

export const THERMOSTAT_MODES = ["OFF", "HEAT", "COOL", "AUTO"] as const;
export type ThermostatMode = (typeof THERMOSTAT_MODES)[number];

export const OUTPUT_STATES = ["HEAT_ON", "COOL_ON", "OFF"] as const;
export type OutputState = (typeof OUTPUT_STATES)[number];

export const STORAGE_PLANS = ["free", "standard", "premium"] as const;
export type StoragePlan = (typeof STORAGE_PLANS)[number];

export type AlertDirection = "HIGH" | "LOW";

export interface Device {
  serial: string;
  ownerId: string;
  ownerEmail: string | null;
  name: string;
  lastSeenAt: Date | null;
  lastIp: string | null;
  createdAt: Date;
}

export interface DeviceCredential {
  id: string;
  deviceSerial: string;
  secretHash: string;
  createdAt: Date;
  expiresAt: Date | null;
  isActive: boolean;
}

/** Credential metadata safe to hand to collaborators (no hash). */
export type CredentialSummary = Omit<DeviceCredential, "secretHash">;

/** A sample that passed validation but has not been written yet. */
export interface NewTelemetrySample {
  deviceSerial: string;
  mode: ThermostatMode;
  setpointC: number;
  tempInsideC: number;
  tempOutsideC: number | null;
  humidityPercent: number | null;
  hysteresisC: number;
  output: OutputState;
  deviceTs: Date;
  rawPayload: Record<string, unknown>;
}

export interface TelemetrySample extends NewTelemetrySample {
  id: string;
  /** Assigned by the store at write time; authoritative for ordering. */
  receivedAt: Date;
}

export interface StorageProfile {
  ownerId: string;
  plan: StoragePlan;
  cachedUsageBytes: number;
  usageCalculatedAt: Date | null;
}

export interface AlertSettings {
  deviceSerial: string;
  alertsEnabled: boolean;
  highEnabled: boolean;
  highThresholdC: number;
  lowEnabled: boolean;
  lowThresholdC: number;
  cooldownMinutes: number;
  recipientEmail: string | null;
}

export const DEFAULT_ALERT_SETTINGS: Omit<AlertSettings, "deviceSerial"> = {
  alertsEnabled: false,
  highEnabled: false,
  highThresholdC: 30,
  lowEnabled: false,
  lowThresholdC: 10,
  cooldownMinutes: 30,
  recipientEmail: null,
};
