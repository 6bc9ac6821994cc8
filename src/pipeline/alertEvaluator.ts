import type { AlertSettingsRepository, AlertStateStore } from '../db/alerts';
import type { AlertDirection, AlertSettings, Device, TelemetrySample } from '../types';

export const ALERT_DIRECTIONS: readonly AlertDirection[] = ['HIGH', 'LOW'];

export type AlertPhase = 'ARMED' | 'COOLING';

export interface FiredAlert {
  device: Device;
  direction: AlertDirection;
  thresholdC: number;
  sample: TelemetrySample;
  settings: AlertSettings;
}

export interface DirectionState {
  phase: AlertPhase;
  lastFiredAt: string | null;
  armsAt: string | null;
}

export function thresholdFor(settings: AlertSettings, direction: AlertDirection): number {
  return direction === 'HIGH' ? settings.highThresholdC : settings.lowThresholdC;
}

/** Whether a reading breaches one direction's threshold with that direction switched on. */
export function breaches(settings: AlertSettings, direction: AlertDirection, tempC: number): boolean {
  if (direction === 'HIGH') return settings.highEnabled && tempC >= settings.highThresholdC;
  return settings.lowEnabled && tempC <= settings.lowThresholdC;
}

/**
 * Per (device, direction) ARMED/COOLING machine. COOLING is not stored as
 * such: a key is cooling while `now - lastFiredAt < cooldown`, and re-arms
 * lazily the first time a sample arrives after that. Directions are tracked
 * separately so a HIGH alert never suppresses a LOW one.
 */
export class AlertEvaluator {
  constructor(
    private readonly settings: AlertSettingsRepository,
    private readonly state: AlertStateStore
  ) {}

  /** Evaluates a stored sample; `receivedAt` is the evaluation clock. */
  async evaluate(device: Device, sample: TelemetrySample): Promise<FiredAlert[]> {
    const settings = await this.settings.get(device.serial);
    if (!settings || !settings.alertsEnabled) return [];

    const cooldownMs = settings.cooldownMinutes * 60_000;
    const fired: FiredAlert[] = [];

    // Both directions are checked; a breach while cooling is absorbed by tryFire.
    for (const direction of ALERT_DIRECTIONS) {
      if (!breaches(settings, direction, sample.tempInsideC)) continue;

      const armed = await this.state.tryFire(device.serial, direction, sample.receivedAt, cooldownMs);
      if (armed) {
        fired.push({ device, direction, thresholdC: thresholdFor(settings, direction), sample, settings });
      }
    }

    return fired;
  }

  async describe(serial: string, now: Date): Promise<Record<AlertDirection, DirectionState>> {
    const settings = await this.settings.get(serial);
    const lastFired = await this.state.lastFired(serial);
    const cooldownMs = (settings?.cooldownMinutes ?? 0) * 60_000;

    const describeOne = (direction: AlertDirection): DirectionState => {
      const last = lastFired[direction];
      if (!last) return { phase: 'ARMED', lastFiredAt: null, armsAt: null };
      const armsAt = new Date(last.getTime() + cooldownMs);
      return {
        phase: now.getTime() < armsAt.getTime() ? 'COOLING' : 'ARMED',
        lastFiredAt: last.toISOString(),
        armsAt: armsAt.toISOString(),
      };
    };

    return { HIGH: describeOne('HIGH'), LOW: describeOne('LOW') };
  }
}
