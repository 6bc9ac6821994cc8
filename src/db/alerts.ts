import { Pool } from 'pg';
import type { AlertDirection, AlertSettings } from '../types';

export interface AlertSettingsRepository {
  get(serial: string): Promise<AlertSettings | null>;
  save(settings: AlertSettings): Promise<AlertSettings>;
}

/**
 * Keyed (device, direction) → last fired timestamp.
 * `tryFire` is an atomic read-modify-write: it records `now` and returns true
 * only when the key has never fired or last fired at least `cooldownMs` ago.
 */
export interface AlertStateStore {
  tryFire(serial: string, direction: AlertDirection, now: Date, cooldownMs: number): Promise<boolean>;
  lastFired(serial: string): Promise<Partial<Record<AlertDirection, Date>>>;
}

interface SettingsRow {
  device_serial: string;
  alerts_enabled: boolean;
  high_enabled: boolean;
  high_threshold_c: number;
  low_enabled: boolean;
  low_threshold_c: number;
  cooldown_minutes: number;
  recipient_email: string | null;
}

const SETTINGS_COLUMNS = `
  device_serial, alerts_enabled, high_enabled, high_threshold_c,
  low_enabled, low_threshold_c, cooldown_minutes, recipient_email
`;

function mapSettings(row: SettingsRow): AlertSettings {
  return {
    deviceSerial: row.device_serial,
    alertsEnabled: row.alerts_enabled,
    highEnabled: row.high_enabled,
    highThresholdC: row.high_threshold_c,
    lowEnabled: row.low_enabled,
    lowThresholdC: row.low_threshold_c,
    cooldownMinutes: row.cooldown_minutes,
    recipientEmail: row.recipient_email,
  };
}

export class PgAlertSettingsRepository implements AlertSettingsRepository {
  constructor(private readonly pool: Pool) {}

  async get(serial: string): Promise<AlertSettings | null> {
    const { rows } = await this.pool.query<SettingsRow>(
      `SELECT ${SETTINGS_COLUMNS} FROM alert_settings WHERE device_serial = $1`,
      [serial]
    );
    return rows[0] ? mapSettings(rows[0]) : null;
  }

  async save(s: AlertSettings): Promise<AlertSettings> {
    const { rows } = await this.pool.query<SettingsRow>(
      `INSERT INTO alert_settings (${SETTINGS_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (device_serial) DO UPDATE SET
         alerts_enabled = EXCLUDED.alerts_enabled,
         high_enabled = EXCLUDED.high_enabled,
         high_threshold_c = EXCLUDED.high_threshold_c,
         low_enabled = EXCLUDED.low_enabled,
         low_threshold_c = EXCLUDED.low_threshold_c,
         cooldown_minutes = EXCLUDED.cooldown_minutes,
         recipient_email = EXCLUDED.recipient_email,
         updated_at = NOW()
       RETURNING ${SETTINGS_COLUMNS}`,
      [
        s.deviceSerial,
        s.alertsEnabled,
        s.highEnabled,
        s.highThresholdC,
        s.lowEnabled,
        s.lowThresholdC,
        s.cooldownMinutes,
        s.recipientEmail,
      ]
    );
    return mapSettings(rows[0]);
  }
}

export class PgAlertStateStore implements AlertStateStore {
  constructor(private readonly pool: Pool) {}

  async tryFire(serial: string, direction: AlertDirection, now: Date, cooldownMs: number): Promise<boolean> {
    // The conditional upsert is a single statement, so two samples racing for
    // the same key cannot both see the old timestamp.
    const { rowCount } = await this.pool.query(
      `INSERT INTO alert_state (device_serial, direction, last_fired_at)
       VALUES ($1, $2, $3)
       ON CONFLICT (device_serial, direction) DO UPDATE
       SET last_fired_at = EXCLUDED.last_fired_at
       WHERE alert_state.last_fired_at <= EXCLUDED.last_fired_at - ($4::double precision * INTERVAL '1 millisecond')
       RETURNING last_fired_at`,
      [serial, direction, now, cooldownMs]
    );
    return rowCount === 1;
  }

  async lastFired(serial: string): Promise<Partial<Record<AlertDirection, Date>>> {
    const { rows } = await this.pool.query<{ direction: AlertDirection; last_fired_at: Date }>(
      'SELECT direction, last_fired_at FROM alert_state WHERE device_serial = $1',
      [serial]
    );
    const result: Partial<Record<AlertDirection, Date>> = {};
    for (const row of rows) result[row.direction] = row.last_fired_at;
    return result;
  }
}
