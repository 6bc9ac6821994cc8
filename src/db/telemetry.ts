import { Pool } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import type { NewTelemetrySample, OutputState, TelemetrySample, ThermostatMode } from '../types';

export const TELEMETRY_RANGE_MAX_ROWS = 10000;
export const TELEMETRY_RECENT_MAX_ROWS = 1000;

/** Fixed per-row cost (columns + index) added to the payload size when estimating storage. */
export const ROW_OVERHEAD_BYTES = 300;

/** Size of the payload as serialized on write; stored with the row so recomputes add up the same figure. */
export function payloadBytes(rawPayload: Record<string, unknown>): number {
  return Buffer.byteLength(JSON.stringify(rawPayload), 'utf8');
}

export function estimateSampleBytes(rawPayload: Record<string, unknown>): number {
  return ROW_OVERHEAD_BYTES + payloadBytes(rawPayload);
}

export function clampRecentLimit(n: number): number {
  return Math.max(1, Math.min(Math.trunc(n), TELEMETRY_RECENT_MAX_ROWS));
}

/** Which of an owner's samples to delete; open bounds mean everything on that side. */
export interface SampleDeletion {
  ownerId: string;
  serial?: string;
  /** Inclusive, on receipt time. */
  start?: Date;
  /** Exclusive, on receipt time. */
  end?: Date;
}

/**
 * Append-only sample storage. Implementations assign `receivedAt` at the
 * moment of the write and never retry a failed write themselves.
 */
export interface TelemetryStore {
  append(sample: NewTelemetrySample): Promise<TelemetrySample>;
  /** Samples with `start <= receivedAt < end`, oldest first. */
  range(serial: string, start: Date, end: Date): Promise<TelemetrySample[]>;
  /** The newest `n` samples, newest first. */
  recent(serial: string, n: number): Promise<TelemetrySample[]>;
  /** Estimated bytes held for every device of an owner. */
  estimateUsageByOwner(ownerId: string): Promise<number>;
  /** Removes matching samples and returns how many went. */
  deleteSamples(selection: SampleDeletion): Promise<number>;
}

interface SampleRow {
  id: string;
  device_serial: string;
  mode: ThermostatMode;
  setpoint_c: number;
  temp_inside_c: number;
  temp_outside_c: number | null;
  humidity_percent: number | null;
  hysteresis_c: number;
  output: OutputState;
  device_ts: Date;
  received_at: Date;
  raw_payload: Record<string, unknown> | null;
}

const SAMPLE_COLUMNS = `
  id, device_serial, mode, setpoint_c, temp_inside_c, temp_outside_c,
  humidity_percent, hysteresis_c, output, device_ts, received_at, raw_payload
`;

function mapSample(row: SampleRow): TelemetrySample {
  return {
    id: row.id,
    deviceSerial: row.device_serial,
    mode: row.mode,
    setpointC: row.setpoint_c,
    tempInsideC: row.temp_inside_c,
    tempOutsideC: row.temp_outside_c,
    humidityPercent: row.humidity_percent,
    hysteresisC: row.hysteresis_c,
    output: row.output,
    deviceTs: row.device_ts,
    receivedAt: row.received_at,
    rawPayload: row.raw_payload ?? {},
  };
}

export class PgTelemetryStore implements TelemetryStore {
  constructor(private readonly pool: Pool) {}

  async append(sample: NewTelemetrySample): Promise<TelemetrySample> {
    // clock_timestamp() rather than NOW(): the receipt time is taken when the row is written.
    const { rows } = await this.pool.query<SampleRow>(
      `INSERT INTO telemetry_samples (
         id, device_serial, mode, setpoint_c, temp_inside_c, temp_outside_c,
         humidity_percent, hysteresis_c, output, device_ts, received_at, raw_payload, payload_bytes
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, clock_timestamp(), $11, $12)
       RETURNING ${SAMPLE_COLUMNS}`,
      [
        uuidv4(),
        sample.deviceSerial,
        sample.mode,
        sample.setpointC,
        sample.tempInsideC,
        sample.tempOutsideC,
        sample.humidityPercent,
        sample.hysteresisC,
        sample.output,
        sample.deviceTs,
        JSON.stringify(sample.rawPayload),
        payloadBytes(sample.rawPayload),
      ]
    );
    return mapSample(rows[0]);
  }

  async range(serial: string, start: Date, end: Date): Promise<TelemetrySample[]> {
    const { rows } = await this.pool.query<SampleRow>(
      `SELECT ${SAMPLE_COLUMNS}
       FROM telemetry_samples
       WHERE device_serial = $1 AND received_at >= $2 AND received_at < $3
       ORDER BY received_at ASC
       LIMIT $4`,
      [serial, start, end, TELEMETRY_RANGE_MAX_ROWS]
    );
    return rows.map(mapSample);
  }

  async recent(serial: string, n: number): Promise<TelemetrySample[]> {
    const { rows } = await this.pool.query<SampleRow>(
      `SELECT ${SAMPLE_COLUMNS}
       FROM telemetry_samples
       WHERE device_serial = $1
       ORDER BY received_at DESC
       LIMIT $2`,
      [serial, clampRecentLimit(n)]
    );
    return rows.map(mapSample);
  }

  async estimateUsageByOwner(ownerId: string): Promise<number> {
    const { rows } = await this.pool.query<{ bytes: string | null }>(
      `SELECT SUM($2 + COALESCE(t.payload_bytes, 0)) AS bytes
       FROM telemetry_samples t
       JOIN devices d ON d.serial = t.device_serial
       WHERE d.owner_id = $1`,
      [ownerId, ROW_OVERHEAD_BYTES]
    );
    return Number(rows[0]?.bytes ?? 0);
  }

  async deleteSamples(selection: SampleDeletion): Promise<number> {
    const { rowCount } = await this.pool.query(
      `DELETE FROM telemetry_samples t
       USING devices d
       WHERE d.serial = t.device_serial
         AND d.owner_id = $1
         AND ($2::text IS NULL OR t.device_serial = $2)
         AND ($3::timestamptz IS NULL OR t.received_at >= $3)
         AND ($4::timestamptz IS NULL OR t.received_at < $4)`,
      [selection.ownerId, selection.serial ?? null, selection.start ?? null, selection.end ?? null]
    );
    return rowCount ?? 0;
  }
}
