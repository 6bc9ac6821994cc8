// src/db/ensureSchema.ts
import { Pool } from 'pg';
import { createLogger } from '../utils/logger';

const log = createLogger('schema');

export async function ensureSchema(pool: Pool) {
  log.info('Ensuring database schema...');

  await pool.query(`
    CREATE TABLE IF NOT EXISTS accounts (
      id TEXT PRIMARY KEY,
      email TEXT,
      created_at TIMESTAMPTZ DEFAULT NOW()
    );

    CREATE TABLE IF NOT EXISTS storage_profiles (
      owner_id TEXT PRIMARY KEY,
      plan TEXT NOT NULL DEFAULT 'free',
      cached_usage_bytes BIGINT NOT NULL DEFAULT 0,
      usage_calculated_at TIMESTAMPTZ,
      updated_at TIMESTAMPTZ DEFAULT NOW()
    );

    CREATE TABLE IF NOT EXISTS devices (
      serial TEXT PRIMARY KEY,
      owner_id TEXT NOT NULL REFERENCES accounts(id),
      name TEXT NOT NULL DEFAULT '',
      last_seen_at TIMESTAMPTZ,
      last_ip TEXT,
      created_at TIMESTAMPTZ DEFAULT NOW()
    );

    CREATE TABLE IF NOT EXISTS device_credentials (
      id UUID PRIMARY KEY,
      device_serial TEXT NOT NULL REFERENCES devices(serial),
      secret_hash TEXT NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      expires_at TIMESTAMPTZ,
      is_active BOOLEAN NOT NULL DEFAULT true
    );

    CREATE UNIQUE INDEX IF NOT EXISTS uq_device_credentials_one_active
      ON device_credentials (device_serial) WHERE is_active;

    CREATE TABLE IF NOT EXISTS telemetry_samples (
      id UUID PRIMARY KEY,
      device_serial TEXT NOT NULL REFERENCES devices(serial),
      mode TEXT NOT NULL,
      setpoint_c DOUBLE PRECISION NOT NULL,
      temp_inside_c DOUBLE PRECISION NOT NULL,
      temp_outside_c DOUBLE PRECISION,
      humidity_percent DOUBLE PRECISION,
      hysteresis_c DOUBLE PRECISION NOT NULL,
      output TEXT NOT NULL,
      device_ts TIMESTAMPTZ NOT NULL,
      received_at TIMESTAMPTZ NOT NULL,
      raw_payload JSONB,
      payload_bytes INT
    );

    ALTER TABLE telemetry_samples ADD COLUMN IF NOT EXISTS payload_bytes INT;
    -- Rows written before the column existed
    UPDATE telemetry_samples
    SET payload_bytes = octet_length(raw_payload::text)
    WHERE payload_bytes IS NULL AND raw_payload IS NOT NULL;

    CREATE INDEX IF NOT EXISTS idx_telemetry_device_received
      ON telemetry_samples (device_serial, received_at);

    CREATE TABLE IF NOT EXISTS alert_settings (
      device_serial TEXT PRIMARY KEY REFERENCES devices(serial),
      alerts_enabled BOOLEAN NOT NULL DEFAULT false,
      high_enabled BOOLEAN NOT NULL DEFAULT false,
      high_threshold_c DOUBLE PRECISION NOT NULL DEFAULT 30,
      low_enabled BOOLEAN NOT NULL DEFAULT false,
      low_threshold_c DOUBLE PRECISION NOT NULL DEFAULT 10,
      cooldown_minutes INT NOT NULL DEFAULT 30,
      recipient_email TEXT,
      updated_at TIMESTAMPTZ DEFAULT NOW()
    );

    CREATE TABLE IF NOT EXISTS alert_state (
      device_serial TEXT NOT NULL REFERENCES devices(serial),
      direction TEXT NOT NULL,
      last_fired_at TIMESTAMPTZ NOT NULL,
      PRIMARY KEY (device_serial, direction)
    );

    CREATE TABLE IF NOT EXISTS rate_limit_counters (
      bucket_key TEXT PRIMARY KEY,
      count INT NOT NULL,
      expires_at TIMESTAMPTZ NOT NULL
    );

    CREATE TABLE IF NOT EXISTS worker_runs (
      id SERIAL PRIMARY KEY,
      worker_name TEXT NOT NULL,
      started_at TIMESTAMPTZ DEFAULT NOW(),
      completed_at TIMESTAMPTZ,
      status TEXT,
      items_processed INT DEFAULT 0,
      duration_seconds NUMERIC,
      success BOOLEAN DEFAULT false,
      error_message TEXT
    );
  `);

  log.info('✅ Database schema ensured');
}
