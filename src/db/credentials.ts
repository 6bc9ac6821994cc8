import { Pool } from 'pg';
import type { CredentialSummary, Device, DeviceCredential } from '../types';
import { DEVICE_COLUMNS, mapDevice, type DeviceRow } from './devices';

export interface ActiveCredential {
  credential: DeviceCredential;
  device: Device;
}

export interface NewCredential {
  id: string;
  secretHash: string;
  expiresAt: Date | null;
}

export interface CredentialRepository {
  /** The single active credential for a serial, joined with its device. */
  findActive(serial: string): Promise<ActiveCredential | null>;
  /** Deactivates every credential of the device and stores `next` as the only active one. */
  replaceActive(serial: string, next: NewCredential): Promise<CredentialSummary>;
  deactivate(serial: string, credentialId: string): Promise<CredentialSummary | null>;
  list(serial: string): Promise<CredentialSummary[]>;
}

interface CredentialRow {
  id: string;
  device_serial: string;
  secret_hash: string;
  created_at: Date;
  expires_at: Date | null;
  is_active: boolean;
}

interface ActiveCredentialRow extends DeviceRow {
  credential_id: string;
  secret_hash: string;
  credential_created_at: Date;
  expires_at: Date | null;
  is_active: boolean;
}

function mapCredential(row: CredentialRow): DeviceCredential {
  return {
    id: row.id,
    deviceSerial: row.device_serial,
    secretHash: row.secret_hash,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
    isActive: row.is_active,
  };
}

export function summarize({ secretHash: _hash, ...summary }: DeviceCredential): CredentialSummary {
  return summary;
}

export class PgCredentialRepository implements CredentialRepository {
  constructor(private readonly pool: Pool) {}

  async findActive(serial: string): Promise<ActiveCredential | null> {
    const { rows } = await this.pool.query<ActiveCredentialRow>(
      `SELECT c.id AS credential_id, c.secret_hash, c.created_at AS credential_created_at,
              c.expires_at, c.is_active, ${DEVICE_COLUMNS}
       FROM device_credentials c
       JOIN devices d ON d.serial = c.device_serial
       LEFT JOIN accounts a ON a.id = d.owner_id
       WHERE c.device_serial = $1 AND c.is_active
       LIMIT 1`,
      [serial]
    );
    const row = rows[0];
    if (!row) return null;
    return {
      credential: {
        id: row.credential_id,
        deviceSerial: row.serial,
        secretHash: row.secret_hash,
        createdAt: row.credential_created_at,
        expiresAt: row.expires_at,
        isActive: row.is_active,
      },
      device: mapDevice(row),
    };
  }

  async replaceActive(serial: string, next: NewCredential): Promise<CredentialSummary> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(
        'UPDATE device_credentials SET is_active = false WHERE device_serial = $1 AND is_active',
        [serial]
      );
      const { rows } = await client.query<CredentialRow>(
        `INSERT INTO device_credentials (id, device_serial, secret_hash, expires_at, is_active)
         VALUES ($1, $2, $3, $4, true)
         RETURNING id, device_serial, secret_hash, created_at, expires_at, is_active`,
        [next.id, serial, next.secretHash, next.expiresAt]
      );
      await client.query('COMMIT');
      return summarize(mapCredential(rows[0]));
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  async deactivate(serial: string, credentialId: string): Promise<CredentialSummary | null> {
    const { rows } = await this.pool.query<CredentialRow>(
      `UPDATE device_credentials
       SET is_active = false
       WHERE device_serial = $1 AND id = $2
       RETURNING id, device_serial, secret_hash, created_at, expires_at, is_active`,
      [serial, credentialId]
    );
    return rows[0] ? summarize(mapCredential(rows[0])) : null;
  }

  async list(serial: string): Promise<CredentialSummary[]> {
    const { rows } = await this.pool.query<CredentialRow>(
      `SELECT id, device_serial, secret_hash, created_at, expires_at, is_active
       FROM device_credentials
       WHERE device_serial = $1
       ORDER BY created_at DESC`,
      [serial]
    );
    return rows.map((row) => summarize(mapCredential(row)));
  }
}
