import { Pool } from 'pg';
import type { Device } from '../types';

export type RegisterResult =
  | { status: 'created'; device: Device }
  | { status: 'existing'; device: Device }
  | { status: 'conflict' };

export interface RegisterDeviceInput {
  serial: string;
  ownerId: string;
  ownerEmail?: string;
  name?: string;
}

export interface DeviceRepository {
  findBySerial(serial: string): Promise<Device | null>;
  /** Claims a serial for an owner; a serial owned by someone else is a conflict. */
  register(input: RegisterDeviceInput): Promise<RegisterResult>;
  rename(serial: string, name: string): Promise<Device | null>;
  touchLastSeen(serial: string, seenAt: Date, ip: string | null): Promise<void>;
}

export interface DeviceRow {
  serial: string;
  owner_id: string;
  owner_email: string | null;
  name: string;
  last_seen_at: Date | null;
  last_ip: string | null;
  created_at: Date;
}

export const DEVICE_COLUMNS = `
  d.serial, d.owner_id, a.email AS owner_email, d.name,
  d.last_seen_at, d.last_ip, d.created_at
`;

export function mapDevice(row: DeviceRow): Device {
  return {
    serial: row.serial,
    ownerId: row.owner_id,
    ownerEmail: row.owner_email,
    name: row.name,
    lastSeenAt: row.last_seen_at,
    lastIp: row.last_ip,
    createdAt: row.created_at,
  };
}

/** Postgres `unique_violation`. */
export function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';
}

export class PgDeviceRepository implements DeviceRepository {
  constructor(private readonly pool: Pool) {}

  async findBySerial(serial: string): Promise<Device | null> {
    const { rows } = await this.pool.query<DeviceRow>(
      `SELECT ${DEVICE_COLUMNS}
       FROM devices d
       LEFT JOIN accounts a ON a.id = d.owner_id
       WHERE d.serial = $1`,
      [serial]
    );
    return rows[0] ? mapDevice(rows[0]) : null;
  }

  async register(input: RegisterDeviceInput): Promise<RegisterResult> {
    try {
      return await this.registerOnce(input);
    } catch (err) {
      // A concurrent first registration inserted the row between our select and insert.
      // The retry's FOR UPDATE now finds it.
      if (!isUniqueViolation(err)) throw err;
      return this.registerOnce(input);
    }
  }

  private async registerOnce(input: RegisterDeviceInput): Promise<RegisterResult> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      await client.query(
        `INSERT INTO accounts (id, email) VALUES ($1, $2)
         ON CONFLICT (id) DO UPDATE SET email = COALESCE(EXCLUDED.email, accounts.email)`,
        [input.ownerId, input.ownerEmail ?? null]
      );

      const { rows: existing } = await client.query<{ owner_id: string }>(
        'SELECT owner_id FROM devices WHERE serial = $1 FOR UPDATE',
        [input.serial]
      );

      let status: 'created' | 'existing';
      if (existing.length === 0) {
        await client.query(
          'INSERT INTO devices (serial, owner_id, name) VALUES ($1, $2, $3)',
          [input.serial, input.ownerId, input.name ?? '']
        );
        status = 'created';
      } else if (existing[0].owner_id !== input.ownerId) {
        await client.query('ROLLBACK');
        return { status: 'conflict' };
      } else {
        if (input.name) {
          await client.query('UPDATE devices SET name = $2 WHERE serial = $1', [input.serial, input.name]);
        }
        status = 'existing';
      }

      const { rows } = await client.query<DeviceRow>(
        `SELECT ${DEVICE_COLUMNS}
         FROM devices d
         LEFT JOIN accounts a ON a.id = d.owner_id
         WHERE d.serial = $1`,
        [input.serial]
      );
      await client.query('COMMIT');
      return { status, device: mapDevice(rows[0]) };
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  async rename(serial: string, name: string): Promise<Device | null> {
    const { rowCount } = await this.pool.query('UPDATE devices SET name = $2 WHERE serial = $1', [serial, name]);
    if (!rowCount) return null;
    return this.findBySerial(serial);
  }

  async touchLastSeen(serial: string, seenAt: Date, ip: string | null): Promise<void> {
    await this.pool.query(
      `UPDATE devices
       SET last_seen_at = GREATEST(COALESCE(last_seen_at, $2), $2),
           last_ip = COALESCE($3, last_ip)
       WHERE serial = $1`,
      [serial, seenAt, ip]
    );
  }
}
