import { randomBytes, timingSafeEqual } from 'crypto';
import bcrypt from 'bcryptjs';
import { v4 as uuidv4 } from 'uuid';
import type { CredentialRepository } from '../db/credentials';
import { AuthenticationFailure, guardStorage } from '../errors';
import type { CredentialSummary, Device } from '../types';
import type { AuthenticatedContext, IngestRequest } from './context';
import { admit, reject, type Gate } from './gate';

const AUTH_SCHEME = 'Device ';
const DAY_MS = 24 * 60 * 60 * 1000;

export interface DeviceCredentials {
  serial: string;
  secret: string;
}

/** Parses `Device <serial>:<secret>`; the secret may itself contain colons. */
export function parseDeviceAuthorization(header: string | undefined): DeviceCredentials | null {
  const value = header?.trim() ?? '';
  if (!value.startsWith(AUTH_SCHEME)) return null;

  const token = value.slice(AUTH_SCHEME.length).trim();
  const sep = token.indexOf(':');
  if (sep < 0) return null;

  const serial = token.slice(0, sep).trim();
  const secret = token.slice(sep + 1).trim();
  if (!serial || !secret) return null;
  return { serial, secret };
}

/** 32 random bytes, URL-safe: about 43 characters. */
export function generateDeviceSecret(): string {
  return randomBytes(32).toString('base64url');
}

export interface SecretHasher {
  hash(secret: string): Promise<string>;
  /** Re-hashes `secret` with the salt embedded in `storedHash` and compares in constant time. */
  matches(secret: string, storedHash: string): Promise<boolean>;
}

export class BcryptSecretHasher implements SecretHasher {
  constructor(private readonly rounds: number) {}

  hash(secret: string): Promise<string> {
    return bcrypt.hash(secret, this.rounds);
  }

  async matches(secret: string, storedHash: string): Promise<boolean> {
    let candidate: string;
    try {
      candidate = await bcrypt.hash(secret, bcrypt.getSalt(storedHash));
    } catch {
      // A stored value that is not a bcrypt hash can never match.
      return false;
    }
    const a = Buffer.from(candidate, 'utf8');
    const b = Buffer.from(storedHash, 'utf8');
    return a.length === b.length && timingSafeEqual(a, b);
  }
}

export interface IssuedCredential {
  credential: CredentialSummary;
  /** Plaintext secret; returned once and never stored. */
  secret: string;
}

export class CredentialVerifier {
  private dummyHash: Promise<string> | undefined;

  constructor(
    private readonly credentials: CredentialRepository,
    private readonly hasher: SecretHasher,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Resolves the device for a serial/secret pair, or null. An unknown serial
   * is checked against a throwaway hash of the same cost, so both failure
   * paths do the same hashing work.
   */
  async verify(serial: string, secret: string): Promise<Device | null> {
    const active = await guardStorage(() => this.credentials.findActive(serial));
    const storedHash = active?.credential.secretHash ?? (await this.getDummyHash());
    const matches = await this.hasher.matches(secret, storedHash);

    if (!active || !matches) return null;

    const { expiresAt } = active.credential;
    if (expiresAt && expiresAt.getTime() <= this.clock().getTime()) return null;

    return active.device;
  }

  readonly authenticate: Gate<IngestRequest, AuthenticatedContext> = async (ctx) => {
    const presented = parseDeviceAuthorization(ctx.authorization);
    if (!presented) return reject(new AuthenticationFailure());

    const device = await this.verify(presented.serial, presented.secret);
    if (!device) return reject(new AuthenticationFailure());

    return admit({ ...ctx, device });
  };

  /** Creates a fresh secret and makes it the device's only active credential. */
  async issue(serial: string, ttlDays: number | null): Promise<IssuedCredential> {
    const secret = generateDeviceSecret();
    const secretHash = await this.hasher.hash(secret);
    const expiresAt = ttlDays === null ? null : new Date(this.clock().getTime() + ttlDays * DAY_MS);

    const credential = await this.credentials.replaceActive(serial, { id: uuidv4(), secretHash, expiresAt });
    return { credential, secret };
  }

  revoke(serial: string, credentialId: string): Promise<CredentialSummary | null> {
    return this.credentials.deactivate(serial, credentialId);
  }

  list(serial: string): Promise<CredentialSummary[]> {
    return this.credentials.list(serial);
  }

  private getDummyHash(): Promise<string> {
    this.dummyHash ??= this.hasher.hash(generateDeviceSecret());
    return this.dummyHash;
  }
}
