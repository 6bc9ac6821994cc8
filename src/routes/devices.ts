// routes/devices.ts
import express from 'express';
import { z } from 'zod';
import { cfg } from '../config';
import type { DeviceRepository } from '../db/devices';
import { RateLimitExceeded, ValidationFailure, guardStorage } from '../errors';
import { requireAuth } from '../middleware/auth';
import type { CredentialVerifier } from '../pipeline/credentialVerifier';
import type { RateLimiter } from '../pipeline/rateLimiter';
import type { CredentialSummary, Device } from '../types';
import { conflict, errorReply, notFound, ok, route, type HttpReply } from '../utils/http';
import { createLogger } from '../utils/logger';
import { RegisterDeviceBody, RenameDeviceBody, toFieldIssues } from '../validators';

const log = createLogger('devices');

const CredentialId = z.string().uuid();

export interface DeviceAdminDeps {
  devices: DeviceRepository;
  verifier: CredentialVerifier;
  /** Caps rotations and revocations per device. */
  keyRotationLimiter: RateLimiter;
  credentialTtlDays?: number;
}

async function throttleKeyChange(deps: DeviceAdminDeps, serial: string): Promise<HttpReply | null> {
  const result = await guardStorage(() => deps.keyRotationLimiter.consume(serial));
  if (result.allowed) return null;
  log.warn({ device: serial }, 'Credential change throttled');
  return errorReply(new RateLimitExceeded(result.retryAfterSeconds));
}

function serializeDevice(d: Device) {
  return {
    serial_number: d.serial,
    owner_id: d.ownerId,
    name: d.name,
    created_at: d.createdAt.toISOString(),
    last_seen: d.lastSeenAt?.toISOString() ?? null,
    last_ip: d.lastIp,
  };
}

function serializeCredential(c: CredentialSummary) {
  return {
    id: c.id,
    created_at: c.createdAt.toISOString(),
    expires_at: c.expiresAt?.toISOString() ?? null,
    is_active: c.isActive,
  };
}

/**
 * Registers a serial to an owner (or re-registers it for the same owner) and
 * issues a fresh secret, deactivating any earlier one. The secret is only
 * ever returned here and by rotation.
 */
export async function handleRegister(deps: DeviceAdminDeps, body: unknown): Promise<HttpReply> {
  const parsed = RegisterDeviceBody.safeParse(body);
  if (!parsed.success) throw new ValidationFailure(toFieldIssues(parsed.error));

  const result = await deps.devices.register({
    serial: parsed.data.serial_number,
    ownerId: parsed.data.owner_id,
    ownerEmail: parsed.data.owner_email,
    name: parsed.data.name,
  });
  if (result.status === 'conflict') {
    return conflict('This device serial is already registered to another owner.');
  }

  const issued = await deps.verifier.issue(result.device.serial, deps.credentialTtlDays ?? cfg.CREDENTIAL_TTL_DAYS);
  log.info({ device: result.device.serial, status: result.status }, 'Device registered');

  return ok(
    {
      device: serializeDevice(result.device),
      api_key: issued.secret,
      expires_at: issued.credential.expiresAt?.toISOString() ?? null,
    },
    result.status === 'created' ? 201 : 200
  );
}

export async function handleRename(deps: DeviceAdminDeps, serial: string, body: unknown): Promise<HttpReply> {
  const parsed = RenameDeviceBody.safeParse(body);
  if (!parsed.success) throw new ValidationFailure(toFieldIssues(parsed.error));

  const device = await deps.devices.rename(serial, parsed.data.name);
  if (!device) return notFound('Device not found');
  return ok({ device: serializeDevice(device) });
}

export async function handleRotate(deps: DeviceAdminDeps, serial: string): Promise<HttpReply> {
  const device = await deps.devices.findBySerial(serial);
  if (!device) return notFound('Device not found');

  const throttled = await throttleKeyChange(deps, serial);
  if (throttled) return throttled;

  const issued = await deps.verifier.issue(serial, deps.credentialTtlDays ?? cfg.CREDENTIAL_TTL_DAYS);
  log.info({ device: serial, credential: issued.credential.id }, 'Device credential rotated');

  return ok({
    device: serializeDevice(device),
    api_key: issued.secret,
    expires_at: issued.credential.expiresAt?.toISOString() ?? null,
  });
}

export async function handleRevoke(deps: DeviceAdminDeps, serial: string, credentialId: string): Promise<HttpReply> {
  if (!CredentialId.safeParse(credentialId).success) return notFound('Key not found for this device.');

  const throttled = await throttleKeyChange(deps, serial);
  if (throttled) return throttled;

  const revoked = await deps.verifier.revoke(serial, credentialId);
  if (!revoked) return notFound('Key not found for this device.');
  log.info({ device: serial, credential: credentialId }, 'Device credential revoked');
  return ok({ device_id: serial, key: serializeCredential(revoked) });
}

export async function handleListCredentials(deps: DeviceAdminDeps, serial: string): Promise<HttpReply> {
  const device = await deps.devices.findBySerial(serial);
  if (!device) return notFound('Device not found');

  const keys = await deps.verifier.list(serial);
  return ok({ device_id: serial, count: keys.length, results: keys.map(serializeCredential) });
}

export function createDevicesRouter(deps: DeviceAdminDeps) {
  const router = express.Router();

  router.post('/', requireAuth, route((req) => handleRegister(deps, req.body)));

  router.get(
    '/:serial',
    requireAuth,
    route(async (req) => {
      const device = await deps.devices.findBySerial(req.params.serial);
      return device ? ok({ device: serializeDevice(device) }) : notFound('Device not found');
    })
  );

  router.patch('/:serial', requireAuth, route((req) => handleRename(deps, req.params.serial, req.body)));
  router.get('/:serial/credentials', requireAuth, route((req) => handleListCredentials(deps, req.params.serial)));
  router.post('/:serial/credentials/rotate', requireAuth, route((req) => handleRotate(deps, req.params.serial)));
  router.post(
    '/:serial/credentials/:credentialId/revoke',
    requireAuth,
    route((req) => handleRevoke(deps, req.params.serial, req.params.credentialId))
  );

  return router;
}
