import { jwtVerify, type JWTPayload } from 'jose';
import { cfg } from '../config';

let secretKey: Uint8Array | undefined;

function getSecretKey(): Uint8Array {
  if (!cfg.CORE_JWT_SECRET) throw new Error('CORE_JWT_SECRET not set');
  secretKey ??= new TextEncoder().encode(cfg.CORE_JWT_SECRET);
  return secretKey;
}

/** Verifies an HS256 service token issued to a collaborator (dashboard, export). */
export async function verifyServiceToken(token: string): Promise<JWTPayload> {
  const { payload } = await jwtVerify(token, getSecretKey(), {
    issuer: cfg.CORE_JWT_ISS,
    audience: cfg.CORE_JWT_AUD,
    algorithms: ['HS256'],
  });
  return payload;
}
