import type { Request, Response, NextFunction } from 'express';
import { cfg } from '../config';
import { errorMessage } from '../errors';
import { verifyServiceToken } from '../utils/jwt';
import { createLogger } from '../utils/logger';

const log = createLogger('auth');

export interface ServiceAuth {
  method: 'api_key' | 'jwt';
  sub?: string;
}

export interface AuthedRequest extends Request {
  auth?: ServiceAuth;
}

export type ServiceAuthResult = { ok: true; auth: ServiceAuth } | { ok: false; message: string };

/** Pulls the token from `Authorization: Bearer <token>` or `x-core-token: <token>`. */
export function extractServiceToken(authorization: string | undefined, coreToken: string | undefined): string {
  if (authorization && authorization.toLowerCase().startsWith('bearer ')) {
    return authorization.slice(7).trim();
  }
  return coreToken?.trim() ?? '';
}

/** The token is either the static CORE_API_KEY or an HS256 JWT. */
export async function resolveServiceAuth(token: string): Promise<ServiceAuthResult> {
  if (!token) return { ok: false, message: 'Missing service token' };

  if (cfg.CORE_API_KEY && token === cfg.CORE_API_KEY) {
    return { ok: true, auth: { method: 'api_key', sub: 'api_key' } };
  }

  try {
    const payload = await verifyServiceToken(token);
    return { ok: true, auth: { method: 'jwt', sub: payload.sub } };
  } catch (err) {
    log.warn({ err: errorMessage(err) }, 'Service token verify failed');
    return { ok: false, message: 'Invalid service token' };
  }
}

/** Guards collaborator endpoints (query, settings, provisioning). */
export async function requireAuth(req: AuthedRequest, res: Response, next: NextFunction) {
  if (!cfg.AUTH_REQUIRED) return next();

  const token = extractServiceToken(req.header('authorization'), req.header('x-core-token'));
  const result = await resolveServiceAuth(token);

  if (!result.ok) {
    log.warn({ path: req.path }, result.message);
    res.status(401).json({ status: 'error', code: 'UNAUTHORIZED', message: result.message });
    return;
  }

  log.debug({ path: req.path, method: result.auth.method, sub: result.auth.sub }, 'Service caller verified');
  req.auth = result.auth;
  next();
}
