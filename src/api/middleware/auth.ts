/**
 * Authentication
 *
 * Two credentials are understood:
 * - `Authorization: Bearer <jwt>` signed HS256 with JWT_SECRET; `sub` is the
 *   user id and `role` is `user` (default) or `admin`
 * - `X-Service-Key` for internal callers, compared in constant time
 *
 * `authenticate` only identifies the caller. Routes declare who may call
 * them with `requireRole`.
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';
import { errors as joseErrors, jwtVerify } from 'jose';
import { z } from 'zod';
import { ForbiddenError, UnauthorizedError } from '../../utils/errors.js';
import type { ApiEnv, Principal } from '../env.js';

export interface AuthOptions {
  jwtSecret: string;
  serviceApiKey: string;
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(['user', 'admin']).default('user'),
});

const digest = (value: string): Buffer => createHash('sha256').update(value, 'utf8').digest();

function keysMatch(expected: string, received: string): boolean {
  return timingSafeEqual(digest(expected), digest(received));
}

async function verifyBearer(token: string, secret: Uint8Array): Promise<Principal> {
  let payload: unknown;
  try {
    ({ payload } = await jwtVerify(token, secret, { algorithms: ['HS256'] }));
  } catch (error) {
    if (error instanceof joseErrors.JWTExpired) {
      throw new UnauthorizedError('Token expired');
    }
    throw new UnauthorizedError('Invalid token');
  }

  const claims = claimsSchema.safeParse(payload);
  if (!claims.success) {
    throw new UnauthorizedError('Token is missing required claims');
  }
  return { userId: claims.data.sub, role: claims.data.role };
}

export function authenticate(options: AuthOptions): MiddlewareHandler<ApiEnv> {
  const secret = new TextEncoder().encode(options.jwtSecret);

  return async (c, next) => {
    const serviceKey = c.req.header('X-Service-Key');
    const authorization = c.req.header('Authorization');

    if (serviceKey !== undefined) {
      if (!keysMatch(options.serviceApiKey, serviceKey)) {
        throw new UnauthorizedError('Invalid service key');
      }
      c.set('principal', { role: 'service' });
    } else if (authorization !== undefined) {
      const [scheme, token] = authorization.split(' ');
      if (scheme?.toLowerCase() !== 'bearer' || !token) {
        throw new UnauthorizedError('Expected a bearer token');
      }
      c.set('principal', await verifyBearer(token, secret));
    } else {
      c.set('principal', null);
    }
    await next();
  };
}

/** Admit callers whose role is listed; anonymous callers get 401, others 403. */
export function requireRole(...roles: Array<Principal['role']>): MiddlewareHandler<ApiEnv> {
  return async (c, next) => {
    const principal = c.get('principal');
    if (!principal) {
      throw new UnauthorizedError();
    }
    if (!roles.includes(principal.role)) {
      throw new ForbiddenError(`Requires role ${roles.join(' or ')}`);
    }
    await next();
  };
}
