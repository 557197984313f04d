/**
 * Auth Middleware — optional JWT bearer auth for the control API.
 *
 * With no secret configured the hub trusts its (loopback) callers and every
 * guard is a pass-through. With a secret, reads need any valid token and
 * mutations need the admin role. The decoded payload lands on
 * res.locals.user so handlers can log who asked.
 */

import { type Request, type Response, type NextFunction, type RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { HubRole, IErrorResponse } from '../../src/types';

const PayloadSchema = z.object({
  sub:  z.string(),
  role: z.enum(['admin', 'viewer']),
});

export interface AuthGuards {
  requireAuth:  RequestHandler;
  requireAdmin: RequestHandler;
}

function deny(res: Response, status: 401 | 403, body: IErrorResponse): void {
  res.status(status).json(body);
}

export function createAuth(secret: string | null): AuthGuards {
  if (!secret) {
    const open: RequestHandler = (_req, _res, next) => next();
    return { requireAuth: open, requireAdmin: open };
  }
  const key: string = secret;

  function requireAuth(req: Request, res: Response, next: NextFunction): void {
    const header = req.headers.authorization;
    if (!header?.startsWith('Bearer ')) {
      deny(res, 401, { error: 'Unauthorized', detail: 'Missing or malformed Authorization header' });
      return;
    }

    let decoded: unknown;
    try {
      decoded = jwt.verify(header.slice(7), key);
    } catch {
      deny(res, 401, { error: 'Unauthorized', detail: 'Invalid or expired token' });
      return;
    }

    const payload = PayloadSchema.safeParse(decoded);
    if (!payload.success) {
      deny(res, 401, { error: 'Unauthorized', detail: 'Token payload is missing sub or role' });
      return;
    }
    res.locals['user'] = payload.data;
    next();
  }

  function requireAdmin(req: Request, res: Response, next: NextFunction): void {
    requireAuth(req, res, () => {
      const user = PayloadSchema.safeParse(res.locals['user']);
      if (!user.success || user.data.role !== 'admin') {
        deny(res, 403, { error: 'Forbidden', detail: 'Admin role required' });
        return;
      }
      next();
    });
  }

  return { requireAuth, requireAdmin };
}

const EIGHT_HOURS_S = 8 * 60 * 60;

/** Mint a token for the control API (see scripts/token.ts). */
export function issueToken(secret: string, subject: string, role: HubRole, expiresInSeconds: number = EIGHT_HOURS_S): string {
  return jwt.sign({ sub: subject, role }, secret, { expiresIn: expiresInSeconds });
}
