import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { InvalidTokenPayloadError, verifyAccessToken, type JwtPayload } from './jwt.js';
import { hasPermission, type PermissionString } from './permissions.js';

// ─── Augmented Request Type ───────────────────────────────────────────
export interface AuthRequest extends Request {
  user?: JwtPayload;
}

// ─── Auth Middleware (Verify JWT) ─────────────────────────────────────
export function authMiddleware(
  req: AuthRequest,
  res: Response,
  next: NextFunction
): void {
  const authHeader = req.headers.authorization;
  if (!authHeader?.startsWith('Bearer ')) {
    res.status(401).json({ error: 'Missing or invalid authorization header' });
    return;
  }

  const token = authHeader.slice(7); // strip "Bearer "
  try {
    req.user = verifyAccessToken(token);
    next();
  } catch (err) {
    if (err instanceof Error && err.name === 'TokenExpiredError') {
      res.status(401).json({ error: 'Token expired', code: 'TOKEN_EXPIRED' });
      return;
    }
    if (err instanceof InvalidTokenPayloadError) {
      res.status(401).json({ error: 'Invalid token claims', code: 'INVALID_CLAIMS' });
      return;
    }
    res.status(401).json({ error: 'Invalid token' });
  }
}

// ─── Permission Guard Middleware ──────────────────────────────────────
export function requirePermission(permission: PermissionString): RequestHandler {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    if (!req.user) {
      res.status(401).json({ error: 'Not authenticated' });
      return;
    }
    if (hasPermission(req.user.role, permission)) {
      next();
      return;
    }
    res.status(403).json({
      error: 'Insufficient permissions',
      required: permission,
      current: req.user.role,
    });
  };
}
