import { timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';

/** Constant-time string comparison; differing lengths never match. */
export function secretsMatch(provided: string, expected: string): boolean {
  const providedBuf = Buffer.from(provided, 'utf-8');
  const expectedBuf = Buffer.from(expected, 'utf-8');
  // timingSafeEqual requires same-length buffers
  return providedBuf.length === expectedBuf.length && timingSafeEqual(providedBuf, expectedBuf);
}

export function createAuthMiddleware(adminToken: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization;
    if (!header) {
      res.status(401).json({ error: 'Authorization header is required' });
      return;
    }

    if (!header.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Invalid authorization scheme; use Bearer' });
      return;
    }

    const token = header.slice(7);
    if (!token || !secretsMatch(token, adminToken)) {
      res.status(401).json({ error: 'Invalid token' });
      return;
    }

    next();
  };
}
