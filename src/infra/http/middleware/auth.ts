import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';

export interface AuthRequest extends Request {
  /** `sub` claim of the verified token. */
  subject?: string;
}

/**
 * Bearer token check. Tokens are issued elsewhere; this service only verifies
 * them against the shared secret.
 */
export function authMiddleware(jwtSecret: string) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      res.status(401).json({ code: 'UNAUTHORIZED', message: 'Missing or invalid authorization header' });
      return;
    }

    const token = authHeader.substring(7); // Remove 'Bearer ' prefix

    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, jwtSecret);
    } catch {
      res.status(401).json({ code: 'UNAUTHORIZED', message: 'Invalid or expired token' });
      return;
    }

    if (typeof decoded === 'string' || typeof decoded.sub !== 'string') {
      res.status(401).json({ code: 'UNAUTHORIZED', message: 'Token has no subject' });
      return;
    }

    req.subject = decoded.sub;
    next();
  };
}
