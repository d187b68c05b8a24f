import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

declare global {
  namespace Express {
    interface Request {
      id: string;
    }
  }
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header.trim().length > 0
    ? header.trim()
    : randomUUID().slice(0, 8);
  req.id = requestId;
  res.setHeader('X-Request-ID', requestId);
  next();
}
