// =====================================================
// Request ID Middleware
// =====================================================
// Propagates x-request-id, or generates one.

import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import * as Sentry from '@sentry/node';

declare global {
  namespace Express {
    interface Request {
      id: string;
    }
  }
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header !== '' ? header : uuidv4();
  req.id = requestId;
  res.setHeader('x-request-id', requestId);

  Sentry.getCurrentScope().setContext('request', {
    requestId,
    method: req.method,
    url: req.url,
  });

  next();
}
