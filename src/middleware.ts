import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import { DecodeError } from './errors.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('HTTP');

export type MiddlewareOptions = {
  corsOrigins: string[];
  bodyLimit: string;
};

export function setupMiddleware(app: Express, options: MiddlewareOptions): void {
  app.use((req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;
    if (origin && options.corsOrigins.includes(origin)) {
      res.header('Access-Control-Allow-Origin', origin);
      res.header('Vary', 'Origin');
    }

    res.header('Access-Control-Allow-Headers', 'Content-Type');
    res.header('Access-Control-Allow-Methods', 'POST, GET, OPTIONS');
    res.header('Access-Control-Allow-Credentials', 'true');

    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }
    next();
  });

  app.use(express.json({ limit: options.bodyLimit }));
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

// Registered last. Clients get a message, never a stack.
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof DecodeError) {
    res.status(400).json({ error: err.message });
    return;
  }

  const status = statusOf(err);
  if (status === 413) {
    res.status(413).json({ error: 'Image payload is too large' });
    return;
  }
  if (status === 400) {
    res.status(400).json({ error: 'Request body is not valid JSON' });
    return;
  }

  log.error(`${req.method} ${req.path} failed:`, err);
  res.status(500).json({ error: 'Internal server error' });
}
