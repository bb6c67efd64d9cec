import type { NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';

import { CourseRagError } from '../errors';

export const asyncHandler =
  (handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof CourseRagError) {
    if (err.status >= 500) {
      console.error(`[error] ${err.name}: ${err.message}`);
    }
    res.status(err.status).json({ error: { code: err.code, message: err.message } });
    return;
  }

  if (err instanceof multer.MulterError) {
    res.status(400).json({ error: { code: err.code, message: err.message } });
    return;
  }

  console.error('[error]', err);
  res.status(500).json({ error: { code: 'INTERNAL', message: 'Internal server error' } });
}
