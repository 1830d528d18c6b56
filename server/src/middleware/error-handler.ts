import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { CircleArtError, InvalidConfigurationError } from '../errors/circle-art.errors';

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    return next(err);
  }

  // Handle Multer errors specifically
  if (err instanceof multer.MulterError) {
    console.error(`[Upload] ${err.code} on field ${err.field ?? '-'} (${req.method} ${req.path})`);
    return res.status(400).json({
      error: 'File upload error',
      message: err.message,
      code: err.code,
      field: err.field
    });
  }

  if (err instanceof CircleArtError) {
    if (err.status >= 500) {
      console.error(`[CircleArt] ${err.code}: ${err.message}`);
    }
    return res.status(err.status).json({
      error: err.name,
      code: err.code,
      message: err.message,
      ...(err instanceof InvalidConfigurationError ? { details: err.issues } : {})
    });
  }

  console.error('Error occurred:', err);
  return res.status(500).json({
    error: 'Internal Server Error',
    message: err instanceof Error ? err.message : String(err)
  });
}
