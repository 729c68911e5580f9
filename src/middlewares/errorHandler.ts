import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';

import { HttpError } from '../utils/httpError';
import logger from '../utils/logger';
import { getPgErrorInfo } from '../utils/pg';

// Constraint failures that reach the handler without a repository mapping.
const PG_ERRORS: Record<string, { status: number; code: string; message: string }> = {
  '23505': { status: 409, code: 'UNIQUE_VIOLATION', message: 'Cette valeur existe déjà.' },
  '23503': { status: 409, code: 'FOREIGN_KEY_VIOLATION', message: 'Enregistrement lié introuvable ou encore référencé.' },
  '23514': { status: 400, code: 'CHECK_VIOLATION', message: 'Valeur refusée par une contrainte.' },
  '22003': { status: 400, code: 'NUMERIC_OUT_OF_RANGE', message: 'Valeur numérique hors limites.' },
};

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof HttpError) {
    if (err.status >= 500) {
      logger.error('HttpError caught by middleware:', { code: err.code, message: err.message, path: req.path });
    }
    res.status(err.status).json({
      error: err.code,
      message: err.message,
      ...(err.details !== undefined ? { details: err.details } : {}),
    });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'VALIDATION_ERROR',
      message: 'Champs invalides.',
      details: err.flatten(),
    });
    return;
  }

  const pg = getPgErrorInfo(err);
  const mapped = pg.code ? PG_ERRORS[pg.code] : undefined;
  if (mapped) {
    logger.warn('Database constraint error:', { code: pg.code, constraint: pg.constraint, path: req.path });
    res.status(mapped.status).json({
      error: mapped.code,
      message: mapped.message,
      ...(pg.constraint ? { details: { constraint: pg.constraint } } : {}),
    });
    return;
  }

  logger.error('Error caught by middleware:', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
    requestId: req.requestId ?? null,
    method: req.method,
    path: req.path,
    ip: req.ip,
  });

  res.status(500).json({ error: 'INTERNAL_ERROR', message: 'Internal Server Error' });
}
