import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';

import { settings } from '../../../config/settings';
import { HttpError } from '../../../utils/httpError';
import logger from '../../../utils/logger';
import { USER_ROLES, type AuthUser, type UserRole } from '../types/auth.types';

const jwtPayloadSchema = z.object({
  id: z.coerce.number().int().positive(),
  username: z.string(),
  email: z.string(),
  role: z.enum(USER_ROLES),
});

// 🔧 Ajout de `req.user` pour tout Express
declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

/** Decoded and shape-checked payload, or null for any bad token. */
export function verifyAccessToken(token: string): AuthUser | null {
  let decoded: unknown;
  try {
    decoded = jwt.verify(token, settings.JWT_SECRET);
  } catch (err) {
    logger.warn('JWT rejeté', err instanceof Error ? err.message : err);
    return null;
  }
  const parsed = jwtPayloadSchema.safeParse(decoded);
  return parsed.success ? parsed.data : null;
}

// 🔐 Vérifie le token JWT
export const authenticateToken: RequestHandler = (req, res, next) => {
  const authHeader = req.headers.authorization;

  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    res.status(401).json({ error: 'UNAUTHORIZED', message: 'Token manquant ou invalide' });
    return;
  }

  const user = verifyAccessToken(authHeader.slice('Bearer '.length));
  if (!user) {
    res.status(403).json({ error: 'FORBIDDEN', message: 'Token invalide ou expiré' });
    return;
  }
  req.user = user;
  next();
};

// 🎯 Vérifie que l'utilisateur a un rôle autorisé
export const authorizeRole = (...roles: UserRole[]) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.user) {
      res.status(401).json({ error: 'UNAUTHORIZED', message: 'Utilisateur non authentifié' });
      return;
    }

    if (!roles.includes(req.user.role)) {
      logger.warn(`🎭 Rôle utilisateur : ${req.user.role}, rôles autorisés : ${roles.join(', ')}`);
      res.status(403).json({ error: 'FORBIDDEN', message: 'Accès interdit' });
      return;
    }

    next();
  };
};

/** Narrows req.user inside controllers that sit behind authenticateToken. */
export function requireUser(req: Request): AuthUser {
  if (!req.user) {
    throw new HttpError(401, 'UNAUTHORIZED', 'Utilisateur non authentifié');
  }
  return req.user;
}
