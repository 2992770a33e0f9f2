/// <reference path="../../types/express.d.ts" />
// src/middlewares/auth.ts
import { Request, Response, NextFunction } from 'express';
import { verifyToken } from '../services/auth.service';
import { RequestContext } from '../types/context';

function readBearerToken(req: Request): string | undefined {
  const [scheme, token] = (req.headers.authorization ?? '').split(' ');
  return scheme === 'Bearer' && token ? token : undefined;
}

/**
 * Adjunta `req.user` cuando llega un token válido. Sin token, o con uno
 * inválido, la petición sigue como anónima; cada operación decide si exige sesión.
 */
export function authMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = readBearerToken(req);
    if (!token) return next();

    const user = verifyToken(token);
    if (!user) {
      req.sessionExpired = true;
      return next();
    }

    req.user = user;
    next();
  };
}

export function contextFrom(req: Request): RequestContext {
  return { user: req.user, sessionExpired: req.sessionExpired };
}
