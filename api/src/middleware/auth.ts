import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { config } from '../config/index.js';
import type { UserIdentity } from '@tiffin-wallet/shared';
import { ApiError } from './errorHandler.js';

export type JwtPayload = UserIdentity;

export interface AuthenticatedRequest extends Request {
  user?: JwtPayload;
}

const USER_ROLES: readonly JwtPayload['role'][] = ['customer', 'owner', 'delivery', 'admin'];

function toJwtPayload(decoded: string | jwt.JwtPayload): JwtPayload {
  if (typeof decoded === 'string' || typeof decoded.userId !== 'string') {
    throw ApiError.unauthorized('AUTH_005', 'Invalid token');
  }

  const role = USER_ROLES.find((candidate) => candidate === decoded.role);
  if (!role) {
    throw ApiError.unauthorized('AUTH_005', 'Invalid token');
  }

  return { userId: decoded.userId, role };
}

export function authenticate(req: AuthenticatedRequest, _res: Response, next: NextFunction): void {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      throw ApiError.unauthorized('AUTH_005', 'No token provided');
    }

    const token = authHeader.split(' ')[1];
    if (!token) {
      throw ApiError.unauthorized('AUTH_005', 'Invalid token format');
    }

    req.user = toJwtPayload(jwt.verify(token, config.jwt.secret));
    next();
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      next(ApiError.unauthorized('AUTH_005', 'Session expired. Please login again'));
    } else if (error instanceof jwt.JsonWebTokenError) {
      next(ApiError.unauthorized('AUTH_005', 'Invalid token'));
    } else {
      next(error);
    }
  }
}

export function requireRole(...roles: JwtPayload['role'][]) {
  return (req: AuthenticatedRequest, _res: Response, next: NextFunction): void => {
    if (!req.user) {
      next(ApiError.unauthorized('AUTH_005', 'Authentication required'));
      return;
    }

    if (!roles.includes(req.user.role)) {
      next(ApiError.forbidden('AUTH_006', 'Insufficient permissions'));
      return;
    }

    next();
  };
}
