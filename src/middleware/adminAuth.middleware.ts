import { createHash, timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { AppError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export interface AdminAuthOptions {
  configApiKey?: string;
  adminApiToken?: string;
  jwtSecret?: string;
}

// Hashing first gives equal-length buffers for timingSafeEqual
function safeEqual(provided: string, expected: string): boolean {
  const a = createHash('sha256').update(provided).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}

function bearerToken(req: Request): string | undefined {
  const header = req.headers.authorization;
  if (!header) {
    return undefined;
  }
  const [scheme, token] = header.split(' ');
  return scheme?.toLowerCase() === 'bearer' && token ? token.trim() : undefined;
}

function isAdminJwt(token: string, secret: string): boolean {
  try {
    const payload = jwt.verify(token, secret, { algorithms: ['HS256'] });
    return typeof payload === 'object' && payload.role === 'admin';
  } catch (error) {
    logger.debug('Admin JWT rejected', { reason: error instanceof Error ? error.message : String(error) });
    return false;
  }
}

export function issueAdminToken(secret: string, role = 'admin', expiresIn: jwt.SignOptions['expiresIn'] = '24h'): string {
  return jwt.sign({ role }, secret, { algorithm: 'HS256', expiresIn });
}

/**
 * Guards the admin API. Accepts `X-API-Key` matching CONFIG_API_KEY, or a
 * bearer token equal to ADMIN_API_TOKEN or signed with JWT_SECRET_KEY
 * carrying role "admin".
 */
export function createAdminAuth(options: AdminAuthOptions) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const apiKeyHeader = req.headers['x-api-key'];
    const apiKey = Array.isArray(apiKeyHeader) ? apiKeyHeader[0] : apiKeyHeader;
    const token = bearerToken(req);

    if (!apiKey && !token) {
      return next(new AppError('API key required in X-API-Key header or Bearer token', 401));
    }

    if (apiKey) {
      if (!options.configApiKey) {
        return next(new AppError('CONFIG_API_KEY not configured', 500));
      }
      if (!safeEqual(apiKey, options.configApiKey)) {
        return next(new AppError('Invalid API key', 403));
      }
      return next();
    }

    if (token) {
      if (!options.adminApiToken && !options.jwtSecret) {
        return next(new AppError('ADMIN_API_TOKEN not configured', 500));
      }
      if (options.adminApiToken && safeEqual(token, options.adminApiToken)) {
        return next();
      }
      if (options.jwtSecret && isAdminJwt(token, options.jwtSecret)) {
        return next();
      }
    }

    next(new AppError('Invalid admin token', 403));
  };
}
