import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
  keyGenerator?: (req: Request) => string;
}

// Forwarded headers only count through the app's 'trust proxy' setting
function connectionKey(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

interface WindowState {
  count: number;
  resetTime: number;
}

export class RateLimiter {
  private requests = new Map<string, WindowState>();
  private readonly windowMs: number;
  private readonly maxRequests: number;
  private readonly keyGenerator: (req: Request) => string;

  constructor(config: RateLimitConfig) {
    this.windowMs = config.windowMs;
    this.maxRequests = config.maxRequests;
    this.keyGenerator = config.keyGenerator ?? connectionKey;

    // Drop expired windows every minute; must not keep the process alive
    setInterval(() => this.cleanupExpiredEntries(), 60000).unref();
  }

  middleware() {
    return (req: Request, res: Response, next: NextFunction): void => {
      const key = this.keyGenerator(req);
      const now = Date.now();

      let state = this.requests.get(key);
      if (!state || state.resetTime <= now) {
        state = { count: 0, resetTime: now + this.windowMs };
        this.requests.set(key, state);
      }

      if (state.count >= this.maxRequests) {
        const retryAfter = Math.ceil((state.resetTime - now) / 1000);
        res.set({
          'X-RateLimit-Limit': this.maxRequests.toString(),
          'X-RateLimit-Remaining': '0',
          'Retry-After': retryAfter.toString()
        });
        logger.warn('Rate limit exceeded', { key, path: req.path });
        res.status(429).json({
          error: 'Too many requests, try again later',
          retryAfter
        });
        return;
      }

      state.count += 1;
      res.set({
        'X-RateLimit-Limit': this.maxRequests.toString(),
        'X-RateLimit-Remaining': (this.maxRequests - state.count).toString()
      });
      next();
    };
  }

  private cleanupExpiredEntries(): void {
    const now = Date.now();
    for (const [key, state] of this.requests) {
      if (state.resetTime <= now) {
        this.requests.delete(key);
      }
    }
  }
}
