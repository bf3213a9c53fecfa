import { Request } from 'express';

export function resolveClientIp(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  const forwardedValue = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  if (forwardedValue) {
    const first = forwardedValue.split(',')[0].trim();
    if (first) {
      return first;
    }
  }

  const realIp = req.headers['x-real-ip'];
  const realIpValue = Array.isArray(realIp) ? realIp[0] : realIp;
  if (realIpValue) {
    return realIpValue.trim();
  }

  return req.socket.remoteAddress || 'unknown';
}
