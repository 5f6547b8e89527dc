import { Request } from 'express';

/**
 * Extract client IP from request
 */
export function getClientIp(request: Request, checkProxyHeaders = true): string | null {
  let ip: string | null = null;

  if (checkProxyHeaders) {
    // First hop of X-Forwarded-For is the original client
    const forwarded = request.headers['x-forwarded-for'];
    if (forwarded) {
      ip = (typeof forwarded === 'string' ? forwarded : forwarded[0] ?? '').split(',')[0].trim() || null;
    }

    const realIp = request.headers['x-real-ip'];
    if (!ip && typeof realIp === 'string' && realIp) {
      ip = realIp.trim();
    }
  }

  if (!ip) {
    ip = request.socket?.remoteAddress ?? request.ip ?? null;
  }

  // IPv6-mapped IPv4 (::ffff:192.168.1.1)
  if (ip && ip.startsWith('::ffff:')) {
    ip = ip.substring(7);
  }

  return ip;
}
