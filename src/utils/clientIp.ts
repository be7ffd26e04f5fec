import { Request } from 'express';
import { ClientContext } from '@/models';

/**
 * Client IP for rate limiting and audit fields
 *
 * req.ip honours the `trust proxy` setting (TRUST_PROXY_HOPS): X-Forwarded-For
 * is only read for the configured number of proxies.
 */
export function getClientIp(req: Request): string {
  if (req.ip) return req.ip;

  // Direct connection without a resolved req.ip
  if (req.socket?.remoteAddress) return req.socket.remoteAddress;

  // Fallback to unknown (shouldn't happen, but prevents crash)
  return 'unknown';
}

/**
 * Audit context attached to login attempts, sessions and transactions
 */
export function getClientContext(req: Request): ClientContext {
  return {
    ipAddress: getClientIp(req),
    userAgent: req.get('user-agent') ?? null,
  };
}
