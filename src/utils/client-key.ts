import type { Request } from 'express';
import { ClientKeyResolver } from '../interfaces/config.interface';

const IPV4_MAPPED_PREFIX = '::ffff:';

export const UNKNOWN_CLIENT_KEY = 'unknown';

/**
 * Normalize a client key: trim, and strip the IPv4-mapped IPv6 prefix
 */
export function normalizeClientKey(clientKey: string): string {
  const trimmed = clientKey.trim();
  if (
    trimmed.toLowerCase().startsWith(IPV4_MAPPED_PREFIX) &&
    trimmed.includes('.')
  ) {
    return trimmed.slice(IPV4_MAPPED_PREFIX.length);
  }
  return trimmed;
}

/**
 * Client identity for a request: the resolver's answer, else the remote address.
 * Clients sharing a NAT or proxy share a key.
 */
export function resolveClientKey(
  request: Request,
  resolver?: ClientKeyResolver,
): string {
  const candidate =
    resolver?.(request) ?? request.ip ?? request.socket?.remoteAddress;

  if (!candidate) {
    return UNKNOWN_CLIENT_KEY;
  }

  const normalized = normalizeClientKey(candidate);
  return normalized.length > 0 ? normalized : UNKNOWN_CLIENT_KEY;
}
