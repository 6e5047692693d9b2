import { isIP } from 'node:net';
import { errorMessage, logger } from '../utils/index.js';

const DOMAIN_PATTERN = /^([a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/;
const SCHEME_PREFIXES = ['http://', 'https://'] as const;

/** True for IPv4 and IPv6 literals. */
export function isIpAddress(text: string): boolean {
  return isIP(text) !== 0;
}

/** True when the text has the shape of a bare DNS name, e.g. `mail.example.com`. */
export function isDomainName(text: string): boolean {
  return DOMAIN_PATTERN.test(text);
}

export function hasScheme(text: string): boolean {
  return SCHEME_PREFIXES.some(prefix => text.startsWith(prefix));
}

/** Ensure an https scheme and drop trailing slashes. */
export function normalizeUri(uri: string): string {
  if (!uri) return '';
  const withScheme = hasScheme(uri) ? uri : `https://${uri}`;
  return withScheme.replace(/\/+$/, '');
}

/** Host with port, preceded by any `user:pass@` the URL carries. */
function netloc(url: URL): string {
  if (!url.username && !url.password) return url.host;
  const credentials = url.password ? `${url.username}:${url.password}` : url.username;
  return `${credentials}@${url.host}`;
}

/**
 * Resolve the host a login URI points at, for grouping.
 * IP literals and bare domain names come back unchanged; anything else is
 * parsed as a URL and its host (with any userinfo) returned without a
 * leading `www.`. Internationalized hosts come back in punycode.
 * Returns null when no host can be determined.
 */
export function extractDomain(uri: string): string | null {
  if (!uri) return null;

  if (isIpAddress(uri)) return uri;

  if (!hasScheme(uri) && !uri.startsWith('www.') && isDomainName(uri)) {
    return uri;
  }

  try {
    const parsed = new URL(normalizeUri(uri));
    let domain = netloc(parsed);
    if (domain.startsWith('www.')) domain = domain.slice(4);
    return domain || null;
  } catch (err) {
    logger.warn(`Could not parse URL '${uri}':`, errorMessage(err));
    return null;
  }
}
