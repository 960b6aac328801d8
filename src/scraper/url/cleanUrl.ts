import { get as registrableDomain, isValid as hasRegistrableDomain } from 'psl';

const ZERO_WIDTH_CHARACTERS = /[\u200B-\u200D\uFEFF]/g;
const SCHEME_PREFIX = /^(?:[a-z0-9+.-]+:)?\/\//i;

/**
 * Reduces a listing href to a bare lowercase hostname: `https://www.Example.com/a/` becomes
 * `example.com`. Returns '' when no host under a public suffix can be recovered.
 * cleanUrl(cleanUrl(x)) === cleanUrl(x).
 */
export function cleanUrl(raw: string): string {
  const trimmed = raw.replace(ZERO_WIDTH_CHARACTERS, '').trim().replace(/\/+$/, '');
  const host = extractHost(trimmed).toLowerCase();

  if (!host || !hasRegistrableDomain(host)) {
    return '';
  }

  const domain = registrableDomain(host);
  if (!domain) {
    return '';
  }

  return host === `www.${domain}` ? domain : host;
}

function extractHost(value: string): string {
  const withoutScheme = value.replace(SCHEME_PREFIX, '');
  const authority = withoutScheme.split(/[/?#]/, 1)[0] ?? '';
  const hostAndPort = authority.slice(authority.lastIndexOf('@') + 1);

  return hostAndPort.replace(/:\d*$/, '').replace(/\.+$/, '');
}
