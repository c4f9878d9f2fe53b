import { IncomingHttpHeaders } from 'http';

/** Prefixes of long-lived account tokens the issuer accepts for exchange. */
export const ACCOUNT_TOKEN_PREFIXES = ['ghp_', 'gho_', 'ghu_', 'github_pat_'] as const;

export function isAccountToken(token: string): boolean {
  return ACCOUNT_TOKEN_PREFIXES.some((prefix) => token.startsWith(prefix));
}

function header(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Caller-supplied account token, looked up in `x-api-key`, then
 * `Authorization: Bearer`, then `api-key`. Values that do not look like an
 * account token are ignored.
 */
export function extractCallerToken(headers: IncomingHttpHeaders): string | undefined {
  const authorization = header(headers, 'authorization');
  const bearer = authorization?.match(/^bearer\s+(.+)$/i)?.[1].trim();

  const candidates = [header(headers, 'x-api-key'), bearer, header(headers, 'api-key')];
  return candidates.find((token): token is string => token !== undefined && isAccountToken(token));
}
