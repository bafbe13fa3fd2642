import { createHash, randomUUID } from 'crypto';

export function generateRequestId(): string {
  return `rank_${randomUUID()}`;
}

export function clamp(value: number, min = 0, max = 1): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Canonical form of an article URL: no fragment, no query string,
 * lower-cased scheme and host, no trailing slash on the path.
 * Returns an empty string for empty input.
 */
export function normalizeUrl(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) return '';

  try {
    const url = new URL(trimmed);
    const path = url.pathname.replace(/\/+$/, '');
    // URL already lower-cases the protocol and host
    return `${url.protocol}//${url.host}${path}`;
  } catch {
    const withoutSuffix = trimmed.split('#')[0].split('?')[0];
    const match = /^([a-z][a-z0-9+.-]*:\/\/)?([^/]*)(.*)$/i.exec(withoutSuffix);
    if (!match) return withoutSuffix.replace(/\/+$/, '');
    const [, scheme = '', host, path] = match;
    return `${scheme.toLowerCase()}${host.toLowerCase()}${path.replace(/\/+$/, '')}`;
  }
}

/** Trim, case-fold and collapse internal whitespace. */
export function normalizeTitle(title: string): string {
  return title.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function hashTitle(title: string): string {
  return createHash('sha256').update(normalizeTitle(title)).digest('hex');
}

export function hoursBetween(fromMs: number, toMs: number): number {
  return (toMs - fromMs) / (1000 * 60 * 60);
}

/** Parse an ISO timestamp; null for missing or unparseable values. */
export function parseTimestamp(value: string | null | undefined): number | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}
