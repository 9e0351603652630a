/**
 * Canonicalization of contact fields. Values that fail the structural
 * checks come back as null so the caller drops that field only.
 */

const PHONE_SEPARATORS = /[\s\-().\/]/g;
const INTERNATIONAL_PHONE = /^\+?255(\d{9})$/;
const LOCAL_PHONE = /^0(\d{9})$/;

/**
 * Normalize a Tanzanian phone number to `+255 XX XXX XXXX`.
 * Accepts `+255 XX XXX XXXX`, `255XXXXXXXXX` and `0XX XXX XXXX` with any
 * spacing or punctuation.
 */
export function normalizePhone(input: string): string | null {
  const compact = input.trim().replace(PHONE_SEPARATORS, '');
  const match = compact.match(INTERNATIONAL_PHONE) ?? compact.match(LOCAL_PHONE);
  if (!match) return null;

  const national = match[1];
  return `+255 ${national.slice(0, 2)} ${national.slice(2, 5)} ${national.slice(5)}`;
}

/**
 * Lowercase and trim an email, then require exactly one `@` with
 * non-empty local and domain parts
 */
export function normalizeEmail(input: string): string | null {
  const email = input.trim().replace(/^mailto:/i, '').toLowerCase();
  if (/\s/.test(email)) return null;

  const parts = email.split('@');
  if (parts.length !== 2) return null;

  const [local, domain] = parts;
  if (!local || !domain) return null;

  return email;
}

export function normalizeAddress(input: string | undefined): string | undefined {
  if (!input) return undefined;
  const address = input.replace(/\s+/g, ' ').trim();
  return address.length > 0 ? address : undefined;
}

/**
 * Display form of a name: whitespace collapsed, ends trimmed
 */
export function cleanName(input: string): string {
  return input.replace(/\s+/g, ' ').trim();
}

/**
 * Deduplication identity: case-insensitive, diacritics and punctuation
 * stripped, whitespace collapsed
 */
export function nameIdentity(name: string): string {
  return name
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Accept absolute http(s) URLs only
 */
export function normalizeWebsite(input: string | undefined): string | undefined {
  if (!input) return undefined;
  const candidate = input.trim();
  try {
    const url = new URL(candidate);
    return url.protocol === 'http:' || url.protocol === 'https:' ? candidate : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Split a cell that may hold several values (`a; b`, `a, b`, `a / b`)
 */
export function splitMultiValue(input: string | undefined): string[] {
  if (!input) return [];
  return input
    .split(/[;,]|\s\/\s/)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
