import type { CheerioAPI } from 'cheerio';
import type { SocialMedia } from '../types/organization.js';

export interface PageContacts {
  emails: string[];
  phones: string[];
  websites: string[];
  social_media: SocialMedia;
}

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

// +255 XX XXX XXXX, (+255) XX XXX XXXX and 0XX XXX XXXX with optional spaces
const PHONE_PATTERN = /(?:\(\+255\)|\+255|\b0)\s?\d{2,3}\s?\d{3}\s?\d{3,4}\b/g;

const SOCIAL_HOSTS: [keyof SocialMedia, RegExp][] = [
  ['facebook', /(^|\.)facebook\.com$/],
  ['instagram', /(^|\.)instagram\.com$/],
  ['linkedin', /(^|\.)linkedin\.com$/],
  ['twitter', /(^|\.)(twitter|x)\.com$/],
];

/**
 * Visible text of a document, one chunk per text node
 */
export function visibleText($: CheerioAPI): string {
  return $.root()
    .find('*')
    .not('script, style, noscript')
    .contents()
    .filter((_, node) => node.nodeType === 3)
    .map((_, node) => $(node).text())
    .get()
    .join(' ');
}

/**
 * Collect emails, phones and outbound links from a parsed page, in document
 * order and without duplicates. Links to `ownHost` (the directory itself)
 * are not counted as websites.
 */
export function extractContacts($: CheerioAPI, ownHost?: string): PageContacts {
  const text = visibleText($);
  const emails = unique(text.match(EMAIL_PATTERN) ?? []);
  const phones = unique((text.match(PHONE_PATTERN) ?? []).map((phone) => phone.trim()));
  const websites: string[] = [];
  const social: SocialMedia = {};

  $('a[href]').each((_, el) => {
    const href = ($(el).attr('href') ?? '').trim();

    if (href.toLowerCase().startsWith('mailto:')) {
      const email = href.slice('mailto:'.length).split('?')[0];
      if (email && !emails.includes(email)) emails.push(email);
      return;
    }
    if (href.toLowerCase().startsWith('tel:')) {
      const phone = href.slice('tel:'.length);
      if (phone && !phones.includes(phone)) phones.push(phone);
      return;
    }
    if (!/^https?:\/\//i.test(href)) return;

    let host: string;
    try {
      host = new URL(href).hostname.toLowerCase();
    } catch {
      return;
    }

    const platform = SOCIAL_HOSTS.find(([, pattern]) => pattern.test(host))?.[0];
    if (platform) {
      social[platform] ??= href;
    } else if (!ownHost || !isSameSite(host, ownHost)) {
      if (!websites.includes(href)) websites.push(href);
    }
  });

  return { emails, phones, websites, social_media: social };
}

function isSameSite(host: string, ownHost: string): boolean {
  const bare = ownHost.replace(/^www\./, '');
  return host === bare || host.endsWith(`.${bare}`);
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Value of the innermost element reading `<label>: value`,
 * e.g. `Address: Plot 4, Mikocheni`
 */
export function labelledValue($: CheerioAPI, label: RegExp): string | undefined {
  const pattern = new RegExp(`^\\s*(?:${label.source})\\s*:?\\s*([^\\s:][^\\n]*)`, 'i');
  return $('*')
    .filter(
      (_, el) =>
        pattern.test($(el).text()) &&
        !$(el)
          .children()
          .toArray()
          .some((child) => pattern.test($(child).text()))
    )
    .map((_, el) => $(el).text().match(pattern)?.[1]?.trim() || undefined)
    .get()
    .find((value) => value.length > 0);
}

/**
 * Pair the n-th name on a listing page with the n-th phone and email found
 * on it, for directories that do not group contacts per entry
 */
export function contactsAt(
  contacts: PageContacts,
  index: number
): { phone?: string; email?: string } {
  return { phone: contacts.phones[index], email: contacts.emails[index] };
}

/**
 * Resolve a possibly relative link against the page it came from
 */
export function absoluteUrl(href: string, base: string): string | undefined {
  try {
    return new URL(href, base).toString();
  } catch {
    return undefined;
  }
}
