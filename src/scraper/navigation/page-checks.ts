import * as cheerio from 'cheerio';
import { SiteProfile } from '../interfaces/product.interface';

export function buildSearchUrl(profile: SiteProfile, query: string): string {
  const encoded = query
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => encodeURIComponent(word))
    .join(profile.querySeparator);
  return profile.searchUrlTemplate.replace('{query}', encoded);
}

/**
 * Absolute links are returned untouched; anything else is resolved
 * against the site's base URL.
 */
export function resolveProductUrl(baseUrl: string, link: string): string {
  if (/^https?:\/\//i.test(link)) return link;
  return new URL(link, baseUrl).toString();
}

/**
 * Returns the first CAPTCHA signature found in the page URL, title,
 * visible text or form actions, or null.
 */
export function detectCaptcha(html: string, url: string, signatures: readonly string[]): string | null {
  const $ = cheerio.load(html);
  $('script, style, noscript').remove();
  const haystack = [
    url,
    $('title').text(),
    $('body').text(),
    ...$('form')
      .map((_, form) => $(form).attr('action') ?? '')
      .get(),
  ]
    .join('\n')
    .replace(/\s+/g, ' ')
    .toLowerCase();

  return signatures.find((signature) => haystack.includes(signature.toLowerCase())) ?? null;
}
