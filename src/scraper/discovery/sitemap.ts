import { XMLParser } from 'fast-xml-parser';
import { gunzipSync } from 'node:zlib';

export type SitemapDocument =
  | { kind: 'index'; locations: string[] }
  | { kind: 'urlset'; locations: string[] }
  | { kind: 'unknown' };

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  isArray: (name) => name === 'sitemap' || name === 'url',
});

const GZIP_MAGIC = [0x1f, 0x8b];

export function isGzipped(body: Buffer, url: string): boolean {
  return url.toLowerCase().endsWith('.gz') || (body[0] === GZIP_MAGIC[0] && body[1] === GZIP_MAGIC[1]);
}

export function decodeSitemapBody(body: Buffer, url: string): string {
  return (isGzipped(body, url) ? gunzipSync(body) : body).toString('utf8');
}

const readLocations = (entries: unknown): string[] => {
  if (!Array.isArray(entries)) return [];
  return entries
    .map((entry: unknown) => {
      if (typeof entry !== 'object' || entry === null || !('loc' in entry)) return '';
      const { loc } = entry;
      return typeof loc === 'string' ? loc.trim() : '';
    })
    .filter(Boolean);
};

const childOf = (node: unknown, key: string): unknown =>
  typeof node === 'object' && node !== null && key in node ? Reflect.get(node, key) : undefined;

export function parseSitemap(xml: string): SitemapDocument {
  const parsed: unknown = xmlParser.parse(xml);

  const index = childOf(parsed, 'sitemapindex');
  if (index !== undefined) {
    return { kind: 'index', locations: readLocations(childOf(index, 'sitemap')) };
  }

  const urlset = childOf(parsed, 'urlset');
  if (urlset !== undefined) {
    return { kind: 'urlset', locations: readLocations(childOf(urlset, 'url')) };
  }

  return { kind: 'unknown' };
}
