export type LocatorKind = 'id' | 'css' | 'class' | 'name' | 'tag' | 'xpath';

export interface Locator {
  kind: LocatorKind;
  value: string;
}

/**
 * Ordered fallback list for one logical field. The first locator that
 * matches wins, so order is priority.
 */
export type SelectorSet = readonly Locator[];

export type ScrapeField = 'link' | 'name' | 'price' | 'image';

export interface SitemapProfile {
  productUrlPattern: string; // substring a product page URL must contain
  productIdPattern: string; // regex whose first group is the product ID
  defaultCategory: string;
}

export interface SiteProfile {
  id: string;
  baseUrl: string;
  searchUrlTemplate: string; // must contain "{query}"
  querySeparator: string; // replaces whitespace between query words
  selectors: Readonly<Record<ScrapeField, SelectorSet>>;
  imageAttribute: string;
  captchaSignatures: readonly string[];
  sitemap?: SitemapProfile;
}

export type SiteProfiles = Readonly<Record<string, SiteProfile>>;

export interface ScrapedRecord {
  name: string;
  price: number;
  imageUrl: string;
}

export interface ProductKey {
  category: string;
  productID: string;
}

export interface ProductItem extends ProductKey {
  name: string;
  description: string;
  image: string;
  prices: Record<string, number>;
  tags: string[];
}

export type ScrapeFailure =
  | { reason: 'NoSearchResults' }
  | { reason: 'CaptchaDetected'; url: string }
  | { reason: 'FieldNotFound'; field: ScrapeField }
  | { reason: 'MalformedPrice'; text: string };

export type ScrapeOutcome =
  | { success: true; record: ScrapedRecord; url: string }
  | { success: false; failure: ScrapeFailure };

export interface ScrapingSettings {
  selectorTimeout: number; // per candidate, ms
  navigationTimeout: number;
  interItemDelay: number;
  requestTimeout: number;
  userAgent: string;
  sitemapMaxDepth: number;
  defaultBatchLimit: number;
}
