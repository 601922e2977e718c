import { ProductItem, ScrapedRecord } from '../interfaces/product.interface';

export interface ProductMetadata {
  category: string;
  productID: string;
  site: string;
  query: string;
}

export const SCRAPED_TAG = 'Scraped';

export function titleCase(value: string): string {
  return value
    .split(/[\s_-]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

export function toProductItem(record: ScrapedRecord, meta: ProductMetadata): ProductItem {
  const siteTitle = titleCase(meta.site);
  return {
    category: meta.category,
    productID: meta.productID,
    name: record.name,
    description: `Scraped data for '${meta.query}'.`,
    image: record.imageUrl,
    prices: { [siteTitle]: record.price },
    tags: Array.from(new Set([meta.category, SCRAPED_TAG, siteTitle])),
  };
}
