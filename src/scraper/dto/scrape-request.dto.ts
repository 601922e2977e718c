import { z } from 'zod';

const text = z.string().trim().min(1);

export const scrapeRequestSchema = z
  .object({
    query: text.optional(),
    product_query: text.optional(), // older clients send this name
    category: text,
    productID: text,
    site: text.toLowerCase().default('amazon'),
  })
  .refine((body) => body.query !== undefined || body.product_query !== undefined, {
    message: 'query is required',
    path: ['query'],
  })
  .transform(({ query, product_query, ...rest }) => ({
    ...rest,
    query: query ?? product_query ?? '',
  }));

export type ScrapeRequest = z.output<typeof scrapeRequestSchema>;

export const sitemapJobSchema = z.object({
  site: text.toLowerCase(),
  category: text.optional(),
  limit: z.coerce.number().int().min(1).max(200).optional(),
});

export type SitemapJobRequest = z.output<typeof sitemapJobSchema>;
