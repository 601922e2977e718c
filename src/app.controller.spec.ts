import { HttpException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { AppController, toHttpException } from './app.controller';
import { AppService } from './app.service';
import { ZodValidationPipe } from './common/zod-validation.pipe';
import { scrapeRequestSchema, sitemapJobSchema } from './scraper/dto/scrape-request.dto';
import { ConfigurationError, PersistenceError, ScrapeFailedError } from './scraper/errors';
import { ProductItem } from './scraper/interfaces/product.interface';
import { ScraperService } from './scraper/scraper.service';

async function httpErrorOf(pending: Promise<unknown>): Promise<HttpException> {
  try {
    await pending;
  } catch (error) {
    if (error instanceof HttpException) return error;
    throw error;
  }
  throw new Error('expected the call to fail');
}

const request = { query: 'wireless mouse', category: 'Electronics', productID: 'EL001', site: 'amazon' };

const item: ProductItem = {
  category: 'Electronics',
  productID: 'EL001',
  name: 'Acme Glide Wireless Mouse',
  description: "Scraped data for 'wireless mouse'.",
  image: 'https://images.example.test/a.jpg',
  prices: { Amazon: 1299 },
  tags: ['Electronics', 'Scraped', 'Amazon'],
};

describe('AppController', () => {
  let controller: AppController;
  const scraperService = {
    scrapeAndSave: jest.fn(),
    startSitemapJob: jest.fn(),
    getSiteIds: jest.fn().mockReturnValue(['amazon', 'flipkart']),
  };

  beforeEach(async () => {
    scraperService.scrapeAndSave.mockReset();
    scraperService.startSitemapJob.mockReset();

    const moduleRef: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [AppService, { provide: ScraperService, useValue: scraperService }],
    }).compile();

    controller = moduleRef.get(AppController);
  });

  it('reports health with the configured sites', () => {
    expect(controller.getHealth()).toMatchObject({ status: 'ok', sites: ['amazon', 'flipkart'] });
  });

  it('returns the saved item on success', async () => {
    scraperService.scrapeAndSave.mockResolvedValue(item);

    await expect(controller.scrapeAndSave(request)).resolves.toEqual({
      status: 'success',
      message: "Successfully scraped and saved 'Acme Glide Wireless Mouse'",
      data: item,
    });
  });

  it('maps a missing search result to 404', async () => {
    scraperService.scrapeAndSave.mockRejectedValue(
      new ScrapeFailedError({ reason: 'NoSearchResults' }, 'amazon', 'wireless mouse'),
    );

    const error = await httpErrorOf(controller.scrapeAndSave(request));

    expect(error.getStatus()).toBe(404);
    expect(error.getResponse()).toEqual({
      status: 'error',
      message: "Could not find product details for 'wireless mouse' on Amazon.",
    });
  });

  it('maps a storage failure to 500 with its own message', async () => {
    scraperService.scrapeAndSave.mockRejectedValue(new PersistenceError('table missing', new Error('x')));

    const error = await httpErrorOf(controller.scrapeAndSave(request));

    expect(error.getStatus()).toBe(500);
    expect(error.getResponse()).toEqual({
      status: 'error',
      message: 'Failed to save item to database. table missing',
    });
  });

  it('acknowledges a sitemap job with 202-style payload', () => {
    scraperService.startSitemapJob.mockReturnValue({ jobId: 'job-1' });

    expect(controller.startSitemapJob({ site: 'amazon' })).toEqual({
      status: 'accepted',
      message: 'Sitemap scrape for amazon started',
      data: { jobId: 'job-1' },
    });
  });

  it('rejects a sitemap job for an unknown site with 400', () => {
    scraperService.startSitemapJob.mockImplementation(() => {
      throw new ConfigurationError('Unknown site "ebay"');
    });

    expect(() => controller.startSitemapJob({ site: 'ebay' })).toThrow(HttpException);
  });
});

describe('toHttpException', () => {
  it('maps scrape failures by reason', () => {
    const statusOf = (error: ScrapeFailedError) => toHttpException(error).getStatus();

    expect(statusOf(new ScrapeFailedError({ reason: 'CaptchaDetected', url: 'https://www.amazon.in/s?k=x' }, 'amazon', 'x'))).toBe(503);
    expect(statusOf(new ScrapeFailedError({ reason: 'FieldNotFound', field: 'price' }, 'amazon', 'x'))).toBe(404);
    expect(statusOf(new ScrapeFailedError({ reason: 'MalformedPrice', text: 'N/A' }, 'amazon', 'x'))).toBe(404);
  });

  it('maps configuration errors to 400 and anything else to 500', () => {
    expect(toHttpException(new ConfigurationError('bad')).getStatus()).toBe(400);
    expect(toHttpException(new Error('Target closed')).getResponse()).toEqual({
      status: 'error',
      message: 'Scraping failed unexpectedly: Target closed',
    });
  });
});

describe('request validation', () => {
  const scrapePipe = new ZodValidationPipe(scrapeRequestSchema);

  it('accepts the legacy product_query field and defaults the site', () => {
    expect(scrapePipe.transform({ product_query: 'mixer grinder', category: 'Home', productID: 'HK005' })).toEqual({
      query: 'mixer grinder',
      category: 'Home',
      productID: 'HK005',
      site: 'amazon',
    });
  });

  it('normalizes the site name', () => {
    expect(scrapePipe.transform({ ...request, site: ' Amazon ' }).site).toBe('amazon');
  });

  it('rejects a body without a query', () => {
    expect(() => scrapePipe.transform({ category: 'Home', productID: 'HK005' })).toThrow(HttpException);
  });

  it('coerces the sitemap limit and bounds it', () => {
    const sitemapPipe = new ZodValidationPipe(sitemapJobSchema);
    expect(sitemapPipe.transform({ site: 'amazon', limit: '5' })).toEqual({ site: 'amazon', limit: 5 });
    expect(() => sitemapPipe.transform({ site: 'amazon', limit: 500 })).toThrow(HttpException);
  });
});
