import { FixtureSessionFactory, readFixture } from '../../test/fakes/fixture-session';
import { InMemoryProductStore } from '../../test/fakes/in-memory-store';
import { scraperConfig } from './config/scraper.config';
import { HttpClient, SitemapDiscoveryService } from './discovery/sitemap-discovery.service';
import { ConfigurationError, PersistenceError, ScrapeFailedError } from './errors';
import { SiteProfiles } from './interfaces/product.interface';
import { ProductPageNavigator } from './navigation/product-page.navigator';
import { SelectorResolver } from './resolver/selector-resolver';
import { ScraperService, productIdFromUrl, validateSiteProfiles } from './scraper.service';

const SEARCH_URL = 'https://www.amazon.in/s?k=wireless+mouse';
const PRODUCT_URL = 'https://www.amazon.in/dp/B0TEST1234/ref=sr_1_1';

const request = { query: 'wireless mouse', category: 'Electronics', productID: 'EL001', site: 'amazon' };

function setup(pages: Record<string, string>, profiles: SiteProfiles = scraperConfig.sites) {
  const settings = { ...scraperConfig.scraping, selectorTimeout: 1, interItemDelay: 0 };
  const sessions = new FixtureSessionFactory(pages);
  const store = new InMemoryProductStore();
  const http: HttpClient = { get: jest.fn() };
  const discovery = new SitemapDiscoveryService(http, settings);
  const navigator = new ProductPageNavigator(new SelectorResolver(), settings);
  const service = new ScraperService(sessions, store, profiles, settings, navigator, discovery);
  return { service, sessions, store, discovery };
}

describe('ScraperService', () => {
  describe('scrapeAndSave', () => {
    const pages = {
      [SEARCH_URL]: readFixture('amazon-search.html'),
      [PRODUCT_URL]: readFixture('amazon-product.html'),
    };

    it('scrapes, persists under the request key and releases the session', async () => {
      const { service, sessions, store } = setup(pages);

      const item = await service.scrapeAndSave(request);

      expect(item.name).toBe('Acme Glide Wireless Mouse, 2.4 GHz, Black');
      expect(item.prices).toEqual({ Amazon: 1299 });
      expect(store.items.get('Electronics#EL001')).toEqual(item);
      expect(sessions.opened).toHaveLength(1);
      expect(sessions.opened[0].closed).toBe(true);
    });

    it('rejects an unknown site before opening a browser', async () => {
      const { service, sessions } = setup(pages);

      await expect(service.scrapeAndSave({ ...request, site: 'ebay' })).rejects.toBeInstanceOf(ConfigurationError);
      expect(sessions.opened).toHaveLength(0);
    });

    it('raises the scrape failure and writes nothing', async () => {
      const { service, sessions, store } = setup({ [SEARCH_URL]: '<html><body>No results</body></html>' });

      const attempt = service.scrapeAndSave(request);

      await expect(attempt).rejects.toBeInstanceOf(ScrapeFailedError);
      await expect(attempt).rejects.toMatchObject({ failure: { reason: 'NoSearchResults' }, site: 'amazon' });
      expect(store.items.size).toBe(0);
      expect(sessions.opened[0].closed).toBe(true);
    });

    it('reports a store failure as a persistence error after the scrape', async () => {
      const { service, sessions, store } = setup(pages);
      store.failure = new Error('ProvisionedThroughputExceededException');

      const attempt = service.scrapeAndSave(request);

      await expect(attempt).rejects.toBeInstanceOf(PersistenceError);
      await expect(attempt).rejects.toThrow('ProvisionedThroughputExceededException');
      expect(sessions.opened[0].closed).toBe(true);
    });

    it('takes a screenshot on an unclassified error and still closes the session', async () => {
      const { service, sessions } = setup({ [SEARCH_URL]: readFixture('amazon-search.html') });

      await expect(service.scrapeAndSave(request)).rejects.toThrow(`net::ERR_NAME_NOT_RESOLVED at ${PRODUCT_URL}`);

      const [session] = sessions.opened;
      expect(session.screenshots).toHaveLength(1);
      expect(session.screenshots[0]).toMatch(/^error-[0-9a-f-]{36}$/);
      expect(session.closed).toBe(true);
    });
  });

  describe('runSitemapJob', () => {
    const productA = 'https://www.amazon.in/dp/B0TEST0001';
    const productB = 'https://www.amazon.in/dp/B0TEST0002';
    const productC = 'https://www.amazon.in/Acme-Mouse/dp/B0TEST0003';

    it('scrapes each discovered page in one session and skips failures', async () => {
      const { service, sessions, store, discovery } = setup({
        [productA]: readFixture('amazon-product.html'),
        [productB]: '<html><body><span id="productTitle">No price here</span></body></html>',
        [productC]: readFixture('amazon-product.html'),
      });
      jest
        .spyOn(discovery, 'discoverProductUrls')
        .mockResolvedValue({ productUrls: [productA, productB, productC], crawlDelay: null });

      const summary = await service.runSitemapJob('job-1', scraperConfig.sites.amazon, {
        site: 'amazon',
        category: 'Electronics',
      });

      expect(summary).toEqual({ jobId: 'job-1', site: 'amazon', discovered: 3, scraped: 2, persisted: 2, failed: 1 });
      expect([...store.items.keys()]).toEqual(['Electronics#B0TEST0001', 'Electronics#B0TEST0003']);
      expect(store.items.get('Electronics#B0TEST0003')?.description).toBe(`Scraped data for '${productC}'.`);
      expect(sessions.opened).toHaveLength(1);
      expect(sessions.opened[0].closed).toBe(true);
    });

    it('counts a navigation crash as a failed item and carries on', async () => {
      const { service, sessions, store, discovery } = setup({ [productB]: readFixture('amazon-product.html') });
      jest
        .spyOn(discovery, 'discoverProductUrls')
        .mockResolvedValue({ productUrls: [productA, productB], crawlDelay: null });

      const summary = await service.runSitemapJob('job-2', scraperConfig.sites.amazon, { site: 'amazon' });

      expect(summary).toMatchObject({ scraped: 1, persisted: 1, failed: 1 });
      expect(store.items.has('General#B0TEST0002')).toBe(true);
      expect(sessions.opened[0].screenshots).toEqual(['error-job-2-1']);
    });

    it('ends the batch at the first CAPTCHA page', async () => {
      const captcha = readFixture('amazon-captcha.html');
      const { service, sessions, store, discovery } = setup({
        [productA]: captcha,
        [productB]: captcha,
        [productC]: captcha,
      });
      jest
        .spyOn(discovery, 'discoverProductUrls')
        .mockResolvedValue({ productUrls: [productA, productB, productC], crawlDelay: null });

      const summary = await service.runSitemapJob('job-4', scraperConfig.sites.amazon, { site: 'amazon' });

      expect(summary).toEqual({ jobId: 'job-4', site: 'amazon', discovered: 3, scraped: 0, persisted: 0, failed: 1 });
      expect(store.items.size).toBe(0);
      expect(sessions.opened[0].visited).toEqual([productA]);
      expect(sessions.opened[0].queries).toEqual([]);
      expect(sessions.opened[0].closed).toBe(true);
    });

    it('does not open a browser when nothing is discovered', async () => {
      const { service, sessions, discovery } = setup({});
      jest.spyOn(discovery, 'discoverProductUrls').mockResolvedValue({ productUrls: [], crawlDelay: null });

      const summary = await service.runSitemapJob('job-3', scraperConfig.sites.amazon, { site: 'amazon' });

      expect(summary.discovered).toBe(0);
      expect(sessions.opened).toHaveLength(0);
    });
  });

  describe('startSitemapJob', () => {
    it('acknowledges immediately with a job id', async () => {
      const { service, discovery } = setup({});
      const discover = jest
        .spyOn(discovery, 'discoverProductUrls')
        .mockResolvedValue({ productUrls: [], crawlDelay: null });

      const { jobId } = service.startSitemapJob({ site: 'amazon', limit: 5 });
      await new Promise((resolve) => setImmediate(resolve));

      expect(jobId).toMatch(/^[0-9a-f-]{36}$/);
      expect(discover).toHaveBeenCalledWith(scraperConfig.sites.amazon, 5, expect.anything());
    });

    it('refuses a site without a sitemap profile', () => {
      const { sitemap: _unused, ...withoutSitemap } = scraperConfig.sites.amazon;
      const { service } = setup({}, { amazon: withoutSitemap });

      expect(() => service.startSitemapJob({ site: 'amazon' })).toThrow(ConfigurationError);
    });
  });

  describe('handleScheduledRefresh', () => {
    it('runs one batch per scheduled site', async () => {
      const { service, discovery } = setup({});
      jest.spyOn(discovery, 'discoverProductUrls').mockResolvedValue({ productUrls: [], crawlDelay: null });

      const summaries = await service.handleScheduledRefresh();

      expect(summaries.map((summary) => summary.site)).toEqual(scraperConfig.schedule.sites);
    });

    it('skips a tick while the previous refresh is still running', async () => {
      const { service, discovery } = setup({});
      let finishDiscovery: () => void = () => undefined;
      const discover = jest
        .spyOn(discovery, 'discoverProductUrls')
        .mockResolvedValue({ productUrls: [], crawlDelay: null })
        .mockImplementationOnce(
          () =>
            new Promise((resolve) => {
              finishDiscovery = () => resolve({ productUrls: [], crawlDelay: null });
            }),
        );

      const first = service.handleScheduledRefresh();
      const second = await service.handleScheduledRefresh();
      finishDiscovery();
      const summaries = await first;

      expect(second).toEqual([]);
      expect(discover).toHaveBeenCalledTimes(scraperConfig.schedule.sites.length);
      expect(summaries.map((summary) => summary.site)).toEqual(scraperConfig.schedule.sites);
    });
  });
});

describe('validateSiteProfiles', () => {
  it('accepts the configured sites', () => {
    expect(() => validateSiteProfiles(scraperConfig.sites)).not.toThrow();
  });

  it('fails fast on an empty selector set', () => {
    const amazon = scraperConfig.sites.amazon;
    const broken = { ...amazon, selectors: { ...amazon.selectors, price: [] } };

    expect(() => validateSiteProfiles({ amazon: broken })).toThrow('Site "amazon" has no selectors for "price"');
  });
});

describe('productIdFromUrl', () => {
  it('extracts the ID with the site pattern', () => {
    expect(productIdFromUrl(scraperConfig.sites.amazon, 'https://www.amazon.in/Acme/dp/B0TEST0003?th=1')).toBe(
      'B0TEST0003',
    );
  });

  it('falls back to a short stable hash', () => {
    const url = 'https://www.amazon.in/gp/product-without-asin';
    const id = productIdFromUrl(scraperConfig.sites.amazon, url);

    expect(id).toMatch(/^[0-9a-f]{16}$/);
    expect(productIdFromUrl(scraperConfig.sites.amazon, url)).toBe(id);
  });
});
