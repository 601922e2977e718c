import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { createHash, randomUUID } from 'node:crypto';
import { BrowserSession, BrowserSessionFactory } from './browser/browser-session';
import { scraperConfig } from './config/scraper.config';
import { SitemapDiscoveryService } from './discovery/sitemap-discovery.service';
import { ScrapeRequest, SitemapJobRequest } from './dto/scrape-request.dto';
import {
  ConfigurationError,
  PersistenceError,
  ScrapeFailedError,
  describeFailure,
  errorMessage,
} from './errors';
import {
  ProductItem,
  ScrapeOutcome,
  ScrapingSettings,
  SiteProfile,
  SiteProfiles,
} from './interfaces/product.interface';
import { ProductPageNavigator } from './navigation/product-page.navigator';
import { toProductItem } from './products/product-normalizer';
import { ProductStore } from './store/product-store';
import {
  BROWSER_SESSION_FACTORY,
  PRODUCT_STORE,
  SCRAPING_SETTINGS,
  SITE_PROFILES,
} from './scraper.constants';

export interface SitemapJobSummary {
  jobId: string;
  site: string;
  discovered: number;
  scraped: number;
  persisted: number;
  failed: number;
}

const SCRAPE_FIELDS = ['link', 'name', 'price', 'image'] as const;

/**
 * Throws ConfigurationError for any profile with a missing or empty
 * selector set or an unusable search template.
 */
export function validateSiteProfiles(profiles: SiteProfiles): void {
  for (const [siteId, profile] of Object.entries(profiles)) {
    if (!profile.searchUrlTemplate.includes('{query}')) {
      throw new ConfigurationError(`Site "${siteId}" search URL template has no {query} placeholder`);
    }
    for (const field of SCRAPE_FIELDS) {
      if (!profile.selectors[field] || profile.selectors[field].length === 0) {
        throw new ConfigurationError(`Site "${siteId}" has no selectors for "${field}"`);
      }
    }
    if (profile.sitemap) {
      try {
        new RegExp(profile.sitemap.productIdPattern);
      } catch (error) {
        throw new ConfigurationError(`Site "${siteId}" productIdPattern is invalid: ${errorMessage(error)}`);
      }
    }
  }
}

/**
 * Product ID from the site's ID pattern, or a stable hash of the URL.
 */
export function productIdFromUrl(profile: SiteProfile, url: string): string {
  const pattern = profile.sitemap?.productIdPattern;
  const match = pattern ? new RegExp(pattern).exec(url) : null;
  if (match?.[1]) return match[1];
  return createHash('sha1').update(url).digest('hex').slice(0, 16);
}

const isClassified = (error: unknown): boolean =>
  error instanceof ScrapeFailedError || error instanceof ConfigurationError || error instanceof PersistenceError;

@Injectable()
export class ScraperService implements OnModuleInit {
  private readonly logger = new Logger(ScraperService.name);
  private isScheduledRunActive = false;

  constructor(
    @Inject(BROWSER_SESSION_FACTORY) private readonly sessions: BrowserSessionFactory,
    @Inject(PRODUCT_STORE) private readonly store: ProductStore,
    @Inject(SITE_PROFILES) private readonly profiles: SiteProfiles,
    @Inject(SCRAPING_SETTINGS) private readonly settings: ScrapingSettings,
    private readonly navigator: ProductPageNavigator,
    private readonly discovery: SitemapDiscoveryService,
  ) {}

  onModuleInit() {
    validateSiteProfiles(this.profiles);
    this.logger.log(`Loaded site profiles: ${this.getSiteIds().join(', ')}`);
  }

  getSiteIds(): string[] {
    return Object.keys(this.profiles);
  }

  getProfile(site: string): SiteProfile {
    const profile = this.profiles[site];
    if (!profile) {
      throw new ConfigurationError(`Unknown site "${site}". Configured sites: ${this.getSiteIds().join(', ')}`);
    }
    return profile;
  }

  /**
   * Search, scrape and persist one product. The browser session is
   * closed before the store write.
   */
  async scrapeAndSave(request: ScrapeRequest): Promise<ProductItem> {
    const profile = this.getProfile(request.site);
    const jobId = randomUUID();
    const logger = new Logger(`Scrape ${jobId}`);
    logger.log(`Starting scrape for '${request.query}' on ${profile.id} (${request.category}/${request.productID})`);

    const outcome = await this.withSession(jobId, logger, (session) =>
      this.navigator.scrapeSearch(session, profile, request.query, logger),
    );

    if (!outcome.success) {
      logger.warn(`Scrape of '${request.query}' on ${profile.id} failed: ${describeFailure(outcome.failure)}`);
      throw new ScrapeFailedError(outcome.failure, profile.id, request.query);
    }

    logger.log(`Scraping finished: "${outcome.record.name}" at ${outcome.record.price}`);
    const item = toProductItem(outcome.record, {
      category: request.category,
      productID: request.productID,
      site: profile.id,
      query: request.query,
    });

    try {
      await this.store.upsert({ category: item.category, productID: item.productID }, item);
    } catch (error) {
      logger.error(`Scrape succeeded but saving ${item.productID} failed: ${errorMessage(error)}`);
      throw error instanceof PersistenceError ? error : new PersistenceError(errorMessage(error), error);
    }

    logger.log(`Saved ${item.category}/${item.productID}`);
    return item;
  }

  /**
   * Validate the request and run the sitemap batch in the background.
   * Its outcome is visible only in the store and the logs.
   */
  startSitemapJob(request: SitemapJobRequest): { jobId: string } {
    const profile = this.getProfile(request.site);
    if (!profile.sitemap) {
      throw new ConfigurationError(`Site "${profile.id}" has no sitemap configuration`);
    }

    const jobId = randomUUID();
    // Don't await - the caller only gets the job id
    this.runSitemapJob(jobId, profile, request).catch((error) => {
      this.logger.error(`Sitemap job ${jobId} for ${profile.id} crashed: ${errorMessage(error)}`);
    });
    return { jobId };
  }

  async runSitemapJob(jobId: string, profile: SiteProfile, request: SitemapJobRequest): Promise<SitemapJobSummary> {
    const logger = new Logger(`Sitemap ${jobId}`);
    const limit = request.limit ?? this.settings.defaultBatchLimit;
    const category = request.category ?? profile.sitemap?.defaultCategory ?? 'General';
    const summary: SitemapJobSummary = { jobId, site: profile.id, discovered: 0, scraped: 0, persisted: 0, failed: 0 };

    logger.log(`Starting sitemap job for ${profile.id} (limit ${limit}, category ${category})`);
    const { productUrls, crawlDelay } = await this.discovery.discoverProductUrls(profile, limit, logger);
    summary.discovered = productUrls.length;
    if (productUrls.length === 0) {
      logger.warn(`No product URLs discovered for ${profile.id}`);
      return summary;
    }

    const itemDelay = Math.max(this.settings.interItemDelay, (crawlDelay ?? 0) * 1000);

    await this.withSession(jobId, logger, async (session) => {
      for (const [index, url] of productUrls.entries()) {
        if (index > 0) await this.delay(itemDelay);

        let outcome: ScrapeOutcome;
        try {
          outcome = await this.navigator.scrapeProductPage(session, profile, url, logger);
        } catch (error) {
          summary.failed++;
          logger.error(`Unexpected error scraping ${url}: ${errorMessage(error)}`);
          await this.captureScreenshot(session, `${jobId}-${index + 1}`, logger);
          continue;
        }
        if (!outcome.success) {
          summary.failed++;
          if (outcome.failure.reason === 'CaptchaDetected') {
            logger.error(`${profile.id} is serving CAPTCHA pages, stopping after ${index + 1} of ${productUrls.length}`);
            break;
          }
          logger.warn(`Skipping ${url}: ${describeFailure(outcome.failure)}`);
          continue;
        }
        summary.scraped++;

        const item = toProductItem(outcome.record, {
          category,
          productID: productIdFromUrl(profile, url),
          site: profile.id,
          query: url,
        });
        try {
          await this.store.upsert({ category: item.category, productID: item.productID }, item);
          summary.persisted++;
        } catch (error) {
          summary.failed++;
          logger.error(`Persistence failed for ${url} (scrape succeeded): ${errorMessage(error)}`);
        }
      }
    });

    logger.log(
      `Finished sitemap job for ${profile.id}: ${summary.discovered} discovered, ${summary.scraped} scraped, ` +
        `${summary.persisted} saved, ${summary.failed} failed`,
    );
    return summary;
  }

  /**
   * Scheduled task - refresh configured sites from their sitemaps
   */
  @Cron(scraperConfig.schedule.cron, { name: 'sitemap-refresh', disabled: !scraperConfig.schedule.enabled })
  async handleScheduledRefresh(): Promise<SitemapJobSummary[]> {
    if (this.isScheduledRunActive) {
      this.logger.warn('Scheduled sitemap refresh still running, skipping...');
      return [];
    }

    this.isScheduledRunActive = true;
    const summaries: SitemapJobSummary[] = [];
    try {
      for (const site of scraperConfig.schedule.sites) {
        const profile = this.profiles[site];
        if (!profile?.sitemap) {
          this.logger.warn(`Scheduled site "${site}" has no sitemap profile, skipping`);
          continue;
        }
        try {
          summaries.push(await this.runSitemapJob(randomUUID(), profile, { site }));
        } catch (error) {
          this.logger.error(`Scheduled refresh of ${site} failed: ${errorMessage(error)}`);
        }
      }
      return summaries;
    } finally {
      this.isScheduledRunActive = false;
    }
  }

  /**
   * Open a session for one job and close it on every exit path.
   * Unclassified errors leave a screenshot behind for debugging.
   */
  private async withSession<T>(
    jobId: string,
    logger: Logger,
    work: (session: BrowserSession) => Promise<T>,
  ): Promise<T> {
    const session = await this.sessions.open();
    try {
      return await work(session);
    } catch (error) {
      if (!isClassified(error)) {
        logger.error(`Unexpected error at ${session.currentUrl()}: ${errorMessage(error)}`);
        await this.captureScreenshot(session, jobId, logger);
      }
      throw error;
    } finally {
      try {
        await session.close();
      } catch (error) {
        logger.error(`Failed to close browser session: ${errorMessage(error)}`);
      }
    }
  }

  private async captureScreenshot(session: BrowserSession, jobId: string, logger: Logger): Promise<void> {
    try {
      const path = await session.screenshot(`error-${jobId}`);
      logger.log(`Saved error screenshot to ${path}`);
    } catch (error) {
      logger.error(`Could not capture screenshot: ${errorMessage(error)}`);
    }
  }

  /**
   * Helper to delay execution
   */
  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
