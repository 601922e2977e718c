import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { errorMessage } from '../errors';
import { ScrapingSettings, SiteProfile } from '../interfaces/product.interface';
import { HTTP_CLIENT, SCRAPING_SETTINGS } from '../scraper.constants';
import { ALLOW_ALL, BLOCK_ALL, RobotsRules, isUrlAllowed, parseRobotsTxt } from './robots';
import { decodeSitemapBody, parseSitemap } from './sitemap';

export type HttpClient = Pick<AxiosInstance, 'get'>;

export interface DiscoveryResult {
  productUrls: string[];
  crawlDelay: number | null; // seconds, from robots.txt
}

/** Receives a batch of sitemap locations; returns false once it wants no more. */
export type UrlSink = (locations: readonly string[]) => boolean;

export function createHttpClient(settings: ScrapingSettings): AxiosInstance {
  return axios.create({
    timeout: settings.requestTimeout,
    headers: {
      'User-Agent': settings.userAgent,
      Accept: 'application/xml,text/xml,text/plain,*/*',
    },
  });
}

@Injectable()
export class SitemapDiscoveryService {
  private readonly logger = new Logger(SitemapDiscoveryService.name);

  constructor(
    @Inject(HTTP_CLIENT) private readonly http: HttpClient,
    @Inject(SCRAPING_SETTINGS) private readonly settings: ScrapingSettings,
  ) {}

  /**
   * Fetch robots.txt. A 4xx means no restrictions; a server error or an
   * unreachable host blocks the whole site.
   */
  async fetchRobots(baseUrl: string, logger: Logger = this.logger): Promise<RobotsRules> {
    const robotsUrl = new URL('/robots.txt', baseUrl).toString();
    try {
      const response = await this.http.get<string>(robotsUrl, {
        responseType: 'text',
        validateStatus: () => true,
      });

      if (response.status >= 200 && response.status < 300) {
        return parseRobotsTxt(String(response.data));
      }
      if (response.status >= 400 && response.status < 500) {
        logger.log(`${robotsUrl} returned ${response.status}, treating site as unrestricted`);
        return ALLOW_ALL;
      }
      logger.warn(`${robotsUrl} returned ${response.status}, blocking site`);
      return BLOCK_ALL;
    } catch (error) {
      logger.warn(`Could not fetch ${robotsUrl}: ${errorMessage(error)}; blocking site`);
      return BLOCK_ALL;
    }
  }

  /**
   * Collect `<url><loc>` values, following sitemap indexes up to the
   * configured depth.
   */
  async collectSitemapUrls(sitemapUrl: string, logger: Logger = this.logger): Promise<string[]> {
    const urls: string[] = [];
    await this.walkSitemap(
      sitemapUrl,
      (locations) => {
        urls.push(...locations);
        return true;
      },
      logger,
    );
    return urls;
  }

  /**
   * Feed each urlset reached from `sitemapUrl` to `sink` until it returns
   * false. A failing child of an index is skipped; a failing `sitemapUrl`
   * throws. Resolves to false once the sink has asked to stop.
   */
  async walkSitemap(sitemapUrl: string, sink: UrlSink, logger: Logger = this.logger, depth = 0): Promise<boolean> {
    if (depth > this.settings.sitemapMaxDepth) {
      logger.warn(`Max sitemap depth reached at ${sitemapUrl}`);
      return true;
    }

    const response = await this.http.get<ArrayBuffer>(sitemapUrl, { responseType: 'arraybuffer' });
    const document = parseSitemap(decodeSitemapBody(Buffer.from(response.data), sitemapUrl));

    switch (document.kind) {
      case 'urlset':
        logger.debug(`${sitemapUrl}: ${document.locations.length} URLs`);
        return sink(document.locations);
      case 'index':
        logger.debug(`${sitemapUrl}: index with ${document.locations.length} child sitemaps`);
        for (const child of document.locations) {
          try {
            if (!(await this.walkSitemap(child, sink, logger, depth + 1))) return false;
          } catch (error) {
            logger.warn(`Skipping child sitemap ${child} of ${sitemapUrl}: ${errorMessage(error)}`);
          }
        }
        return true;
      case 'unknown':
        logger.warn(`${sitemapUrl} is not a sitemap document`);
        return true;
    }
  }

  /**
   * Product page URLs for a site, filtered by the site's product URL
   * pattern and robots.txt, deduplicated and capped at `limit`.
   */
  async discoverProductUrls(
    profile: SiteProfile,
    limit: number,
    logger: Logger = this.logger,
  ): Promise<DiscoveryResult> {
    const pattern = profile.sitemap?.productUrlPattern;
    if (!pattern) return { productUrls: [], crawlDelay: null };

    const robots = await this.fetchRobots(profile.baseUrl, logger);
    if (robots === BLOCK_ALL) return { productUrls: [], crawlDelay: null };

    const sitemapUrls = robots.sitemaps.length > 0 ? robots.sitemaps : [new URL('/sitemap.xml', profile.baseUrl).toString()];

    const seen = new Set<string>();
    const productUrls: string[] = [];
    let blocked = 0;

    const accept: UrlSink = (candidates) => {
      for (const url of candidates) {
        if (productUrls.length >= limit) break;
        if (seen.has(url) || !url.includes(pattern)) continue;
        seen.add(url);
        if (!isUrlAllowed(robots, url)) {
          blocked++;
          continue;
        }
        productUrls.push(url);
      }
      return productUrls.length < limit;
    };

    for (const sitemapUrl of sitemapUrls) {
      if (productUrls.length >= limit) break;
      try {
        await this.walkSitemap(sitemapUrl, accept, logger);
      } catch (error) {
        logger.warn(`Skipping sitemap ${sitemapUrl}: ${errorMessage(error)}`);
      }
    }

    logger.log(
      `Discovered ${productUrls.length} product URLs for ${profile.id} from ${sitemapUrls.length} sitemap(s)` +
        (blocked > 0 ? `, ${blocked} blocked by robots.txt` : ''),
    );
    return { productUrls, crawlDelay: robots.crawlDelay };
  }
}
