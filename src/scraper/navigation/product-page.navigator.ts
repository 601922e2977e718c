import { Inject, Injectable, Logger } from '@nestjs/common';
import { BrowserSession, PageElement } from '../browser/browser-session';
import {
  ScrapeField,
  ScrapeOutcome,
  ScrapingSettings,
  SiteProfile,
} from '../interfaces/product.interface';
import { parsePrice } from '../parsers/price.parser';
import { SelectorResolver, describeLocator } from '../resolver/selector-resolver';
import { SCRAPING_SETTINGS } from '../scraper.constants';
import { buildSearchUrl, detectCaptcha, resolveProductUrl } from './page-checks';

@Injectable()
export class ProductPageNavigator {
  private readonly logger = new Logger(ProductPageNavigator.name);

  constructor(
    private readonly resolver: SelectorResolver,
    @Inject(SCRAPING_SETTINGS) private readonly settings: ScrapingSettings,
  ) {}

  /**
   * Search the site for `query`, follow the first result and scrape it.
   */
  async scrapeSearch(
    session: BrowserSession,
    profile: SiteProfile,
    query: string,
    logger: Logger = this.logger,
  ): Promise<ScrapeOutcome> {
    const searchUrl = buildSearchUrl(profile, query);
    logger.log(`Searching ${profile.id} for '${query}': ${searchUrl}`);
    await session.navigate(searchUrl);

    const blocked = await this.checkCaptcha(session, profile, `'${query}'`, logger);
    if (blocked) return blocked;

    const link = await this.findField(session, profile, 'link', logger);
    const href = link ? await link.readAttribute('href') : null;
    if (!href) {
      logger.warn(`No search results for '${query}' on ${profile.id}`);
      return { success: false, failure: { reason: 'NoSearchResults' } };
    }

    return this.scrapeProductPage(session, profile, resolveProductUrl(profile.baseUrl, href), logger);
  }

  /**
   * Load a product page and read name, price and image, stopping at the
   * first field that cannot be found.
   */
  async scrapeProductPage(
    session: BrowserSession,
    profile: SiteProfile,
    productUrl: string,
    logger: Logger = this.logger,
  ): Promise<ScrapeOutcome> {
    logger.log(`Loading product page ${productUrl}`);
    await session.navigate(productUrl);

    const blocked = await this.checkCaptcha(session, profile, productUrl, logger);
    if (blocked) return blocked;

    const nameElement = await this.findField(session, profile, 'name', logger);
    const name = nameElement ? await nameElement.readText() : '';
    if (!name) return this.fieldNotFound('name', productUrl, logger);

    const priceElement = await this.findField(session, profile, 'price', logger);
    const priceText = priceElement ? await priceElement.readText() : '';
    if (!priceText) return this.fieldNotFound('price', productUrl, logger);

    const imageElement = await this.findField(session, profile, 'image', logger);
    const imageUrl = imageElement ? await imageElement.readAttribute(profile.imageAttribute) : null;
    if (!imageUrl) return this.fieldNotFound('image', productUrl, logger);

    const price = parsePrice(priceText);
    if (price === null) {
      logger.warn(`Unparseable price "${priceText}" on ${productUrl}`);
      return { success: false, failure: { reason: 'MalformedPrice', text: priceText } };
    }

    logger.debug(`Scraped "${name}" at ${price} from ${productUrl}`);
    return { success: true, record: { name, price, imageUrl }, url: productUrl };
  }

  private async checkCaptcha(
    session: BrowserSession,
    profile: SiteProfile,
    target: string,
    logger: Logger,
  ): Promise<ScrapeOutcome | null> {
    const signature = detectCaptcha(await session.pageSource(), session.currentUrl(), profile.captchaSignatures);
    if (!signature) return null;

    logger.warn(`CAPTCHA page on ${profile.id} (matched "${signature}"), giving up on ${target}`);
    return { success: false, failure: { reason: 'CaptchaDetected', url: session.currentUrl() } };
  }

  private async findField(
    session: BrowserSession,
    profile: SiteProfile,
    field: ScrapeField,
    logger: Logger,
  ): Promise<PageElement | null> {
    const result = await this.resolver.resolve(
      session,
      profile.selectors[field],
      this.settings.selectorTimeout,
      logger,
    );
    if (result.found) return result.element;

    logger.warn(
      `Field "${field}" not found on ${profile.id}; tried ${result.misses.map(describeLocator).join(', ')}`,
    );
    return null;
  }

  private fieldNotFound(field: ScrapeField, url: string, logger: Logger): ScrapeOutcome {
    logger.warn(`Aborting ${url}: required field "${field}" missing`);
    return { success: false, failure: { reason: 'FieldNotFound', field } };
  }
}
