import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { PuppeteerSessionFactory } from './browser/puppeteer-session';
import { scraperConfig } from './config/scraper.config';
import { SitemapDiscoveryService, createHttpClient } from './discovery/sitemap-discovery.service';
import { ProductPageNavigator } from './navigation/product-page.navigator';
import { SelectorResolver } from './resolver/selector-resolver';
import {
  BROWSER_SESSION_FACTORY,
  HTTP_CLIENT,
  PRODUCT_STORE,
  SCRAPING_SETTINGS,
  SITE_PROFILES,
} from './scraper.constants';
import { ScraperService } from './scraper.service';
import { DynamoProductStore, createDocumentClient } from './store/product-store';

@Module({
  imports: [ScheduleModule.forRoot()],
  providers: [
    { provide: SITE_PROFILES, useValue: scraperConfig.sites },
    { provide: SCRAPING_SETTINGS, useValue: scraperConfig.scraping },
    { provide: BROWSER_SESSION_FACTORY, useClass: PuppeteerSessionFactory },
    {
      provide: PRODUCT_STORE,
      useFactory: () =>
        new DynamoProductStore(
          scraperConfig.storage.tableName,
          createDocumentClient(scraperConfig.storage.region),
        ),
    },
    { provide: HTTP_CLIENT, useFactory: () => createHttpClient(scraperConfig.scraping) },
    SelectorResolver,
    ProductPageNavigator,
    SitemapDiscoveryService,
    ScraperService,
  ],
  exports: [ScraperService],
})
export class ScraperModule {}
