import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  NotFoundException,
  Post,
  ServiceUnavailableException,
} from '@nestjs/common';
import { AppService, HealthStatus } from './app.service';
import { ZodValidationPipe } from './common/zod-validation.pipe';
import {
  ScrapeRequest,
  SitemapJobRequest,
  scrapeRequestSchema,
  sitemapJobSchema,
} from './scraper/dto/scrape-request.dto';
import { ConfigurationError, PersistenceError, ScrapeFailedError, errorMessage } from './scraper/errors';
import { ProductItem } from './scraper/interfaces/product.interface';
import { titleCase } from './scraper/products/product-normalizer';
import { ScraperService } from './scraper/scraper.service';

export interface ApiResponse<T> {
  status: 'success' | 'accepted';
  message: string;
  data?: T;
}

/**
 * Map service errors onto HTTP responses shaped `{ status, message }`.
 */
export function toHttpException(error: unknown): HttpException {
  if (error instanceof HttpException) return error;

  if (error instanceof ConfigurationError) {
    return new BadRequestException({ status: 'error', message: error.message });
  }

  if (error instanceof ScrapeFailedError) {
    const site = titleCase(error.site);
    const { failure, query } = error;
    switch (failure.reason) {
      case 'CaptchaDetected':
        return new ServiceUnavailableException({
          status: 'error',
          message: `${site} served a CAPTCHA page for '${query}'. Try again later.`,
        });
      case 'NoSearchResults':
        return new NotFoundException({
          status: 'error',
          message: `Could not find product details for '${query}' on ${site}.`,
        });
      case 'FieldNotFound':
        return new NotFoundException({
          status: 'error',
          message: `Could not find the product ${failure.field} for '${query}' on ${site}.`,
        });
      case 'MalformedPrice':
        return new NotFoundException({
          status: 'error',
          message: `Could not read a price for '${query}' on ${site} (got "${failure.text}").`,
        });
    }
  }

  if (error instanceof PersistenceError) {
    return new InternalServerErrorException({
      status: 'error',
      message: `Failed to save item to database. ${error.message}`,
    });
  }

  return new InternalServerErrorException({
    status: 'error',
    message: `Scraping failed unexpectedly: ${errorMessage(error)}`,
  });
}

@Controller()
export class AppController {
  constructor(
    private readonly appService: AppService,
    private readonly scraperService: ScraperService,
  ) {}

  @Get()
  getHealth(): HealthStatus {
    return this.appService.getHealth();
  }

  @Post('scrape-and-save')
  @HttpCode(HttpStatus.OK)
  async scrapeAndSave(
    @Body(new ZodValidationPipe(scrapeRequestSchema)) request: ScrapeRequest,
  ): Promise<ApiResponse<ProductItem>> {
    try {
      const item = await this.scraperService.scrapeAndSave(request);
      return {
        status: 'success',
        message: `Successfully scraped and saved '${item.name}'`,
        data: item,
      };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post('scrape-sitemap')
  @HttpCode(HttpStatus.ACCEPTED)
  startSitemapJob(
    @Body(new ZodValidationPipe(sitemapJobSchema)) request: SitemapJobRequest,
  ): ApiResponse<{ jobId: string }> {
    try {
      // Runs in background; progress is only visible in logs and the store
      const { jobId } = this.scraperService.startSitemapJob(request);
      return {
        status: 'accepted',
        message: `Sitemap scrape for ${request.site} started`,
        data: { jobId },
      };
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
