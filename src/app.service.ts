import { Injectable } from '@nestjs/common';
import { ScraperService } from './scraper/scraper.service';

export interface HealthStatus {
  status: 'ok';
  service: string;
  sites: string[];
  timestamp: string;
}

@Injectable()
export class AppService {
  constructor(private readonly scraperService: ScraperService) {}

  getHealth(): HealthStatus {
    return {
      status: 'ok',
      service: 'listing-scraper',
      sites: this.scraperService.getSiteIds(),
      timestamp: new Date().toISOString(),
    };
  }
}
