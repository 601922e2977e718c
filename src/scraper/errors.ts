import { Locator, ScrapeFailure } from './interfaces/product.interface';

/**
 * Broken or missing configuration: unknown site, empty selector set,
 * site without a sitemap profile.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The browser rejected a locator as syntactically invalid.
 */
export class InvalidLocatorError extends Error {
  constructor(
    readonly locator: Locator,
    detail: string,
  ) {
    super(`Invalid ${locator.kind} locator "${locator.value}": ${detail}`);
    this.name = 'InvalidLocatorError';
  }
}

export class ScrapeFailedError extends Error {
  constructor(
    readonly failure: ScrapeFailure,
    readonly site: string,
    readonly query: string,
  ) {
    super(`Scrape of '${query}' on ${site} failed: ${describeFailure(failure)}`);
    this.name = 'ScrapeFailedError';
  }
}

/**
 * The scrape succeeded but the record could not be written.
 */
export class PersistenceError extends Error {
  constructor(
    message: string,
    readonly cause: unknown,
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}

export function describeFailure(failure: ScrapeFailure): string {
  switch (failure.reason) {
    case 'NoSearchResults':
      return 'no search results';
    case 'CaptchaDetected':
      return `CAPTCHA page served at ${failure.url}`;
    case 'FieldNotFound':
      return `field "${failure.field}" not found`;
    case 'MalformedPrice':
      return `price text "${failure.text}" is not a number`;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
