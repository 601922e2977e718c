import { Injectable, Logger } from '@nestjs/common';
import { BrowserSession, PageElement } from '../browser/browser-session';
import { ConfigurationError, InvalidLocatorError } from '../errors';
import { Locator, SelectorSet } from '../interfaces/product.interface';

export type ResolveResult =
  | { found: true; element: PageElement; locator: Locator; index: number }
  | { found: false; misses: Locator[] };

export const describeLocator = (locator: Locator): string => `${locator.kind}=${locator.value}`;

@Injectable()
export class SelectorResolver {
  private readonly logger = new Logger(SelectorResolver.name);

  /**
   * Try each locator in order and return the first element found.
   * `timeoutMs` applies to every candidate separately, so an all-miss
   * set costs up to `timeoutMs * selectorSet.length`.
   */
  async resolve(
    session: BrowserSession,
    selectorSet: SelectorSet,
    timeoutMs: number,
    logger: Logger = this.logger,
  ): Promise<ResolveResult> {
    if (selectorSet.length === 0) {
      throw new ConfigurationError('Selector set is empty');
    }

    const misses: Locator[] = [];
    for (const [index, locator] of selectorSet.entries()) {
      let element: PageElement | null;
      try {
        element = await session.find(locator, timeoutMs);
      } catch (error) {
        if (!(error instanceof InvalidLocatorError)) throw error;
        logger.warn(error.message);
        element = null;
      }

      if (element) {
        if (index > 0) {
          logger.log(`Matched fallback #${index + 1} ${describeLocator(locator)}`);
        }
        return { found: true, element, locator, index };
      }

      logger.debug(`No match for ${describeLocator(locator)} within ${timeoutMs}ms`);
      misses.push(locator);
    }

    return { found: false, misses };
  }
}
