import { Injectable, Logger } from '@nestjs/common';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import puppeteer, { Browser, ElementHandle, Page, TimeoutError } from 'puppeteer-core';
import { scraperConfig } from '../config/scraper.config';
import { InvalidLocatorError, errorMessage } from '../errors';
import { Locator } from '../interfaces/product.interface';
import { BrowserSession, BrowserSessionFactory, PageElement } from './browser-session';

/**
 * Translate a locator into a puppeteer selector string.
 * XPath goes through puppeteer's `::-p-xpath()` pseudo-element.
 */
export function toPuppeteerSelector(locator: Locator): string {
  const quoted = JSON.stringify(locator.value);
  switch (locator.kind) {
    case 'id':
      return `[id=${quoted}]`;
    case 'name':
      return `[name=${quoted}]`;
    case 'class':
      return locator.value
        .split(/\s+/)
        .filter(Boolean)
        .map((className) => `[class~=${JSON.stringify(className)}]`)
        .join('');
    case 'css':
    case 'tag':
      return locator.value;
    case 'xpath':
      return `::-p-xpath(${locator.value})`;
  }
}

const SELECTOR_SYNTAX_ERROR = /not a valid selector|invalid selector|unexpected token|SyntaxError/i;

class PuppeteerElement implements PageElement {
  constructor(private readonly handle: ElementHandle<Element>) {}

  async readText(): Promise<string> {
    const text = await this.handle.evaluate((element) => element.textContent ?? '');
    return text.trim();
  }

  async readAttribute(name: string): Promise<string | null> {
    return this.handle.evaluate((element, attribute) => element.getAttribute(attribute), name);
  }
}

export class PuppeteerSession implements BrowserSession {
  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly navigationTimeout: number,
    private readonly screenshotDir: string,
  ) {}

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.navigationTimeout });
  }

  async find(locator: Locator, timeoutMs: number): Promise<PageElement | null> {
    try {
      const handle = await this.page.waitForSelector(toPuppeteerSelector(locator), { timeout: timeoutMs });
      return handle ? new PuppeteerElement(handle) : null;
    } catch (error) {
      if (error instanceof TimeoutError) {
        return null;
      }
      const message = errorMessage(error);
      if (SELECTOR_SYNTAX_ERROR.test(message)) {
        throw new InvalidLocatorError(locator, message);
      }
      throw error;
    }
  }

  currentUrl(): string {
    return this.page.url();
  }

  pageSource(): Promise<string> {
    return this.page.content();
  }

  async screenshot(name: string): Promise<string> {
    await mkdir(this.screenshotDir, { recursive: true });
    const path: `${string}.png` = `${join(this.screenshotDir, name)}.png`;
    await this.page.screenshot({ path, fullPage: true });
    return path;
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

@Injectable()
export class PuppeteerSessionFactory implements BrowserSessionFactory {
  private readonly logger = new Logger(PuppeteerSessionFactory.name);

  async open(): Promise<BrowserSession> {
    const { browser: browserConfig, scraping, debug } = scraperConfig;
    this.logger.debug(`Launching ${browserConfig.executablePath} (headless: ${browserConfig.headless})`);

    const browser = await puppeteer.launch({
      executablePath: browserConfig.executablePath,
      headless: browserConfig.headless,
      args: browserConfig.args,
    });

    try {
      const page = await browser.newPage();
      await page.setUserAgent(scraping.userAgent);
      return new PuppeteerSession(browser, page, scraping.navigationTimeout, debug.screenshotDir);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }
}
