import { Locator } from '../interfaces/product.interface';

export interface PageElement {
  readText(): Promise<string>;
  readAttribute(name: string): Promise<string | null>;
}

/**
 * One browser tab owned by a single scrape job.
 */
export interface BrowserSession {
  navigate(url: string): Promise<void>;
  /**
   * Waits up to `timeoutMs` for the locator to match.
   * Resolves null on timeout; throws InvalidLocatorError when the
   * locator cannot be parsed.
   */
  find(locator: Locator, timeoutMs: number): Promise<PageElement | null>;
  currentUrl(): string;
  pageSource(): Promise<string>;
  /** Returns the path the screenshot was written to. */
  screenshot(name: string): Promise<string>;
  close(): Promise<void>;
}

export interface BrowserSessionFactory {
  open(): Promise<BrowserSession>;
}
