import { ScrapingSettings, SiteProfiles } from '../interfaces/product.interface';

const envNumber = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
};

const envList = (name: string, fallback: string[]): string[] => {
  const raw = process.env[name];
  if (!raw) return fallback;
  return raw
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter(Boolean);
};

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

const sites: SiteProfiles = {
  amazon: {
    id: 'amazon',
    baseUrl: 'https://www.amazon.in',
    searchUrlTemplate: 'https://www.amazon.in/s?k={query}',
    querySeparator: '+',
    selectors: {
      link: [
        { kind: 'css', value: "div[data-component-type='s-search-result'] h2 a" },
        { kind: 'css', value: "div[data-component-type='s-search-result'] a.a-link-normal.s-no-outline" },
        { kind: 'css', value: 'a.a-link-normal.s-underline-text' },
      ],
      name: [
        { kind: 'id', value: 'productTitle' },
        { kind: 'css', value: '#title span' },
        { kind: 'css', value: 'span.a-size-large.product-title-word-break' },
      ],
      price: [
        { kind: 'css', value: '.a-price-whole' },
        { kind: 'id', value: 'priceblock_ourprice' },
        { kind: 'id', value: 'priceblock_dealprice' },
        { kind: 'css', value: '.a-price .a-offscreen' },
      ],
      image: [
        { kind: 'id', value: 'landingImage' },
        { kind: 'css', value: '#imgTagWrapperId img' },
        { kind: 'css', value: 'img.s-image' },
      ],
    },
    imageAttribute: 'src',
    captchaSignatures: [
      'Enter the characters you see below',
      "Sorry, we just need to make sure you're not a robot",
      '/errors/validateCaptcha',
    ],
    sitemap: {
      productUrlPattern: '/dp/',
      productIdPattern: '/dp/([A-Z0-9]{10})',
      defaultCategory: 'General',
    },
  },
  flipkart: {
    id: 'flipkart',
    baseUrl: 'https://www.flipkart.com',
    searchUrlTemplate: 'https://www.flipkart.com/search?q={query}',
    querySeparator: '%20',
    selectors: {
      link: [
        { kind: 'css', value: 'a.CGtC98' },
        { kind: 'css', value: 'a._1fQZEK' },
        { kind: 'css', value: 'a.s1Q9rs' },
        { kind: 'css', value: 'div[data-id] a[href*="/p/"]' },
      ],
      name: [
        { kind: 'css', value: 'span.VU-ZEz' },
        { kind: 'css', value: 'span.B_NuCI' },
        { kind: 'css', value: 'h1 span' },
      ],
      price: [
        { kind: 'css', value: 'div.Nx9bqj.CxhGGd' },
        { kind: 'css', value: 'div._30jeq3._16Jk6d' },
        { kind: 'css', value: 'div._30jeq3' },
      ],
      image: [
        { kind: 'css', value: 'img.DByuf4' },
        { kind: 'css', value: 'img._396cs4' },
        { kind: 'css', value: 'div._3kidJX img' },
      ],
    },
    imageAttribute: 'src',
    captchaSignatures: ['Are you a human?', 'Please verify you are a human'],
    sitemap: {
      productUrlPattern: '/p/',
      productIdPattern: '[?&]pid=([A-Z0-9]+)',
      defaultCategory: 'General',
    },
  },
};

const scraping: ScrapingSettings = {
  selectorTimeout: envNumber('SELECTOR_TIMEOUT_MS', 5000),
  navigationTimeout: envNumber('NAVIGATION_TIMEOUT_MS', 30000),
  interItemDelay: envNumber('INTER_ITEM_DELAY_MS', 3000),
  requestTimeout: 10000, // robots.txt / sitemap fetches
  userAgent: USER_AGENT,
  sitemapMaxDepth: 3,
  defaultBatchLimit: 20,
};

export const scraperConfig = {
  sites,
  scraping,
  browser: {
    executablePath: process.env.CHROME_PATH || '/usr/bin/google-chrome',
    headless: process.env.BROWSER_HEADLESS !== 'false',
    args: ['--no-sandbox', '--disable-dev-shm-usage'],
  },
  storage: {
    region: process.env.AWS_REGION || 'ap-south-1',
    tableName: process.env.PRODUCTS_TABLE || 'ScrapedProducts',
  },
  schedule: {
    enabled: process.env.SCHEDULE_ENABLED === 'true',
    cron: process.env.SCHEDULE_CRON || '0 0 */6 * * *',
    sites: envList('SCHEDULE_SITES', ['amazon']),
  },
  debug: {
    screenshotDir: process.env.SCREENSHOT_DIR || 'screenshots',
  },
};
