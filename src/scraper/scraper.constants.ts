export const BROWSER_SESSION_FACTORY = Symbol('BROWSER_SESSION_FACTORY');
export const PRODUCT_STORE = Symbol('PRODUCT_STORE');
export const HTTP_CLIENT = Symbol('HTTP_CLIENT');
export const SITE_PROFILES = Symbol('SITE_PROFILES');
export const SCRAPING_SETTINGS = Symbol('SCRAPING_SETTINGS');
