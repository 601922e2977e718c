const CURRENCY_GLYPHS = /[₹$€£¥]|Rs\.?|INR/gi;
const SEPARATORS = /[\s,]/g;
const NUMERIC = /^\d+(?:\.\d+)?$/;

/**
 * Parse listing price text such as "₹1,23,456" or "1,299.".
 * Commas are always thousands separators (both Indian and Western
 * grouping); returns null when anything but a plain number remains.
 */
export function parsePrice(priceText: string): number | null {
  const cleaned = priceText
    .replace(CURRENCY_GLYPHS, '')
    .replace(SEPARATORS, '')
    .replace(/\.$/, '');

  if (!NUMERIC.test(cleaned)) return null;
  return parseFloat(cleaned);
}
