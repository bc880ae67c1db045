import { fail, succeed, type ScrapeResult } from '../errors.js';

const NUMERIC_TOKEN = /\d[\d,.]*/g;

/**
 * Reads a price out of a text fragment such as "Rs. 1,234.00" or "MRP: 999".
 *
 * The longest numeric-looking token wins (first one on a tie), so a stray
 * digit next to the real price is ignored. Thousands separators and a
 * trailing sentence period are dropped, and repeated periods collapse into a
 * single decimal point.
 */
export function parsePriceText(text: string): ScrapeResult<number> {
  const candidates = text.match(NUMERIC_TOKEN);
  if (!candidates) {
    return fail('parse', `Could not parse price from text: ${JSON.stringify(text)}`);
  }

  let token = candidates[0] ?? '';
  for (const candidate of candidates) {
    if (candidate.length > token.length) {
      token = candidate;
    }
  }

  const cleaned = collapsePeriods(token.replace(/,/g, '').replace(/\.+$/, ''));
  const price = Number(cleaned);

  if (cleaned === '' || !Number.isFinite(price)) {
    return fail('parse', `Could not parse price from text: ${JSON.stringify(text)}`);
  }

  return succeed(price);
}

// "1.234.56" -> "1234.56": only the last period survives as the decimal point.
function collapsePeriods(token: string): string {
  const last = token.lastIndexOf('.');
  if (last === -1 || token.indexOf('.') === last) {
    return token;
  }
  return token.slice(0, last).replace(/\./g, '') + token.slice(last);
}
