import type { CheerioAPI } from 'cheerio';
import { fail, succeed, type ScrapeResult } from '../errors.js';
import { parsePriceText } from '../services/price-parser.js';
import type { ExtractedProduct, SiteExtractor } from '../types.js';

// Class names from Flipkart's product layout; they change when the site ships a redesign.
const TITLE_SELECTOR = 'span.B_NuCI';
const PRICE_SELECTOR = 'div._30jeq3._16Jk6d';

export const flipkartExtractor: SiteExtractor = {
  site: 'flipkart',

  extract($: CheerioAPI): ScrapeResult<ExtractedProduct> {
    const title = $(TITLE_SELECTOR).first();
    const priceEl = $(PRICE_SELECTOR).first();

    if (title.length === 0 || priceEl.length === 0) {
      return fail('extraction', 'could not locate name/price on flipkart page');
    }

    const price = parsePriceText(priceEl.text());
    if (!price.ok) return price;

    return succeed({ name: title.text().trim(), price: price.value });
  },
};
