import type { CheerioAPI } from 'cheerio';
import { fail, succeed, type ScrapeResult } from '../errors.js';
import { parsePriceText } from '../services/price-parser.js';
import type { ExtractedProduct, SiteExtractor } from '../types.js';

const TITLE_SELECTOR = '#productTitle';
const PRICE_SELECTORS = ['#priceblock_ourprice', '#priceblock_dealprice'];

export const amazonExtractor: SiteExtractor = {
  site: 'amazon',

  extract($: CheerioAPI): ScrapeResult<ExtractedProduct> {
    const title = $(TITLE_SELECTOR).first();
    const priceSelector = PRICE_SELECTORS.find(selector => $(selector).length > 0);

    if (title.length === 0 || !priceSelector) {
      return fail('extraction', 'could not locate name/price on amazon page');
    }

    const price = parsePriceText($(priceSelector).first().text());
    if (!price.ok) return price;

    return succeed({ name: title.text().trim(), price: price.value });
  },
};
