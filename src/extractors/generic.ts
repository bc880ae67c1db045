import type { CheerioAPI } from 'cheerio';
import { hasChildren, isText, type AnyNode } from 'domhandler';
import { fail, succeed, type ScrapeResult } from '../errors.js';
import { parsePriceText } from '../services/price-parser.js';
import type { ExtractedProduct, SiteExtractor } from '../types.js';

export const UNKNOWN_PRODUCT_NAME = 'Unknown product';

const HAS_DIGIT = /[0-9]/;

/**
 * Best-effort extraction for sites without a dedicated extractor: the page
 * title becomes the name and the first text node that reads as a price,
 * in document order, becomes the price.
 */
export const genericExtractor: SiteExtractor = {
  site: 'generic',

  extract($: CheerioAPI): ScrapeResult<ExtractedProduct> {
    const title = $('title').first();
    const name = title.length > 0 ? title.text().trim() : UNKNOWN_PRODUCT_NAME;

    for (const raw of collectText($.root().toArray(), [])) {
      const text = raw.trim();
      if (!text || !HAS_DIGIT.test(text)) continue;

      const price = parsePriceText(text);
      if (price.ok) {
        return succeed({ name, price: price.value });
      }
    }

    return fail('extraction', 'could not locate name/price on generic page');
  },
};

function collectText(nodes: AnyNode[], out: string[]): string[] {
  for (const node of nodes) {
    if (isText(node)) {
      out.push(node.data);
    } else if (hasChildren(node)) {
      collectText(node.children, out);
    }
  }
  return out;
}
