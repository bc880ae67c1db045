import { load } from 'cheerio';
import { ScrapeError } from '../errors.js';
import { extractProduct, normalizeSite } from '../extractors/index.js';
import type { ExtractedProduct, ProductInfo } from '../types.js';
import { DEFAULT_TIMEOUT_SECONDS, fetchProductPage, type PageFetcher } from './http.js';

export interface ProductResolver {
  resolve(url: string, site: string | null): Promise<ProductInfo>;
}

interface ProductScraperOptions {
  fetchPage?: PageFetcher;
  timeoutSeconds?: number;
}

/**
 * Parses a product page and runs the extractor for `site`. Throws
 * {@link ScrapeError} when the page has no readable name or price.
 */
export function parseProductDetails(html: string, site: string | null): ExtractedProduct {
  const result = extractProduct(load(html), normalizeSite(site));
  if (!result.ok) {
    throw new ScrapeError(result.failure);
  }
  return result.value;
}

export class ProductScraper implements ProductResolver {
  private fetchPage: PageFetcher;
  private timeoutSeconds: number;

  constructor(options: ProductScraperOptions = {}) {
    this.fetchPage = options.fetchPage ?? fetchProductPage;
    this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
  }

  async resolve(url: string, site: string | null): Promise<ProductInfo> {
    let html: string;
    try {
      html = await this.fetchPage(url, this.timeoutSeconds);
    } catch (error) {
      if (error instanceof ScrapeError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new ScrapeError({ kind: 'transport', message: `Failed to fetch ${url}: ${reason}`, cause: error });
    }

    const normalizedSite = normalizeSite(site);
    const details = parseProductDetails(html, normalizedSite);

    return {
      name: details.name,
      price: details.price,
      url,
      site: normalizedSite,
    };
  }
}
