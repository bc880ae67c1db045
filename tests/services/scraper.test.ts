import { describe, it, expect, vi } from 'vitest';
import { ScrapeError } from '../../src/errors.js';
import { parseProductDetails, ProductScraper } from '../../src/services/scraper.js';
import type { PageFetcher } from '../../src/services/http.js';

const AMAZON_PAGE = `
  <html>
    <body>
      <span id="productTitle">Test Kettle</span>
      <span id="priceblock_ourprice">₹1,499.00</span>
    </body>
  </html>
`;

const GENERIC_PAGE = `
  <html>
    <head><title>Demo Product</title></head>
    <body><div>Only Rs. 1,234.00 today!</div></body>
  </html>
`;

describe('parseProductDetails', () => {
  it('parses a generic page', () => {
    expect(parseProductDetails(GENERIC_PAGE, 'other')).toEqual({ name: 'Demo Product', price: 1234 });
  });

  it('throws a ScrapeError carrying the failure kind', () => {
    expect(() => parseProductDetails('<p>nothing</p>', 'amazon')).toThrow(ScrapeError);

    try {
      parseProductDetails('<p>nothing</p>', 'amazon');
    } catch (error) {
      expect(error).toBeInstanceOf(ScrapeError);
      if (error instanceof ScrapeError) {
        expect(error.kind).toBe('extraction');
        expect(error.message).toBe('could not locate name/price on amazon page');
      }
    }
  });
});

describe('ProductScraper', () => {
  it('fetches the page and runs the extractor for the normalized site', async () => {
    const fetchPage = vi.fn<PageFetcher>().mockResolvedValue(AMAZON_PAGE);
    const scraper = new ProductScraper({ fetchPage });

    const info = await scraper.resolve('https://shop.test/kettle', '  AMAZON ');

    expect(info).toEqual({
      name: 'Test Kettle',
      price: 1499,
      url: 'https://shop.test/kettle',
      site: 'amazon',
    });
    expect(fetchPage).toHaveBeenCalledWith('https://shop.test/kettle', 10);
  });

  it('passes the configured timeout to the fetcher', async () => {
    const fetchPage = vi.fn<PageFetcher>().mockResolvedValue(GENERIC_PAGE);
    const scraper = new ProductScraper({ fetchPage, timeoutSeconds: 3 });

    const info = await scraper.resolve('https://shop.test/demo', null);

    expect(info.site).toBe('generic');
    expect(fetchPage).toHaveBeenCalledWith('https://shop.test/demo', 3);
  });

  it('rethrows transport ScrapeErrors unchanged', async () => {
    const transportError = new ScrapeError({ kind: 'transport', message: 'Failed to fetch: 503' });
    const scraper = new ProductScraper({ fetchPage: vi.fn<PageFetcher>().mockRejectedValue(transportError) });

    await expect(scraper.resolve('https://shop.test/x', 'generic')).rejects.toBe(transportError);
  });

  it('wraps other fetch errors as transport ScrapeErrors', async () => {
    const cause = new Error('socket hang up');
    const scraper = new ProductScraper({ fetchPage: vi.fn<PageFetcher>().mockRejectedValue(cause) });

    const error = await scraper.resolve('https://shop.test/x', 'generic').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ScrapeError);
    if (error instanceof ScrapeError) {
      expect(error.kind).toBe('transport');
      expect(error.message).toBe('Failed to fetch https://shop.test/x: socket hang up');
      expect(error.cause).toBe(cause);
    }
  });

  it('surfaces extraction failures as ScrapeErrors', async () => {
    const scraper = new ProductScraper({
      fetchPage: vi.fn<PageFetcher>().mockResolvedValue('<title>Empty</title><p>Sold out</p>'),
    });

    const error = await scraper.resolve('https://shop.test/x', 'generic').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ScrapeError);
    if (error instanceof ScrapeError) {
      expect(error.kind).toBe('extraction');
    }
  });
});
