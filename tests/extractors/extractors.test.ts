import { describe, it, expect } from 'vitest';
import { load } from 'cheerio';
import { extractProduct, getExtractor, normalizeSite } from '../../src/extractors/index.js';

describe('normalizeSite', () => {
  it('trims and lowercases known sites', () => {
    expect(normalizeSite('  Amazon ')).toBe('amazon');
    expect(normalizeSite('FLIPKART')).toBe('flipkart');
  });

  it('maps unknown, empty and missing values to generic', () => {
    expect(normalizeSite('other')).toBe('generic');
    expect(normalizeSite('ebay')).toBe('generic');
    expect(normalizeSite('')).toBe('generic');
    expect(normalizeSite(null)).toBe('generic');
    expect(normalizeSite(undefined)).toBe('generic');
  });
});

describe('getExtractor', () => {
  it('returns the extractor registered for each site', () => {
    expect(getExtractor('amazon').site).toBe('amazon');
    expect(getExtractor('flipkart').site).toBe('flipkart');
    expect(getExtractor('generic').site).toBe('generic');
  });
});

describe('amazon extractor', () => {
  it('reads the title and the primary price', () => {
    const $ = load(`
      <span id="productTitle">  Echo Dot (5th Gen)  </span>
      <span id="priceblock_dealprice">₹2,999.00</span>
      <span id="priceblock_ourprice">₹3,499.00</span>
    `);

    expect(extractProduct($, 'amazon')).toEqual({
      ok: true,
      value: { name: 'Echo Dot (5th Gen)', price: 3499 },
    });
  });

  it('falls back to the deal price', () => {
    const $ = load(`
      <span id="productTitle">Echo Dot</span>
      <span id="priceblock_dealprice">₹2,999.00</span>
    `);

    expect(extractProduct($, 'amazon')).toEqual({
      ok: true,
      value: { name: 'Echo Dot', price: 2999 },
    });
  });

  it('fails with an extraction error when the price is missing', () => {
    const $ = load('<span id="productTitle">Echo Dot</span>');

    expect(extractProduct($, 'amazon')).toEqual({
      ok: false,
      failure: {
        kind: 'extraction',
        message: 'could not locate name/price on amazon page',
        cause: undefined,
      },
    });
  });

  it('fails with a parse error when the price text has no number', () => {
    const $ = load(`
      <span id="productTitle">Echo Dot</span>
      <span id="priceblock_ourprice">Currently unavailable</span>
    `);

    const result = extractProduct($, 'amazon');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe('parse');
    }
  });
});

describe('flipkart extractor', () => {
  it('reads the title and price by class', () => {
    const $ = load(`
      <span class="B_NuCI">Test Phone 128 GB</span>
      <div class="_30jeq3 _16Jk6d">₹12,999</div>
    `);

    expect(extractProduct($, 'flipkart')).toEqual({
      ok: true,
      value: { name: 'Test Phone 128 GB', price: 12999 },
    });
  });

  it('fails when the title is missing', () => {
    const $ = load('<div class="_30jeq3 _16Jk6d">₹12,999</div>');

    const result = extractProduct($, 'flipkart');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe('extraction');
      expect(result.failure.message).toBe('could not locate name/price on flipkart page');
    }
  });
});

describe('generic extractor', () => {
  it('uses the page title and the first price-like text', () => {
    const $ = load(`
      <html>
        <head><title>Demo Product</title></head>
        <body>
          <div>Only Rs. 1,234.00 today!</div>
        </body>
      </html>
    `);

    expect(extractProduct($, 'generic')).toEqual({
      ok: true,
      value: { name: 'Demo Product', price: 1234 },
    });
  });

  it('falls back to a placeholder name without a title', () => {
    const $ = load('<p>Price: 450</p>');

    expect(extractProduct($, 'generic')).toEqual({
      ok: true,
      value: { name: 'Unknown product', price: 450 },
    });
  });

  it('takes text nodes in document order', () => {
    const $ = load(`
      <title>Lamp</title>
      <div>Rs. 250<span>Rs. 300</span> later 400</div>
    `);

    expect(extractProduct($, 'generic')).toEqual({
      ok: true,
      value: { name: 'Lamp', price: 250 },
    });
  });

  it('reads a price that ends a sentence', () => {
    const $ = load('<title>Lamp</title><p>Price: Rs. 1,499.50.</p>');

    expect(extractProduct($, 'generic')).toEqual({
      ok: true,
      value: { name: 'Lamp', price: 1499.5 },
    });
  });

  it('fails when no text contains a digit', () => {
    const $ = load('<title>Lamp</title><p>Out of stock</p>');

    const result = extractProduct($, 'generic');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe('extraction');
      expect(result.failure.message).toBe('could not locate name/price on generic page');
    }
  });
});
