import type { CheerioAPI } from 'cheerio';
import type { ScrapeResult } from '../errors.js';
import { SITES, type ExtractedProduct, type Site, type SiteExtractor } from '../types.js';
import { amazonExtractor } from './amazon.js';
import { flipkartExtractor } from './flipkart.js';
import { genericExtractor } from './generic.js';

const EXTRACTORS: Record<Site, SiteExtractor> = {
  amazon: amazonExtractor,
  flipkart: flipkartExtractor,
  generic: genericExtractor,
};

/**
 * Maps free-form site input to a known variant. Anything unrecognised,
 * including "other" and an empty value, falls back to the generic extractor.
 */
export function normalizeSite(raw: string | null | undefined): Site {
  const site = (raw ?? '').trim().toLowerCase();
  return SITES.find(known => known === site) ?? 'generic';
}

export function getExtractor(site: Site): SiteExtractor {
  return EXTRACTORS[site];
}

export function extractProduct($: CheerioAPI, site: Site): ScrapeResult<ExtractedProduct> {
  return getExtractor(site).extract($);
}
