import type { CheerioAPI } from 'cheerio';
import type { ScrapeResult } from './errors.js';

export const SITES = ['amazon', 'flipkart', 'generic'] as const;

export type Site = (typeof SITES)[number];

export interface Product {
  id: number;
  url: string;
  target_price: number;
  site: Site;
  active: boolean;
  created_at: string;
}

export interface PriceSnapshot {
  id: number;
  product_id: number;
  observed_at: string;
  price: number;
  currency: string;
}

export interface ProductInfo {
  name: string;
  price: number;
  url: string;
  site: Site;
}

export interface ExtractedProduct {
  name: string;
  price: number;
}

export interface SiteExtractor {
  site: Site;
  extract($: CheerioAPI): ScrapeResult<ExtractedProduct>;
}

export interface PriceStats {
  min: number;
  max: number;
  avg: number;
  count: number;
}

export type TrendDirection = 'up' | 'down' | 'stable';

export interface PriceAnalysis {
  belowOrEqual: boolean;
  currentPrice: number;
  targetPrice: number;
  difference: number;
}

export interface PriceDropAlert {
  recipient: string;
  productName: string;
  productUrl: string;
  currentPrice: number;
  targetPrice: number;
}

export interface CheckSummary {
  startedAt: string;
  finishedAt: string;
  processed: number;
  scraped: number;
  failed: number;
  notificationsSent: number;
}

export interface BotSettings {
  alertRecipient: string | null;
  checkIntervalMinutes: number | null;
}

export interface Config {
  discord: {
    token: string;
    clientId: string;
    guildId?: string;
  };
  monitoring: {
    checkIntervalMinutes: number;
    alertCooldownMinutes: number;
    requestTimeoutSeconds: number;
    currency: string;
  };
  alerts: {
    recipientEmail?: string;
    resendApiKey?: string;
    from: string;
  };
  databasePath: string;
}
