import { DataQualityError, ScrapeError } from '../errors.js';
import { DEFAULT_CURRENCY, type Database, type PriceStore } from '../services/database.js';
import { NotificationGate } from '../services/notification-gate.js';
import { EmailNotifier, type PriceAlertNotifier } from '../services/notifier.js';
import { analyzePrice, coercePrice } from '../services/price-analyzer.js';
import { ProductScraper, type ProductResolver } from '../services/scraper.js';
import type { CheckSummary, Config, Product, ProductInfo } from '../types.js';
import { IntervalScheduler } from './scheduler.js';

interface MonitorDependencies {
  store: PriceStore;
  scraper: ProductResolver;
  notifier: PriceAlertNotifier;
  gate: NotificationGate;
  resolveRecipient: () => string | null;
  intervalMinutes: number;
  currency?: string;
  now?: () => Date;
}

type ProductOutcome = 'scrape_failed' | 'invalid_price' | 'not_notified' | 'notified' | 'notify_failed';

export class MonitorOrchestrator {
  private store: PriceStore;
  private scraper: ProductResolver;
  private notifier: PriceAlertNotifier;
  private gate: NotificationGate;
  private resolveRecipient: () => string | null;
  private currency: string;
  private now: () => Date;
  private scheduler: IntervalScheduler;
  private lastSummary: CheckSummary | null = null;

  readonly intervalMinutes: number;

  constructor(deps: MonitorDependencies) {
    this.store = deps.store;
    this.scraper = deps.scraper;
    this.notifier = deps.notifier;
    this.gate = deps.gate;
    this.resolveRecipient = deps.resolveRecipient;
    this.currency = deps.currency ?? DEFAULT_CURRENCY;
    this.now = deps.now ?? (() => new Date());
    this.intervalMinutes = deps.intervalMinutes;
    this.scheduler = new IntervalScheduler(deps.intervalMinutes * 60 * 1000, () => this.runOnce());
  }

  start(): void {
    console.log(`[Monitor] Starting price checks every ${this.intervalMinutes} minute(s)`);
    this.scheduler.start();
  }

  async stop(): Promise<void> {
    await this.scheduler.stop();
    console.log('[Monitor] Stopped price checks');
  }

  isChecking(): boolean {
    return this.scheduler.isRunning();
  }

  getLastSummary(): CheckSummary | null {
    return this.lastSummary;
  }

  /**
   * One pass over every active product. A failure on one product is logged
   * and counted; it never stops the rest of the pass.
   */
  async runOnce(): Promise<CheckSummary> {
    const startedAt = this.now().toISOString();
    console.log(`[Monitor] Running price check at ${startedAt}`);

    const summary: CheckSummary = {
      startedAt,
      finishedAt: startedAt,
      processed: 0,
      scraped: 0,
      failed: 0,
      notificationsSent: 0,
    };

    let products: Product[];
    try {
      products = this.store.listActiveProducts();
    } catch (error) {
      console.error('[Monitor] Failed to load products:', error);
      return this.finish(summary);
    }

    if (products.length === 0) {
      console.log('[Monitor] No active products to process');
      return this.finish(summary);
    }

    const recipient = this.resolveRecipient();

    for (const product of products) {
      summary.processed++;

      let outcome: ProductOutcome;
      try {
        outcome = await this.checkProduct(product, recipient);
      } catch (error) {
        console.error(`[Monitor] Unexpected error while checking product ${product.id}:`, error);
        summary.failed++;
        continue;
      }

      if (outcome === 'scrape_failed' || outcome === 'invalid_price') {
        summary.failed++;
        continue;
      }

      summary.scraped++;
      if (outcome === 'notified') {
        summary.notificationsSent++;
      }
    }

    return this.finish(summary);
  }

  private async checkProduct(product: Product, recipient: string | null): Promise<ProductOutcome> {
    console.log(`[Monitor] Checking product ${product.id} (${product.url})`);

    let info: ProductInfo;
    try {
      info = await this.scraper.resolve(product.url, product.site);
    } catch (error) {
      if (error instanceof ScrapeError) {
        console.error(`[Monitor] Scrape failed for ${product.url} (${error.kind}): ${error.message}`);
      } else {
        console.error(`[Monitor] Unexpected error while scraping ${product.url}:`, error);
      }
      return 'scrape_failed';
    }

    let currentPrice: number;
    try {
      currentPrice = coercePrice(info.price);
    } catch (error) {
      if (error instanceof DataQualityError) {
        console.error(`[Monitor] Invalid price data for ${product.url}: ${error.message}`);
        return 'invalid_price';
      }
      throw error;
    }

    this.store.appendSnapshot(product.id, currentPrice, this.currency, this.now().toISOString());

    const analysis = analyzePrice(currentPrice, product.target_price);
    console.log(
      `[Monitor] Current price = ${currentPrice}, target = ${product.target_price}, diff = ${analysis.difference}`
    );

    if (!analysis.belowOrEqual) return 'not_notified';

    if (!recipient) {
      console.log('[Monitor] No alert recipient configured; cannot send email');
      return 'not_notified';
    }

    if (!this.gate.shouldSend(recipient, product.url)) {
      console.log(`[Monitor] Skipping alert for ${product.url} - cooldown active`);
      return 'not_notified';
    }

    let sent = false;
    try {
      sent = await this.notifier.sendPriceDropAlert({
        recipient,
        productName: info.name,
        productUrl: product.url,
        currentPrice,
        targetPrice: product.target_price,
      });
    } catch (error) {
      console.error(`[Monitor] Notifier threw for ${product.url}:`, error);
    }

    if (!sent) {
      console.log('[Monitor] Email notification skipped or failed');
      return 'notify_failed';
    }

    this.gate.recordSent(recipient, product.url, this.now().getTime());
    console.log('[Monitor] Notification sent via email');
    return 'notified';
  }

  private finish(summary: CheckSummary): CheckSummary {
    const finished: CheckSummary = { ...summary, finishedAt: this.now().toISOString() };
    this.lastSummary = finished;
    console.log(
      `[Monitor] Run summary: processed=${finished.processed}, scraped=${finished.scraped}, ` +
        `failed=${finished.failed}, notifications_sent=${finished.notificationsSent}`
    );
    return finished;
  }
}

/** Wires the orchestrator to the SQLite store, the HTTP scraper and the email notifier. */
export function createMonitor(config: Config, db: Database): MonitorOrchestrator {
  const settings = db.getBotSettings();

  return new MonitorOrchestrator({
    store: db,
    scraper: new ProductScraper({ timeoutSeconds: config.monitoring.requestTimeoutSeconds }),
    notifier: new EmailNotifier({ apiKey: config.alerts.resendApiKey, from: config.alerts.from }),
    gate: new NotificationGate({ cooldownMs: config.monitoring.alertCooldownMinutes * 60 * 1000 }),
    resolveRecipient: () => db.getBotSettings().alertRecipient ?? config.alerts.recipientEmail ?? null,
    intervalMinutes: settings.checkIntervalMinutes ?? config.monitoring.checkIntervalMinutes,
    currency: config.monitoring.currency,
  });
}
