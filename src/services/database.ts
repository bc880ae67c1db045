import BetterSqlite3 from 'better-sqlite3';
import { normalizeSite } from '../extractors/index.js';
import type { BotSettings, PriceSnapshot, Product, Site } from '../types.js';

export const DEFAULT_CURRENCY = 'INR';

/** The slice of the store the check cycle depends on. */
export interface PriceStore {
  listActiveProducts(): Product[];
  getHistory(productId: number, limit?: number): PriceSnapshot[];
  appendSnapshot(productId: number, price: number, currency?: string, observedAt?: string): PriceSnapshot;
}

export interface NewProduct {
  url: string;
  target_price: number;
  site?: Site;
  active?: boolean;
}

export class Database implements PriceStore {
  private db: BetterSqlite3.Database;

  constructor(dbPath: string) {
    this.db = new BetterSqlite3(dbPath);
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS products (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        url TEXT NOT NULL,
        target_price REAL NOT NULL,
        site TEXT NOT NULL DEFAULT 'generic',
        active INTEGER NOT NULL DEFAULT 1,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS price_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        product_id INTEGER NOT NULL REFERENCES products (id),
        observed_at TEXT NOT NULL,
        price REAL NOT NULL,
        currency TEXT NOT NULL DEFAULT 'INR'
      );

      CREATE INDEX IF NOT EXISTS idx_history_product_time ON price_history(product_id, observed_at);

      CREATE TABLE IF NOT EXISTS bot_config (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  }

  getConfig(key: string): string | null {
    const stmt = this.db.prepare<[string], { value: string }>('SELECT value FROM bot_config WHERE key = ?');
    const row = stmt.get(key);
    return row?.value ?? null;
  }

  setConfig(key: string, value: string): void {
    const stmt = this.db.prepare(`
      INSERT INTO bot_config (key, value, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET
        value = excluded.value,
        updated_at = excluded.updated_at
    `);
    stmt.run(key, value, new Date().toISOString());
  }

  deleteConfig(key: string): void {
    const stmt = this.db.prepare('DELETE FROM bot_config WHERE key = ?');
    stmt.run(key);
  }

  getAllConfig(): Record<string, string> {
    const stmt = this.db.prepare<[], { key: string; value: string }>('SELECT key, value FROM bot_config');
    const rows = stmt.all();
    return Object.fromEntries(rows.map(r => [r.key, r.value]));
  }

  getBotSettings(): BotSettings {
    const config = this.getAllConfig();
    const interval = config['check_interval_minutes'] ? parseInt(config['check_interval_minutes'], 10) : NaN;
    return {
      alertRecipient: config['alert_recipient'] ?? null,
      checkIntervalMinutes: Number.isNaN(interval) ? null : interval,
    };
  }

  setBotSetting(key: string, value: string | null): void {
    if (value === null) {
      this.deleteConfig(key);
    } else {
      this.setConfig(key, value);
    }
  }

  addProduct(product: NewProduct): Product {
    if (!(product.target_price > 0)) {
      throw new RangeError(`Target price must be a positive number, got ${product.target_price}`);
    }

    const stmt = this.db.prepare(`
      INSERT INTO products (url, target_price, site, active, created_at)
      VALUES (?, ?, ?, ?, ?)
    `);
    const createdAt = new Date().toISOString();
    const site = product.site ?? 'generic';
    const active = product.active ?? true;
    const result = stmt.run(product.url, product.target_price, site, active ? 1 : 0, createdAt);

    return {
      id: Number(result.lastInsertRowid),
      url: product.url,
      target_price: product.target_price,
      site,
      active,
      created_at: createdAt,
    };
  }

  getProduct(productId: number): Product | null {
    const stmt = this.db.prepare<[number], ProductRow>(`
      SELECT id, url, target_price, site, active, created_at
      FROM products WHERE id = ?
    `);
    const row = stmt.get(productId);
    return row ? toProduct(row) : null;
  }

  listProducts(activeOnly = false): Product[] {
    const where = activeOnly ? 'WHERE active = 1' : '';
    const stmt = this.db.prepare<[], ProductRow>(`
      SELECT id, url, target_price, site, active, created_at
      FROM products ${where}
      ORDER BY id
    `);
    return stmt.all().map(toProduct);
  }

  listActiveProducts(): Product[] {
    return this.listProducts(true);
  }

  setProductActive(productId: number, active: boolean): boolean {
    const stmt = this.db.prepare('UPDATE products SET active = ? WHERE id = ?');
    const result = stmt.run(active ? 1 : 0, productId);
    return result.changes > 0;
  }

  updateTargetPrice(productId: number, targetPrice: number): boolean {
    if (!(targetPrice > 0)) {
      throw new RangeError(`Target price must be a positive number, got ${targetPrice}`);
    }
    const stmt = this.db.prepare('UPDATE products SET target_price = ? WHERE id = ?');
    const result = stmt.run(targetPrice, productId);
    return result.changes > 0;
  }

  appendSnapshot(
    productId: number,
    price: number,
    currency: string = DEFAULT_CURRENCY,
    observedAt: string = new Date().toISOString()
  ): PriceSnapshot {
    const stmt = this.db.prepare(`
      INSERT INTO price_history (product_id, observed_at, price, currency)
      VALUES (?, ?, ?, ?)
    `);
    const result = stmt.run(productId, observedAt, price, currency);

    return {
      id: Number(result.lastInsertRowid),
      product_id: productId,
      observed_at: observedAt,
      price,
      currency,
    };
  }

  /** Snapshots for a product, newest first. */
  getHistory(productId: number, limit?: number): PriceSnapshot[] {
    const base = `
      SELECT id, product_id, observed_at, price, currency
      FROM price_history WHERE product_id = ?
      ORDER BY observed_at DESC, id DESC
    `;

    if (limit === undefined) {
      return this.db.prepare<[number], PriceSnapshot>(base).all(productId);
    }
    return this.db.prepare<[number, number], PriceSnapshot>(`${base} LIMIT ?`).all(productId, limit);
  }

  getLatestSnapshot(productId: number): PriceSnapshot | null {
    return this.getHistory(productId, 1)[0] ?? null;
  }

  countSnapshots(productId: number): number {
    const stmt = this.db.prepare<[number], { count: number }>(
      'SELECT COUNT(*) AS count FROM price_history WHERE product_id = ?'
    );
    return stmt.get(productId)?.count ?? 0;
  }

  close(): void {
    this.db.close();
  }
}

interface ProductRow {
  id: number;
  url: string;
  target_price: number;
  site: string;
  active: number;
  created_at: string;
}

function toProduct(row: ProductRow): Product {
  return {
    id: row.id,
    url: row.url,
    target_price: row.target_price,
    site: normalizeSite(row.site),
    active: Boolean(row.active),
    created_at: row.created_at,
  };
}
