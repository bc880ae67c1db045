import { EmbedBuilder } from 'discord.js';
import type { CheckSummary, PriceSnapshot, PriceStats, Product, ProductInfo, TrendDirection } from '../types.js';

const COLORS = {
  info: 0x0099ff,
  below_target: 0x00ff00,
  above_target: 0xffa500,
} as const;

const TREND_LABELS: Record<TrendDirection, string> = {
  up: '📈 Up',
  down: '📉 Down',
  stable: '➖ Stable',
};

const FOOTER = { text: 'Price Tracker' };

export function formatPrice(price: number, currency = 'INR'): string {
  return `${currency} ${price.toFixed(2)}`;
}

export function createProductEmbed(info: ProductInfo, targetPrice?: number, currency?: string): EmbedBuilder {
  const belowTarget = targetPrice !== undefined && info.price <= targetPrice;

  const embed = new EmbedBuilder()
    .setColor(targetPrice === undefined ? COLORS.info : belowTarget ? COLORS.below_target : COLORS.above_target)
    .setTitle(info.name.slice(0, 256) || 'Unknown product')
    .setURL(info.url)
    .setTimestamp()
    .setFooter(FOOTER)
    .addFields(
      { name: 'Price', value: formatPrice(info.price, currency), inline: true },
      { name: 'Site', value: info.site, inline: true }
    );

  if (targetPrice !== undefined) {
    embed.addFields({ name: 'Target', value: formatPrice(targetPrice, currency), inline: true });
  }

  return embed;
}

export function createHistoryEmbed(
  product: Product,
  history: PriceSnapshot[],
  stats: PriceStats | null,
  trend: TrendDirection,
  currency?: string
): EmbedBuilder {
  const lines = history.map(entry => `${entry.observed_at} -> ${formatPrice(entry.price, entry.currency)}`);

  const embed = new EmbedBuilder()
    .setColor(COLORS.info)
    .setTitle(`Price History: product ${product.id}`)
    .setURL(product.url)
    .setDescription('```\n' + lines.join('\n') + '\n```')
    .setTimestamp()
    .setFooter(FOOTER)
    .addFields({ name: 'Target', value: formatPrice(product.target_price, currency), inline: true });

  if (stats) {
    embed.addFields(
      { name: 'Min', value: stats.min.toFixed(2), inline: true },
      { name: 'Max', value: stats.max.toFixed(2), inline: true },
      { name: 'Average', value: stats.avg.toFixed(2), inline: true },
      { name: 'Records', value: String(stats.count), inline: true }
    );
  }

  embed.addFields({ name: 'Trend (recent)', value: TREND_LABELS[trend], inline: true });

  return embed;
}

export function createStatusEmbed(
  products: Product[],
  intervalMinutes: number,
  lastSummary: CheckSummary | null,
  checking: boolean
): EmbedBuilder {
  const activeCount = products.filter(p => p.active).length;

  const embed = new EmbedBuilder()
    .setColor(COLORS.info)
    .setTitle('Price Tracker Status')
    .setTimestamp()
    .setFooter(FOOTER)
    .addFields(
      { name: 'Products Tracked', value: String(products.length), inline: true },
      { name: 'Active', value: String(activeCount), inline: true },
      { name: 'Paused', value: String(products.length - activeCount), inline: true },
      { name: 'Check Interval', value: `${intervalMinutes} min`, inline: true },
      { name: 'Check Running', value: checking ? 'Yes' : 'No', inline: true }
    );

  if (lastSummary) {
    embed.addFields({
      name: 'Last Check',
      value:
        `${new Date(lastSummary.finishedAt).toLocaleString()}\n` +
        `Processed ${lastSummary.processed}, scraped ${lastSummary.scraped}, ` +
        `failed ${lastSummary.failed}, alerts sent ${lastSummary.notificationsSent}`,
      inline: false,
    });
  }

  return embed;
}
