import { SlashCommandBuilder, MessageFlags } from 'discord.js';
import type { ChatInputCommandInteraction, AutocompleteInteraction } from 'discord.js';
import type { Command } from '../bot.js';
import { ScrapeError } from '../errors.js';
import { normalizeSite } from '../extractors/index.js';
import type { Database } from '../services/database.js';
import type { ProductResolver } from '../services/scraper.js';
import { createProductEmbed, formatPrice } from '../utils/embed.js';
import { productUrlSchema, targetPriceSchema, validate } from '../utils/validation.js';
import { respondWithProducts, SITE_CHOICES } from './product-options.js';

export function createTrackCommand(db: Database, scraper: ProductResolver, currency: string): Command {
  const data = new SlashCommandBuilder()
    .setName('track')
    .setDescription('Manage tracked products')
    .addSubcommand(sub =>
      sub
        .setName('add')
        .setDescription('Start tracking a product page')
        .addStringOption(opt =>
          opt.setName('url').setDescription('Product page URL').setRequired(true)
        )
        .addNumberOption(opt =>
          opt
            .setName('target')
            .setDescription('Alert when the price is at or below this value')
            .setRequired(true)
            .setMinValue(0.01)
        )
        .addStringOption(opt =>
          opt
            .setName('site')
            .setDescription('Which site the page belongs to')
            .addChoices(...SITE_CHOICES)
        )
    )
    .addSubcommand(sub =>
      sub
        .setName('list')
        .setDescription('List all tracked products')
    )
    .addSubcommand(sub =>
      sub
        .setName('toggle')
        .setDescription('Pause or resume tracking for a product')
        .addIntegerOption(opt =>
          opt.setName('id').setDescription('Product ID').setRequired(true).setAutocomplete(true)
        )
    )
    .addSubcommand(sub =>
      sub
        .setName('target')
        .setDescription('Change the target price of a product')
        .addIntegerOption(opt =>
          opt.setName('id').setDescription('Product ID').setRequired(true).setAutocomplete(true)
        )
        .addNumberOption(opt =>
          opt.setName('price').setDescription('New target price').setRequired(true).setMinValue(0.01)
        )
    );

  return {
    data,
    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      const subcommand = interaction.options.getSubcommand();

      switch (subcommand) {
        case 'add':
          await handleAdd(interaction, db, scraper, currency);
          break;
        case 'list':
          await handleList(interaction, db, currency);
          break;
        case 'toggle':
          await handleToggle(interaction, db);
          break;
        case 'target':
          await handleTarget(interaction, db, currency);
          break;
      }
    },
    async autocomplete(interaction: AutocompleteInteraction): Promise<void> {
      await respondWithProducts(interaction, db);
    },
  };
}

async function handleAdd(
  interaction: ChatInputCommandInteraction,
  db: Database,
  scraper: ProductResolver,
  currency: string
): Promise<void> {
  const url = validate(productUrlSchema, interaction.options.getString('url', true));
  if (!url.ok) {
    await interaction.reply({ content: `❌ Invalid URL: ${url.error}`, flags: MessageFlags.Ephemeral });
    return;
  }

  const target = validate(targetPriceSchema, interaction.options.getNumber('target', true));
  if (!target.ok) {
    await interaction.reply({ content: `❌ Invalid price: ${target.error}`, flags: MessageFlags.Ephemeral });
    return;
  }

  const site = normalizeSite(interaction.options.getString('site'));
  const product = db.addProduct({ url: url.value, target_price: target.value, site });

  await interaction.deferReply();

  try {
    const info = await scraper.resolve(product.url, product.site);
    db.appendSnapshot(product.id, info.price, currency);

    await interaction.editReply({
      content: `✅ Tracking product **#${product.id}**. Initial price snapshot stored.`,
      embeds: [createProductEmbed(info, product.target_price, currency)],
    });
  } catch (error) {
    if (!(error instanceof ScrapeError)) throw error;

    console.error(`[Track] Initial scrape failed for ${product.url}:`, error.message);
    await interaction.editReply(
      `⚠️ Product **#${product.id}** saved, but the page could not be read: ${error.message}\n` +
        'It will be retried on the next scheduled check.'
    );
  }
}

async function handleList(interaction: ChatInputCommandInteraction, db: Database, currency: string): Promise<void> {
  const products = db.listProducts();

  if (products.length === 0) {
    await interaction.reply({
      content: 'No products are being tracked yet. Use `/track add` to start.',
      flags: MessageFlags.Ephemeral,
    });
    return;
  }

  const lines = products.map(p => {
    const latest = db.getLatestSnapshot(p.id);
    const status = p.active ? 'active' : 'paused';
    const last = latest ? formatPrice(latest.price, latest.currency) : 'no data';
    return `• **#${p.id}** <${p.url}>\n  target ${formatPrice(p.target_price, currency)} · last ${last} · ${p.site} · ${status}`;
  });

  await interaction.reply({
    content: `**Tracked products:**\n${lines.join('\n')}`.slice(0, 2000),
    flags: MessageFlags.Ephemeral,
  });
}

async function handleToggle(interaction: ChatInputCommandInteraction, db: Database): Promise<void> {
  const id = interaction.options.getInteger('id', true);
  const product = db.getProduct(id);

  if (!product) {
    await interaction.reply({ content: `⚠️ No product found with ID ${id}`, flags: MessageFlags.Ephemeral });
    return;
  }

  const active = !product.active;
  db.setProductActive(id, active);

  await interaction.reply({
    content: `✅ Product **#${id}** is now ${active ? '**active**' : '**paused**'}`,
    flags: MessageFlags.Ephemeral,
  });
}

async function handleTarget(interaction: ChatInputCommandInteraction, db: Database, currency: string): Promise<void> {
  const id = interaction.options.getInteger('id', true);
  const price = validate(targetPriceSchema, interaction.options.getNumber('price', true));

  if (!price.ok) {
    await interaction.reply({ content: `❌ Invalid price: ${price.error}`, flags: MessageFlags.Ephemeral });
    return;
  }

  if (!db.updateTargetPrice(id, price.value)) {
    await interaction.reply({ content: `⚠️ No product found with ID ${id}`, flags: MessageFlags.Ephemeral });
    return;
  }

  await interaction.reply({
    content: `✅ Target price for **#${id}** set to **${formatPrice(price.value, currency)}**`,
    flags: MessageFlags.Ephemeral,
  });
}
