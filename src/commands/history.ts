import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction, AutocompleteInteraction } from 'discord.js';
import type { Command } from '../bot.js';
import type { Database } from '../services/database.js';
import { computeStats, trendDirection } from '../services/price-analyzer.js';
import { createHistoryEmbed } from '../utils/embed.js';
import { respondWithProducts } from './product-options.js';

const DEFAULT_LIMIT = 10;

export function createHistoryCommand(db: Database, currency: string): Command {
  return {
    data: new SlashCommandBuilder()
      .setName('history')
      .setDescription('Show price history, statistics and trend for a product')
      .addIntegerOption(option =>
        option
          .setName('id')
          .setDescription('Product ID')
          .setRequired(true)
          .setAutocomplete(true)
      )
      .addIntegerOption(option =>
        option
          .setName('limit')
          .setDescription(`How many recent records to show (default ${DEFAULT_LIMIT})`)
          .setMinValue(1)
          .setMaxValue(25)
      ),

    async autocomplete(interaction: AutocompleteInteraction): Promise<void> {
      await respondWithProducts(interaction, db);
    },

    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      const id = interaction.options.getInteger('id', true);
      const limit = interaction.options.getInteger('limit') ?? DEFAULT_LIMIT;

      const product = db.getProduct(id);
      if (!product) {
        await interaction.reply(`No product found with ID ${id}`);
        return;
      }

      const history = db.getHistory(id);
      if (history.length === 0) {
        await interaction.reply(`No price history for product #${id} yet.`);
        return;
      }

      const embed = createHistoryEmbed(
        product,
        history.slice(0, limit),
        computeStats(history),
        trendDirection(history),
        currency
      );

      await interaction.reply({ embeds: [embed] });
    },
  };
}
