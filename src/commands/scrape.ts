import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import type { Command } from '../bot.js';
import { ScrapeError } from '../errors.js';
import type { ProductResolver } from '../services/scraper.js';
import { createProductEmbed } from '../utils/embed.js';
import { productUrlSchema, validate } from '../utils/validation.js';
import { SITE_CHOICES } from './product-options.js';

export function createScrapeCommand(scraper: ProductResolver): Command {
  return {
    data: new SlashCommandBuilder()
      .setName('scrape')
      .setDescription('Fetch the current name and price of a page without tracking it')
      .addStringOption(option =>
        option.setName('url').setDescription('Product page URL').setRequired(true)
      )
      .addStringOption(option =>
        option
          .setName('site')
          .setDescription('Which site the page belongs to')
          .addChoices(...SITE_CHOICES)
      ),

    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      const url = validate(productUrlSchema, interaction.options.getString('url', true));
      if (!url.ok) {
        await interaction.reply(`❌ Invalid URL: ${url.error}`);
        return;
      }

      await interaction.deferReply();

      try {
        const info = await scraper.resolve(url.value, interaction.options.getString('site'));
        await interaction.editReply({ embeds: [createProductEmbed(info)] });
      } catch (error) {
        if (!(error instanceof ScrapeError)) throw error;
        await interaction.editReply(`❌ Could not read the page (${error.kind}): ${error.message}`);
      }
    },
  };
}
