import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import type { Command } from '../bot.js';
import type { MonitorOrchestrator } from '../monitors/index.js';
import type { Database } from '../services/database.js';
import { createStatusEmbed } from '../utils/embed.js';

export function createStatusCommand(db: Database, monitor: MonitorOrchestrator): Command {
  return {
    data: new SlashCommandBuilder()
      .setName('status')
      .setDescription('Show tracker status and the last check summary'),

    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      const embed = createStatusEmbed(
        db.listProducts(),
        monitor.intervalMinutes,
        monitor.getLastSummary(),
        monitor.isChecking()
      );

      await interaction.reply({ embeds: [embed] });
    },
  };
}
