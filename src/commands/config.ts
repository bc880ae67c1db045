import {
  SlashCommandBuilder,
  ChatInputCommandInteraction,
  PermissionFlagsBits,
  MessageFlags,
} from 'discord.js';
import type { Command } from '../bot.js';
import type { Database } from '../services/database.js';
import type { BotSettings, Config } from '../types.js';
import { recipientEmailSchema, validate } from '../utils/validation.js';

const SETTING_KEYS = {
  alert_recipient: 'Alert Recipient',
  check_interval_minutes: 'Check Interval (minutes)',
} as const;

export function createConfigCommand(db: Database, config: Config): Command {
  const data = new SlashCommandBuilder()
    .setName('config')
    .setDescription('Configure tracker settings (Admin only)')
    .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
    .addSubcommand(sub =>
      sub
        .setName('show')
        .setDescription('Show current configuration')
    )
    .addSubcommand(sub =>
      sub
        .setName('recipient')
        .setDescription('Set the email address that receives price drop alerts')
        .addStringOption(opt =>
          opt
            .setName('email')
            .setDescription('Recipient email. Leave empty to reset to default.')
        )
    )
    .addSubcommand(sub =>
      sub
        .setName('interval')
        .setDescription('Set how often prices are checked')
        .addIntegerOption(opt =>
          opt
            .setName('minutes')
            .setDescription('Check interval in minutes (min: 1). Leave empty to reset to default.')
            .setMinValue(1)
            .setMaxValue(1440)
        )
    )
    .addSubcommand(sub =>
      sub
        .setName('reset')
        .setDescription('Reset all settings to .env defaults')
    );

  return {
    data,
    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      const subcommand = interaction.options.getSubcommand();

      switch (subcommand) {
        case 'show':
          await handleShow(interaction, db, config);
          break;
        case 'recipient':
          await handleRecipient(interaction, db);
          break;
        case 'interval':
          await handleInterval(interaction, db);
          break;
        case 'reset':
          await handleReset(interaction, db);
          break;
      }
    },
  };
}

/** Lines of the `/config show` reply: runtime overrides first, `.env` defaults otherwise. */
export function describeSettings(settings: BotSettings, config: Config): string[] {
  const defaultRecipient = config.alerts.recipientEmail ?? '(not set)';
  const interval =
    settings.checkIntervalMinutes !== null
      ? `${settings.checkIntervalMinutes} min`
      : `${config.monitoring.checkIntervalMinutes} min (default from .env)`;

  return [
    '**Current Configuration**',
    '',
    '**Alerts:**',
    `- ${SETTING_KEYS.alert_recipient}: ${settings.alertRecipient ?? `${defaultRecipient} (default from .env)`}`,
    `- Email delivery: ${config.alerts.resendApiKey ? '✅ Configured' : '❌ RESEND_API_KEY not set'}`,
    `- Cooldown: ${config.monitoring.alertCooldownMinutes} min`,
    '',
    '**Timing:**',
    `- ${SETTING_KEYS.check_interval_minutes}: ${interval}`,
    `- Request Timeout: ${config.monitoring.requestTimeoutSeconds}s`,
  ];
}

async function handleShow(interaction: ChatInputCommandInteraction, db: Database, config: Config): Promise<void> {
  const lines = describeSettings(db.getBotSettings(), config);
  await interaction.reply({ content: lines.join('\n'), flags: MessageFlags.Ephemeral });
}

async function handleRecipient(interaction: ChatInputCommandInteraction, db: Database): Promise<void> {
  const email = interaction.options.getString('email');

  if (email === null) {
    db.setBotSetting('alert_recipient', null);
    await interaction.reply({
      content: '✅ Alert recipient reset to .env default',
      flags: MessageFlags.Ephemeral,
    });
    return;
  }

  const recipient = validate(recipientEmailSchema, email);
  if (!recipient.ok) {
    await interaction.reply({ content: `❌ ${recipient.error}`, flags: MessageFlags.Ephemeral });
    return;
  }

  db.setBotSetting('alert_recipient', recipient.value);
  await interaction.reply({
    content: `✅ Price drop alerts will now be emailed to **${recipient.value}**`,
    flags: MessageFlags.Ephemeral,
  });
}

async function handleInterval(interaction: ChatInputCommandInteraction, db: Database): Promise<void> {
  const minutes = interaction.options.getInteger('minutes');

  if (minutes !== null) {
    db.setBotSetting('check_interval_minutes', minutes.toString());
    await interaction.reply({
      content: `✅ Check interval set to **${minutes} minutes**\n⚠️ Restart the bot for this change to take effect.`,
      flags: MessageFlags.Ephemeral,
    });
  } else {
    db.setBotSetting('check_interval_minutes', null);
    await interaction.reply({
      content: `✅ Check interval reset to .env default\n⚠️ Restart the bot for this change to take effect.`,
      flags: MessageFlags.Ephemeral,
    });
  }
}

async function handleReset(interaction: ChatInputCommandInteraction, db: Database): Promise<void> {
  for (const key of Object.keys(SETTING_KEYS)) {
    db.setBotSetting(key, null);
  }

  await interaction.reply({
    content: '✅ All settings reset to .env defaults\n⚠️ Restart the bot for interval changes to take effect.',
    flags: MessageFlags.Ephemeral,
  });
}
