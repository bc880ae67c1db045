import { z } from 'zod';
import type { Config } from './types.js';

const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1),
  DISCORD_CLIENT_ID: z.string().min(1),
  DISCORD_GUILD_ID: z.string().optional(),
  DATABASE_PATH: z.string().min(1).default('./data/tracker.db'),
  CHECK_INTERVAL_MINUTES: z.string().transform(Number).pipe(z.number().int().positive()).default('60'),
  ALERT_COOLDOWN_MINUTES: z.string().transform(Number).pipe(z.number().nonnegative()).default('60'),
  REQUEST_TIMEOUT_SECONDS: z.string().transform(Number).pipe(z.number().positive()).default('10'),
  DEFAULT_CURRENCY: z.string().min(1).default('INR'),
  ALERT_RECIPIENT_EMAIL: z.string().email().optional(),
  ALERT_EMAIL: z.string().email().optional(),
  RESEND_API_KEY: z.string().min(1).optional(),
  EMAIL_FROM: z.string().min(1).default('Price Tracker <alerts@example.com>'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.parse(dropEmpty(env));

  return {
    discord: {
      token: parsed.DISCORD_TOKEN,
      clientId: parsed.DISCORD_CLIENT_ID,
      guildId: parsed.DISCORD_GUILD_ID,
    },
    monitoring: {
      checkIntervalMinutes: parsed.CHECK_INTERVAL_MINUTES,
      alertCooldownMinutes: parsed.ALERT_COOLDOWN_MINUTES,
      requestTimeoutSeconds: parsed.REQUEST_TIMEOUT_SECONDS,
      currency: parsed.DEFAULT_CURRENCY,
    },
    alerts: {
      recipientEmail: parsed.ALERT_RECIPIENT_EMAIL ?? parsed.ALERT_EMAIL,
      resendApiKey: parsed.RESEND_API_KEY,
      from: parsed.EMAIL_FROM,
    },
    databasePath: parsed.DATABASE_PATH,
  };
}

// A blank line in .env means "unset", not an empty value.
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  return Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1] !== '')
  );
}
