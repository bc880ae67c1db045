import { Events } from 'discord.js';
import { createClient } from './bot.js';
import { loadConfig } from './config.js';
import { Database } from './services/database.js';
import { ProductScraper } from './services/scraper.js';
import { createMonitor } from './monitors/index.js';
import { loadCommands } from './commands/index.js';
import fs from 'node:fs';
import path from 'node:path';

async function main(): Promise<void> {
  console.log('[Main] Starting Price Tracker Bot...');

  const config = loadConfig();
  console.log('[Main] Configuration loaded');

  const dataDir = path.dirname(config.databasePath);
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
  }

  const db = new Database(config.databasePath);
  console.log('[Main] Database initialized');

  const monitor = createMonitor(config, db);
  const scraper = new ProductScraper({ timeoutSeconds: config.monitoring.requestTimeoutSeconds });
  const client = createClient();

  const commands = loadCommands({ db, config, scraper, monitor });
  for (const command of commands) {
    client.commands.set(command.data.name, command);
  }
  console.log(`[Main] Loaded ${commands.length} commands`);

  client.once(Events.ClientReady, (readyClient) => {
    console.log(`[Main] Logged in as ${readyClient.user.tag}`);
    monitor.start();
  });

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    console.log('[Main] Shutting down...');
    await monitor.stop();
    db.close();
    await client.destroy();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      console.error('[Main] Error during shutdown:', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await client.login(config.discord.token);
}

main().catch((error) => {
  console.error('[Main] Fatal error:', error);
  process.exit(1);
});
