import { REST, Routes } from 'discord.js';
import { loadConfig } from './config.js';
import { Database } from './services/database.js';
import { ProductScraper } from './services/scraper.js';
import { createMonitor } from './monitors/index.js';
import { loadCommands } from './commands/index.js';

async function deployCommands(): Promise<void> {
  const config = loadConfig();
  const db = new Database(':memory:');
  const commands = loadCommands({
    db,
    config,
    scraper: new ProductScraper(),
    monitor: createMonitor(config, db),
  });

  const commandData = commands.map(c => c.data.toJSON());

  const rest = new REST().setToken(config.discord.token);

  try {
    console.log(`Deploying ${commandData.length} commands...`);

    if (config.discord.guildId) {
      await rest.put(
        Routes.applicationGuildCommands(config.discord.clientId, config.discord.guildId),
        { body: commandData }
      );
      console.log(`Commands deployed to guild ${config.discord.guildId}`);
    } else {
      await rest.put(
        Routes.applicationCommands(config.discord.clientId),
        { body: commandData }
      );
      console.log('Commands deployed globally (may take up to 1 hour to propagate)');
    }
  } finally {
    db.close();
  }
}

deployCommands().catch((error) => {
  console.error('Failed to deploy commands:', error);
  process.exit(1);
});
