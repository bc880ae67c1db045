import type { Command } from '../bot.js';
import type { MonitorOrchestrator } from '../monitors/index.js';
import type { Database } from '../services/database.js';
import type { ProductResolver } from '../services/scraper.js';
import type { Config } from '../types.js';
import { createTrackCommand } from './track.js';
import { createHistoryCommand } from './history.js';
import { createStatusCommand } from './status.js';
import { createScrapeCommand } from './scrape.js';
import { createConfigCommand } from './config.js';

export interface CommandContext {
  db: Database;
  config: Config;
  scraper: ProductResolver;
  monitor: MonitorOrchestrator;
}

export function loadCommands({ db, config, scraper, monitor }: CommandContext): Command[] {
  return [
    createTrackCommand(db, scraper, config.monitoring.currency),
    createHistoryCommand(db, config.monitoring.currency),
    createStatusCommand(db, monitor),
    createScrapeCommand(scraper),
    createConfigCommand(db, config),
  ];
}
